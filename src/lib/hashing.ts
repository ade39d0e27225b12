import { keccak_256 } from '@noble/hashes/sha3';
import { toHex, utf8Bytes, type Hex } from './encoding.js';

/** Prefix that turns an assertion into its revocation message */
export const REVOKED_PREFIX = 'Revoked: ';

export function keccak256(data: Uint8Array): Uint8Array {
  return keccak_256(data);
}

export function keccak256Hex(data: Uint8Array): Hex {
  return toHex(keccak_256(data));
}

export function hashText(text: string): Hex {
  return keccak256Hex(utf8Bytes(text));
}

export function revocationText(text: string): string {
  return REVOKED_PREFIX + text;
}

export function assertionIdOf(text: string): Hex {
  return hashText(text);
}

export function revokeIdOf(text: string): Hex {
  return hashText(revocationText(text));
}
