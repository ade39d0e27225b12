import { keccak_256 } from '@noble/hashes/sha3';
import { toHex, type Hex } from './encoding.js';

export type Address = Hex;

export const ZERO_ADDRESS: Address = '0x0000000000000000000000000000000000000000';

const ADDRESS_RE = /^0x[0-9a-fA-F]{40}$/;

export function isAddress(value: string): boolean {
  return ADDRESS_RE.test(value);
}

/** EIP-55 mixed-case checksum encoding */
export function toChecksumAddress(value: string): Address {
  if (!isAddress(value)) {
    throw new Error(`Invalid address: '${value}'`);
  }
  const lower = value.slice(2).toLowerCase();
  const digest = Buffer.from(keccak_256(Buffer.from(lower, 'ascii'))).toString('hex');
  let out = '';
  for (let i = 0; i < lower.length; i++) {
    out += parseInt(digest[i], 16) >= 8 ? lower[i].toUpperCase() : lower[i];
  }
  return `0x${out}`;
}

export function sameAddress(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

export function isZeroAddress(value: string): boolean {
  return sameAddress(value, ZERO_ADDRESS);
}

/** Address of an uncompressed (65-byte, 0x04-prefixed) secp256k1 public key */
export function addressFromPublicKey(uncompressed: Uint8Array): Address {
  if (uncompressed.length !== 65 || uncompressed[0] !== 0x04) {
    throw new Error('Expected a 65-byte uncompressed public key');
  }
  const digest = keccak_256(uncompressed.subarray(1));
  return toChecksumAddress(toHex(digest.subarray(12)));
}
