import { secp256k1 } from '@noble/curves/secp256k1';
import { addressFromPublicKey, sameAddress, type Address } from './address.js';
import { fromHex, toHex, type Hex } from './encoding.js';
import { ErrorCode, SignatureError } from './errors.js';
import { attestationDigest, type TypedDataDomain } from './typed-data.js';

const SIGNATURE_LENGTH = 65;
const HALF_ORDER = secp256k1.CURVE.n >> 1n;

/** Sign a 32-byte digest; returns `r ‖ s ‖ v` with v in {27, 28} */
export function signDigest(digest: Uint8Array, privateKey: Uint8Array): Hex {
  const sig = secp256k1.sign(digest, privateKey);
  const out = new Uint8Array(SIGNATURE_LENGTH);
  out.set(sig.toCompactRawBytes(), 0);
  out[64] = 27 + sig.recovery;
  return toHex(out);
}

/**
 * Recover the signing address of a digest.
 * Returns null for anything malformed: wrong length, bad v, high-s or a point off the curve.
 */
export function recoverDigestSigner(digest: Uint8Array, signature: string | Uint8Array): Address | null {
  let bytes: Uint8Array;
  try {
    bytes = typeof signature === 'string' ? fromHex(signature) : signature;
  } catch {
    return null;
  }
  if (bytes.length !== SIGNATURE_LENGTH) return null;

  const v = bytes[64];
  const recovery = v >= 27 ? v - 27 : v;
  if (recovery !== 0 && recovery !== 1) return null;

  try {
    const sig = secp256k1.Signature.fromCompact(bytes.subarray(0, 64)).addRecoveryBit(recovery);
    if (sig.r === 0n || sig.s === 0n || sig.s > HALF_ORDER) return null;
    const point = sig.recoverPublicKey(digest);
    return addressFromPublicKey(point.toRawBytes(false));
  } catch {
    return null;
  }
}

export function signAttestation(
  privateKey: Uint8Array,
  domain: TypedDataDomain,
  text: string,
  signedAt: number,
): Hex {
  return signDigest(attestationDigest(domain, text, signedAt), privateKey);
}

export function recoverAttestationSigner(
  domain: TypedDataDomain,
  text: string,
  signedAt: number,
  signature: string | Uint8Array,
): Address | null {
  if (!Number.isSafeInteger(signedAt) || signedAt < 0) return null;
  return recoverDigestSigner(attestationDigest(domain, text, signedAt), signature);
}

/**
 * Check that `signer` signed `(text, signedAt)` under `domain`.
 * @throws SignatureError when the timestamp is zero or the signature does not recover to `signer`
 */
export function verifyAttestationSignature(
  domain: TypedDataDomain,
  text: string,
  signedAt: number,
  signer: Address,
  signature: string | Uint8Array,
): void {
  if (signedAt === 0) {
    throw new SignatureError(ErrorCode.INVALID_SIGNATURE, 'Invalid signature');
  }
  const recovered = recoverAttestationSigner(domain, text, signedAt, signature);
  if (recovered === null || !sameAddress(recovered, signer)) {
    throw new SignatureError(ErrorCode.INVALID_SIGNATURE, 'Invalid signature');
  }
}
