/**
 * Structured-data hashing (EIP-712).
 *
 * Every signature the registry accepts is made over
 * `0x19 0x01 ‖ domainSeparator ‖ hashStruct(message)`, so a signature for one
 * registry instance, chain or message type cannot be replayed against another.
 */
import { keccak256 } from './hashing.js';
import { concatBytes, fromHex, leftPadWord, toHex, uint256Word, utf8Bytes, type Hex } from './encoding.js';
import { isAddress, type Address } from './address.js';

export interface TypedDataField {
  name: string;
  type: string;
}

export type TypedDataTypes = Record<string, readonly TypedDataField[]>;

export type TypedValue = string | number | bigint | boolean | Uint8Array | TypedMessage;

export interface TypedMessage {
  [field: string]: TypedValue;
}

export interface TypedDataDomain {
  name: string;
  version: string;
  chainId: number | bigint;
  verifyingContract: Address;
}

export interface TypedData {
  domain: TypedDataDomain;
  types: TypedDataTypes;
  primaryType: string;
  message: TypedMessage;
}

export const DOMAIN_TYPE: readonly TypedDataField[] = [
  { name: 'name', type: 'string' },
  { name: 'version', type: 'string' },
  { name: 'chainId', type: 'uint256' },
  { name: 'verifyingContract', type: 'address' },
];

/** The message type signed by attestors, for attest and revoke alike */
export const ATTESTATION_TYPES: TypedDataTypes = {
  attestation: [
    { name: 'assertion', type: 'string' },
    { name: 'signdate', type: 'uint256' },
  ],
};

export const ATTESTATION_PRIMARY_TYPE = 'attestation';

function collectDependencies(type: string, types: TypedDataTypes, found: Set<string>): Set<string> {
  const fields = types[type];
  if (found.has(type) || !fields) return found;
  found.add(type);
  for (const field of fields) {
    collectDependencies(field.type, types, found);
  }
  return found;
}

/** `Primary(type name,...)` followed by referenced struct types in name order */
export function encodeType(primaryType: string, types: TypedDataTypes): string {
  if (!types[primaryType]) {
    throw new Error(`Unknown struct type: ${primaryType}`);
  }
  const deps = [...collectDependencies(primaryType, types, new Set())].filter((t) => t !== primaryType).sort();
  return [primaryType, ...deps]
    .map((name) => {
      const fields = types[name] ?? [];
      return `${name}(${fields.map((f) => `${f.type} ${f.name}`).join(',')})`;
    })
    .join('');
}

export function typeHash(primaryType: string, types: TypedDataTypes): Uint8Array {
  return keccak256(utf8Bytes(encodeType(primaryType, types)));
}

function asBigInt(type: string, value: TypedValue): bigint {
  if (typeof value === 'bigint') return value;
  if (typeof value === 'number' && Number.isSafeInteger(value)) return BigInt(value);
  if (typeof value === 'string' && /^-?(0x[0-9a-fA-F]+|\d+)$/.test(value)) {
    return value.startsWith('-') ? -BigInt(value.slice(1)) : BigInt(value);
  }
  throw new Error(`Expected an integer for ${type}, got ${String(value)}`);
}

function asBytes(type: string, value: TypedValue): Uint8Array {
  if (value instanceof Uint8Array) return value;
  if (typeof value === 'string') return fromHex(value);
  throw new Error(`Expected bytes for ${type}`);
}

function encodeValue(type: string, value: TypedValue, types: TypedDataTypes): Uint8Array {
  if (types[type]) {
    if (typeof value !== 'object' || value instanceof Uint8Array) {
      throw new Error(`Expected a struct for ${type}`);
    }
    return hashStruct(type, value, types);
  }

  if (type === 'string') {
    if (typeof value !== 'string') throw new Error('Expected a string');
    return keccak256(utf8Bytes(value));
  }
  if (type === 'bytes') {
    return keccak256(asBytes(type, value));
  }
  if (type === 'bool') {
    if (typeof value !== 'boolean') throw new Error('Expected a boolean');
    return uint256Word(value ? 1n : 0n);
  }
  if (type === 'address') {
    if (typeof value !== 'string' || !isAddress(value)) throw new Error(`Invalid address: ${String(value)}`);
    return leftPadWord(fromHex(value));
  }

  const fixedBytes = /^bytes(\d+)$/.exec(type);
  if (fixedBytes) {
    const size = Number(fixedBytes[1]);
    const bytes = asBytes(type, value);
    if (size < 1 || size > 32 || bytes.length !== size) {
      throw new Error(`Expected ${size} bytes for ${type}`);
    }
    const word = new Uint8Array(32);
    word.set(bytes);
    return word;
  }

  const integer = /^(u?)int(\d*)$/.exec(type);
  if (integer) {
    const bits = integer[2] ? Number(integer[2]) : 256;
    const n = asBigInt(type, value);
    if (integer[1] === 'u') {
      if (n < 0n || n >= 1n << BigInt(bits)) throw new Error(`Value out of range for ${type}`);
      return uint256Word(n);
    }
    const limit = 1n << BigInt(bits - 1);
    if (n < -limit || n >= limit) throw new Error(`Value out of range for ${type}`);
    return uint256Word(n < 0n ? (1n << 256n) + n : n);
  }

  throw new Error(`Unsupported typed-data type: ${type}`);
}

export function hashStruct(primaryType: string, data: TypedMessage, types: TypedDataTypes): Uint8Array {
  const fields = types[primaryType];
  if (!fields) throw new Error(`Unknown struct type: ${primaryType}`);
  const encoded = fields.map((field) => {
    const value = data[field.name];
    if (value === undefined) throw new Error(`Missing field '${field.name}' in ${primaryType}`);
    return encodeValue(field.type, value, types);
  });
  return keccak256(concatBytes(typeHash(primaryType, types), ...encoded));
}

export function domainSeparator(domain: TypedDataDomain): Uint8Array {
  return hashStruct(
    'EIP712Domain',
    {
      name: domain.name,
      version: domain.version,
      chainId: BigInt(domain.chainId),
      verifyingContract: domain.verifyingContract,
    },
    { EIP712Domain: DOMAIN_TYPE },
  );
}

export function hashTypedData(data: TypedData): Uint8Array {
  return keccak256(
    concatBytes(
      new Uint8Array([0x19, 0x01]),
      domainSeparator(data.domain),
      hashStruct(data.primaryType, data.message, data.types),
    ),
  );
}

/** Digest of an `attestation(string assertion,uint256 signdate)` message */
export function attestationDigest(domain: TypedDataDomain, text: string, signedAt: number | bigint): Uint8Array {
  return hashTypedData({
    domain,
    types: ATTESTATION_TYPES,
    primaryType: ATTESTATION_PRIMARY_TYPE,
    message: { assertion: text, signdate: BigInt(signedAt) },
  });
}

export function attestationDigestHex(domain: TypedDataDomain, text: string, signedAt: number | bigint): Hex {
  return toHex(attestationDigest(domain, text, signedAt));
}
