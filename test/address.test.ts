import { describe, it, expect } from 'vitest';
import {
  addressFromPublicKey,
  isAddress,
  isZeroAddress,
  sameAddress,
  toChecksumAddress,
  ZERO_ADDRESS,
} from '../src/lib/address.js';
import { testKey } from './helpers.js';

const CHECKSUMMED = [
  '0x5aAeb6053F3E94C9b9A09f33669435E7Ef1BeAed',
  '0xfB6916095ca1df60bB79Ce92cE3Ea74c37c5d359',
  '0xdbF03B407c01E7cD3CBea99509d93f8DDDC8C6FB',
  '0xD1220A0cf47c7B9Be7A2E6BA89F429762e7b9aDb',
];

describe('addresses', () => {
  it('applies the EIP-55 mixed-case checksum', () => {
    for (const expected of CHECKSUMMED) {
      expect(toChecksumAddress(expected.toLowerCase())).toBe(expected);
      expect(toChecksumAddress(expected.toUpperCase().replace('0X', '0x'))).toBe(expected);
    }
  });

  it('validates shape', () => {
    expect(isAddress(CHECKSUMMED[0])).toBe(true);
    expect(isAddress('0x1234')).toBe(false);
    expect(isAddress('5aAeb6053F3E94C9b9A09f33669435E7Ef1BeAed')).toBe(false);
    expect(() => toChecksumAddress('0xzz')).toThrow("Invalid address: '0xzz'");
  });

  it('compares case-insensitively', () => {
    expect(sameAddress(CHECKSUMMED[0], CHECKSUMMED[0].toLowerCase())).toBe(true);
    expect(sameAddress(CHECKSUMMED[0], CHECKSUMMED[1])).toBe(false);
    expect(isZeroAddress(ZERO_ADDRESS)).toBe(true);
  });

  it('derives the address of private key 1', () => {
    const key = testKey(1);
    expect(key.address).toBe('0x7E5F4552091A69125d5DfCb7b8C2659029395Bdf');
    expect(addressFromPublicKey(key.publicKey)).toBe(key.address);
  });

  it('rejects compressed public keys', () => {
    expect(() => addressFromPublicKey(new Uint8Array(33))).toThrow('Expected a 65-byte uncompressed public key');
  });
});
