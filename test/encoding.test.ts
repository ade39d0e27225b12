import { describe, it, expect } from 'vitest';
import {
  decodeDocument,
  detectFormat,
  encodeDocument,
  fromHex,
  leftPadWord,
  toHex,
  uint256Word,
} from '../src/lib/encoding.js';

describe('hex', () => {
  it('round-trips bytes', () => {
    expect(toHex(new Uint8Array([0, 1, 254, 255]))).toBe('0x0001feff');
    expect(Array.from(fromHex('0x0001feff'))).toEqual([0, 1, 254, 255]);
    expect(Array.from(fromHex('ABcd'))).toEqual([0xab, 0xcd]);
  });

  it('rejects odd length and non-hex digits', () => {
    expect(() => fromHex('0xabc')).toThrow("Invalid hex string: '0xabc'");
    expect(() => fromHex('0xzz')).toThrow("Invalid hex string: '0xzz'");
  });
});

describe('words', () => {
  it('encodes uint256 big-endian', () => {
    const word = uint256Word(258n);
    expect(word.length).toBe(32);
    expect(word[30]).toBe(1);
    expect(word[31]).toBe(2);
    expect(() => uint256Word(-1n)).toThrow('Value out of uint256 range: -1');
    expect(() => uint256Word(1n << 256n)).toThrow('Value out of uint256 range');
  });

  it('left-pads short values', () => {
    const word = leftPadWord(new Uint8Array([7]));
    expect(word[31]).toBe(7);
    expect(word.subarray(0, 31).every((b) => b === 0)).toBe(true);
    expect(() => leftPadWord(new Uint8Array(33))).toThrow('Cannot pad 33 bytes into a 32-byte word');
  });
});

describe('documents', () => {
  it('writes pretty JSON with sorted keys and a trailing newline', () => {
    const out = encodeDocument({ b: 1, a: { d: [2, 1], c: 'x' } }).toString('utf8');
    expect(out).toBe('{\n  "a": {\n    "c": "x",\n    "d": [\n      2,\n      1\n    ]\n  },\n  "b": 1\n}\n');
  });

  it('detects and decodes both formats', () => {
    const doc = { schemaVersion: 1, name: 'test', list: [1, 2, 3] };
    const json = encodeDocument(doc, 'json');
    const cbor = encodeDocument(doc, 'cbor');
    expect(detectFormat(json)).toBe('json');
    expect(detectFormat(cbor)).toBe('cbor');
    expect(decodeDocument(json)).toEqual(doc);
    expect(decodeDocument(cbor)).toEqual(doc);
  });

  it('treats leading whitespace before a brace as JSON', () => {
    expect(detectFormat(Buffer.from('  \n{"a":1}'))).toBe('json');
    expect(decodeDocument(Buffer.from('  \n{"a":1}'))).toEqual({ a: 1 });
  });
});
