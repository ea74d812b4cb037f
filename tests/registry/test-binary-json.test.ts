import { describe, it, expect } from 'vitest';
import { decodeBinaryJson, encodeBinaryJson, hasBinaryJsonTag, type JsonObject } from '../../src/registry/binary-json.js';
import { IndexParseError } from '../../src/errors.js';

const TAG_AND_VERSION = [0x71, 0x62, 0x6a, 0x73, 0x01, 0x00, 0x00, 0x00];

function u32(value: number): number[] {
  return [value & 0xff, (value >>> 8) & 0xff, (value >>> 16) & 0xff, (value >>> 24) & 0xff];
}

describe('encodeBinaryJson', () => {
  it('encodes an empty array as a bare container', () => {
    expect(Array.from(encodeBinaryJson([]))).toEqual([...TAG_AND_VERSION, ...u32(12), ...u32(0), ...u32(12)]);
  });

  it('marks objects in the container header', () => {
    expect(Array.from(encodeBinaryJson({}))).toEqual([...TAG_AND_VERSION, ...u32(12), ...u32(1), ...u32(12)]);
  });

  it('stores small integers inline in the value word', () => {
    // type 2 (number), inline flag, value 1 << 5
    expect(Array.from(encodeBinaryJson([1]))).toEqual([
      ...TAG_AND_VERSION,
      ...u32(16),
      ...u32(2),
      ...u32(12),
      ...u32(0x2a),
    ]);
  });

  it('writes keys as latin-1 strings padded to four bytes', () => {
    const bytes = encodeBinaryJson({ a: true });
    // entry at 12: word (bool, latin key, value 1), u16 length 1, 'a', padding
    expect(Array.from(bytes.subarray(8))).toEqual([
      ...u32(24),
      ...u32(3),
      ...u32(20),
      ...u32(0x31),
      0x01,
      0x00,
      0x61,
      0x00,
      ...u32(12),
    ]);
  });
});

describe('decodeBinaryJson', () => {
  it('keeps a __proto__ key as an ordinary member', () => {
    const source: JsonObject = JSON.parse('{"__proto__":"x","FileName":"a"}');
    const decoded = decodeBinaryJson(encodeBinaryJson(source));
    expect(Object.entries(decoded ?? {})).toEqual([
      ['FileName', 'a'],
      ['__proto__', 'x'],
    ]);
    expect(Object.getPrototypeOf(decoded)).toBe(Object.prototype);
  });

  it('decodes what the encoder writes', () => {
    const value = {
      FileName: 'plugins/a.mjs',
      KPlugin: { Id: 'demo', ServiceTypes: ['KPackage/Theme', 'Plasma/Applet'], Name: 'Grüße 日本' },
      Weight: -12,
      Big: 2 ** 30,
      Ratio: 1.5,
      Enabled: false,
      Icon: null,
      Nested: [[1, 2], { x: 'y' }],
    };
    expect(decodeBinaryJson(encodeBinaryJson(value))).toEqual(value);
  });

  it('decodes the inline integer range edges', () => {
    expect(decodeBinaryJson(encodeBinaryJson([-(2 ** 26), 2 ** 26 - 1, 2 ** 26]))).toEqual([
      -(2 ** 26),
      2 ** 26 - 1,
      2 ** 26,
    ]);
  });

  it('rejects data without the tag', () => {
    const bytes = new Uint8Array(20);
    expect(() => decodeBinaryJson(bytes)).toThrow(IndexParseError);
    expect(() => decodeBinaryJson(bytes)).toThrow(/missing binary JSON tag/);
  });

  it('rejects short documents', () => {
    expect(() => decodeBinaryJson(new Uint8Array(TAG_AND_VERSION))).toThrow(/too short/);
  });

  it('rejects other versions', () => {
    const bytes = encodeBinaryJson([]);
    bytes[4] = 2;
    expect(() => decodeBinaryJson(bytes)).toThrow(/unsupported version 2/);
  });

  it('rejects truncated containers', () => {
    const bytes = encodeBinaryJson(['hello world']);
    expect(() => decodeBinaryJson(bytes.subarray(0, bytes.byteLength - 4))).toThrow(IndexParseError);
  });

  it('rejects unknown value types', () => {
    const bytes = new Uint8Array([...TAG_AND_VERSION, ...u32(16), ...u32(2), ...u32(12), ...u32(6)]);
    expect(() => decodeBinaryJson(bytes)).toThrow(/unknown value type 6/);
  });

  it('rejects tables that point past the container', () => {
    const bytes = new Uint8Array([...TAG_AND_VERSION, ...u32(16), ...u32(4), ...u32(12), ...u32(0x2a)]);
    expect(() => decodeBinaryJson(bytes)).toThrow(/table out of range/);
  });
});

describe('hasBinaryJsonTag', () => {
  it('detects the tag', () => {
    expect(hasBinaryJsonTag(encodeBinaryJson([]))).toBe(true);
    expect(hasBinaryJsonTag(new TextEncoder().encode('[]'))).toBe(false);
    expect(hasBinaryJsonTag(new Uint8Array(2))).toBe(false);
  });
});
