/**
 * Codec for the binary JSON container used by plugin index files.
 *
 * Layout (all integers little-endian):
 *
 *   header   u32 tag ('qbjs'), u32 version (1)
 *   base     u32 size, u32 (isObject:1 | length:31), u32 tableOffset, payload..., table
 *   value    u32 (type:3 | latinOrInt:1 | latinKey:1 | value:27)
 *
 * Every offset inside a base is relative to the start of that base. Array
 * tables hold value words; object tables hold offsets of entries, each entry
 * being a value word followed by its key.
 */

import { IndexParseError } from '../errors.js';

export type JsonValue = null | boolean | number | string | JsonValue[] | JsonObject;
export interface JsonObject {
  [key: string]: JsonValue;
}

/** Add an own member, including keys such as `__proto__` that plain assignment would not create. */
export function setJsonMember(obj: JsonObject, key: string, value: JsonValue): void {
  Object.defineProperty(obj, key, { value, enumerable: true, writable: true, configurable: true });
}

export const BINARY_JSON_TAG = 0x736a6271;
export const BINARY_JSON_VERSION = 1;

const HEADER_SIZE = 8;
const BASE_HEADER_SIZE = 12;
const MAX_OFFSET = 0x7ffffff;
const MIN_INLINE_INT = -0x4000000;
const MAX_INLINE_INT = 0x3ffffff;

const ValueType = {
  Null: 0,
  Bool: 1,
  Double: 2,
  String: 3,
  Array: 4,
  Object: 5,
} as const;

/** True when `bytes` starts with the binary JSON tag. */
export function hasBinaryJsonTag(bytes: Uint8Array): boolean {
  if (bytes.byteLength < 4) return false;
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  return view.getUint32(0, true) === BINARY_JSON_TAG;
}

// ── Decoding ───────────────────────────────────────────────────────

class Reader {
  private readonly _view: DataView;
  private readonly _bytes: Uint8Array;

  constructor(bytes: Uint8Array) {
    this._bytes = bytes;
    this._view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  ensure(offset: number, length: number, limit: number = this._bytes.byteLength): void {
    if (offset < 0 || length < 0 || offset + length > limit) {
      throw new IndexParseError(`read of ${length} bytes past end of data`, offset);
    }
  }

  u16(offset: number, limit: number): number {
    this.ensure(offset, 2, limit);
    return this._view.getUint16(offset, true);
  }

  u32(offset: number, limit: number): number {
    this.ensure(offset, 4, limit);
    return this._view.getUint32(offset, true);
  }

  i32(offset: number, limit: number): number {
    this.ensure(offset, 4, limit);
    return this._view.getInt32(offset, true);
  }

  f64(offset: number, limit: number): number {
    this.ensure(offset, 8, limit);
    return this._view.getFloat64(offset, true);
  }

  latin1(offset: number, limit: number): string {
    const length = this.u16(offset, limit);
    this.ensure(offset + 2, length, limit);
    let out = '';
    for (let i = 0; i < length; i++) {
      out += String.fromCharCode(this._bytes[offset + 2 + i]);
    }
    return out;
  }

  utf16(offset: number, limit: number): string {
    const length = this.i32(offset, limit);
    if (length < 0) {
      throw new IndexParseError('negative string length', offset);
    }
    this.ensure(offset + 4, length * 2, limit);
    let out = '';
    for (let i = 0; i < length; i++) {
      out += String.fromCharCode(this._view.getUint16(offset + 4 + i * 2, true));
    }
    return out;
  }
}

function decodeBase(reader: Reader, baseOffset: number, limit: number): JsonValue {
  const size = reader.u32(baseOffset, limit);
  if (size < BASE_HEADER_SIZE) {
    throw new IndexParseError(`container size ${size} is smaller than its header`, baseOffset);
  }
  reader.ensure(baseOffset, size, limit);
  const baseEnd = baseOffset + size;

  const header = reader.u32(baseOffset + 4, baseEnd);
  const isObject = (header & 1) === 1;
  const length = header >>> 1;
  const tableOffset = reader.u32(baseOffset + 8, baseEnd);
  if (length > 0 && (tableOffset < BASE_HEADER_SIZE || tableOffset + length * 4 > size)) {
    throw new IndexParseError('container table out of range', baseOffset);
  }
  const table = baseOffset + tableOffset;

  if (!isObject) {
    const items: JsonValue[] = [];
    for (let i = 0; i < length; i++) {
      const word = reader.u32(table + i * 4, baseEnd);
      items.push(decodeValue(reader, word, baseOffset, baseEnd));
    }
    return items;
  }

  const obj: JsonObject = {};
  for (let i = 0; i < length; i++) {
    const entryOffset = baseOffset + reader.u32(table + i * 4, baseEnd);
    const word = reader.u32(entryOffset, baseEnd);
    const latinKey = ((word >>> 4) & 1) === 1;
    const key = latinKey ? reader.latin1(entryOffset + 4, baseEnd) : reader.utf16(entryOffset + 4, baseEnd);
    setJsonMember(obj, key, decodeValue(reader, word, baseOffset, baseEnd));
  }
  return obj;
}

function decodeValue(reader: Reader, word: number, baseOffset: number, baseEnd: number): JsonValue {
  const type = word & 7;
  const latinOrInt = ((word >>> 3) & 1) === 1;
  const value = word >>> 5;
  const dataOffset = baseOffset + value;

  switch (type) {
    case ValueType.Null:
      return null;
    case ValueType.Bool:
      return value !== 0;
    case ValueType.Double:
      // arithmetic shift sign-extends the 27-bit inline integer
      return latinOrInt ? (word | 0) >> 5 : reader.f64(dataOffset, baseEnd);
    case ValueType.String:
      return latinOrInt ? reader.latin1(dataOffset, baseEnd) : reader.utf16(dataOffset, baseEnd);
    case ValueType.Array:
    case ValueType.Object:
      if (value < BASE_HEADER_SIZE) {
        throw new IndexParseError('nested container overlaps its parent header', dataOffset);
      }
      return decodeBase(reader, dataOffset, baseEnd);
    default:
      throw new IndexParseError(`unknown value type ${type}`, dataOffset);
  }
}

/** Decode a tagged binary JSON document into its top-level array or object. */
export function decodeBinaryJson(bytes: Uint8Array): JsonValue {
  const reader = new Reader(bytes);
  if (bytes.byteLength < HEADER_SIZE + BASE_HEADER_SIZE) {
    throw new IndexParseError(`document of ${bytes.byteLength} bytes is too short`);
  }
  if (reader.u32(0, bytes.byteLength) !== BINARY_JSON_TAG) {
    throw new IndexParseError('missing binary JSON tag', 0);
  }
  const version = reader.u32(4, bytes.byteLength);
  if (version !== BINARY_JSON_VERSION) {
    throw new IndexParseError(`unsupported version ${version}`, 4);
  }
  return decodeBase(reader, HEADER_SIZE, bytes.byteLength);
}

// ── Encoding ───────────────────────────────────────────────────────

class Writer {
  private _buf: Uint8Array = new Uint8Array(64);
  private _view: DataView = new DataView(this._buf.buffer);
  length = 0;

  private _reserve(extra: number): void {
    if (this.length + extra <= this._buf.byteLength) return;
    let capacity = this._buf.byteLength * 2;
    while (capacity < this.length + extra) capacity *= 2;
    const next = new Uint8Array(capacity);
    next.set(this._buf.subarray(0, this.length));
    this._buf = next;
    this._view = new DataView(next.buffer);
  }

  u16(value: number): void {
    this._reserve(2);
    this._view.setUint16(this.length, value, true);
    this.length += 2;
  }

  u32(value: number): void {
    this._reserve(4);
    this._view.setUint32(this.length, value >>> 0, true);
    this.length += 4;
  }

  f64(value: number): void {
    this._reserve(8);
    this._view.setFloat64(this.length, value, true);
    this.length += 8;
  }

  bytes(data: Uint8Array): void {
    this._reserve(data.byteLength);
    this._buf.set(data, this.length);
    this.length += data.byteLength;
  }

  align(): void {
    while (this.length % 4 !== 0) {
      this._reserve(1);
      this._buf[this.length++] = 0;
    }
  }

  patchU32(offset: number, value: number): void {
    this._view.setUint32(offset, value >>> 0, true);
  }

  toBytes(): Uint8Array {
    return this._buf.slice(0, this.length);
  }
}

function isLatin1(s: string): boolean {
  if (s.length >= 0x8000) return false;
  for (let i = 0; i < s.length; i++) {
    if (s.charCodeAt(i) > 0xff) return false;
  }
  return true;
}

function writeString(w: Writer, s: string, latin: boolean): void {
  if (latin) {
    w.u16(s.length);
    const data = new Uint8Array(s.length);
    for (let i = 0; i < s.length; i++) data[i] = s.charCodeAt(i);
    w.bytes(data);
  } else {
    w.u32(s.length);
    for (let i = 0; i < s.length; i++) w.u16(s.charCodeAt(i));
  }
  w.align();
}

function makeWord(type: number, latinOrInt: boolean, latinKey: boolean, value: number): number {
  if (value > MAX_OFFSET) {
    throw new RangeError(`binary JSON offset ${value} exceeds 27 bits`);
  }
  return (type | (latinOrInt ? 1 << 3 : 0) | (latinKey ? 1 << 4 : 0) | ((value & MAX_OFFSET) << 5)) >>> 0;
}

/** Writes the payload of `value` (if any) at the writer's end and returns its word. */
function writeValue(w: Writer, baseStart: number, value: JsonValue, latinKey: boolean): number {
  if (value === null) return makeWord(ValueType.Null, false, latinKey, 0);
  if (typeof value === 'boolean') return makeWord(ValueType.Bool, false, latinKey, value ? 1 : 0);
  if (typeof value === 'number') {
    if (Number.isInteger(value) && value >= MIN_INLINE_INT && value <= MAX_INLINE_INT) {
      return makeWord(ValueType.Double, true, latinKey, value & MAX_OFFSET);
    }
    const offset = w.length - baseStart;
    w.f64(value);
    return makeWord(ValueType.Double, false, latinKey, offset);
  }
  const offset = w.length - baseStart;
  if (typeof value === 'string') {
    const latin = isLatin1(value);
    writeString(w, value, latin);
    return makeWord(ValueType.String, latin, latinKey, offset);
  }
  writeBase(w, value);
  return makeWord(Array.isArray(value) ? ValueType.Array : ValueType.Object, false, latinKey, offset);
}

function writeBase(w: Writer, value: JsonValue[] | JsonObject): void {
  const start = w.length;
  w.u32(0);
  w.u32(0);
  w.u32(0);

  const table: number[] = [];
  let length: number;
  if (Array.isArray(value)) {
    length = value.length;
    for (const item of value) {
      table.push(writeValue(w, start, item, false));
    }
  } else {
    const keys = Object.keys(value).sort();
    length = keys.length;
    for (const key of keys) {
      const entryOffset = w.length - start;
      table.push(entryOffset);
      w.u32(0);
      const latinKey = isLatin1(key);
      writeString(w, key, latinKey);
      w.patchU32(start + entryOffset, writeValue(w, start, value[key], latinKey));
    }
  }

  const tableOffset = w.length - start;
  for (const entry of table) w.u32(entry);
  w.patchU32(start, w.length - start);
  w.patchU32(start + 4, (length << 1) | (Array.isArray(value) ? 0 : 1));
  w.patchU32(start + 8, tableOffset);
}

/** Encode a top-level array or object as a tagged binary JSON document. */
export function encodeBinaryJson(value: JsonValue[] | JsonObject): Uint8Array {
  const w = new Writer();
  w.u32(BINARY_JSON_TAG);
  w.u32(BINARY_JSON_VERSION);
  writeBase(w, value);
  return w.toBytes();
}
