import { describe, it, expect } from 'vitest';
import {
  encodeVarint,
  writeVarint,
  varintSize,
  writeIntVarint,
  intVarintSize,
  readVarint,
} from '../util/varint.ts';

describe('varint encoding', () => {
  it('encodes 0', () => {
    expect(encodeVarint(0n)).toEqual(new Uint8Array([0x00]));
  });

  it('encodes 127 as single byte', () => {
    expect(encodeVarint(127n)).toEqual(new Uint8Array([0x7f]));
  });

  it('encodes 128 as two bytes', () => {
    expect(encodeVarint(128n)).toEqual(new Uint8Array([0x80, 0x01]));
  });

  it('encodes 300', () => {
    // 300 = 0x12C → varint: 0xAC 0x02
    expect(encodeVarint(300n)).toEqual(new Uint8Array([0xac, 0x02]));
  });

  it('encodes negative int64 as 10-byte two\'s complement', () => {
    const encoded = encodeVarint(-1n);
    expect(encoded.length).toBe(10);
    expect(encoded[9]).toBe(0x01);
    expect(readVarint(encoded, 0).value).toBe(0xffff_ffff_ffff_ffffn);
  });

  it('varintSize matches encodeVarint length', () => {
    const testValues = [0n, 1n, 127n, 128n, 16383n, 16384n, 2097152n, 1_700_000_000_000_000_000n];
    for (const v of testValues) {
      expect(varintSize(v)).toBe(encodeVarint(v).length);
    }
  });

  it('intVarintSize matches writeIntVarint length', () => {
    const buf = new Uint8Array(8);
    for (const v of [0, 1, 127, 128, 16383, 16384, 2097151, 2097152, 0x7fffffff]) {
      expect(intVarintSize(v)).toBe(writeIntVarint(buf, 0, v));
    }
  });

  it('writeVarint writes at an offset', () => {
    const buf = new Uint8Array(10);
    const written = writeVarint(buf, 3, 300n);
    expect(written).toBe(2);
    expect(buf[3]).toBe(0xac);
    expect(buf[4]).toBe(0x02);
  });

  it('readVarint reports value and length', () => {
    const buf = new Uint8Array([0xff, 0xac, 0x02, 0x05]);
    expect(readVarint(buf, 1)).toEqual({ value: 300n, length: 2 });
  });

  it('readVarint rejects truncated input', () => {
    expect(() => readVarint(new Uint8Array([0x80, 0x80]), 0)).toThrow(RangeError);
  });
});
