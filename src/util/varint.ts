/**
 * LEB128 varint encoding for protobuf wire format.
 *
 * Two flavours: a number path for ids, lengths and line numbers (always
 * non-negative and below 2^31), and a BigInt path for int64 sample values
 * and nanosecond timestamps.
 */

const INT64_MASK = 64;

/** Write a varint for a non-negative number below 2^31 (no BigInt overhead). */
export function writeIntVarint(buf: Uint8Array, offset: number, value: number): number {
  let i = offset;
  while (value > 0x7f) {
    buf[i++] = (value & 0x7f) | 0x80;
    value >>>= 7;
  }
  buf[i++] = value;
  return i - offset;
}

/** Byte length of a non-negative number varint below 2^31. */
export function intVarintSize(n: number): number {
  if (n < 0x80) return 1;
  if (n < 0x4000) return 2;
  if (n < 0x200000) return 3;
  if (n < 0x10000000) return 4;
  return 5;
}

/**
 * Write an int64 varint into a pre-allocated buffer at the given offset.
 * Negative values are written as 64-bit two's complement (10 bytes).
 * Returns the number of bytes written.
 */
export function writeVarint(buf: Uint8Array, offset: number, value: bigint): number {
  let v = value < 0n ? BigInt.asUintN(INT64_MASK, value) : value;
  let i = offset;
  do {
    let byte = Number(v & 0x7fn);
    v >>= 7n;
    if (v !== 0n) byte |= 0x80;
    buf[i++] = byte;
  } while (v !== 0n);
  return i - offset;
}

/** Byte length of an int64 varint, computed without allocating. */
export function varintSize(value: bigint): number {
  let v = value < 0n ? BigInt.asUintN(INT64_MASK, value) : value;
  let size = 1;
  while (v > 0x7fn) {
    size++;
    v >>= 7n;
  }
  return size;
}

export function encodeVarint(value: bigint): Uint8Array {
  const buf = new Uint8Array(varintSize(value));
  writeVarint(buf, 0, value);
  return buf;
}

/** Read an unsigned varint starting at `offset`. Throws on truncated input. */
export function readVarint(buf: Uint8Array, offset: number): { value: bigint; length: number } {
  let value = 0n;
  let shift = 0n;
  let i = offset;
  for (;;) {
    if (i >= buf.length) {
      throw new RangeError(`truncated varint at offset ${offset}`);
    }
    const byte = buf[i++] ?? 0;
    value |= BigInt(byte & 0x7f) << shift;
    if ((byte & 0x80) === 0) break;
    shift += 7n;
  }
  return { value, length: i - offset };
}
