/**
 * Two-pass protobuf encoder for the pprof Profile message.
 *
 * Pass 1, size calculation: walks the structure with integer math and
 *   Buffer.byteLength to compute the exact byte count of every message.
 *
 * Pass 2, single-allocation write: allocates exactly one Uint8Array and
 *   writes every field directly into it.
 *
 * Proto schema (subset of perftools.profiles):
 *   message ValueType { int64 type = 1; int64 unit = 2; }
 *   message Sample    { repeated uint64 location_id = 1; repeated int64 value = 2; }
 *   message Line      { uint64 function_id = 1; int64 line = 2; }
 *   message Location  { uint64 id = 1; repeated Line line = 4; }
 *   message Function  { uint64 id = 1; int64 name = 2; int64 system_name = 3; int64 filename = 4; }
 *   message Profile   {
 *     repeated ValueType sample_type = 1; repeated Sample sample = 2;
 *     repeated Location location = 4; repeated Function function = 5;
 *     repeated string string_table = 6; int64 time_nanos = 9;
 *     int64 duration_nanos = 10; int64 default_sample_type = 14;
 *   }
 */

import type {
  PprofProfile,
  PprofValueType,
  PprofSample,
  PprofLocation,
  PprofLine,
  PprofFunction,
} from '../types/pprof.ts';
import { writeIntVarint, intVarintSize, writeVarint, varintSize } from '../util/varint.ts';

const ENC = new TextEncoder();

/** tag + length prefix + body */
function lenField(size: number): number {
  return 1 + intVarintSize(size) + size;
}

// ─── Size calculation (pass 1) ──────────────────────────────────────────────

function valueTypeSize(vt: PprofValueType): number {
  return 1 + intVarintSize(vt.type) + 1 + intVarintSize(vt.unit);
}

function packedIdsSize(ids: number[]): number {
  let size = 0;
  for (const id of ids) size += intVarintSize(id);
  return size;
}

function packedValuesSize(values: bigint[]): number {
  let size = 0;
  for (const v of values) size += varintSize(v);
  return size;
}

function sampleSize(s: PprofSample): number {
  let size = 0;
  if (s.locationIds.length > 0) size += lenField(packedIdsSize(s.locationIds));
  if (s.values.length > 0) size += lenField(packedValuesSize(s.values));
  return size;
}

function lineSize(l: PprofLine): number {
  return 1 + intVarintSize(l.functionId) + 1 + intVarintSize(l.line);
}

function locationSize(loc: PprofLocation): number {
  let size = 1 + intVarintSize(loc.id);
  for (const l of loc.lines) size += lenField(lineSize(l));
  return size;
}

function functionSize(fn: PprofFunction): number {
  return (
    1 + intVarintSize(fn.id) +
    1 + intVarintSize(fn.name) +
    1 + intVarintSize(fn.systemName) +
    1 + intVarintSize(fn.filename)
  );
}

function computeTotalSize(p: PprofProfile): number {
  let size = 0;
  for (const vt of p.sampleTypes) size += lenField(valueTypeSize(vt));
  for (const s of p.samples) size += lenField(sampleSize(s));
  for (const loc of p.locations) size += lenField(locationSize(loc));
  for (const fn of p.functions) size += lenField(functionSize(fn));
  for (const str of p.stringTable) size += lenField(Buffer.byteLength(str));
  size += 1 + varintSize(p.timeNanos);
  size += 1 + varintSize(p.durationNanos);
  size += 1 + intVarintSize(p.defaultSampleType);
  return size;
}

// ─── Write pass (pass 2) ────────────────────────────────────────────────────

function writeIntField(buf: Uint8Array, off: number, tag: number, value: number): number {
  buf[off++] = tag;
  return off + writeIntVarint(buf, off, value);
}

function writeValueType(buf: Uint8Array, off: number, vt: PprofValueType): number {
  off = writeIntField(buf, off, 0x08, vt.type); // field 1 (type), varint
  return writeIntField(buf, off, 0x10, vt.unit); // field 2 (unit), varint
}

function writeSample(buf: Uint8Array, off: number, s: PprofSample): number {
  if (s.locationIds.length > 0) {
    buf[off++] = 0x0a; // field 1 (location_id), packed
    off += writeIntVarint(buf, off, packedIdsSize(s.locationIds));
    for (const id of s.locationIds) off += writeIntVarint(buf, off, id);
  }
  if (s.values.length > 0) {
    buf[off++] = 0x12; // field 2 (value), packed
    off += writeIntVarint(buf, off, packedValuesSize(s.values));
    for (const v of s.values) off += writeVarint(buf, off, v);
  }
  return off;
}

function writeLocation(buf: Uint8Array, off: number, loc: PprofLocation): number {
  off = writeIntField(buf, off, 0x08, loc.id); // field 1 (id)
  for (const l of loc.lines) {
    buf[off++] = 0x22; // field 4 (line), LEN
    off += writeIntVarint(buf, off, lineSize(l));
    off = writeIntField(buf, off, 0x08, l.functionId);
    off = writeIntField(buf, off, 0x10, l.line);
  }
  return off;
}

function writeFunction(buf: Uint8Array, off: number, fn: PprofFunction): number {
  off = writeIntField(buf, off, 0x08, fn.id);
  off = writeIntField(buf, off, 0x10, fn.name);
  off = writeIntField(buf, off, 0x18, fn.systemName);
  return writeIntField(buf, off, 0x20, fn.filename);
}

function writeString(buf: Uint8Array, off: number, str: string): number {
  buf[off++] = 0x32; // field 6 (string_table), LEN
  const len = Buffer.byteLength(str);
  off += writeIntVarint(buf, off, len);
  ENC.encodeInto(str, buf.subarray(off));
  return off + len;
}

// ─── Public API ─────────────────────────────────────────────────────────────

export function encodeProfile(p: PprofProfile): Uint8Array {
  const buf = new Uint8Array(computeTotalSize(p));
  let off = 0;

  for (const vt of p.sampleTypes) {
    buf[off++] = 0x0a; // field 1 (sample_type)
    off += writeIntVarint(buf, off, valueTypeSize(vt));
    off = writeValueType(buf, off, vt);
  }
  for (const s of p.samples) {
    buf[off++] = 0x12; // field 2 (sample)
    off += writeIntVarint(buf, off, sampleSize(s));
    off = writeSample(buf, off, s);
  }
  for (const loc of p.locations) {
    buf[off++] = 0x22; // field 4 (location)
    off += writeIntVarint(buf, off, locationSize(loc));
    off = writeLocation(buf, off, loc);
  }
  for (const fn of p.functions) {
    buf[off++] = 0x2a; // field 5 (function)
    off += writeIntVarint(buf, off, functionSize(fn));
    off = writeFunction(buf, off, fn);
  }
  for (const str of p.stringTable) {
    off = writeString(buf, off, str);
  }

  buf[off++] = 0x48; // field 9 (time_nanos)
  off += writeVarint(buf, off, p.timeNanos);
  buf[off++] = 0x50; // field 10 (duration_nanos)
  off += writeVarint(buf, off, p.durationNanos);
  off = writeIntField(buf, off, 0x70, p.defaultSampleType); // field 14

  return buf;
}
