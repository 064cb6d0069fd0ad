/**
 * Internal pprof data structures.
 * These map directly to the perftools.profiles protobuf schema; every string
 * field is an index into Profile.stringTable.
 */

export interface PprofValueType {
  type: number;
  unit: number;
}

export interface PprofSample {
  locationIds: number[]; // leaf first
  values: bigint[];
}

export interface PprofLine {
  functionId: number;
  line: number;
}

export interface PprofLocation {
  id: number;
  lines: PprofLine[];
}

export interface PprofFunction {
  id: number;
  name: number;
  systemName: number;
  filename: number;
}

export interface PprofProfile {
  sampleTypes: PprofValueType[];
  samples: PprofSample[];
  locations: PprofLocation[];
  functions: PprofFunction[];
  stringTable: string[]; // stringTable[0] must be ''
  timeNanos: bigint;
  durationNanos: bigint;
  defaultSampleType: number;
}
