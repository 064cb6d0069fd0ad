/**
 * ProfileWindow → BinaryProfile (pprof protobuf bytes).
 *
 * Steps:
 *  1. Validate the window's time range
 *  2. Skip samples with an unrecognized type or a non-integer value
 *  3. Group the rest by identical stack; per stack, a count and a value sum for every sample type
 *  4. Sort stacks by key and assign string/function/location ids in that order
 *  5. Encode with the two-pass pprof writer
 *
 * Output depends only on the multiset of samples in the window: no wall-clock,
 * no randomness, no reliance on Map iteration order of the input.
 */

import type {
  ProfileWindow,
  Sample,
  SampleTypeGroup,
  StackFrame,
  ValueColumn,
} from '../types/profile.ts';
import type { PprofFunction, PprofLocation, PprofProfile, PprofSample } from '../types/pprof.ts';
import { encodeProfile } from '../proto/profile.ts';
import { SAMPLE_TYPES, SAMPLE_TYPE_ORDER, isSampleType, type SampleType } from './sampleTypes.ts';
import { EncodingError } from './errors.ts';
import { noopLogger, type Logger } from '../util/logger.ts';

const MAX_LINE = 0x7fffffff;

export interface SkippedSamples {
  unknownType: number;
  invalidValue: number;
}

export interface BinaryProfileInit {
  bytes: Uint8Array;
  startNanos: bigint;
  endNanos: bigint;
  valueColumns: ValueColumn[];
  groups: SampleTypeGroup[];
  skipped: SkippedSamples;
  dropped: number;
}

/** Serialized pprof profile for one closed window. Never mutated after construction. */
export class BinaryProfile {
  readonly startNanos: bigint;
  readonly endNanos: bigint;
  readonly valueColumns: readonly ValueColumn[];
  /** One entry per sample type present in the window, canonical order. */
  readonly groups: readonly SampleTypeGroup[];
  readonly skipped: Readonly<SkippedSamples>;
  /** Samples the accumulator evicted while this window was open. */
  readonly dropped: number;
  private readonly bytes: Uint8Array;

  constructor(init: BinaryProfileInit) {
    this.bytes = init.bytes.slice();
    this.startNanos = init.startNanos;
    this.endNanos = init.endNanos;
    this.valueColumns = Object.freeze(init.valueColumns.map((c) => Object.freeze({ ...c })));
    this.groups = Object.freeze(init.groups.map((g) => Object.freeze({ ...g })));
    this.skipped = Object.freeze({ ...init.skipped });
    this.dropped = init.dropped;
    Object.freeze(this);
  }

  get byteLength(): number {
    return this.bytes.length;
  }

  get skippedSamples(): number {
    return this.skipped.unknownType + this.skipped.invalidValue;
  }

  get sampleCount(): number {
    let n = 0;
    for (const g of this.groups) n += g.sampleCount;
    return n;
  }

  /** A copy of the serialized profile. */
  toBytes(): Uint8Array {
    return this.bytes.slice();
  }
}

interface StackAggregate {
  frames: readonly StackFrame[];
  counts: Map<SampleType, number>;
  sums: Map<SampleType, bigint>;
}

// JSON keeps names apart whatever characters they contain.
function functionKey(f: StackFrame): string {
  return JSON.stringify([f.function, f.file]);
}

function stackKey(frames: readonly StackFrame[]): string {
  return JSON.stringify(frames.map((f) => [f.function, f.file, normalizeLine(f.line)]));
}

const INT64_MAX = (1n << 63n) - 1n;
const INT64_MIN = -(1n << 63n);

function toInt64(value: number | bigint): bigint | undefined {
  if (typeof value === 'bigint') return BigInt.asIntN(64, value) === value ? value : undefined;
  return Number.isSafeInteger(value) ? BigInt(value) : undefined;
}

/** Sums are kept exact while grouping and saturated once, so input order cannot change them. */
function saturateInt64(value: bigint): bigint {
  return value > INT64_MAX ? INT64_MAX : value < INT64_MIN ? INT64_MIN : value;
}

function normalizeLine(line: number): number {
  return Number.isInteger(line) && line >= 0 && line <= MAX_LINE ? line : 0;
}

// Plain code-unit comparison: localeCompare depends on the host's ICU data.
function compareKeys(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/** Interning tables shared by one build. Ids are assigned in first-use order. */
class ProfileTables {
  readonly strings: string[] = [''];
  readonly functions: PprofFunction[] = [];
  readonly locations: PprofLocation[] = [];
  private readonly stringIds = new Map<string, number>([['', 0]]);
  private readonly functionIds = new Map<string, number>();
  private readonly locationIds = new Map<string, number>();

  str(value: string): number {
    let id = this.stringIds.get(value);
    if (id === undefined) {
      id = this.strings.length;
      this.strings.push(value);
      this.stringIds.set(value, id);
    }
    return id;
  }

  location(frame: StackFrame): number {
    const fnKey = functionKey(frame);
    let functionId = this.functionIds.get(fnKey);
    if (functionId === undefined) {
      functionId = this.functions.length + 1;
      const name = this.str(frame.function);
      this.functions.push({ id: functionId, name, systemName: name, filename: this.str(frame.file) });
      this.functionIds.set(fnKey, functionId);
    }

    const line = normalizeLine(frame.line);
    const locKey = `${functionId}:${line}`;
    let locationId = this.locationIds.get(locKey);
    if (locationId === undefined) {
      locationId = this.locations.length + 1;
      this.locations.push({ id: locationId, lines: [{ functionId, line }] });
      this.locationIds.set(locKey, locationId);
    }
    return locationId;
  }
}

export interface ProfileBuilderOptions {
  logger?: Logger;
}

export class ProfileBuilder {
  private readonly logger: Logger;

  constructor(options: ProfileBuilderOptions = {}) {
    this.logger = options.logger ?? noopLogger;
  }

  build(window: ProfileWindow): BinaryProfile {
    if (window.endNanos < window.startNanos) {
      throw new EncodingError(
        `window ends before it starts (${window.startNanos} > ${window.endNanos})`
      );
    }

    const skipped: SkippedSamples = { unknownType: 0, invalidValue: 0 };
    const unknownTypes = new Set<string>();
    const stacks = new Map<string, StackAggregate>();
    const present = new Set<SampleType>();

    for (const sample of window.samples) {
      if (!isSampleType(sample.sampleType)) {
        skipped.unknownType++;
        unknownTypes.add(sample.sampleType);
        continue;
      }
      const value = toInt64(sample.value);
      if (value === undefined) {
        skipped.invalidValue++;
        continue;
      }
      this.accumulate(stacks, sample, sample.sampleType, value);
      present.add(sample.sampleType);
    }

    if (skipped.unknownType + skipped.invalidValue > 0) {
      this.logger.log('warn', 'profile build skipped samples', {
        unknownType: skipped.unknownType,
        invalidValue: skipped.invalidValue,
        unknownTypes: [...unknownTypes].sort(compareKeys),
      });
    }

    const types = SAMPLE_TYPE_ORDER.filter((t) => present.has(t));
    const tables = new ProfileTables();

    const valueColumns: ValueColumn[] = [];
    for (const t of types) {
      valueColumns.push({ type: `${t}_samples`, unit: 'count' });
      valueColumns.push({ type: t, unit: SAMPLE_TYPES[t].unit });
    }
    const sampleTypes = valueColumns.map((c) => ({ type: tables.str(c.type), unit: tables.str(c.unit) }));

    const groups = new Map<SampleType, SampleTypeGroup>(
      types.map((t) => [
        t,
        { sampleType: t, unit: SAMPLE_TYPES[t].unit, sampleCount: 0, stackCount: 0, total: 0n },
      ])
    );

    const samples: PprofSample[] = [];
    let saturated = 0;
    for (const key of [...stacks.keys()].sort(compareKeys)) {
      const agg = stacks.get(key);
      if (!agg) continue;

      const values: bigint[] = [];
      for (const t of types) {
        const count = agg.counts.get(t) ?? 0;
        const exact = agg.sums.get(t) ?? 0n;
        const sum = saturateInt64(exact);
        if (sum !== exact) saturated++;
        values.push(BigInt(count), sum);

        const group = groups.get(t);
        if (group && count > 0) {
          group.sampleCount += count;
          group.stackCount++;
          group.total += sum;
        }
      }
      samples.push({ locationIds: agg.frames.map((f) => tables.location(f)), values });
    }

    for (const group of groups.values()) {
      const total = saturateInt64(group.total);
      if (total !== group.total) saturated++;
      group.total = total;
    }
    if (saturated > 0) {
      this.logger.log('warn', 'profile value sums saturated at int64 bounds', { saturated });
    }

    const profile: PprofProfile = {
      sampleTypes,
      samples,
      locations: tables.locations,
      functions: tables.functions,
      stringTable: tables.strings,
      timeNanos: window.startNanos,
      durationNanos: window.endNanos - window.startNanos,
      // Default to the value column of the first type, not its count column.
      defaultSampleType: sampleTypes[1]?.type ?? 0,
    };

    let dropped = 0;
    for (const n of Object.values(window.dropped)) dropped += n;

    return new BinaryProfile({
      bytes: encodeProfile(profile),
      startNanos: window.startNanos,
      endNanos: window.endNanos,
      valueColumns,
      groups: [...groups.values()],
      skipped,
      dropped,
    });
  }

  private accumulate(
    stacks: Map<string, StackAggregate>,
    sample: Sample,
    type: SampleType,
    value: bigint
  ): void {
    const key = stackKey(sample.stackFrames);
    let agg = stacks.get(key);
    if (!agg) {
      agg = { frames: sample.stackFrames, counts: new Map(), sums: new Map() };
      stacks.set(key, agg);
    }
    agg.counts.set(type, (agg.counts.get(type) ?? 0) + 1);
    agg.sums.set(type, (agg.sums.get(type) ?? 0n) + value);
  }
}
