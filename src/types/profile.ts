/**
 * Sampler-facing and export-facing profile data structures.
 */

export interface StackFrame {
  function: string;
  file: string;
  line: number;
}

export interface Sample {
  /** One of the keys of SAMPLE_TYPES; anything else is skipped at build time. */
  sampleType: string;
  /** Leaf first, root last (pprof order). */
  stackFrames: readonly StackFrame[];
  value: number | bigint;
  timestampNanos: bigint;
}

export interface ProfileWindow {
  startNanos: bigint;
  endNanos: bigint;
  samples: readonly Sample[];
  /** Samples evicted by the per-type capacity bound, keyed by sample type. */
  dropped: Readonly<Record<string, number>>;
}

export type Aggregation = 'sum' | 'average';

export interface SampleTypeInfo {
  unit: string;
  aggregation: Aggregation;
  sampled: boolean;
}

export interface ValueColumn {
  type: string;
  unit: string;
}

export interface SampleTypeGroup {
  sampleType: string;
  unit: string;
  /** Number of raw samples folded into this group. */
  sampleCount: number;
  /** Number of distinct stacks carrying a value for this type. */
  stackCount: number;
  total: bigint;
}

export interface TimeRange {
  startNanos: bigint;
  endNanos: bigint;
}

export interface UploadPayload {
  readonly compressedBody: Uint8Array;
  readonly contentEncoding: 'gzip';
  readonly labels: Readonly<Record<string, string>>;
  readonly authToken: string;
  readonly timeRange: Readonly<TimeRange>;
  readonly format: 'pprof';
  /** JSON document describing each value column, sent alongside the profile. */
  readonly sampleTypeConfig: string;
}
