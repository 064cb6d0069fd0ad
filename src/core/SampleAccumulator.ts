/**
 * In-memory buffer for the open profile window.
 *
 * record() and swap() both run to completion on the JS event loop, so a sample
 * is attributed to whichever window is open when record() executes and can
 * never be split across, lost between, or duplicated into two windows.
 */

import type { ProfileWindow, Sample } from '../types/profile.ts';

export const DEFAULT_CAPACITY_PER_TYPE = 10_000;

export interface SampleAccumulatorOptions {
  /** Maximum samples kept per sample type; the oldest is evicted beyond it. */
  capacityPerType?: number;
  /** Sample types refused outright, e.g. memory types when memory profiling is off. */
  disabledTypes?: readonly string[];
  /** Wall-clock in epoch nanoseconds. */
  clock?: () => bigint;
}

export interface AccumulatorStats {
  recorded: number;
  dropped: number;
  filtered: number;
}

export function epochNanos(): bigint {
  return BigInt(Date.now()) * 1_000_000n;
}

/** Fixed-size ring that overwrites its oldest entry when full. */
class SampleRing {
  private readonly items: Sample[] = [];
  private head = 0;

  constructor(private readonly capacity: number) {}

  /** Returns true when an older sample was evicted to make room. */
  push(sample: Sample): boolean {
    if (this.items.length < this.capacity) {
      this.items.push(sample);
      return false;
    }
    this.items[this.head] = sample;
    this.head = (this.head + 1) % this.capacity;
    return true;
  }

  /** Oldest first. */
  drain(): Sample[] {
    return [...this.items.slice(this.head), ...this.items.slice(0, this.head)];
  }
}

function freezeSample(sample: Sample): Sample {
  return Object.freeze({
    sampleType: sample.sampleType,
    stackFrames: Object.freeze(sample.stackFrames.map((f) => Object.freeze({ ...f }))),
    value: sample.value,
    timestampNanos: sample.timestampNanos,
  });
}

export class SampleAccumulator {
  private readonly capacity: number;
  private readonly disabled: ReadonlySet<string>;
  private readonly clock: () => bigint;

  private rings = new Map<string, SampleRing>();
  private dropped: Record<string, number> = {};
  private windowStart: bigint;
  private readonly totals: AccumulatorStats = { recorded: 0, dropped: 0, filtered: 0 };

  constructor(options: SampleAccumulatorOptions = {}) {
    this.capacity = Math.max(1, Math.floor(options.capacityPerType ?? DEFAULT_CAPACITY_PER_TYPE));
    this.disabled = new Set(options.disabledTypes ?? []);
    this.clock = options.clock ?? epochNanos;
    this.windowStart = this.clock();
  }

  /** Append to the open window. Never throws, never grows past the capacity bound. */
  record(sample: Sample): void {
    if (this.disabled.has(sample.sampleType)) {
      this.totals.filtered++;
      return;
    }

    let ring = this.rings.get(sample.sampleType);
    if (!ring) {
      ring = new SampleRing(this.capacity);
      this.rings.set(sample.sampleType, ring);
    }

    this.totals.recorded++;
    if (ring.push(freezeSample(sample))) {
      this.totals.dropped++;
      this.dropped[sample.sampleType] = (this.dropped[sample.sampleType] ?? 0) + 1;
    }
  }

  /**
   * Close the open window and return it; the successor starts where this one ends.
   * A clock that stepped backwards yields a zero-length window rather than a negative one.
   */
  swap(): ProfileWindow {
    const now = this.clock();
    const endNanos = now > this.windowStart ? now : this.windowStart;

    const samples: Sample[] = [];
    for (const ring of this.rings.values()) {
      samples.push(...ring.drain());
    }

    const closed: ProfileWindow = Object.freeze({
      startNanos: this.windowStart,
      endNanos,
      samples: Object.freeze(samples),
      dropped: Object.freeze(this.dropped),
    });

    this.rings = new Map();
    this.dropped = {};
    this.windowStart = endNanos;
    return closed;
  }

  /** Start of the currently open window. */
  get openSince(): bigint {
    return this.windowStart;
  }

  stats(): AccumulatorStats {
    return { ...this.totals };
  }
}
