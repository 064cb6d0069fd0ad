import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { ProfileBuilder } from '../core/ProfileBuilder.ts';
import { EncodingError } from '../core/errors.ts';
import type { ProfileWindow, Sample, StackFrame } from '../types/profile.ts';
import { decodeProfile } from './helpers/pprofReader.ts';
import { memoryLogger } from './helpers/memoryLogger.ts';

const MAIN: StackFrame = { function: 'main', file: 'app.ts', line: 1 };
const WORK: StackFrame = { function: 'work', file: 'app.ts', line: 10 };
const IDLE: StackFrame = { function: 'idle', file: 'app.ts', line: 20 };

function s(sampleType: string, frames: StackFrame[], value: number | bigint): Sample {
  return { sampleType, stackFrames: frames, value, timestampNanos: 0n };
}

function window(samples: Sample[]): ProfileWindow {
  return { startNanos: 1_000n, endNanos: 11_000n, samples, dropped: {} };
}

// 3 CPU samples over two stacks, 2 allocation samples on one stack
const scenarioA = window([
  s('cpu', [WORK, MAIN], 10),
  s('cpu', [WORK, MAIN], 20),
  s('cpu', [IDLE, MAIN], 5),
  s('alloc_space', [WORK, MAIN], 100),
  s('alloc_space', [WORK, MAIN], 200),
]);

describe('ProfileBuilder', () => {
  it('yields one group per sample type with its sample count', () => {
    const profile = new ProfileBuilder().build(scenarioA);
    expect(profile.groups).toEqual([
      { sampleType: 'cpu', unit: 'nanoseconds', sampleCount: 3, stackCount: 2, total: 35n },
      { sampleType: 'alloc_space', unit: 'bytes', sampleCount: 2, stackCount: 1, total: 300n },
    ]);
    expect(profile.sampleCount).toBe(5);
  });

  it('writes a count and a value column per sample type', () => {
    const profile = new ProfileBuilder().build(scenarioA);
    expect(profile.valueColumns).toEqual([
      { type: 'cpu_samples', unit: 'count' },
      { type: 'cpu', unit: 'nanoseconds' },
      { type: 'alloc_space_samples', unit: 'count' },
      { type: 'alloc_space', unit: 'bytes' },
    ]);

    const decoded = decodeProfile(profile.toBytes());
    expect(decoded.sampleTypes).toEqual(profile.valueColumns);
    expect(decoded.defaultSampleType).toBe('cpu');
  });

  it('aggregates identical stacks into one pprof sample, stacks sorted by key', () => {
    const decoded = decodeProfile(new ProfileBuilder().build(scenarioA).toBytes());

    // 'idle' sorts before 'work'
    expect(decoded.samples).toEqual([
      { locationIds: [1, 2], values: [1n, 5n, 0n, 0n] },
      { locationIds: [3, 2], values: [2n, 30n, 2n, 300n] },
    ]);
    expect(decoded.functions).toEqual([
      { id: 1, name: 'idle', filename: 'app.ts' },
      { id: 2, name: 'main', filename: 'app.ts' },
      { id: 3, name: 'work', filename: 'app.ts' },
    ]);
    expect(decoded.locations).toEqual([
      { id: 1, lines: [{ functionId: 1, line: 20 }] },
      { id: 2, lines: [{ functionId: 2, line: 1 }] },
      { id: 3, lines: [{ functionId: 3, line: 10 }] },
    ]);
    expect(decoded.stringTable).toEqual([
      '',
      'cpu_samples',
      'count',
      'cpu',
      'nanoseconds',
      'alloc_space_samples',
      'alloc_space',
      'bytes',
      'idle',
      'app.ts',
      'main',
      'work',
    ]);
  });

  it('stamps the window range as time and duration', () => {
    const decoded = decodeProfile(new ProfileBuilder().build(scenarioA).toBytes());
    expect(decoded.timeNanos).toBe(1_000n);
    expect(decoded.durationNanos).toBe(10_000n);
  });

  it('skips samples with an unrecognized type and counts them', () => {
    const logger = memoryLogger();
    const profile = new ProfileBuilder({ logger }).build(
      window([s('cpu', [MAIN], 1), s('goroutines', [MAIN], 1), s('goroutines', [WORK], 1)])
    );

    expect(profile.groups.map((g) => g.sampleType)).toEqual(['cpu']);
    expect(profile.skipped).toEqual({ unknownType: 2, invalidValue: 0 });
    expect(profile.skippedSamples).toBe(2);
    expect(logger.entries).toEqual([
      {
        level: 'warn',
        message: 'profile build skipped samples',
        fields: { unknownType: 2, invalidValue: 0, unknownTypes: ['goroutines'] },
      },
    ]);
  });

  it('skips samples whose value is not an int64', () => {
    const profile = new ProfileBuilder().build(
      window([s('cpu', [MAIN], 1.5), s('cpu', [MAIN], 2n ** 70n), s('cpu', [MAIN], 4n)])
    );
    expect(profile.skipped).toEqual({ unknownType: 0, invalidValue: 2 });
    expect(profile.groups[0]?.total).toBe(4n);
  });

  it('saturates per-stack sums that overflow int64', () => {
    const max = 2n ** 63n - 1n;
    const logger = memoryLogger();
    const profile = new ProfileBuilder({ logger }).build(
      window([s('alloc_space', [MAIN], max), s('alloc_space', [MAIN], max), s('alloc_space', [MAIN], max)])
    );

    expect(profile.groups[0]?.total).toBe(max);
    expect(decodeProfile(profile.toBytes()).samples).toEqual([{ locationIds: [1], values: [3n, max] }]);
    expect(logger.find('profile value sums saturated at int64 bounds')[0]?.fields).toEqual({ saturated: 1 });
  });

  it('keeps stacks apart when names contain separator-like characters', () => {
    const decoded = decodeProfile(
      new ProfileBuilder()
        .build(
          window([
            s('cpu', [{ function: 'a', file: 'b\u0000c', line: 1 }], 1),
            s('cpu', [{ function: 'a\u0000b', file: 'c', line: 1 }], 1),
          ])
        )
        .toBytes()
    );
    expect(decoded.samples).toHaveLength(2);
    expect(decoded.functions.map((f) => [f.name, f.filename])).toEqual([
      ['a', 'b\u0000c'],
      ['a\u0000b', 'c'],
    ]);
  });

  it('accepts samples with an empty stack', () => {
    const decoded = decodeProfile(new ProfileBuilder().build(window([s('wall', [], 7)])).toBytes());
    expect(decoded.samples).toEqual([{ locationIds: [], values: [1n, 7n] }]);
  });

  it('replaces an invalid line number with 0', () => {
    const decoded = decodeProfile(
      new ProfileBuilder().build(window([s('cpu', [{ function: 'f', file: 'f.ts', line: -3 }], 1)])).toBytes()
    );
    expect(decoded.locations).toEqual([{ id: 1, lines: [{ functionId: 1, line: 0 }] }]);
  });

  it('builds an empty profile for an empty window', () => {
    const profile = new ProfileBuilder().build(window([]));
    expect(profile.groups).toEqual([]);
    expect(decodeProfile(profile.toBytes()).samples).toEqual([]);
  });

  it('sums evicted samples from the window into dropped', () => {
    const profile = new ProfileBuilder().build({ ...window([]), dropped: { cpu: 3, wall: 2 } });
    expect(profile.dropped).toBe(5);
  });

  it('throws EncodingError when the window ends before it starts', () => {
    const bad: ProfileWindow = { startNanos: 10n, endNanos: 5n, samples: [], dropped: {} };
    expect(() => new ProfileBuilder().build(bad)).toThrow(EncodingError);
  });

  it('hands out copies: mutating returned bytes leaves the profile intact', () => {
    const profile = new ProfileBuilder().build(scenarioA);
    const bytes = profile.toBytes();
    bytes.fill(0);
    expect(profile.toBytes()).not.toEqual(bytes);
    expect(Object.isFrozen(profile)).toBe(true);
  });

  it('is deterministic regardless of sample order', () => {
    const frame = fc.record({
      function: fc.constantFrom('main', 'handle', 'parse', 'render'),
      file: fc.constantFrom('a.ts', 'b.ts'),
      line: fc.integer({ min: 0, max: 50 }),
    });
    const sample = fc.record({
      sampleType: fc.constantFrom('cpu', 'wall', 'alloc_space', 'heap_space', 'unknown'),
      stackFrames: fc.array(frame, { maxLength: 4 }),
      value: fc.integer({ min: 0, max: 1_000_000 }),
      timestampNanos: fc.bigInt({ min: 0n, max: 10n ** 18n }),
    });
    const samplesAndShuffle = fc
      .array(sample, { maxLength: 40 })
      .chain((samples) =>
        fc.tuple(
          fc.constant(samples),
          fc.shuffledSubarray(samples, { minLength: samples.length, maxLength: samples.length })
        )
      );

    fc.assert(
      fc.property(samplesAndShuffle, ([ordered, shuffled]) => {
        const a = new ProfileBuilder().build(window(ordered)).toBytes();
        const b = new ProfileBuilder().build(window(shuffled)).toBytes();
        expect(b).toEqual(a);
      })
    );
  });
});
