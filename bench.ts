import { bench, group, run } from 'mitata';
import { encodeVarint } from './src/util/varint.ts';
import { SampleAccumulator } from './src/core/SampleAccumulator.ts';
import { ProfileBuilder } from './src/core/ProfileBuilder.ts';
import { PayloadEncoder } from './src/core/PayloadEncoder.ts';
import { gzipCompress } from './src/compress/gzip.ts';
import type { ProfileWindow, Sample } from './src/types/profile.ts';

// ─── Fixtures ──────────────────────────────────────────────────────────────

function makeSamples(stackCount: number, samplesPerStack: number): Sample[] {
  const samples: Sample[] = [];
  for (let s = 0; s < stackCount; s++) {
    const stackFrames = Array.from({ length: 12 }, (_, d) => ({
      function: `fn_${s % 40}_${d}`,
      file: `/srv/app/src/module_${d % 6}.ts`,
      line: 10 + d,
    }));
    for (let i = 0; i < samplesPerStack; i++) {
      samples.push({
        sampleType: i % 3 === 0 ? 'alloc_space' : 'cpu',
        stackFrames,
        value: 10_000 + i,
        timestampNanos: 1_700_000_000_000_000_000n + BigInt(i),
      });
    }
  }
  return samples;
}

function makeWindow(samples: Sample[]): ProfileWindow {
  return {
    startNanos: 1_700_000_000_000_000_000n,
    endNanos: 1_700_000_010_000_000_000n,
    samples,
    dropped: {},
  };
}

const smallWindow = makeWindow(makeSamples(10, 5)); // 50 samples
const largeWindow = makeWindow(makeSamples(500, 20)); // 10k samples

const builder = new ProfileBuilder();
const encoder = new PayloadEncoder();
const largeProfile = builder.build(largeWindow);
const largeBytes = largeProfile.toBytes();
const metadata = { serviceName: 'bench-svc', authToken: 'test-token', environment: 'bench' };

// ─── Benchmarks ────────────────────────────────────────────────────────────

group('varint', () => {
  bench('encode 1', () => encodeVarint(1n));
  bench('encode 2^32', () => encodeVarint(4294967296n));
  bench('encode epoch nanos', () => encodeVarint(1_700_000_000_000_000_000n));
});

group('accumulator', () => {
  const samples = makeSamples(100, 10);
  bench('record 1k + swap', () => {
    const acc = new SampleAccumulator({ capacityPerType: 512 });
    for (const s of samples) acc.record(s);
    acc.swap();
  });
});

group('build', () => {
  bench('50 samples', () => builder.build(smallWindow));
  bench('10k samples', () => builder.build(largeWindow));
});

group('encode', () => {
  bench(`gzip ${largeBytes.length} B`, () => gzipCompress(largeBytes));
  bench('payload (10k samples)', () => encoder.encode(largeProfile, metadata));
});

await run();
