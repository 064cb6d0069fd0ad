import { describe, it, expect, vi, afterEach } from 'vitest';
import { ProfileExporter } from '../core/ProfileExporter.ts';
import { parseExporterConfig } from '../core/ExporterConfig.ts';
import { gzipUncompress } from '../compress/gzip.ts';
import type { Sample } from '../types/profile.ts';
import { decodeProfile } from './helpers/pprofReader.ts';
import { memoryLogger } from './helpers/memoryLogger.ts';

const cpu: Sample = {
  sampleType: 'cpu',
  stackFrames: [
    { function: 'handle', file: 'server.ts', line: 42 },
    { function: 'main', file: 'server.ts', line: 1 },
  ],
  value: 10_000_000,
  timestampNanos: 1n,
};

function steppingClock(): () => bigint {
  let now = 1_700_000_000_000_000_000n;
  return () => (now += 1_000_000_000n);
}

function stubIngest(status = 200) {
  const fetchMock = vi.fn(
    async (_input: string | URL | Request, _init?: RequestInit) => new Response(null, { status })
  );
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

function lastRequest(fetchMock: ReturnType<typeof stubIngest>) {
  const call = fetchMock.mock.calls[fetchMock.mock.calls.length - 1];
  if (!call) throw new Error('fetch was not called');
  const [input, init] = call;
  return { url: new URL(input instanceof Request ? input.url : input), init: init ?? {} };
}

function baseBuilder() {
  return new ProfileExporter()
    .endpoint('http://ingest.local:4040/ingest')
    .service('checkout', { environment: 'test', host: 'h1' })
    .token('test-token')
    .clock(steppingClock());
}

describe('ProfileExporter builder', () => {
  it('requires an endpoint', () => {
    expect(() => new ProfileExporter().service('checkout').build()).toThrow(
      'ProfileExporter: endpoint() must be called before build()'
    );
  });

  it('requires a service name', () => {
    expect(() => new ProfileExporter().endpoint('http://ingest.local:4040/ingest').build()).toThrow(
      'ProfileExporter: service() must be called before build()'
    );
  });

  it('warns when no token is configured', () => {
    const logger = memoryLogger();
    new ProfileExporter()
      .endpoint('http://ingest.local:4040/ingest')
      .service('checkout')
      .logger(logger)
      .build();
    expect(logger.find('profiling token not set; uploads carry no Authorization header')[0]?.fields).toEqual({
      endpoint: 'http://ingest.local:4040/ingest',
    });
  });

  it('refuses memory samples when memory profiling is off', () => {
    const exporter = baseBuilder().memoryProfiling(false).build();
    exporter.record({ ...cpu, sampleType: 'alloc_space', value: 4096 });
    exporter.record({ ...cpu, sampleType: 'heap_space', value: 4096 });
    exporter.record(cpu);
    expect(exporter.stats()).toEqual({ recorded: 1, dropped: 0, filtered: 2 });
  });
});

describe('BuiltProfileExporter', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('exports recorded samples end to end', async () => {
    const fetchMock = stubIngest();
    const exporter = baseBuilder().build();
    exporter.record(cpu);
    exporter.record({ ...cpu, value: 5_000_000 });

    expect(await exporter.flush()).toBe('success');
    expect(fetchMock).toHaveBeenCalledTimes(1);

    const { url, init } = lastRequest(fetchMock);
    expect(url.searchParams.get('name')).toBe('checkout{env=test,host=h1}');
    expect(new Headers(init.headers).get('authorization')).toBe('Bearer test-token');

    const form = init.body;
    if (!(form instanceof FormData)) throw new Error('expected a FormData body');
    const field = form.get('profile');
    if (!(field instanceof Blob)) throw new Error('expected a profile blob');
    const decoded = decodeProfile(gzipUncompress(new Uint8Array(await field.arrayBuffer())));
    expect(decoded.sampleTypes).toEqual([
      { type: 'cpu_samples', unit: 'count' },
      { type: 'cpu', unit: 'nanoseconds' },
    ]);
    expect(decoded.samples).toEqual([{ locationIds: [1, 2], values: [2n, 15_000_000n] }]);

    await exporter.stop();
    expect(exporter.state).toBe('stopped');
  });

  it('does nothing when disabled', async () => {
    const fetchMock = stubIngest();
    const exporter = baseBuilder().enabled(false).build();

    exporter.start();
    exporter.record(cpu);
    expect(await exporter.flush()).toBeNull();
    await exporter.stop();

    expect(exporter.enabled).toBe(false);
    expect(exporter.stats().recorded).toBe(0);
    expect(exporter.state).toBe('idle');
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('builds from a parsed config', async () => {
    const fetchMock = stubIngest();
    const config = parseExporterConfig({
      endpoint: 'http://ingest.local:4040/ingest',
      serviceName: 'checkout',
      host: 'h1',
      token: 'test-token',
      bodyFormat: 'gzip',
      timeUnit: 'seconds',
      labels: { region: 'eu' },
    });
    const exporter = ProfileExporter.fromConfig(config).clock(steppingClock()).build();
    exporter.record(cpu);

    expect(await exporter.flush()).toBe('success');
    const { url, init } = lastRequest(fetchMock);
    expect(url.searchParams.get('name')).toBe('checkout{host=h1,region=eu}');
    expect(url.searchParams.get('from')).toBe('1700000001');
    expect(new Headers(init.headers).get('content-encoding')).toBe('gzip');
  });

  it('honours enabled=false from config', () => {
    const config = parseExporterConfig({
      enabled: 'false',
      endpoint: 'http://ingest.local:4040/ingest',
      serviceName: 'checkout',
    });
    expect(ProfileExporter.fromConfig(config).build().enabled).toBe(false);
  });

  it('reports a rejected upload as a fatal cycle outcome', async () => {
    stubIngest(401);
    const logger = memoryLogger();
    const exporter = baseBuilder().logger(logger).build();
    exporter.record(cpu);

    expect(await exporter.flush()).toBe('upload-fatal');
    expect(logger.find('profile export cycle')[0]?.fields).toMatchObject({
      outcome: 'upload-fatal',
      status: 401,
      error: 'HTTP 401 (check the auth token)',
    });
  });
});
