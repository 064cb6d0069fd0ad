// ProfileExporter fluent builder and built instance.
//
// Usage:
//   const exporter = new ProfileExporter()
//     .endpoint('http://pyroscope:4040/ingest', { timeout: 5_000 })
//     .service('checkout', { environment: 'prod' })
//     .token(process.env.TOKEN ?? '')
//     .retry({ maxAttempts: 4 })
//     .build();
//
//   exporter.start();
//   sampler.on('sample', (s) => exporter.record(s));
//   process.on('SIGTERM', () => void exporter.stop());

import { hostname } from 'node:os';
import type { Sample } from '../types/profile.ts';
import type { ExporterConfig, IngestEndpointConfig } from './ExporterConfig.ts';
import type { RetryPolicy } from './RetryPolicy.ts';
import type { PayloadMetadata } from './PayloadEncoder.ts';
import { SampleAccumulator, DEFAULT_CAPACITY_PER_TYPE, type AccumulatorStats } from './SampleAccumulator.ts';
import { ProfileBuilder } from './ProfileBuilder.ts';
import { PayloadEncoder } from './PayloadEncoder.ts';
import { BackoffUploader } from './BackoffUploader.ts';
import { ExportScheduler, type CycleOutcome, type SchedulerState } from './ExportScheduler.ts';
import { MEMORY_SAMPLE_TYPES } from './sampleTypes.ts';
import { noopLogger, type Logger } from '../util/logger.ts';

/** ProfileExporter fluent builder. */
export class ProfileExporter {
  private _endpoint?: IngestEndpointConfig;
  private _serviceName?: string;
  private _environment?: string;
  private _host: string = hostname();
  private _labels: Record<string, string> = {};
  private _token = '';
  private _intervalMs = 60_000;
  private _cycleTimeoutMs?: number;
  private _flushTimeoutMs = 5_000;
  private _capacity = DEFAULT_CAPACITY_PER_TYPE;
  private _memoryProfiling = true;
  private _retry: Partial<RetryPolicy> = {};
  private _logger: Logger = noopLogger;
  private _clock?: () => bigint;
  private _enabled = true;

  /** Build from a parsed ExporterConfig (see loadExporterConfig). */
  static fromConfig(config: ExporterConfig): ProfileExporter {
    const builder = new ProfileExporter()
      .endpoint(config.endpoint, {
        timeout: config.requestTimeoutMs,
        bodyFormat: config.bodyFormat,
        timeUnit: config.timeUnit,
        spyName: config.spyName,
      })
      .service(config.serviceName, {
        environment: config.environment,
        host: config.host,
        labels: config.labels,
      })
      .token(config.token)
      .interval(config.intervalMs, { cycleTimeoutMs: config.cycleTimeoutMs })
      .flushTimeout(config.flushTimeoutMs)
      .capacity(config.capacityPerType)
      .memoryProfiling(config.enableMemoryProfiling)
      .retry(config.retry);
    return builder.enabled(config.enabled);
  }

  /**
   * Configure the ingestion endpoint.
   * @param url Ingest URL, e.g. http://localhost:4040/ingest
   * @param options Per-request timeout, extra headers and wire format
   */
  endpoint(url: string, options?: Omit<IngestEndpointConfig, 'url'>): this {
    this._endpoint = { ...options, url, timeout: options?.timeout ?? 10_000 };
    return this;
  }

  /** Service identity carried as labels on every upload. */
  service(
    name: string,
    options?: { environment?: string; host?: string; labels?: Record<string, string> }
  ): this {
    this._serviceName = name;
    this._environment = options?.environment;
    if (options?.host !== undefined) this._host = options.host;
    this._labels = { ...this._labels, ...options?.labels };
    return this;
  }

  token(token: string): this {
    this._token = token;
    return this;
  }

  interval(ms: number, options?: { cycleTimeoutMs?: number }): this {
    this._intervalMs = ms;
    this._cycleTimeoutMs = options?.cycleTimeoutMs;
    return this;
  }

  flushTimeout(ms: number): this {
    this._flushTimeoutMs = ms;
    return this;
  }

  /** Per-sample-type capacity of the open window. */
  capacity(perType: number): this {
    this._capacity = perType;
    return this;
  }

  /** When off, allocation and heap samples are refused at record time. */
  memoryProfiling(enabled: boolean): this {
    this._memoryProfiling = enabled;
    return this;
  }

  retry(policy: Partial<RetryPolicy>): this {
    this._retry = { ...this._retry, ...policy };
    return this;
  }

  logger(logger: Logger): this {
    this._logger = logger;
    return this;
  }

  /** Wall-clock in epoch nanoseconds; defaults to Date.now(). */
  clock(clock: () => bigint): this {
    this._clock = clock;
    return this;
  }

  /** A disabled exporter accepts every call and exports nothing. */
  enabled(enabled: boolean): this {
    this._enabled = enabled;
    return this;
  }

  /** Build the configured exporter. Throws if endpoint() or service() was not called. */
  build(): BuiltProfileExporter {
    if (!this._endpoint) {
      throw new Error('ProfileExporter: endpoint() must be called before build()');
    }
    if (!this._serviceName) {
      throw new Error('ProfileExporter: service() must be called before build()');
    }

    const logger = this._logger;
    if (!this._token) {
      logger.log('warn', 'profiling token not set; uploads carry no Authorization header', {
        endpoint: this._endpoint.url,
      });
    }

    const accumulator = new SampleAccumulator({
      capacityPerType: this._capacity,
      disabledTypes: this._memoryProfiling ? [] : MEMORY_SAMPLE_TYPES,
      clock: this._clock,
    });
    const metadata: PayloadMetadata = {
      serviceName: this._serviceName,
      authToken: this._token,
      environment: this._environment,
      host: this._host,
      labels: this._labels,
    };
    const scheduler = new ExportScheduler({
      accumulator,
      builder: new ProfileBuilder({ logger }),
      encoder: new PayloadEncoder(),
      uploader: new BackoffUploader({ ...this._endpoint, retry: this._retry, logger }),
      metadata,
      intervalMs: this._intervalMs,
      cycleTimeoutMs: this._cycleTimeoutMs,
      flushTimeoutMs: this._flushTimeoutMs,
      logger,
    });

    if (this._enabled) {
      logger.log('info', 'profile exporter configured', {
        endpoint: this._endpoint.url,
        service: this._serviceName,
      });
    }
    return new BuiltProfileExporter(accumulator, scheduler, this._enabled);
  }
}

/** A configured exporter: the sampler calls record(), the host calls start()/stop(). */
export class BuiltProfileExporter {
  constructor(
    private readonly accumulator: SampleAccumulator,
    private readonly scheduler: ExportScheduler,
    readonly enabled: boolean
  ) {}

  record(sample: Sample): void {
    if (!this.enabled) return;
    this.accumulator.record(sample);
  }

  start(): void {
    if (!this.enabled) return;
    this.scheduler.start();
  }

  stop(): Promise<void> {
    if (!this.enabled) return Promise.resolve();
    return this.scheduler.stop();
  }

  /** Export the open window now instead of waiting for the timer. */
  flush(): Promise<CycleOutcome | null> {
    if (!this.enabled) return Promise.resolve(null);
    return this.scheduler.tick();
  }

  get state(): SchedulerState {
    return this.scheduler.state;
  }

  stats(): AccumulatorStats {
    return this.accumulator.stats();
  }
}
