/**
 * Ships one UploadPayload to the ingestion endpoint, retrying transient failures.
 *
 * The retry loop lives here rather than in the scheduler: deciding whether a
 * failure is worth another attempt needs the HTTP status and transport error,
 * which only this layer sees. upload() never throws; every failure comes back
 * as an UploadError.
 */

import type { UploadPayload } from '../types/profile.ts';
import type { IngestEndpointConfig } from './ExporterConfig.ts';
import { UploadError } from './errors.ts';
import {
  DEFAULT_RETRY_POLICY,
  classifyStatus,
  exponentialBackoff,
  initialRetryState,
  nextRetryStep,
  sleep,
  type AttemptOutcome,
  type BackoffFn,
  type RetryPolicy,
  type RetryState,
  type StatusClassifier,
} from './RetryPolicy.ts';
import { noopLogger, type Logger } from '../util/logger.ts';

export type UploadResult =
  | { ok: true; attempts: number; status: number }
  | { ok: false; error: UploadError };

export interface UploadOptions {
  /** Aborting stops further attempts; an attempt already on the wire runs to completion. */
  signal?: AbortSignal;
}

export interface BackoffUploaderOptions extends IngestEndpointConfig {
  retry?: Partial<RetryPolicy>;
  logger?: Logger;
  classifyStatus?: StatusClassifier;
  backoff?: BackoffFn;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  /** Monotonic milliseconds, used for the maxElapsedMs budget. */
  now?: () => number;
}

const NANOS_PER_SECOND = 1_000_000_000n;

function describeStatus(status: number): string {
  if (status === 400) return 'check the auth token and payload';
  if (status === 401 || status === 403) return 'check the auth token';
  if (status === 404) return 'check the endpoint path';
  return '';
}

/** `service{env=prod,host=a}`: the ingest name with every label but service_name. */
export function ingestName(labels: Readonly<Record<string, string>>): string {
  const service = labels['service_name'] ?? 'unknown';
  const tags = Object.keys(labels)
    .filter((k) => k !== 'service_name')
    .sort()
    .map((k) => `${k}=${labels[k] ?? ''}`);
  return tags.length > 0 ? `${service}{${tags.join(',')}}` : service;
}

export class BackoffUploader {
  private readonly endpoint: URL;
  private readonly config: Required<Omit<IngestEndpointConfig, 'headers'>> & {
    headers: Record<string, string>;
  };
  private readonly policy: RetryPolicy;
  private readonly logger: Logger;
  private readonly classify: StatusClassifier;
  private readonly backoff: BackoffFn;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly now: () => number;

  constructor(options: BackoffUploaderOptions) {
    this.endpoint = new URL(options.url);
    this.config = {
      url: options.url,
      timeout: options.timeout ?? 10_000,
      headers: options.headers ?? {},
      bodyFormat: options.bodyFormat ?? 'multipart',
      timeUnit: options.timeUnit ?? 'nanoseconds',
      spyName: options.spyName ?? 'nodejs',
    };
    this.policy = { ...DEFAULT_RETRY_POLICY, ...options.retry };
    this.logger = options.logger ?? noopLogger;
    this.classify = options.classifyStatus ?? classifyStatus;
    this.backoff = options.backoff ?? exponentialBackoff();
    this.sleep = options.sleep ?? sleep;
    this.now = options.now ?? (() => performance.now());
  }

  get retryPolicy(): Readonly<RetryPolicy> {
    return this.policy;
  }

  async upload(payload: UploadPayload, options: UploadOptions = {}): Promise<UploadResult> {
    const { signal } = options;
    const url = this.buildUrl(payload);
    const started = this.now();
    let state: RetryState = initialRetryState(this.policy);

    for (;;) {
      if (signal?.aborted) {
        return this.fail(state, 'aborted', 'upload abandoned before completion');
      }

      const delayMs = state.nextDelay;
      const outcome = await this.attemptOnce(url, payload);
      const step = nextRetryStep(state, outcome, this.policy, this.backoff, this.now() - started);
      state = step.state;

      this.logger.log(outcome.kind === 'success' ? 'info' : 'warn', 'profile upload attempt', {
        attempt: state.attempt,
        maxAttempts: state.maxAttempts,
        delayMs,
        outcome: outcome.kind,
        status: outcome.status,
        error: outcome.kind === 'success' ? undefined : outcome.message,
      });

      if (step.done) {
        if (step.outcome === 'success') {
          this.logger.log('info', 'profile upload completed', {
            attempts: state.attempt,
            bytes: payload.compressedBody.length,
          });
          return { ok: true, attempts: state.attempt, status: outcome.status ?? 0 };
        }
        return this.fail(state, step.outcome, state.lastMessage ?? 'upload failed');
      }

      await this.sleep(state.nextDelay, signal);
    }
  }

  /**
   * One network call. Timeouts and transport errors are retryable. The timeout
   * covers reading an error body too; a stalled body yields the bare status.
   */
  private async attemptOnce(url: URL, payload: UploadPayload): Promise<AttemptOutcome> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.config.timeout);
    try {
      const response = await fetch(url, {
        method: 'POST',
        headers: this.buildHeaders(payload),
        body: this.buildBody(payload),
        signal: controller.signal,
      });

      const kind = this.classify(response.status);
      if (kind === 'success') {
        return { kind, status: response.status };
      }

      const body = await response.text().catch(() => '');
      const hint = describeStatus(response.status);
      return {
        kind,
        status: response.status,
        message: `HTTP ${response.status}${hint ? ` (${hint})` : ''} ${body}`.trim().slice(0, 500),
      };
    } catch (err) {
      if (err instanceof Error && err.name === 'AbortError') {
        return { kind: 'retryable', message: `request timed out after ${this.config.timeout}ms` };
      }
      const msg = err instanceof Error ? err.message : String(err);
      return { kind: 'retryable', message: `network error: ${msg}` };
    } finally {
      clearTimeout(timer);
    }
  }

  private fail(state: RetryState, reason: 'fatal' | 'exhausted' | 'aborted', message: string): UploadResult {
    const kind = reason === 'fatal' ? 'fatal' : 'retryable';
    return {
      ok: false,
      error: new UploadError(message, kind, reason, state.attempt, state.lastStatus),
    };
  }

  private buildUrl(payload: UploadPayload): URL {
    const url = new URL(this.endpoint);
    const { startNanos, endNanos } = payload.timeRange;
    const toUnit = (ns: bigint) =>
      this.config.timeUnit === 'seconds' ? ns / NANOS_PER_SECOND : ns;

    url.searchParams.set('name', ingestName(payload.labels));
    url.searchParams.set('from', toUnit(startNanos).toString());
    url.searchParams.set('until', toUnit(endNanos).toString());
    url.searchParams.set('format', payload.format);
    url.searchParams.set('spyName', this.config.spyName);
    return url;
  }

  private buildHeaders(payload: UploadPayload): Record<string, string> {
    const headers: Record<string, string> = { ...this.config.headers };
    if (this.config.bodyFormat === 'gzip') {
      headers['Content-Type'] = 'application/octet-stream';
      headers['Content-Encoding'] = payload.contentEncoding;
    }
    if (payload.authToken) {
      headers['Authorization'] = `Bearer ${payload.authToken}`;
    }
    return headers;
  }

  private buildBody(payload: UploadPayload): FormData | Uint8Array {
    if (this.config.bodyFormat === 'gzip') {
      return payload.compressedBody;
    }
    // The ingest server reads the gzip-compressed profile from the form field itself.
    const form = new FormData();
    form.append('profile', new Blob([payload.compressedBody]), 'profile');
    form.append('sample_type_config', new Blob([payload.sampleTypeConfig]), 'sample_type_config');
    return form;
  }
}
