/**
 * Timer-driven export loop.
 *
 *   idle ──tick──▶ exporting ──cycle done──▶ idle
 *   idle | exporting ──stop()──▶ stopped   (terminal)
 *
 * One cycle = swap → build → encode → upload. A tick that finds a cycle still
 * running is skipped, so windows leave in the order they were closed and never
 * overlap. Every failure is caught and logged here; nothing reaches the host.
 */

import type { ProfileWindow } from '../types/profile.ts';
import type { SampleAccumulator } from './SampleAccumulator.ts';
import type { ProfileBuilder, BinaryProfile } from './ProfileBuilder.ts';
import type { PayloadEncoder, PayloadMetadata } from './PayloadEncoder.ts';
import type { BackoffUploader, UploadResult } from './BackoffUploader.ts';
import { EncodingError } from './errors.ts';
import { noopLogger, type Logger } from '../util/logger.ts';

export type SchedulerState = 'idle' | 'exporting' | 'stopped';

export type CycleOutcome =
  | 'success'
  | 'empty'
  | 'encoding-dropped'
  | 'upload-retryable-exhausted'
  | 'upload-fatal'
  | 'abandoned';

/** The uploader seam; BackoffUploader in production. */
export type ProfileUploader = Pick<BackoffUploader, 'upload'>;

export interface ExportSchedulerOptions {
  accumulator: SampleAccumulator;
  builder: ProfileBuilder;
  encoder: PayloadEncoder;
  uploader: ProfileUploader;
  metadata: PayloadMetadata;
  intervalMs: number;
  /** Hard bound on one cycle; past it the cycle is abandoned. Default: intervalMs. */
  cycleTimeoutMs?: number;
  /** Bound on the final flush during stop(). */
  flushTimeoutMs: number;
  logger?: Logger;
}

const TIMED_OUT = Symbol('timed-out');

/** Resolves to TIMED_OUT when `ms` passes first; the timer never outlives the race. */
async function withTimeout<T>(work: Promise<T>, ms: number): Promise<T | typeof TIMED_OUT> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<typeof TIMED_OUT>((resolve) => {
    timer = setTimeout(() => resolve(TIMED_OUT), ms);
  });
  try {
    return await Promise.race([work, deadline]);
  } finally {
    clearTimeout(timer);
  }
}

export class ExportScheduler {
  private _state: SchedulerState = 'idle';
  private timer: ReturnType<typeof setInterval> | null = null;
  private inFlight: Promise<CycleOutcome> | null = null;
  private cycleAbort: AbortController | null = null;
  private stopping: Promise<void> | null = null;
  private readonly cycleTimeoutMs: number;
  private readonly logger: Logger;
  private cycleCount = 0;

  constructor(private readonly options: ExportSchedulerOptions) {
    this.cycleTimeoutMs = options.cycleTimeoutMs ?? options.intervalMs;
    this.logger = options.logger ?? noopLogger;
  }

  get state(): SchedulerState {
    return this._state;
  }

  start(): void {
    if (this._state === 'stopped' || this.timer) return;
    this.timer = setInterval(() => {
      void this.tick();
    }, this.options.intervalMs);
    // Profiling must never keep the host process alive.
    this.timer.unref?.();
    this.logger.log('info', 'profile export started', { intervalMs: this.options.intervalMs });
  }

  /**
   * Timer callback, public so hosts and tests can drive cycles by hand.
   * Resolves to the cycle outcome, or null when the tick was skipped.
   */
  async tick(): Promise<CycleOutcome | null> {
    if (this._state === 'stopped') return null;
    if (this._state === 'exporting') {
      this.logger.log('warn', 'export tick skipped: previous cycle still running');
      return null;
    }
    return this.runCycle(this.cycleTimeoutMs);
  }

  /**
   * Flush the last window and stop. Waits at most flushTimeoutMs, then reaches
   * 'stopped' whatever the in-flight cycle is doing. Never rejects.
   */
  stop(): Promise<void> {
    if (!this.stopping) this.stopping = this.shutdown();
    return this.stopping;
  }

  private async shutdown(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }

    const { flushTimeoutMs } = this.options;
    if (this._state === 'idle') {
      await this.runCycle(flushTimeoutMs);
    } else if (this.inFlight) {
      const result = await withTimeout(this.inFlight, flushTimeoutMs);
      if (result === TIMED_OUT) {
        this.cycleAbort?.abort();
        this.logger.log('warn', 'profile export abandoned at shutdown', {
          cycle: this.cycleCount,
          outcome: 'abandoned',
          flushTimeoutMs,
        });
      }
    }

    this._state = 'stopped';
    this.logger.log('info', 'profile export stopped', { cycles: this.cycleCount });
  }

  /** Runs one cycle bounded by `timeoutMs`; the state returns to idle either way. */
  private async runCycle(timeoutMs: number): Promise<CycleOutcome> {
    this._state = 'exporting';
    const cycle = ++this.cycleCount;
    const abort = new AbortController();
    const work = this.exportWindow(cycle, abort.signal);
    this.inFlight = work;
    this.cycleAbort = abort;

    try {
      const result = await withTimeout(work, timeoutMs);
      if (result === TIMED_OUT) {
        // Further retries are cancelled; a request already on the wire is left to finish.
        abort.abort();
        this.logger.log('warn', 'profile export cycle abandoned', { cycle, outcome: 'abandoned', timeoutMs });
        return 'abandoned';
      }
      return result;
    } finally {
      this.inFlight = null;
      this.cycleAbort = null;
      if (this._state === 'exporting') this._state = 'idle';
    }
  }

  private async exportWindow(cycle: number, signal: AbortSignal): Promise<CycleOutcome> {
    let window: ProfileWindow | undefined;
    let payloadBytes = 0;
    try {
      window = this.options.accumulator.swap();
      const profile = this.options.builder.build(window);
      if (profile.dropped > 0) {
        this.logger.log('warn', 'samples dropped by capacity bound', { cycle, dropped: window.dropped });
      }
      if (profile.groups.length === 0) {
        this.logger.log('debug', 'profile export cycle', { cycle, outcome: 'empty' });
        return 'empty';
      }

      const payload = this.options.encoder.encode(profile, this.options.metadata);
      payloadBytes = payload.compressedBody.length;
      const result = await this.options.uploader.upload(payload, { signal });
      // An aborted cycle was already reported as abandoned by whoever aborted it.
      if (signal.aborted) return 'abandoned';
      return this.report(cycle, profile, result, payloadBytes);
    } catch (err) {
      if (err instanceof EncodingError) {
        this.logger.log('error', 'profile export cycle', {
          cycle,
          outcome: 'encoding-dropped',
          error: err.message,
          startNanos: window?.startNanos,
          endNanos: window?.endNanos,
        });
        return 'encoding-dropped';
      }
      // Anything else is a bug in a collaborator; contain it like an encoding failure.
      const msg = err instanceof Error ? err.message : String(err);
      this.logger.log('error', 'profile export cycle failed unexpectedly', { cycle, error: msg });
      return 'encoding-dropped';
    }
  }

  private report(cycle: number, profile: BinaryProfile, result: UploadResult, bytes: number): CycleOutcome {
    const window = { startNanos: profile.startNanos, endNanos: profile.endNanos };
    if (result.ok) {
      this.logger.log('info', 'profile export cycle', {
        cycle,
        outcome: 'success',
        attempts: result.attempts,
        samples: profile.sampleCount,
        bytes,
        ...window,
      });
      return 'success';
    }

    const { error } = result;
    const outcome: CycleOutcome =
      error.reason === 'aborted'
        ? 'abandoned'
        : error.kind === 'fatal'
          ? 'upload-fatal'
          : 'upload-retryable-exhausted';
    this.logger.log('error', 'profile export cycle', {
      cycle,
      outcome,
      reason: error.reason,
      attempts: error.attempts,
      status: error.status,
      error: error.message,
      ...window,
    });
    return outcome;
  }
}
