/**
 * Retry policy as an explicit state machine.
 *
 *   attempt k fails retryable ─▶ wait backoff(k) ─▶ attempt k+1
 *   attempt k fails fatal     ─▶ stop ('fatal')
 *   attempt k == maxAttempts  ─▶ stop ('exhausted')
 *
 * Classification, backoff and sleeping are plain functions so the policy can be
 * exercised without a network.
 */

import type { UploadErrorKind } from './errors.ts';

export interface RetryPolicy {
  /** Upper bound on network calls for one payload. */
  maxAttempts: number;
  /** Raw delay before the first retry; doubles on each further retry. */
  baseDelayMs: number;
  maxDelayMs: number;
  /** Fraction of the raw delay added as random jitter, 0..1. */
  jitter: number;
  /** Stop retrying once this much time has passed since the first attempt. */
  maxElapsedMs?: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 500,
  maxDelayMs: 4_000,
  jitter: 1,
};

export type AttemptOutcome =
  | { kind: 'success'; status: number }
  | { kind: UploadErrorKind; status?: number; message: string };

export interface RetryState {
  /** Attempts made so far. */
  attempt: number;
  maxAttempts: number;
  /** Delay to wait before the next attempt, ms. */
  nextDelay: number;
  lastError?: UploadErrorKind;
  lastStatus?: number;
  lastMessage?: string;
}

export type RetryStep =
  | { done: true; outcome: 'success'; state: RetryState }
  | { done: true; outcome: 'fatal' | 'exhausted'; state: RetryState }
  | { done: false; state: RetryState };

export type StatusClass = 'success' | UploadErrorKind;
export type StatusClassifier = (status: number) => StatusClass;
/** Delay before retry number `retry` (1 = the second attempt). */
export type BackoffFn = (retry: number, policy: RetryPolicy) => number;

/**
 * 2xx succeed. 5xx, 429 (rate limited) and 408 (request timeout) are transient.
 * Every other status, 4xx payload rejections included, is fatal.
 */
export function classifyStatus(status: number): StatusClass {
  if (status >= 200 && status < 300) return 'success';
  if (status >= 500 || status === 429 || status === 408) return 'retryable';
  return 'fatal';
}

/**
 * Exponential backoff with additive jitter below the raw delay, capped.
 * Because jitter < raw and raw doubles per retry, the result never decreases
 * as `retry` grows.
 */
export function exponentialBackoff(random: () => number = Math.random): BackoffFn {
  return (retry, policy) => {
    if (retry < 1) return 0;
    const raw = policy.baseDelayMs * 2 ** (retry - 1);
    const jitter = Math.min(Math.max(policy.jitter, 0), 1);
    const jittered = raw + Math.floor(random() * raw * jitter);
    return Math.min(policy.maxDelayMs, jittered);
  };
}

export function initialRetryState(policy: RetryPolicy): RetryState {
  return { attempt: 0, maxAttempts: policy.maxAttempts, nextDelay: 0 };
}

/** Fold one attempt's outcome into the state and decide what happens next. */
export function nextRetryStep(
  state: RetryState,
  outcome: AttemptOutcome,
  policy: RetryPolicy,
  backoff: BackoffFn,
  elapsedMs: number
): RetryStep {
  const attempt = state.attempt + 1;

  if (outcome.kind === 'success') {
    return { done: true, outcome: 'success', state: { ...state, attempt, nextDelay: 0 } };
  }

  const failed: RetryState = {
    ...state,
    attempt,
    lastError: outcome.kind,
    lastStatus: outcome.status,
    lastMessage: outcome.message,
  };

  if (outcome.kind === 'fatal') {
    return { done: true, outcome: 'fatal', state: { ...failed, nextDelay: 0 } };
  }
  if (attempt >= state.maxAttempts) {
    return { done: true, outcome: 'exhausted', state: { ...failed, nextDelay: 0 } };
  }

  const nextDelay = backoff(attempt, policy);
  if (policy.maxElapsedMs !== undefined && elapsedMs + nextDelay > policy.maxElapsedMs) {
    return { done: true, outcome: 'exhausted', state: { ...failed, nextDelay: 0 } };
  }
  return { done: false, state: { ...failed, nextDelay } };
}

/** Resolves after `ms`, or as soon as `signal` aborts. Never rejects. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (ms <= 0 || signal?.aborted) {
      resolve();
      return;
    }
    const done = () => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal?.addEventListener('abort', done, { once: true });
  });
}
