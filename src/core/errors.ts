/**
 * Error kinds raised or returned by the export bridge. None of them leave the
 * bridge: the scheduler catches and logs every one at the cycle boundary.
 */

/** Profile or compression construction failed; fatal for the current cycle. */
export class EncodingError extends Error {
  override readonly name = 'EncodingError';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export type UploadErrorKind = 'retryable' | 'fatal';

/**
 * Why the attempt sequence ended:
 * - 'fatal': the endpoint rejected the payload
 * - 'exhausted': every attempt failed with a retryable error
 * - 'aborted': shutdown or a cycle timeout cancelled the remaining attempts
 */
export type UploadErrorReason = 'fatal' | 'exhausted' | 'aborted';

export class UploadError extends Error {
  override readonly name = 'UploadError';

  constructor(
    message: string,
    readonly kind: UploadErrorKind,
    readonly reason: UploadErrorReason,
    readonly attempts: number,
    readonly status?: number
  ) {
    super(message);
  }
}

export class ConfigError extends Error {
  override readonly name = 'ConfigError';

  constructor(readonly issues: string[]) {
    super(`Invalid profiling exporter config:\n  ${issues.join('\n  ')}`);
  }
}
