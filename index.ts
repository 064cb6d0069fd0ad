// pprofbridge: sampled stacks → pprof → gzip → ingestion endpoint

// Core builder
export { ProfileExporter, BuiltProfileExporter } from './src/core/ProfileExporter.ts';

// Components (for custom wiring and testing)
export { SampleAccumulator, epochNanos } from './src/core/SampleAccumulator.ts';
export type { SampleAccumulatorOptions, AccumulatorStats } from './src/core/SampleAccumulator.ts';
export { ProfileBuilder, BinaryProfile } from './src/core/ProfileBuilder.ts';
export type { ProfileBuilderOptions, SkippedSamples } from './src/core/ProfileBuilder.ts';
export { PayloadEncoder, buildLabels, buildSampleTypeConfig } from './src/core/PayloadEncoder.ts';
export type { PayloadMetadata, PayloadEncoderOptions } from './src/core/PayloadEncoder.ts';
export { BackoffUploader, ingestName } from './src/core/BackoffUploader.ts';
export type { BackoffUploaderOptions, UploadResult, UploadOptions } from './src/core/BackoffUploader.ts';
export { ExportScheduler } from './src/core/ExportScheduler.ts';
export type { ExportSchedulerOptions, SchedulerState, CycleOutcome, ProfileUploader } from './src/core/ExportScheduler.ts';

// Retry policy
export {
  DEFAULT_RETRY_POLICY,
  classifyStatus,
  exponentialBackoff,
  initialRetryState,
  nextRetryStep,
} from './src/core/RetryPolicy.ts';
export type {
  RetryPolicy,
  RetryState,
  RetryStep,
  AttemptOutcome,
  BackoffFn,
  StatusClassifier,
} from './src/core/RetryPolicy.ts';

// Configuration
export { exporterConfigSchema, parseExporterConfig, loadExporterConfig } from './src/core/ExporterConfig.ts';
export type { ExporterConfig, ExporterConfigInput, IngestEndpointConfig } from './src/core/ExporterConfig.ts';

// Errors and logging
export { EncodingError, UploadError, ConfigError } from './src/core/errors.ts';
export type { UploadErrorKind, UploadErrorReason } from './src/core/errors.ts';
export { createConsoleLogger, noopLogger } from './src/util/logger.ts';
export type { Logger, LogLevel, LogFields, ConsoleLoggerOptions } from './src/util/logger.ts';

// Types
export { SAMPLE_TYPES, isSampleType } from './src/core/sampleTypes.ts';
export type { SampleType } from './src/core/sampleTypes.ts';
export type {
  Sample,
  StackFrame,
  ProfileWindow,
  SampleTypeGroup,
  ValueColumn,
  UploadPayload,
  TimeRange,
} from './src/types/profile.ts';

// Encoding (for advanced use)
export { encodeProfile } from './src/proto/profile.ts';
export type { PprofProfile } from './src/types/pprof.ts';
export { gzipCompress, gzipUncompress } from './src/compress/gzip.ts';
