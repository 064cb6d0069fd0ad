/**
 * Exporter configuration: types, zod schema, and environment loading.
 * Read once at construction; nothing here changes while the exporter runs.
 */

import { hostname } from 'node:os';
import { z } from 'zod';
import { ConfigError } from './errors.ts';

export type BodyFormat = 'multipart' | 'gzip';
export type TimeUnit = 'nanoseconds' | 'seconds';

/** Where and how profiles are POSTed. */
export interface IngestEndpointConfig {
  url: string;
  timeout?: number; // milliseconds, per request
  headers?: Record<string, string>;
  /** 'multipart': form fields `profile` + `sample_type_config`. 'gzip': raw body with Content-Encoding. */
  bodyFormat?: BodyFormat;
  /** Unit of the `from` / `until` query parameters. */
  timeUnit?: TimeUnit;
  spyName?: string;
}

const envBool = z.preprocess((value) => {
  if (typeof value !== 'string') return value;
  return ['true', '1', 'yes'].includes(value.trim().toLowerCase());
}, z.boolean());

const positiveInt = z.coerce.number().int().positive();

export const exporterConfigSchema = z.object({
  enabled: envBool.default(true),
  endpoint: z.string().url(),
  token: z.string().default(''),
  serviceName: z.string().min(1),
  environment: z.string().optional(),
  host: z.string().default(() => hostname()),
  labels: z.record(z.string()).default({}),
  intervalMs: positiveInt.default(60_000),
  requestTimeoutMs: positiveInt.default(10_000),
  cycleTimeoutMs: positiveInt.optional(),
  flushTimeoutMs: positiveInt.default(5_000),
  capacityPerType: positiveInt.default(10_000),
  enableMemoryProfiling: envBool.default(true),
  bodyFormat: z.enum(['multipart', 'gzip']).default('multipart'),
  timeUnit: z.enum(['nanoseconds', 'seconds']).default('nanoseconds'),
  spyName: z.string().min(1).default('nodejs'),
  retry: z
    .object({
      maxAttempts: positiveInt.max(20).default(3),
      baseDelayMs: z.coerce.number().int().nonnegative().default(500),
      maxDelayMs: z.coerce.number().int().nonnegative().default(4_000),
      jitter: z.coerce.number().min(0).max(1).default(1),
      maxElapsedMs: positiveInt.optional(),
    })
    .default({}),
});

export type ExporterConfig = z.infer<typeof exporterConfigSchema>;
export type ExporterConfigInput = z.input<typeof exporterConfigSchema>;

export function parseExporterConfig(input: unknown): ExporterConfig {
  const result = exporterConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }
  return result.data;
}

type Env = Record<string, string | undefined>;

/**
 * Environment variable configuration. Unset variables fall back to schema defaults.
 *
 *   PROFILING_ENDPOINT, TOKEN, SERVICE_NAME, ENVIRONMENT, ENABLE_PROFILING,
 *   ENABLE_MEMORY_PROFILING, PROFILING_INTERVAL_MS, PROFILING_TIMEOUT_MS,
 *   PROFILING_FLUSH_TIMEOUT_MS, PROFILING_CAPACITY, PROFILING_MAX_ATTEMPTS,
 *   PROFILING_BASE_DELAY_MS, PROFILING_MAX_DELAY_MS, PROFILING_BODY_FORMAT,
 *   PROFILING_TIME_UNIT
 */
export function loadExporterConfig(env: Env = process.env): ExporterConfig {
  return parseExporterConfig({
    enabled: env['ENABLE_PROFILING'],
    endpoint: env['PROFILING_ENDPOINT'] ?? 'http://localhost:4040/ingest',
    token: env['TOKEN'],
    serviceName: env['SERVICE_NAME'] ?? 'helloworld',
    environment: env['ENVIRONMENT'] || undefined,
    intervalMs: env['PROFILING_INTERVAL_MS'],
    requestTimeoutMs: env['PROFILING_TIMEOUT_MS'],
    flushTimeoutMs: env['PROFILING_FLUSH_TIMEOUT_MS'],
    capacityPerType: env['PROFILING_CAPACITY'],
    enableMemoryProfiling: env['ENABLE_MEMORY_PROFILING'],
    bodyFormat: env['PROFILING_BODY_FORMAT'],
    timeUnit: env['PROFILING_TIME_UNIT'],
    retry: {
      maxAttempts: env['PROFILING_MAX_ATTEMPTS'],
      baseDelayMs: env['PROFILING_BASE_DELAY_MS'],
      maxDelayMs: env['PROFILING_MAX_DELAY_MS'],
    },
  });
}
