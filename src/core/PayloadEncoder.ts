import type { UploadPayload, ValueColumn } from '../types/profile.ts';
import type { BinaryProfile } from './ProfileBuilder.ts';
import { gzipCompress } from '../compress/gzip.ts';
import { SAMPLE_TYPES, isSampleType } from './sampleTypes.ts';
import { EncodingError } from './errors.ts';

/** Static identity of the exporting service, fixed at construction. */
export interface PayloadMetadata {
  serviceName: string;
  authToken: string;
  environment?: string;
  host?: string;
  /** Extra static labels; service_name, env and host win on conflict. */
  labels?: Record<string, string>;
}

export interface PayloadEncoderOptions {
  compress?: (data: Uint8Array) => Uint8Array;
}

interface SampleTypeConfigEntry {
  units: string;
  aggregation: string;
  'display-name': string;
  sampled: boolean;
}

function ingestUnits(column: ValueColumn): string {
  if (column.type.endsWith('_samples')) return 'samples';
  if (column.unit === 'bytes') return 'bytes';
  if (column.unit === 'count') return 'objects';
  return 'samples';
}

/** The `sample_type_config` document, one entry per value column. */
export function buildSampleTypeConfig(columns: readonly ValueColumn[]): string {
  const config: Record<string, SampleTypeConfigEntry> = {};
  for (const column of columns) {
    const base = column.type.replace(/_samples$/, '');
    const info = isSampleType(base) ? SAMPLE_TYPES[base] : undefined;
    config[column.type] = {
      units: ingestUnits(column),
      aggregation: info?.aggregation ?? 'sum',
      'display-name': column.type,
      sampled: info?.sampled ?? true,
    };
  }
  return JSON.stringify(config);
}

/** Merge static labels and identity labels, keys sorted. */
export function buildLabels(metadata: PayloadMetadata): Record<string, string> {
  const merged: Record<string, string> = { ...metadata.labels, service_name: metadata.serviceName };
  if (metadata.environment) merged['env'] = metadata.environment;
  if (metadata.host) merged['host'] = metadata.host;

  const sorted: Record<string, string> = {};
  for (const key of Object.keys(merged).sort()) {
    const value = merged[key];
    if (value !== undefined) sorted[key] = value;
  }
  return sorted;
}

export class PayloadEncoder {
  private readonly compress: (data: Uint8Array) => Uint8Array;

  constructor(options: PayloadEncoderOptions = {}) {
    this.compress = options.compress ?? ((data) => gzipCompress(data));
  }

  /**
   * Compress the profile and attach the transport metadata.
   * Throws EncodingError when compression fails; the profile is not retried.
   */
  encode(profile: BinaryProfile, metadata: PayloadMetadata): UploadPayload {
    let compressedBody: Uint8Array;
    try {
      compressedBody = this.compress(profile.toBytes());
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      throw new EncodingError(`gzip compression failed: ${msg}`, { cause: err });
    }

    const payload: UploadPayload = {
      compressedBody,
      contentEncoding: 'gzip',
      labels: Object.freeze(buildLabels(metadata)),
      authToken: metadata.authToken,
      timeRange: Object.freeze({ startNanos: profile.startNanos, endNanos: profile.endNanos }),
      format: 'pprof',
      sampleTypeConfig: buildSampleTypeConfig(profile.valueColumns),
    };
    return Object.freeze(payload);
  }
}
