import type { SampleTypeInfo } from '../types/profile.ts';

/**
 * Sample types the builder understands, in canonical column order.
 * Heap samples are point-in-time readings, hence 'average' and unsampled.
 */
export const SAMPLE_TYPES = {
  cpu: { unit: 'nanoseconds', aggregation: 'sum', sampled: true },
  wall: { unit: 'nanoseconds', aggregation: 'sum', sampled: true },
  alloc_space: { unit: 'bytes', aggregation: 'sum', sampled: true },
  alloc_objects: { unit: 'count', aggregation: 'sum', sampled: true },
  heap_space: { unit: 'bytes', aggregation: 'average', sampled: false },
} as const satisfies Record<string, SampleTypeInfo>;

export type SampleType = keyof typeof SAMPLE_TYPES;

export const SAMPLE_TYPE_ORDER: readonly SampleType[] = [
  'cpu',
  'wall',
  'alloc_space',
  'alloc_objects',
  'heap_space',
];

export const MEMORY_SAMPLE_TYPES: readonly SampleType[] = ['alloc_space', 'alloc_objects', 'heap_space'];

export function isSampleType(value: string): value is SampleType {
  return Object.prototype.hasOwnProperty.call(SAMPLE_TYPES, value);
}
