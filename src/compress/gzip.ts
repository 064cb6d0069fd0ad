import { gzipSync, gunzipSync } from 'fflate';

// mtime 0 keeps the header free of wall-clock time, so equal input gives equal output.
export function gzipCompress(data: Uint8Array, level: 0 | 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9 = 6): Uint8Array {
  return gzipSync(data, { level, mtime: 0 });
}

export function gzipUncompress(data: Uint8Array): Uint8Array {
  return gunzipSync(data);
}
