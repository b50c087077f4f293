import { gunzipSync } from 'node:zlib';
import { ResourceError } from '../resource/errors.js';

/** True when `name` carries the `.gz` suffix that selects transparent decompression. */
export function isGzipName(name: string): boolean {
  return name.endsWith('.gz');
}

/** Decompress a whole gzip file held in memory. */
export function gunzip(bytes: Uint8Array, name?: string): Uint8Array {
  try {
    const out = gunzipSync(bytes);
    return new Uint8Array(out.buffer, out.byteOffset, out.byteLength);
  } catch (err) {
    throw new ResourceError('RESOURCE_DECODE_ERROR', `Invalid gzip data${name ? ` in ${name}` : ''}`, {
      resourceName: name,
      cause: err,
      context: { format: 'gzip' }
    });
  }
}
