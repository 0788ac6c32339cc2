/**
 * Digest computation and truncation
 * @module digest
 */

import { createHash } from 'node:crypto';
import type { HashFunction, HashLimit } from './types.js';

/**
 * Default hash function: 128-bit MD5, lowercase hex (32 characters)
 */
export function HashMd5Hex(bytes: Uint8Array): string {
  return createHash('md5').update(bytes).digest('hex');
}

/**
 * Keep the first `limit` characters of a digest.
 *
 * `'unbounded'` keeps the whole digest; a limit past the end keeps it whole too.
 */
export function TruncateDigest(digest: string, limit: HashLimit): string {
  if (limit === 'unbounded') {
    return digest;
  }

  return digest.slice(0, limit);
}

/**
 * Hash bytes and truncate the result
 *
 * @example
 * ```typescript
 * const input = new TextEncoder().encode('{"name":"User"}');
 * ComputeDigest(input, HashMd5Hex, 12);
 * // 12 hex characters
 * ```
 */
export function ComputeDigest(bytes: Uint8Array, hashFunction: HashFunction, limit: HashLimit): string {
  return TruncateDigest(hashFunction(bytes), limit);
}
