/**
 * Cache key generation
 *
 * A key identifies one resource at one target size. It is the SHA-256 of
 * "<address>_<width>x<height>" in lowercase hex, which also makes it a safe
 * file name for the payload.
 */

import { createHash } from 'node:crypto';

import type { CacheKey, TargetDimensions } from '@tiercache/types';

/**
 * Format target dimensions as "<width>x<height>" with fractions truncated
 *
 * @example
 * formatDimensions({ width: 120.7, height: 80 }) // '120x80'
 */
export function formatDimensions(target: TargetDimensions): string {
  return `${Math.trunc(target.width)}x${Math.trunc(target.height)}`;
}

/**
 * Derive the cache key for a resource address at a target size
 */
export function generateCacheKey(address: string, target: TargetDimensions): CacheKey {
  const source = `${address}_${formatDimensions(target)}`;
  return createHash('sha256').update(source).digest('hex');
}

/**
 * Check that a string has the shape of a generated cache key
 */
export function isCacheKey(value: string): boolean {
  return /^[0-9a-f]{64}$/.test(value);
}
