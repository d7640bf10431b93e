/**
 * Cache metadata helpers
 *
 * Metadata records are plain objects owned by whichever tier holds the
 * entry. Access and validation bookkeeping mutate them in place.
 */

import type { CacheMetadata, TargetDimensions } from '@tiercache/types';
import { z } from 'zod';

/**
 * Input for a new metadata record
 */
export interface NewMetadataInput {
  resourceAddress: string;
  targetDimensions: TargetDimensions;
  validator?: string | undefined;
}

/**
 * Create metadata for an entry stored now
 *
 * byteSize stays 0 until the disk tier writes the payload.
 */
export function createCacheMetadata(input: NewMetadataInput, now: number = Date.now()): CacheMetadata {
  const metadata: CacheMetadata = {
    resourceAddress: input.resourceAddress,
    createdAt: now,
    lastAccessedAt: now,
    lastValidatedAt: now,
    accessCount: 0,
    byteSize: 0,
    targetDimensions: { width: input.targetDimensions.width, height: input.targetDimensions.height },
  };
  if (input.validator !== undefined) {
    metadata.validator = input.validator;
  }
  return metadata;
}

/**
 * Record a read of the entry
 */
export function recordAccess(metadata: CacheMetadata, now: number = Date.now()): void {
  metadata.accessCount += 1;
  metadata.lastAccessedAt = now;
}

/**
 * Record that the origin confirmed the entry; the validator is left as is
 */
export function markValidated(metadata: CacheMetadata, now: number = Date.now()): void {
  metadata.lastValidatedAt = now;
}

/**
 * Whether more than ttlMs has passed since the entry was last validated
 */
export function isTtlExpired(metadata: CacheMetadata, ttlMs: number, now: number = Date.now()): boolean {
  return now - metadata.lastValidatedAt > ttlMs;
}

/**
 * Copy a metadata record
 */
export function cloneMetadata(metadata: CacheMetadata): CacheMetadata {
  return { ...metadata, targetDimensions: { ...metadata.targetDimensions } };
}

/**
 * Whether two records describe the same logical entry
 */
export function sameLogicalEntry(a: CacheMetadata, b: CacheMetadata): boolean {
  return (
    a.resourceAddress === b.resourceAddress &&
    a.targetDimensions.width === b.targetDimensions.width &&
    a.targetDimensions.height === b.targetDimensions.height
  );
}

const timestampSchema = z.number().finite().nonnegative();

/**
 * Schema of one persisted metadata record
 */
export const cacheMetadataSchema = z.object({
  resourceAddress: z.string(),
  validator: z.string().optional(),
  createdAt: timestampSchema,
  lastAccessedAt: timestampSchema,
  lastValidatedAt: timestampSchema,
  accessCount: z.number().int().nonnegative(),
  byteSize: z.number().int().nonnegative(),
  targetDimensions: z.object({
    width: z.number().finite().nonnegative(),
    height: z.number().finite().nonnegative(),
  }),
});

/**
 * Schema of the persisted metadata document (key → record)
 */
export const metadataDocumentSchema = z.record(z.string(), cacheMetadataSchema);

export type MetadataDocument = Record<string, CacheMetadata>;
