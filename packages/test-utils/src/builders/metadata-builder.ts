/**
 * Fluent builder for CacheMetadata test data
 *
 * Note: Builds plain objects so core tests can depend on this package
 * without a cycle through @tiercache/core.
 */

import type { CacheMetadata } from '@tiercache/types';

/**
 * Fixed epoch used by default (2024-01-01T00:00:00.000Z)
 */
export const TEST_EPOCH = Date.UTC(2024, 0, 1);

/**
 * Fluent builder for creating CacheMetadata instances
 */
export class CacheMetadataBuilder {
  private metadata: CacheMetadata;

  constructor() {
    this.metadata = {
      resourceAddress: 'https://assets.test/image.png',
      createdAt: TEST_EPOCH,
      lastAccessedAt: TEST_EPOCH,
      lastValidatedAt: TEST_EPOCH,
      accessCount: 1,
      byteSize: 0,
      targetDimensions: { width: 0, height: 0 },
    };
  }

  /**
   * Set the resource address
   */
  forAddress(address: string): this {
    this.metadata.resourceAddress = address;
    return this;
  }

  /**
   * Set the target size
   */
  atSize(width: number, height: number): this {
    this.metadata.targetDimensions = { width, height };
    return this;
  }

  withValidator(validator: string): this {
    this.metadata.validator = validator;
    return this;
  }

  withByteSize(byteSize: number): this {
    this.metadata.byteSize = byteSize;
    return this;
  }

  withAccessCount(accessCount: number): this {
    this.metadata.accessCount = accessCount;
    return this;
  }

  /**
   * Set every timestamp to the same instant
   */
  at(epochMs: number): this {
    this.metadata.createdAt = epochMs;
    this.metadata.lastAccessedAt = epochMs;
    this.metadata.lastValidatedAt = epochMs;
    return this;
  }

  lastAccessedAt(epochMs: number): this {
    this.metadata.lastAccessedAt = epochMs;
    return this;
  }

  lastValidatedAt(epochMs: number): this {
    this.metadata.lastValidatedAt = epochMs;
    return this;
  }

  /**
   * Build the metadata (a fresh copy on every call)
   */
  build(): CacheMetadata {
    return { ...this.metadata, targetDimensions: { ...this.metadata.targetDimensions } };
  }
}

/**
 * Start a new metadata builder
 */
export function cacheMetadata(): CacheMetadataBuilder {
  return new CacheMetadataBuilder();
}
