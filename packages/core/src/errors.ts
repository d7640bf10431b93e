/**
 * Error classes for cache operations
 *
 * Only StoragePathUnavailableError escapes a tier. The other classes describe
 * failures the tiers log and absorb, degrading to a miss or a cold start.
 */

/**
 * Error codes for cache operations
 */
export enum CacheErrorCode {
  /** Base directory cannot be resolved or created */
  STORAGE_PATH_UNAVAILABLE = 'STORAGE_PATH_UNAVAILABLE',
  /** Payload file could not be written, read or deleted */
  PAYLOAD_IO = 'PAYLOAD_IO',
  /** Persisted metadata document is unreadable or undecodable */
  METADATA_CORRUPT = 'METADATA_CORRUPT',
  /** Metadata document could not be written */
  METADATA_PERSIST = 'METADATA_PERSIST',
  /** Network or transport failure while fetching */
  FETCH_FAILED = 'FETCH_FAILED',
}

/**
 * Base error class for cache errors
 */
export class TierCacheError extends Error {
  constructor(
    message: string,
    public readonly code: CacheErrorCode,
    cause?: Error,
  ) {
    super(message, cause ? { cause } : undefined);
    this.name = 'TierCacheError';
    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, TierCacheError);
    }
  }
}

/**
 * Thrown when the disk tier cannot provision its directory
 */
export class StoragePathUnavailableError extends TierCacheError {
  constructor(
    public readonly storagePath: string,
    cause?: Error,
  ) {
    super(
      `Cache storage path unavailable: ${storagePath}${cause ? `: ${cause.message}` : ''}`,
      CacheErrorCode.STORAGE_PATH_UNAVAILABLE,
      cause,
    );
    this.name = 'StoragePathUnavailableError';
  }
}

/**
 * A payload file operation failed
 */
export class PayloadIOError extends TierCacheError {
  constructor(
    public readonly operation: 'read' | 'write' | 'delete',
    public readonly filePath: string,
    cause?: Error,
  ) {
    super(
      `Failed to ${operation} payload ${filePath}${cause ? `: ${cause.message}` : ''}`,
      CacheErrorCode.PAYLOAD_IO,
      cause,
    );
    this.name = 'PayloadIOError';
  }
}

/**
 * The metadata document could not be decoded
 */
export class MetadataCorruptError extends TierCacheError {
  constructor(
    public readonly filePath: string,
    reason: string,
    cause?: Error,
  ) {
    super(`Metadata document ${filePath} is corrupt: ${reason}`, CacheErrorCode.METADATA_CORRUPT, cause);
    this.name = 'MetadataCorruptError';
  }
}

/**
 * The metadata document could not be written
 */
export class MetadataPersistError extends TierCacheError {
  constructor(
    public readonly filePath: string,
    cause?: Error,
  ) {
    super(
      `Failed to persist metadata to ${filePath}${cause ? `: ${cause.message}` : ''}`,
      CacheErrorCode.METADATA_PERSIST,
      cause,
    );
    this.name = 'MetadataPersistError';
  }
}

/**
 * A fetch from the origin failed
 */
export class FetchFailedError extends TierCacheError {
  constructor(
    public readonly address: string,
    cause?: Error,
  ) {
    super(
      `Fetch failed for ${address}${cause ? `: ${cause.message}` : ''}`,
      CacheErrorCode.FETCH_FAILED,
      cause,
    );
    this.name = 'FetchFailedError';
  }
}

/**
 * Normalize an unknown thrown value into an Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
