/**
 * Cache data model
 *
 * Types describing cache entries as they flow between the tiers and the
 * persisted metadata document.
 */

/**
 * Cache key: lowercase hex SHA-256 of the resource address and target size
 */
export type CacheKey = string;

/**
 * Size a resource is requested at
 */
export interface TargetDimensions {
  /** Width in pixels (fractional parts are ignored when keying) */
  width: number;
  /** Height in pixels (fractional parts are ignored when keying) */
  height: number;
}

/**
 * Per-entry bookkeeping
 *
 * Timestamps are epoch milliseconds.
 */
export interface CacheMetadata {
  /** Canonical address of the remote resource */
  resourceAddress: string;
  /** Server-issued validator (ETag) used for conditional fetches */
  validator?: string;
  /** When the entry was first stored */
  createdAt: number;
  /** Last time the entry was read */
  lastAccessedAt: number;
  /** Last time the origin confirmed the entry (starts at createdAt) */
  lastValidatedAt: number;
  /** Number of recorded reads */
  accessCount: number;
  /** Payload size in bytes, stamped when the payload is written */
  byteSize: number;
  /** Size the resource was requested at */
  targetDimensions: TargetDimensions;
}

/**
 * Which tier(s) receive a write
 */
export type CacheStrategy = 'memoryOnly' | 'diskOnly' | 'both';

/**
 * All cache strategies, in CLI help order
 */
export const CACHE_STRATEGIES: readonly CacheStrategy[] = ['memoryOnly', 'diskOnly', 'both'];

/**
 * Snapshot of the tier coordinator's statistics
 *
 * Read from each tier in turn, so not atomic across tiers.
 */
export interface TierStatistics {
  /** Memory tier hit rate (0-1) */
  memoryHitRate: number;
  /** Disk tier hit rate (0-1) */
  diskHitRate: number;
  /** Sum of resident disk payload sizes in bytes */
  diskSizeBytes: number;
  /** Number of resident disk entries */
  diskEntryCount: number;
}

/**
 * Cache statistics including network counters
 */
export interface CacheStatistics extends TierStatistics {
  /** Share of conditional requests answered with "not modified" (0-1) */
  validatorHitRate: number;
  /** Number of fresh downloads */
  totalDownloads: number;
  /** Bytes received in fresh downloads */
  totalBytesDownloaded: number;
  /** Payload bytes not re-downloaded thanks to "not modified" answers */
  totalBytesSaved: number;
}
