/**
 * Configuration schema types for tiercache
 */

/**
 * Where the disk tier keeps its files
 *
 * - default: the user's cache directory ($XDG_CACHE_HOME or ~/.cache)
 * - shared: a directory shared by cooperating processes, keyed by identifier
 * - custom: an explicit directory
 */
export type StorageLocation =
  | { kind: 'default' }
  | { kind: 'shared'; identifier: string }
  | { kind: 'custom'; path: string };

/**
 * Cache configuration
 */
export interface TierCacheConfig {
  /** Disk tier location */
  storage: StorageLocation;
  /** Memory tier cost budget in bytes */
  memoryLimitBytes: number;
  /** Disk tier payload budget in bytes */
  diskLimitBytes: number;
  /** Time after validation before an entry is revalidated (ms) */
  ttlMs: number;
  /** Headers sent with every fetch */
  defaultHeaders: Record<string, string>;
}

/**
 * Partial configuration as read from files, env or callers
 */
export type PartialTierCacheConfig = Partial<TierCacheConfig>;
