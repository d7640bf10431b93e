/**
 * Default configuration values
 */

import * as os from 'node:os';

import type { TierCacheConfig } from './schema.js';

const MiB = 1024 * 1024;

/** Disk budget: 150 MiB */
export const DEFAULT_DISK_LIMIT_BYTES = 150 * MiB;

/** Upper bound of the default memory budget: 150 MiB */
export const MAX_DEFAULT_MEMORY_LIMIT_BYTES = 150 * MiB;

/** Share of physical memory the default memory budget may take */
export const DEFAULT_MEMORY_SHARE = 0.25;

/** TTL: 7 days */
export const DEFAULT_TTL_MS = 7 * 24 * 60 * 60 * 1000;

/**
 * Default memory budget: 25% of physical memory, capped at 150 MiB
 */
export function resolveDefaultMemoryLimit(totalMemoryBytes: number = os.totalmem()): number {
  return Math.min(Math.floor(totalMemoryBytes * DEFAULT_MEMORY_SHARE), MAX_DEFAULT_MEMORY_LIMIT_BYTES);
}

/**
 * Build the default configuration
 */
export function createDefaultConfig(): TierCacheConfig {
  return {
    storage: { kind: 'default' },
    memoryLimitBytes: resolveDefaultMemoryLimit(),
    diskLimitBytes: DEFAULT_DISK_LIMIT_BYTES,
    ttlMs: DEFAULT_TTL_MS,
    defaultHeaders: {},
  };
}
