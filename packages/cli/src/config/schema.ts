/**
 * Configuration schema types for the tiercache CLI
 */

import type { PartialTierCacheConfig, TierCacheConfig } from '@tiercache/core';
import type { CacheStrategy } from '@tiercache/types';

/**
 * Resolved CLI configuration: the cache configuration plus transport settings
 */
export interface CliConfig extends TierCacheConfig {
  /** Per-request timeout for the HTTP fetcher (ms) */
  timeoutMs: number;
}

/**
 * Partial configuration as read from a file or the environment
 */
export type PartialCliConfig = PartialTierCacheConfig & {
  timeoutMs?: number;
};

/**
 * Options shared by every command
 */
export interface CliOptions {
  /** Explicit config file path */
  config?: string;
  /** Custom cache directory (overrides file and env storage) */
  cacheDir?: string;
  /** Disable colored output */
  noColor?: boolean;
  /** Print debug logs to stderr */
  verbose?: boolean;
}

/**
 * Options of the fetch and inspect commands
 */
export interface FetchOptions extends CliOptions {
  width?: number;
  height?: number;
  strategy?: CacheStrategy;
  /** Raw "name:value" header arguments */
  header?: string[];
  /** File the resolved bytes are written to */
  output?: string;
}

/**
 * Options of the clear command
 */
export interface ClearOptions extends CliOptions {
  memory?: boolean;
  disk?: boolean;
}
