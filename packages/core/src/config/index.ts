/**
 * Configuration module exports
 */

export type { StorageLocation, TierCacheConfig, PartialTierCacheConfig } from './schema.js';

export {
  DEFAULT_DISK_LIMIT_BYTES,
  MAX_DEFAULT_MEMORY_LIMIT_BYTES,
  DEFAULT_MEMORY_SHARE,
  DEFAULT_TTL_MS,
  resolveDefaultMemoryLimit,
  createDefaultConfig,
} from './defaults.js';

export {
  storageLocationSchema,
  tierCacheConfigSchema,
  partialTierCacheConfigSchema,
  ConfigValidationError,
  validateConfig,
  validatePartialConfig,
  resolveConfig,
} from './validation.js';
