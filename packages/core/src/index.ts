/**
 * @tiercache/core - Two-tier object cache
 *
 * This package contains the cache engine:
 * - Eviction list with blended recency/frequency scoring
 * - Disk tier (payload files + metadata document) and memory tier (LRU)
 * - Cache coordinator and revalidation orchestrator
 * - TierCache facade, configuration and error types
 */

export const VERSION = '0.1.0';

// Re-export shared types so embedders need a single import
export * from '@tiercache/types';

export * from './errors.js';
export * from './logger.js';
export * from './cache-key.js';
export * from './metadata.js';
export { SerialQueue } from './concurrency/serial-queue.js';

export * from './config/index.js';
export * from './eviction/index.js';
export * from './disk/index.js';
export * from './memory/index.js';
export * from './coordinator/index.js';
export * from './revalidation/index.js';
export * from './codec/index.js';
export * from './client/index.js';
