/**
 * Memory tier exports
 */

export { LRUCache, type LRUOptions, type LRUStats } from './lru-cache.js';
export { MemoryTier, type MemoryTierOptions } from './memory-tier.js';
