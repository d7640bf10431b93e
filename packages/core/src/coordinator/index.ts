/**
 * Coordinator exports
 */

export { CacheCoordinator, createCacheCoordinator, type CacheCoordinatorOptions } from './cache-coordinator.js';
