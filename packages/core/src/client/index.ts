export {
  TierCache,
  createTierCache,
  type TierCacheOptions,
  type LoadOptions,
  type SaveOptions,
} from './tier-cache.js';
