/**
 * TierCache
 *
 * Entry point for embedding applications. Builds the disk tier, memory tier,
 * coordinator and revalidation orchestrator from one configuration. There is
 * no shared default instance: construct one and pass it where it is needed.
 *
 * @example
 * const cache = new TierCache({
 *   config: { storage: { kind: 'custom', path: '/var/cache/thumbs' } },
 *   codec: binaryCodec,
 *   fetcher: new HttpFetcher(),
 * });
 * const outcome = await cache.load('https://cdn.example.com/a.png', { width: 120, height: 80 });
 */

import type {
  CacheKey,
  CacheMetadata,
  CacheStatistics,
  CacheStrategy,
  Fetcher,
  HeaderProvider,
  MemoryPressureSignal,
  ObjectCodec,
  TargetDimensions,
} from '@tiercache/types';

import { generateCacheKey } from '../cache-key.js';
import type { PartialTierCacheConfig, TierCacheConfig } from '../config/schema.js';
import { resolveConfig } from '../config/validation.js';
import { CacheCoordinator } from '../coordinator/cache-coordinator.js';
import { DiskTier } from '../disk/disk-tier.js';
import { type CacheLogger, consoleLogger } from '../logger.js';
import { MemoryTier } from '../memory/memory-tier.js';
import { createCacheMetadata } from '../metadata.js';
import { type LoadOutcome, RevalidationOrchestrator } from '../revalidation/revalidation-orchestrator.js';

/**
 * TierCache options
 */
export interface TierCacheOptions<T> {
  /** Overrides merged over the defaults */
  config?: PartialTierCacheConfig;
  codec: ObjectCodec<T>;
  fetcher: Fetcher;
  /** Headers computed per request (overrides default headers) */
  headerProvider?: HeaderProvider;
  /** Host low-memory signal; clears the memory tier */
  pressureSignal?: MemoryPressureSignal;
  logger?: CacheLogger;
}

/**
 * Per-call load options
 */
export interface LoadOptions {
  strategy?: CacheStrategy;
  headers?: Record<string, string>;
  signal?: AbortSignal;
}

/**
 * Options for storing an object without fetching it
 */
export interface SaveOptions {
  validator?: string;
  strategy?: CacheStrategy;
}

export class TierCache<T> {
  readonly config: TierCacheConfig;
  readonly coordinator: CacheCoordinator<T>;
  readonly orchestrator: RevalidationOrchestrator<T>;

  private readonly memory: MemoryTier<T>;

  /**
   * @throws ConfigValidationError when the merged configuration is invalid
   * @throws StoragePathUnavailableError when the disk tier cannot be provisioned
   */
  constructor(options: TierCacheOptions<T>) {
    const logger = options.logger ?? consoleLogger;
    const codec = options.codec;
    this.config = resolveConfig(options.config);

    const disk = new DiskTier({
      storage: this.config.storage,
      diskLimitBytes: this.config.diskLimitBytes,
      ttlMs: this.config.ttlMs,
      logger,
    });
    this.memory = new MemoryTier<T>({
      memoryLimitBytes: this.config.memoryLimitBytes,
      estimateCost: (object) => codec.estimatedCost(object),
      pressureSignal: options.pressureSignal,
      logger,
    });
    this.coordinator = new CacheCoordinator({ memory: this.memory, disk, codec, logger });
    this.orchestrator = new RevalidationOrchestrator({
      coordinator: this.coordinator,
      fetcher: options.fetcher,
      headerProvider: options.headerProvider,
      defaultHeaders: this.config.defaultHeaders,
      logger,
    });
  }

  /**
   * Cache key for a resource at a target size
   */
  keyFor(address: string, target: TargetDimensions): CacheKey {
    return generateCacheKey(address, target);
  }

  /**
   * Resolve an object from the cache, revalidating or downloading as needed
   */
  load(address: string, target: TargetDimensions, options: LoadOptions = {}): Promise<LoadOutcome<T>> {
    return this.orchestrator.load({ address, target, ...options });
  }

  /**
   * Store an object obtained elsewhere
   *
   * @returns the entry's cache key
   */
  async save(
    object: T,
    address: string,
    target: TargetDimensions,
    options: SaveOptions = {},
  ): Promise<CacheKey> {
    const key = this.keyFor(address, target);
    const metadata = createCacheMetadata({
      resourceAddress: address,
      targetDimensions: target,
      validator: options.validator,
    });
    await this.coordinator.setObject(key, object, metadata, options.strategy ?? 'both');
    return key;
  }

  getMetadata(address: string, target: TargetDimensions): Promise<CacheMetadata | undefined> {
    return this.coordinator.getMetadata(this.keyFor(address, target));
  }

  remove(address: string, target: TargetDimensions): Promise<void> {
    return this.coordinator.remove(this.keyFor(address, target));
  }

  clearMemory(): Promise<void> {
    return this.coordinator.clearMemory();
  }

  clearDisk(): Promise<void> {
    return this.coordinator.clearDisk();
  }

  clearAll(): Promise<void> {
    return this.coordinator.clearAll();
  }

  /**
   * Tier and network counters (approximate across tiers)
   */
  async getStatistics(): Promise<CacheStatistics> {
    const tiers = await this.coordinator.statistics();
    const network = this.orchestrator.statistics;
    const counters = network.snapshot();
    return {
      ...tiers,
      validatorHitRate: network.validatorHitRate(),
      totalDownloads: counters.downloads,
      totalBytesDownloaded: counters.bytesDownloaded,
      totalBytesSaved: counters.bytesSaved,
    };
  }

  async resetStatistics(): Promise<void> {
    await this.coordinator.resetStatistics();
    this.orchestrator.statistics.reset();
  }

  getTtl(): number {
    return this.coordinator.getTtl();
  }

  setTtl(ttlMs: number): void {
    this.coordinator.setTtl(ttlMs);
  }

  getDiskLimit(): number {
    return this.coordinator.getDiskLimit();
  }

  /**
   * Change the disk budget; lowering it evicts immediately
   */
  setDiskLimit(limitBytes: number): Promise<void> {
    return this.coordinator.setDiskLimit(limitBytes);
  }

  getMemoryLimit(): number {
    return this.coordinator.getMemoryLimit();
  }

  setMemoryLimit(limitBytes: number): Promise<void> {
    return this.coordinator.setMemoryLimit(limitBytes);
  }

  handleMemoryPressure(): Promise<void> {
    return this.memory.handleMemoryPressure();
  }

  /**
   * Release the pressure-signal subscription
   */
  dispose(): void {
    this.memory.dispose();
  }
}

/**
 * Create a TierCache
 */
export function createTierCache<T>(options: TierCacheOptions<T>): TierCache<T> {
  return new TierCache(options);
}
