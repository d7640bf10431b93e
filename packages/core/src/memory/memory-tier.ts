/**
 * Memory Tier
 *
 * Process-lifetime cache of decoded objects, bounded by an estimated byte
 * cost. Backed by an LRU container; no persistence and no TTL. Disk metadata
 * stays authoritative, the copies kept here only track hot-path accesses.
 */

import type { CacheKey, CacheMetadata, MemoryPressureSignal } from '@tiercache/types';

import { SerialQueue } from '../concurrency/serial-queue.js';
import { type CacheLogger, consoleLogger } from '../logger.js';
import { cloneMetadata, recordAccess } from '../metadata.js';

import { LRUCache } from './lru-cache.js';

/**
 * Memory tier options
 */
export interface MemoryTierOptions<T> {
  /** Cost budget in bytes */
  memoryLimitBytes: number;
  /** Estimated in-memory cost of an object */
  estimateCost: (object: T) => number;
  /** Upper bound on entry count (default: unbounded) */
  maxEntries?: number;
  /** Host low-memory signal; each signal clears the tier */
  pressureSignal?: MemoryPressureSignal;
  logger?: CacheLogger;
}

interface MemoryEntry<T> {
  object: T;
  metadata: CacheMetadata;
}

export class MemoryTier<T> {
  private readonly lru: LRUCache<CacheKey, MemoryEntry<T>>;
  private readonly queue = new SerialQueue();
  private readonly logger: CacheLogger;
  private readonly unsubscribe: (() => void) | undefined;

  constructor(options: MemoryTierOptions<T>) {
    this.logger = options.logger ?? consoleLogger;
    this.lru = new LRUCache<CacheKey, MemoryEntry<T>>({
      maxSize: options.maxEntries ?? Infinity,
      maxCost: options.memoryLimitBytes,
      trackStats: true,
      costEstimator: (entry) => options.estimateCost(entry.object),
      onEvict: (key) => this.logger.debug('Evicted memory entry', { key }),
    });

    this.unsubscribe = options.pressureSignal?.subscribe(() => {
      this.handleMemoryPressure().catch((err: unknown) => {
        this.logger.error('Failed to clear memory tier on pressure signal', {
          error: err instanceof Error ? err.message : String(err),
        });
      });
    });
  }

  /**
   * Look up an object; a hit increments the entry's access count
   */
  get(key: CacheKey): Promise<T | undefined> {
    return this.queue.run(() => {
      const entry = this.lru.get(key);
      if (!entry) return undefined;

      recordAccess(entry.metadata);
      return entry.object;
    });
  }

  /**
   * Store an object with a copy of its metadata
   *
   * Least recently used entries are dropped to make room. An object whose
   * cost alone exceeds the budget is not stored.
   *
   * @returns whether the object is now resident
   */
  set(key: CacheKey, object: T, metadata: CacheMetadata): Promise<boolean> {
    return this.queue.run(() => {
      const stored = this.lru.set(key, { object, metadata: cloneMetadata(metadata) });
      if (!stored) {
        this.logger.debug('Object exceeds memory budget; not cached', { key });
      }
      return stored;
    });
  }

  /**
   * Copy of the metadata held with a resident object
   */
  getMetadata(key: CacheKey): Promise<CacheMetadata | undefined> {
    return this.queue.run(() => {
      const entry = this.lru.peek(key);
      return entry ? cloneMetadata(entry.metadata) : undefined;
    });
  }

  has(key: CacheKey): Promise<boolean> {
    return this.queue.run(() => this.lru.has(key));
  }

  remove(key: CacheKey): Promise<void> {
    return this.queue.run(() => {
      this.lru.delete(key);
    });
  }

  /**
   * Drop every object and reset statistics
   */
  clearAll(): Promise<void> {
    return this.queue.run(() => {
      this.lru.clear();
      this.lru.resetStats();
    });
  }

  /**
   * Drop every object in response to a low-memory signal (statistics kept)
   */
  handleMemoryPressure(): Promise<void> {
    return this.queue.run(() => {
      const dropped = this.lru.size;
      this.lru.clear();
      if (dropped > 0) {
        this.logger.info('Cleared memory tier under memory pressure', { dropped });
      }
    });
  }

  /**
   * hits / (hits + misses), or 0 before any lookup
   */
  hitRate(): Promise<number> {
    return this.queue.run(() => {
      const { hits, misses } = this.lru.getStats();
      const total = hits + misses;
      return total > 0 ? hits / total : 0;
    });
  }

  resetStatistics(): Promise<void> {
    return this.queue.run(() => {
      this.lru.resetStats();
    });
  }

  /**
   * Sum of resident object costs
   */
  currentCost(): Promise<number> {
    return this.queue.run(() => this.lru.cost);
  }

  entryCount(): Promise<number> {
    return this.queue.run(() => this.lru.size);
  }

  getMemoryLimit(): number {
    return this.lru.getStats().maxCost;
  }

  /**
   * Change the cost budget, evicting until the tier fits
   */
  setMemoryLimit(limitBytes: number): Promise<void> {
    return this.queue.run(() => {
      this.lru.resize(limitBytes);
    });
  }

  /**
   * Stop listening to the pressure signal
   */
  dispose(): void {
    this.unsubscribe?.();
  }
}
