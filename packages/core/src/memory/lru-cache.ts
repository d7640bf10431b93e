/**
 * Memory LRU Cache
 *
 * Generic LRU (Least Recently Used) container bounded by entry count and by
 * total cost:
 * - O(1) get/set operations
 * - Cost-based eviction (least recently used first)
 * - Optional statistics tracking
 */

/**
 * Cache entry with its cost
 */
interface CacheEntry<V> {
  /** The cached value */
  value: V;

  /** Estimated cost in bytes */
  cost: number;
}

/**
 * LRU cache statistics
 */
export interface LRUStats {
  /** Current item count */
  count: number;

  /** Maximum capacity */
  maxCount: number;

  /** Hit count */
  hits: number;

  /** Miss count */
  misses: number;

  /** Eviction count */
  evictions: number;

  /** Sum of entry costs */
  totalCost: number;

  /** Cost budget */
  maxCost: number;
}

/**
 * LRU cache options
 */
export interface LRUOptions<K, V> {
  /** Maximum number of entries (Infinity = unbounded) */
  maxSize: number;

  /** Maximum total cost (Infinity = unbounded) */
  maxCost: number;

  /** Whether to track statistics */
  trackStats: boolean;

  /** Function to estimate an entry's cost */
  costEstimator?: (value: V) => number;

  /** Called for every entry removed to make room */
  onEvict?: (key: K, value: V) => void;
}

/**
 * Generic LRU cache implementation
 *
 * Uses Map for O(1) operations while maintaining insertion order
 * for LRU eviction (Map iterates in insertion order).
 */
export class LRUCache<K, V> {
  private cache: Map<K, CacheEntry<V>> = new Map();
  private readonly maxSize: number;
  private maxCost: number;
  private readonly trackStats: boolean;
  private readonly costEstimator: (value: V) => number;
  private readonly onEvict: ((key: K, value: V) => void) | undefined;

  // Statistics
  private hits = 0;
  private misses = 0;
  private evictions = 0;
  private totalCost = 0;

  constructor(options: LRUOptions<K, V>) {
    this.maxSize = options.maxSize;
    this.maxCost = options.maxCost;
    this.trackStats = options.trackStats;
    this.costEstimator = options.costEstimator ?? (() => 1);
    this.onEvict = options.onEvict;
  }

  /**
   * Get a value from the cache
   *
   * Moves the entry to the end (most recently used) on access.
   */
  get(key: K): V | undefined {
    const entry = this.cache.get(key);

    if (!entry) {
      if (this.trackStats) this.misses++;
      return undefined;
    }

    // Move to end (most recently used) by re-inserting
    this.cache.delete(key);
    this.cache.set(key, entry);

    if (this.trackStats) this.hits++;
    return entry.value;
  }

  /**
   * Look up a value without touching recency or statistics
   */
  peek(key: K): V | undefined {
    return this.cache.get(key)?.value;
  }

  /**
   * Set a value in the cache
   *
   * Evicts least recently used entries until the new entry fits.
   *
   * @returns false when the value alone exceeds the cost budget (not stored)
   */
  set(key: K, value: V): boolean {
    this.delete(key);

    const cost = this.costEstimator(value);
    if (cost > this.maxCost) {
      return false;
    }

    while (this.cache.size > 0 && (this.cache.size >= this.maxSize || this.totalCost + cost > this.maxCost)) {
      this.evictLRU();
    }

    this.cache.set(key, { value, cost });
    this.totalCost += cost;
    return true;
  }

  /**
   * Check if key exists (without updating access time)
   */
  has(key: K): boolean {
    return this.cache.has(key);
  }

  /**
   * Delete an entry from the cache
   */
  delete(key: K): boolean {
    const entry = this.cache.get(key);
    if (entry) {
      this.totalCost -= entry.cost;
      return this.cache.delete(key);
    }
    return false;
  }

  /**
   * Clear all entries from the cache
   */
  clear(): void {
    this.cache.clear();
    this.totalCost = 0;
  }

  /**
   * Get the current number of entries
   */
  get size(): number {
    return this.cache.size;
  }

  /**
   * Sum of entry costs
   */
  get cost(): number {
    return this.totalCost;
  }

  /**
   * Change the cost budget, evicting until the cache fits
   */
  resize(maxCost: number): void {
    this.maxCost = maxCost;
    while (this.cache.size > 0 && this.totalCost > this.maxCost) {
      this.evictLRU();
    }
  }

  /**
   * Get cache statistics
   */
  getStats(): LRUStats {
    return {
      count: this.cache.size,
      maxCount: this.maxSize,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      totalCost: this.totalCost,
      maxCost: this.maxCost,
    };
  }

  /**
   * Reset statistics (keeps cached data)
   */
  resetStats(): void {
    this.hits = 0;
    this.misses = 0;
    this.evictions = 0;
  }

  /**
   * Keys from least to most recently used
   */
  keys(): IterableIterator<K> {
    return this.cache.keys();
  }

  /**
   * Evict the least recently used entry
   */
  private evictLRU(): void {
    // Map iterates in insertion order, first entry is LRU
    const first = this.cache.entries().next();
    if (first.done) return;

    const [key, entry] = first.value;
    this.delete(key);
    if (this.trackStats) this.evictions++;
    this.onEvict?.(key, entry.value);
  }
}
