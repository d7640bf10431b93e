/**
 * Cache Coordinator
 *
 * Composes the memory and disk tiers behind one lookup/store API:
 *
 *   getObject:  memory → disk → decode → promote into memory
 *   setObject:  write to the tier(s) chosen by the strategy
 *
 * Each call on a tier is an independent serialized call. A coordinator
 * operation that touches both tiers holds no cross-tier lock, so statistics
 * snapshots are approximate.
 */

import type {
  CacheKey,
  CacheMetadata,
  CacheStrategy,
  ObjectCodec,
  TargetDimensions,
  TierStatistics,
} from '@tiercache/types';

import type { DiskTier } from '../disk/disk-tier.js';
import { toError } from '../errors.js';
import { type CacheLogger, consoleLogger } from '../logger.js';
import type { MemoryTier } from '../memory/memory-tier.js';

/**
 * Coordinator dependencies
 */
export interface CacheCoordinatorOptions<T> {
  memory: MemoryTier<T>;
  disk: DiskTier;
  codec: ObjectCodec<T>;
  logger?: CacheLogger;
}

export class CacheCoordinator<T> {
  readonly memory: MemoryTier<T>;
  readonly disk: DiskTier;
  private readonly codec: ObjectCodec<T>;
  private readonly logger: CacheLogger;

  constructor(options: CacheCoordinatorOptions<T>) {
    this.memory = options.memory;
    this.disk = options.disk;
    this.codec = options.codec;
    this.logger = options.logger ?? consoleLogger;
  }

  /**
   * Find an object in either tier
   *
   * A disk hit is decoded and promoted into memory with the disk metadata.
   * Never reaches the network.
   */
  async getObject(key: CacheKey): Promise<T | undefined> {
    const cached = await this.memory.get(key);
    if (cached !== undefined) {
      return cached;
    }

    const entry = await this.disk.get(key);
    if (!entry) {
      return undefined;
    }

    const object = await this.decode(entry.bytes, entry.metadata.targetDimensions, key);
    if (object === undefined) {
      return undefined;
    }

    await this.memory.set(key, object, entry.metadata);
    return object;
  }

  /**
   * Store an object in the tier(s) selected by the strategy
   *
   * Disk writes encode the object (primary, then fallback). When neither
   * encoding succeeds the disk write is skipped.
   */
  async setObject(
    key: CacheKey,
    object: T,
    metadata: CacheMetadata,
    strategy: CacheStrategy = 'both',
  ): Promise<void> {
    if (strategy !== 'memoryOnly') {
      const bytes = await this.encode(object, key);
      if (bytes) {
        await this.disk.set(key, bytes, metadata);
      } else {
        this.logger.warn('Object could not be encoded; skipping disk write', { key });
      }
    }

    if (strategy !== 'diskOnly') {
      await this.memory.set(key, object, metadata);
    }
  }

  /**
   * Authoritative (disk) metadata for a key
   */
  getMetadata(key: CacheKey): Promise<CacheMetadata | undefined> {
    return this.disk.getMetadata(key);
  }

  updateMetadata(key: CacheKey, metadata: CacheMetadata): Promise<void> {
    return this.disk.updateMetadata(key, metadata);
  }

  isExpired(key: CacheKey, ttlMs?: number): Promise<boolean> {
    return this.disk.isExpired(key, ttlMs);
  }

  async remove(key: CacheKey): Promise<void> {
    await this.memory.remove(key);
    await this.disk.remove(key);
  }

  clearMemory(): Promise<void> {
    return this.memory.clearAll();
  }

  clearDisk(): Promise<void> {
    return this.disk.clearAll();
  }

  async clearAll(): Promise<void> {
    await this.memory.clearAll();
    await this.disk.clearAll();
  }

  /**
   * Read each tier's counters in turn (not an atomic snapshot)
   */
  async statistics(): Promise<TierStatistics> {
    const memoryHitRate = await this.memory.hitRate();
    const diskHitRate = await this.disk.hitRate();
    const diskSizeBytes = await this.disk.currentSize();
    const diskEntryCount = await this.disk.entryCount();
    return { memoryHitRate, diskHitRate, diskSizeBytes, diskEntryCount };
  }

  async resetStatistics(): Promise<void> {
    await this.memory.resetStatistics();
    await this.disk.resetStatistics();
  }

  getTtl(): number {
    return this.disk.getTtl();
  }

  setTtl(ttlMs: number): void {
    this.disk.setTtl(ttlMs);
  }

  getDiskLimit(): number {
    return this.disk.getDiskLimit();
  }

  setDiskLimit(limitBytes: number): Promise<void> {
    return this.disk.setDiskLimit(limitBytes);
  }

  getMemoryLimit(): number {
    return this.memory.getMemoryLimit();
  }

  setMemoryLimit(limitBytes: number): Promise<void> {
    return this.memory.setMemoryLimit(limitBytes);
  }

  /**
   * Decode bytes, treating a thrown error as a failed decode
   */
  async decode(bytes: Uint8Array, target: TargetDimensions, key: CacheKey): Promise<T | undefined> {
    try {
      const object = await this.codec.decode(bytes, target);
      if (object === undefined) {
        this.logger.warn('Codec could not decode payload', { key, bytes: bytes.byteLength });
      }
      return object;
    } catch (err) {
      this.logger.warn('Codec threw while decoding payload', { key, error: toError(err).message });
      return undefined;
    }
  }

  private async encode(object: T, key: CacheKey): Promise<Uint8Array | undefined> {
    const primary = await this.tryEncode(() => this.codec.encodePrimary(object), key, 'primary');
    if (primary) return primary;
    return this.tryEncode(() => this.codec.encodeFallback(object), key, 'fallback');
  }

  private async tryEncode(
    encode: () => Uint8Array | undefined | Promise<Uint8Array | undefined>,
    key: CacheKey,
    encoding: 'primary' | 'fallback',
  ): Promise<Uint8Array | undefined> {
    try {
      return await encode();
    } catch (err) {
      this.logger.debug('Encoding failed', { key, encoding, error: toError(err).message });
      return undefined;
    }
  }
}

/**
 * Create a coordinator over existing tiers
 */
export function createCacheCoordinator<T>(options: CacheCoordinatorOptions<T>): CacheCoordinator<T> {
  return new CacheCoordinator(options);
}
