/**
 * Disk Tier
 *
 * Persistent cache of raw payload bytes plus one metadata document. Owns the
 * eviction list and keeps the sum of payload sizes under a byte budget with
 * the list's blended recency/frequency eviction.
 *
 * Every operation runs through a serial queue: a write completes (payload
 * file, metadata document, cleanup) before the next operation starts.
 *
 * Failure model:
 * - the storage directory cannot be provisioned → constructor throws
 * - payload write fails → set() returns false, prior state unchanged
 * - payload delete fails → logged, ignored (an unreferenced file is harmless)
 * - metadata document corrupt at startup → cold start
 * - metadata persist fails → logged; in-memory state stays authoritative
 * - key resident but payload missing → treated as a miss and the entry dropped
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

import type { CacheKey, CacheMetadata } from '@tiercache/types';

import { SerialQueue } from '../concurrency/serial-queue.js';
import type { StorageLocation } from '../config/schema.js';
import { PayloadIOError, StoragePathUnavailableError, toError } from '../errors.js';
import { EvictionList } from '../eviction/eviction-list.js';
import { type CacheLogger, consoleLogger } from '../logger.js';
import { cloneMetadata, isTtlExpired } from '../metadata.js';

import { loadMetadataDocument, persistMetadataDocument } from './metadata-document.js';
import { type StoragePaths, describeLocation, resolveStoragePaths } from './storage-location.js';

/**
 * Disk tier options
 */
export interface DiskTierOptions {
  /** Where payloads and the metadata document live */
  storage: StorageLocation;
  /** Payload byte budget */
  diskLimitBytes: number;
  /** Default TTL for isExpired() (ms) */
  ttlMs: number;
  /** Receives swallowed failures */
  logger?: CacheLogger;
}

/**
 * Payload and metadata returned by a disk hit
 */
export interface DiskEntry {
  bytes: Uint8Array;
  metadata: CacheMetadata;
}

const SAFE_KEY = /^[A-Za-z0-9_-][A-Za-z0-9._-]*$/;

/**
 * Whether a key can be used as a payload file name
 */
export function isSafeDiskKey(key: string): boolean {
  return SAFE_KEY.test(key) && !key.endsWith('.tmp');
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

export class DiskTier {
  readonly paths: StoragePaths;

  private readonly list = new EvictionList();
  private readonly queue = new SerialQueue();
  private readonly logger: CacheLogger;
  private diskLimit: number;
  private ttl: number;

  private hits = 0;
  private misses = 0;

  /**
   * @throws StoragePathUnavailableError when the directory cannot be resolved or created
   */
  constructor(options: DiskTierOptions) {
    this.logger = options.logger ?? consoleLogger;
    this.diskLimit = options.diskLimitBytes;
    this.ttl = options.ttlMs;
    this.paths = resolveStoragePaths(options.storage);

    try {
      fs.mkdirSync(this.paths.objectsDirectory, { recursive: true });
    } catch (err) {
      throw new StoragePathUnavailableError(
        `${describeLocation(options.storage)} (${this.paths.baseDirectory})`,
        toError(err),
      );
    }

    this.loadMetadata();
  }

  // ============================================================
  // Payload operations
  // ============================================================

  /**
   * Read an entry, recording an access
   *
   * A resident key whose payload file is gone is removed and reported as a
   * miss.
   */
  get(key: CacheKey): Promise<DiskEntry | undefined> {
    return this.queue.run(async () => {
      if (!isSafeDiskKey(key)) {
        this.misses++;
        return undefined;
      }

      const node = this.list.touch(key);
      if (!node) {
        this.misses++;
        return undefined;
      }

      const filePath = this.payloadPath(key);
      let bytes: Buffer;
      try {
        bytes = await fs.promises.readFile(filePath);
      } catch (err) {
        if (isNotFound(err)) {
          this.logger.warn('Payload missing for resident key; dropping entry', { key });
          this.list.remove(key);
          await this.persistMetadata();
        } else {
          const error = new PayloadIOError('read', filePath, toError(err));
          this.logger.warn(error.message, { key, code: error.code });
        }
        this.misses++;
        return undefined;
      }

      this.hits++;
      return { bytes, metadata: cloneMetadata(node.metadata) };
    });
  }

  /**
   * Store a payload
   *
   * byteSize is stamped from the written length. Runs the eviction pass when
   * the new total exceeds the budget.
   *
   * @returns false when the payload could not be written
   */
  set(key: CacheKey, bytes: Uint8Array, metadata: CacheMetadata): Promise<boolean> {
    return this.queue.run(async () => {
      if (!isSafeDiskKey(key)) {
        this.logger.warn('Rejected unsafe cache key', { key });
        return false;
      }

      const filePath = this.payloadPath(key);
      const temporaryPath = `${filePath}.tmp`;
      try {
        await fs.promises.writeFile(temporaryPath, bytes);
        await fs.promises.rename(temporaryPath, filePath);
      } catch (err) {
        const error = new PayloadIOError('write', filePath, toError(err));
        this.logger.warn(error.message, { key, code: error.code });
        await this.deleteFile(temporaryPath);
        return false;
      }

      const stored = cloneMetadata(metadata);
      stored.byteSize = bytes.byteLength;
      this.list.insertOrTouch(key, stored);

      await this.persistMetadata();
      await this.cleanupIfNeeded();
      return true;
    });
  }

  /**
   * Delete an entry's payload and metadata; absent keys are a no-op
   */
  remove(key: CacheKey): Promise<void> {
    return this.queue.run(async () => {
      if (!isSafeDiskKey(key)) return;

      await this.deleteFile(this.payloadPath(key));
      if (this.list.remove(key)) {
        await this.persistMetadata();
      }
    });
  }

  /**
   * Delete every entry, recreate the directory and reset statistics
   */
  clearAll(): Promise<void> {
    return this.queue.run(async () => {
      try {
        await fs.promises.rm(this.paths.objectsDirectory, { recursive: true, force: true });
        await fs.promises.mkdir(this.paths.objectsDirectory, { recursive: true });
      } catch (err) {
        this.logger.error('Failed to recreate payload directory', {
          path: this.paths.objectsDirectory,
          error: toError(err).message,
        });
      }

      this.list.removeAll();
      this.hits = 0;
      this.misses = 0;
      await this.persistMetadata();
    });
  }

  // ============================================================
  // Metadata operations
  // ============================================================

  /**
   * Copy of an entry's metadata, without touching the payload or counters
   */
  getMetadata(key: CacheKey): Promise<CacheMetadata | undefined> {
    return this.queue.run(() => {
      const node = this.list.getNode(key);
      return node ? cloneMetadata(node.metadata) : undefined;
    });
  }

  /**
   * Replace an entry's metadata
   *
   * byteSize keeps the written payload's size. Keys that are not resident
   * are ignored.
   */
  updateMetadata(key: CacheKey, metadata: CacheMetadata): Promise<void> {
    return this.queue.run(async () => {
      const node = this.list.getNode(key);
      if (!node) return;

      const updated = cloneMetadata(metadata);
      updated.byteSize = node.metadata.byteSize;
      this.list.updateMetadata(key, updated);
      await this.persistMetadata();
    });
  }

  /**
   * Whether the entry needs revalidation: true when absent, or when more than
   * ttlMs has passed since it was last validated (or created)
   */
  isExpired(key: CacheKey, ttlMs: number = this.ttl): Promise<boolean> {
    return this.queue.run(() => {
      const node = this.list.getNode(key);
      if (!node) return true;
      return isTtlExpired(node.metadata, ttlMs);
    });
  }

  // ============================================================
  // Budget and statistics
  // ============================================================

  /**
   * Sum of resident payload sizes in bytes
   */
  currentSize(): Promise<number> {
    return this.queue.run(() => this.list.totalSize());
  }

  /**
   * Number of resident entries
   */
  entryCount(): Promise<number> {
    return this.queue.run(() => this.list.size);
  }

  /**
   * Resident keys from most to least recently used
   */
  keys(): Promise<CacheKey[]> {
    return this.queue.run(() => Array.from(this.list.keys()));
  }

  getDiskLimit(): number {
    return this.diskLimit;
  }

  /**
   * Change the byte budget; evicts immediately when over the new limit
   */
  setDiskLimit(limitBytes: number): Promise<void> {
    return this.queue.run(async () => {
      this.diskLimit = limitBytes;
      await this.cleanupIfNeeded();
    });
  }

  getTtl(): number {
    return this.ttl;
  }

  setTtl(ttlMs: number): void {
    this.ttl = ttlMs;
  }

  /**
   * hits / (hits + misses), or 0 before any lookup
   */
  hitRate(): Promise<number> {
    return this.queue.run(() => {
      const total = this.hits + this.misses;
      return total > 0 ? this.hits / total : 0;
    });
  }

  resetStatistics(): Promise<void> {
    return this.queue.run(() => {
      this.hits = 0;
      this.misses = 0;
    });
  }

  // ============================================================
  // Internals (callers must already hold the queue)
  // ============================================================

  private payloadPath(key: CacheKey): string {
    return path.join(this.paths.objectsDirectory, key);
  }

  private loadMetadata(): void {
    const document = loadMetadataDocument(this.paths.metadataFile, this.logger);
    // The document lists most recently used first; insert in reverse so the
    // list ends up in the same order.
    const entries = Object.entries(document).filter(([key]) => isSafeDiskKey(key));
    for (let i = entries.length - 1; i >= 0; i--) {
      const entry = entries[i];
      if (entry) {
        this.list.insertOrTouch(entry[0], entry[1]);
      }
    }
    if (entries.length > 0) {
      this.logger.debug('Loaded cache metadata', { entries: entries.length });
    }
  }

  private async persistMetadata(): Promise<void> {
    await persistMetadataDocument(this.paths.metadataFile, this.list.allMetadata(), this.logger);
  }

  private async cleanupIfNeeded(): Promise<void> {
    if (this.list.totalSize() <= this.diskLimit) return;

    const removed = this.list.evictUntil(this.diskLimit);
    for (const key of removed) {
      await this.deleteFile(this.payloadPath(key));
    }
    await this.persistMetadata();

    this.logger.info('Evicted disk entries', {
      count: removed.length,
      sizeBytes: this.list.totalSize(),
      limitBytes: this.diskLimit,
    });
  }

  private async deleteFile(filePath: string): Promise<void> {
    try {
      await fs.promises.unlink(filePath);
    } catch (err) {
      if (!isNotFound(err)) {
        const error = new PayloadIOError('delete', filePath, toError(err));
        this.logger.debug(error.message, { code: error.code });
      }
    }
  }
}
