/**
 * Tests for the cache coordinator
 */

import {
  bytesOf,
  cacheMetadata,
  createMockCodec,
  createMockLogger,
  createTempDir,
  removeTempDir,
  textOf,
  type MockCodecConfig,
  type MockLogger,
} from '@tiercache/test-utils';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { DiskTier } from '../../disk/disk-tier.js';
import { MemoryTier } from '../../memory/memory-tier.js';
import { createCacheCoordinator } from '../cache-coordinator.js';

describe('CacheCoordinator', () => {
  let dir: string;
  let logger: MockLogger;

  beforeEach(async () => {
    dir = await createTempDir();
    logger = createMockLogger();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  function setup(codecConfig: MockCodecConfig = {}) {
    const codec = createMockCodec(codecConfig);
    const disk = new DiskTier({ storage: { kind: 'custom', path: dir }, diskLimitBytes: 10_000, ttlMs: 1000, logger });
    const memory = new MemoryTier<Uint8Array>({
      memoryLimitBytes: 10_000,
      estimateCost: (object) => codec.estimatedCost(object),
      logger,
    });
    const coordinator = createCacheCoordinator({ memory, disk, codec, logger });
    return { codec, disk, memory, coordinator };
  }

  describe('getObject', () => {
    it('should serve memory hits without reading the disk', async () => {
      const { coordinator, disk } = setup();
      await coordinator.setObject('key-a', bytesOf('hello'), cacheMetadata().build());

      const object = await coordinator.getObject('key-a');

      expect(object && textOf(object)).toBe('hello');
      expect(await disk.hitRate()).toBe(0);
    });

    it('should decode disk hits and promote them into memory', async () => {
      const { coordinator, codec, disk, memory } = setup();
      await coordinator.setObject('key-a', bytesOf('hello'), cacheMetadata().withAccessCount(0).build(), 'diskOnly');
      expect(await memory.has('key-a')).toBe(false);
      expect(await coordinator.getObject('missing')).toBeUndefined();

      const first = await coordinator.getObject('key-a');
      expect((await memory.getMetadata('key-a'))?.accessCount).toBe(1);
      expect(await disk.hitRate()).toBe(0.5);

      const second = await coordinator.getObject('key-a');

      expect(first && textOf(first)).toBe('hello');
      expect(second).toBe(first);
      expect(codec.decode).toHaveBeenCalledTimes(1);
      expect((await memory.getMetadata('key-a'))?.accessCount).toBe(2);
      expect(await disk.hitRate()).toBe(0.5);
    });

    it('should report a double miss without decoding', async () => {
      const { coordinator, codec } = setup();

      expect(await coordinator.getObject('missing')).toBeUndefined();
      expect(codec.decode).not.toHaveBeenCalled();
    });

    it('should treat a decode failure as a miss', async () => {
      const { coordinator, memory } = setup({ failDecodes: 1 });
      await coordinator.setObject('key-a', bytesOf('hello'), cacheMetadata().build(), 'diskOnly');

      expect(await coordinator.getObject('key-a')).toBeUndefined();
      expect(await memory.has('key-a')).toBe(false);
      expect(logger.warn).toHaveBeenCalledWith('Codec could not decode payload', { key: 'key-a', bytes: 5 });
    });

    it('should treat a throwing codec like a failed decode', async () => {
      const { coordinator } = setup({ failDecodes: 1, throwOnFailure: true });
      await coordinator.setObject('key-a', bytesOf('hello'), cacheMetadata().build(), 'diskOnly');

      expect(await coordinator.getObject('key-a')).toBeUndefined();
      expect(logger.warn).toHaveBeenCalledWith('Codec threw while decoding payload', {
        key: 'key-a',
        error: 'Mock codec: decode failed',
      });
    });
  });

  describe('setObject', () => {
    it('should write both tiers by default', async () => {
      const { coordinator, disk, memory } = setup();

      await coordinator.setObject('key-a', bytesOf('hello'), cacheMetadata().build());

      expect(await memory.has('key-a')).toBe(true);
      expect(await disk.entryCount()).toBe(1);
    });

    it('should skip encoding for memoryOnly', async () => {
      const { coordinator, codec, disk, memory } = setup();

      await coordinator.setObject('key-a', bytesOf('hello'), cacheMetadata().build(), 'memoryOnly');

      expect(await memory.has('key-a')).toBe(true);
      expect(await disk.entryCount()).toBe(0);
      expect(codec.encodePrimary).not.toHaveBeenCalled();
    });

    it('should leave memory alone for diskOnly', async () => {
      const { coordinator, disk, memory } = setup();

      await coordinator.setObject('key-a', bytesOf('hello'), cacheMetadata().build(), 'diskOnly');

      expect(await memory.has('key-a')).toBe(false);
      expect(await disk.entryCount()).toBe(1);
    });

    it('should fall back to the secondary encoding', async () => {
      const { coordinator, codec, disk } = setup({ failPrimary: true });

      await coordinator.setObject('key-a', bytesOf('hello'), cacheMetadata().build(), 'diskOnly');

      expect(codec.encodeFallback).toHaveBeenCalledTimes(1);
      expect((await disk.getMetadata('key-a'))?.byteSize).toBe(5);
    });

    it('should skip the disk write when no encoding succeeds', async () => {
      const { coordinator, disk, memory } = setup({ failPrimary: true, failFallback: true, throwOnFailure: true });

      await coordinator.setObject('key-a', bytesOf('hello'), cacheMetadata().build());

      expect(await disk.entryCount()).toBe(0);
      expect(await memory.has('key-a')).toBe(true);
      expect(logger.warn).toHaveBeenCalledWith('Object could not be encoded; skipping disk write', { key: 'key-a' });
    });
  });

  describe('removal and clearing', () => {
    it('should remove a key from both tiers', async () => {
      const { coordinator, disk, memory } = setup();
      await coordinator.setObject('key-a', bytesOf('hello'), cacheMetadata().build());

      await coordinator.remove('key-a');

      expect(await memory.has('key-a')).toBe(false);
      expect(await disk.getMetadata('key-a')).toBeUndefined();
    });

    it('should clear one tier at a time', async () => {
      const { coordinator, disk, memory } = setup();
      await coordinator.setObject('key-a', bytesOf('hello'), cacheMetadata().build());

      await coordinator.clearMemory();
      expect(await memory.entryCount()).toBe(0);
      expect(await disk.entryCount()).toBe(1);

      await coordinator.clearDisk();
      expect(await disk.entryCount()).toBe(0);
    });

    it('should clear both tiers', async () => {
      const { coordinator, disk, memory } = setup();
      await coordinator.setObject('key-a', bytesOf('hello'), cacheMetadata().build());

      await coordinator.clearAll();

      expect(await memory.entryCount()).toBe(0);
      expect(await disk.entryCount()).toBe(0);
    });
  });

  describe('statistics', () => {
    it('should combine both tiers', async () => {
      const { coordinator } = setup();
      await coordinator.setObject('key-a', bytesOf('hello'), cacheMetadata().build());
      await coordinator.getObject('key-a');
      await coordinator.getObject('missing');

      expect(await coordinator.statistics()).toEqual({
        memoryHitRate: 0.5,
        diskHitRate: 0,
        diskSizeBytes: 5,
        diskEntryCount: 1,
      });

      await coordinator.resetStatistics();
      expect((await coordinator.statistics()).memoryHitRate).toBe(0);
    });

    it('should pass limits and TTL through to the tiers', async () => {
      const { coordinator } = setup();

      coordinator.setTtl(42);
      await coordinator.setDiskLimit(2048);
      await coordinator.setMemoryLimit(1024);

      expect(coordinator.getTtl()).toBe(42);
      expect(coordinator.getDiskLimit()).toBe(2048);
      expect(coordinator.getMemoryLimit()).toBe(1024);
    });
  });
});
