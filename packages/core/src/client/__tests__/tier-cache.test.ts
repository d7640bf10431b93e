/**
 * Tests for the TierCache entry point
 */

import {
  bytesOf,
  createMockFetcher,
  createMockLogger,
  createPressureSignal,
  createTempDir,
  freshResult,
  removeTempDir,
  textOf,
  type MockFetcher,
} from '@tiercache/test-utils';
import type { MemoryPressureSignal } from '@tiercache/types';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { generateCacheKey } from '../../cache-key.js';
import { binaryCodec } from '../../codec/binary-codec.js';
import { ConfigValidationError } from '../../config/validation.js';
import { createTierCache, TierCache } from '../tier-cache.js';

const ADDRESS = 'https://assets.test/banner.jpg';
const TARGET = { width: 300, height: 100 };

describe('TierCache', () => {
  let dir: string;
  let fetcher: MockFetcher;

  beforeEach(async () => {
    dir = await createTempDir();
    fetcher = createMockFetcher({ fallback: freshResult('banner', '"b1"') });
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  function open(pressureSignal?: MemoryPressureSignal): TierCache<Uint8Array> {
    return createTierCache({
      config: { storage: { kind: 'custom', path: dir }, memoryLimitBytes: 4096, diskLimitBytes: 8192 },
      codec: binaryCodec,
      fetcher,
      pressureSignal,
      logger: createMockLogger(),
    });
  }

  it('should resolve from the network, then from the cache', async () => {
    const cache = open();

    const first = await cache.load(ADDRESS, TARGET);
    const second = await cache.load(ADDRESS, TARGET);

    expect(first).toMatchObject({ status: 'resolved', source: 'network' });
    expect(second).toMatchObject({ status: 'resolved', source: 'cache' });
    expect(second.status === 'resolved' && textOf(second.object)).toBe('banner');
    expect(fetcher.fetch).toHaveBeenCalledTimes(1);
  });

  it('should reuse disk entries written by an earlier instance', async () => {
    await open().load(ADDRESS, TARGET);

    const outcome = await open().load(ADDRESS, TARGET);

    expect(outcome).toMatchObject({ status: 'resolved', source: 'cache' });
    expect(fetcher.fetch).toHaveBeenCalledTimes(1);
  });

  it('should combine tier and network statistics', async () => {
    const cache = open();
    await cache.load(ADDRESS, TARGET);
    await cache.load(ADDRESS, TARGET);

    expect(await cache.getStatistics()).toEqual({
      memoryHitRate: 0.5,
      diskHitRate: 0,
      diskSizeBytes: 6,
      diskEntryCount: 1,
      validatorHitRate: 0,
      totalDownloads: 1,
      totalBytesDownloaded: 6,
      totalBytesSaved: 0,
    });

    await cache.resetStatistics();
    expect((await cache.getStatistics()).totalDownloads).toBe(0);
  });

  it('should save objects obtained elsewhere', async () => {
    const cache = open();

    const key = await cache.save(bytesOf('local'), ADDRESS, TARGET, { validator: '"l1"' });
    const outcome = await cache.load(ADDRESS, TARGET);

    expect(key).toBe(generateCacheKey(ADDRESS, TARGET));
    expect(cache.keyFor(ADDRESS, TARGET)).toBe(key);
    expect(outcome.status === 'resolved' && textOf(outcome.object)).toBe('local');
    expect((await cache.getMetadata(ADDRESS, TARGET))?.validator).toBe('"l1"');
    expect(fetcher.fetch).not.toHaveBeenCalled();
  });

  it('should remove and clear entries', async () => {
    const cache = open();
    await cache.save(bytesOf('a'), ADDRESS, TARGET);
    await cache.save(bytesOf('b'), ADDRESS, { width: 10, height: 10 });

    await cache.remove(ADDRESS, TARGET);
    expect(await cache.getMetadata(ADDRESS, TARGET)).toBeUndefined();

    await cache.clearAll();
    expect((await cache.getStatistics()).diskEntryCount).toBe(0);
  });

  it('should expose configured limits and accept changes', async () => {
    const cache = open();

    expect(cache.getDiskLimit()).toBe(8192);
    expect(cache.getMemoryLimit()).toBe(4096);

    cache.setTtl(60_000);
    await cache.setDiskLimit(1024);
    await cache.setMemoryLimit(512);

    expect(cache.getTtl()).toBe(60_000);
    expect(cache.getDiskLimit()).toBe(1024);
    expect(cache.getMemoryLimit()).toBe(512);
  });

  it('should clear the memory tier on a pressure signal', async () => {
    const signal = createPressureSignal();
    const cache = open(signal);
    await cache.load(ADDRESS, TARGET);

    signal.emit();
    expect(await cache.coordinator.memory.entryCount()).toBe(0);

    const outcome = await cache.load(ADDRESS, TARGET);
    expect(outcome).toMatchObject({ status: 'resolved', source: 'cache' });
    expect(await cache.coordinator.memory.entryCount()).toBe(1);
    expect(fetcher.fetch).toHaveBeenCalledTimes(1);

    cache.dispose();
    expect(signal.listenerCount).toBe(0);
  });

  it('should reject invalid configuration', () => {
    expect(
      () =>
        new TierCache({
          config: { storage: { kind: 'custom', path: dir }, diskLimitBytes: -5 },
          codec: binaryCodec,
          fetcher,
        }),
    ).toThrow(ConfigValidationError);
  });
});
