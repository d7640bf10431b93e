/**
 * Tests for the LRU container
 */

import { describe, it, expect, vi } from 'vitest';

import { LRUCache } from '../lru-cache.js';

function createCache(
  maxSize: number,
  maxCost: number,
  onEvict?: (key: string, value: string) => void,
): LRUCache<string, string> {
  return new LRUCache<string, string>({
    maxSize,
    maxCost,
    trackStats: true,
    costEstimator: (value) => value.length,
    onEvict,
  });
}

describe('LRUCache', () => {
  it('should return stored values and count hits and misses', () => {
    const cache = createCache(10, 100);
    cache.set('a', 'one');

    expect(cache.get('a')).toBe('one');
    expect(cache.get('b')).toBeUndefined();
    expect(cache.getStats()).toMatchObject({ hits: 1, misses: 1, count: 1, totalCost: 3 });
  });

  it('should evict the least recently used entry when full', () => {
    const onEvict = vi.fn();
    const cache = createCache(2, 100, onEvict);
    cache.set('a', 'A');
    cache.set('b', 'B');
    cache.get('a');

    cache.set('c', 'C');

    expect(Array.from(cache.keys())).toEqual(['a', 'c']);
    expect(onEvict).toHaveBeenCalledWith('b', 'B');
    expect(cache.getStats().evictions).toBe(1);
  });

  it('should evict until the total cost fits', () => {
    const cache = createCache(10, 10);
    cache.set('a', 'xxxx');
    cache.set('b', 'xxxx');

    cache.set('c', 'xxx');

    expect(Array.from(cache.keys())).toEqual(['b', 'c']);
    expect(cache.cost).toBe(7);
  });

  it('should refuse a value that alone exceeds the budget', () => {
    const cache = createCache(10, 5);
    cache.set('a', 'xx');

    expect(cache.set('a', 'xxxxxx')).toBe(false);
    expect(cache.has('a')).toBe(false);
    expect(cache.cost).toBe(0);
  });

  it('should not change recency or statistics on peek', () => {
    const cache = createCache(2, 100);
    cache.set('a', 'A');
    cache.set('b', 'B');

    expect(cache.peek('a')).toBe('A');
    cache.set('c', 'C');

    expect(cache.has('a')).toBe(false);
    expect(cache.getStats().hits).toBe(0);
  });

  it('should evict on resize to a smaller budget', () => {
    const cache = createCache(10, 100);
    cache.set('a', 'xxxx');
    cache.set('b', 'xxxx');

    cache.resize(5);

    expect(Array.from(cache.keys())).toEqual(['b']);
    expect(cache.getStats().maxCost).toBe(5);
  });

  it('should keep statistics across clear until reset', () => {
    const cache = createCache(10, 100);
    cache.set('a', 'A');
    cache.get('a');

    cache.clear();
    expect(cache.size).toBe(0);
    expect(cache.getStats().hits).toBe(1);

    cache.resetStats();
    expect(cache.getStats().hits).toBe(0);
  });
});
