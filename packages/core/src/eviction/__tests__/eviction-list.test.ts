/**
 * Tests for the eviction list
 */

import type { CacheMetadata } from '@tiercache/types';
import { cacheMetadata } from '@tiercache/test-utils';
import { describe, it, expect, beforeEach } from 'vitest';

import { EvictionList } from '../eviction-list.js';

function entry(byteSize: number, accessCount: number, lastAccessedAt: number): CacheMetadata {
  return cacheMetadata().at(lastAccessedAt).withByteSize(byteSize).withAccessCount(accessCount).build();
}

describe('EvictionList', () => {
  let list: EvictionList;

  beforeEach(() => {
    list = new EvictionList();
  });

  describe('insertOrTouch', () => {
    it('should insert at the front and track total size', () => {
      list.insertOrTouch('a', entry(100, 1, 0));
      list.insertOrTouch('b', entry(50, 1, 0));

      expect(Array.from(list.keys())).toEqual(['b', 'a']);
      expect(list.totalSize()).toBe(150);
      expect(list.size).toBe(2);
    });

    it('should replace metadata of an existing key and move it to the front', () => {
      list.insertOrTouch('a', entry(100, 1, 0));
      list.insertOrTouch('b', entry(50, 1, 0));
      list.insertOrTouch('a', entry(30, 4, 0));

      expect(Array.from(list.keys())).toEqual(['a', 'b']);
      expect(list.totalSize()).toBe(80);
      expect(list.size).toBe(2);
      expect(list.getNode('a')?.metadata.accessCount).toBe(4);
    });
  });

  describe('touch', () => {
    it('should move the node to the front and record an access', () => {
      list.insertOrTouch('a', entry(10, 1, 0));
      list.insertOrTouch('b', entry(10, 1, 0));

      const node = list.touch('a', 5000);

      expect(node?.metadata.accessCount).toBe(2);
      expect(node?.metadata.lastAccessedAt).toBe(5000);
      expect(Array.from(list.keys())).toEqual(['a', 'b']);
    });

    it('should return undefined for an unknown key', () => {
      expect(list.touch('missing')).toBeUndefined();
    });
  });

  describe('updateMetadata', () => {
    it('should replace metadata without moving the node', () => {
      list.insertOrTouch('a', entry(10, 1, 0));
      list.insertOrTouch('b', entry(10, 1, 0));

      expect(list.updateMetadata('a', entry(25, 9, 0))).toBe(true);

      expect(Array.from(list.keys())).toEqual(['b', 'a']);
      expect(list.totalSize()).toBe(35);
    });

    it('should report false for an unknown key', () => {
      expect(list.updateMetadata('missing', entry(10, 1, 0))).toBe(false);
    });
  });

  describe('remove', () => {
    it('should unlink from any position', () => {
      list.insertOrTouch('a', entry(1, 1, 0));
      list.insertOrTouch('b', entry(2, 1, 0));
      list.insertOrTouch('c', entry(4, 1, 0));

      expect(list.remove('b')).toBe(true);
      expect(Array.from(list.keys())).toEqual(['c', 'a']);
      expect(list.remove('c')).toBe(true);
      expect(list.remove('a')).toBe(true);

      expect(Array.from(list.keys())).toEqual([]);
      expect(list.totalSize()).toBe(0);
    });

    it('should ignore absent keys', () => {
      list.insertOrTouch('a', entry(1, 1, 0));

      expect(list.remove('missing')).toBe(false);
      expect(list.remove('a')).toBe(true);
      expect(list.remove('a')).toBe(false);
      expect(list.size).toBe(0);
    });

    it('should accept a key again after removal', () => {
      list.insertOrTouch('a', entry(1, 1, 0));
      list.insertOrTouch('b', entry(2, 1, 0));
      list.remove('a');
      list.insertOrTouch('a', entry(3, 1, 0));

      expect(Array.from(list.keys())).toEqual(['a', 'b']);
      expect(list.totalSize()).toBe(5);
    });
  });

  describe('removeAll', () => {
    it('should empty the list', () => {
      list.insertOrTouch('a', entry(1, 1, 0));
      list.insertOrTouch('b', entry(2, 1, 0));

      list.removeAll();

      expect(list.size).toBe(0);
      expect(list.totalSize()).toBe(0);
      expect(list.has('a')).toBe(false);
      expect(Array.from(list.keys())).toEqual([]);
    });
  });

  describe('allMetadata', () => {
    it('should map every key to its metadata', () => {
      const a = entry(1, 1, 0);
      const b = entry(2, 3, 0);
      list.insertOrTouch('a', a);
      list.insertOrTouch('b', b);

      expect(list.allMetadata()).toEqual({ a, b });
      expect(Object.keys(list.allMetadata())).toEqual(['b', 'a']);
    });
  });

  describe('evictUntil', () => {
    it('should evict the stale, rarely used entry first', () => {
      list.insertOrTouch('A', entry(100, 1, 0));
      list.insertOrTouch('B', entry(100, 5, 1000));
      list.insertOrTouch('C', entry(150, 1, 2000));

      const removed = list.evictUntil(300);

      expect(removed).toEqual(['A']);
      expect(list.totalSize()).toBe(250);
      expect(Array.from(list.keys())).toEqual(['C', 'B']);
    });

    it('should stop as soon as the target is met', () => {
      list.insertOrTouch('A', entry(100, 1, 0));
      list.insertOrTouch('B', entry(100, 5, 1000));
      list.insertOrTouch('C', entry(150, 1, 2000));

      expect(list.evictUntil(250)).toEqual(['A']);
      expect(list.evictUntil(250)).toEqual([]);
    });

    it('should evict the earliest created entry when scores tie', () => {
      list.insertOrTouch('first', entry(100, 2, 500));
      list.insertOrTouch('second', entry(100, 2, 500));
      list.insertOrTouch('third', entry(100, 2, 500));

      expect(list.evictUntil(150)).toEqual(['first', 'second']);
      expect(Array.from(list.keys())).toEqual(['third']);
    });

    it('should keep creation order for ties even after a touch moved a node', () => {
      list.insertOrTouch('first', entry(100, 1, 500));
      list.insertOrTouch('second', entry(100, 1, 500));
      list.insertOrTouch('first', entry(100, 1, 500));

      expect(list.evictUntil(100)).toEqual(['first']);
    });

    it('should evict the less used entry when access times are equal', () => {
      list.insertOrTouch('busy', entry(100, 5, 500));
      list.insertOrTouch('rare', entry(100, 1, 500));

      expect(list.evictUntil(100)).toEqual(['rare']);
      expect(Array.from(list.keys())).toEqual(['busy']);
    });

    it('should empty the list for a zero target', () => {
      list.insertOrTouch('a', entry(1, 1, 0));
      list.insertOrTouch('b', entry(2, 1, 10));

      expect(list.evictUntil(0)).toEqual(['a', 'b']);
      expect(list.size).toBe(0);
      expect(list.totalSize()).toBe(0);
    });

    it('should keep total size equal to the sum of resident sizes', () => {
      list.insertOrTouch('a', entry(10, 1, 0));
      list.insertOrTouch('b', entry(20, 2, 100));
      list.insertOrTouch('c', entry(30, 3, 200));
      list.updateMetadata('b', entry(5, 2, 100));
      list.remove('c');
      list.insertOrTouch('d', entry(40, 1, 300));

      const sum = Object.values(list.allMetadata()).reduce((total, md) => total + md.byteSize, 0);
      expect(list.totalSize()).toBe(sum);
      expect(sum).toBe(55);
    });
  });
});
