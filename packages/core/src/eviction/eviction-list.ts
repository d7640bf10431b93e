/**
 * Eviction List
 *
 * Doubly linked index over resident disk keys with a Map for O(1) lookup.
 * The front holds the most recently inserted or touched entry. Node existence
 * is the authoritative record of disk residency.
 *
 * Eviction (evictUntil) ranks every node by a blended recency/frequency score
 * and removes the lowest one per round until the total size fits the target.
 * Each round is a full O(n) scan; it only runs when the tier is over budget.
 */

import type { CacheKey, CacheMetadata } from '@tiercache/types';

import { recordAccess } from '../metadata.js';

import { type EvictionNode, createEvictionNode } from './eviction-node.js';
import { computeScoreBounds, evictionScore } from './scoring.js';

export class EvictionList {
  private readonly nodes: Map<CacheKey, EvictionNode> = new Map();
  private head: EvictionNode | null = null;
  private tail: EvictionNode | null = null;
  private nextSequence = 0;
  private total = 0;

  /**
   * Insert a node at the front, or replace an existing node's metadata and
   * move it to the front. Does not count as an access.
   */
  insertOrTouch(key: CacheKey, metadata: CacheMetadata): EvictionNode {
    const existing = this.nodes.get(key);
    if (existing) {
      this.total += metadata.byteSize - existing.metadata.byteSize;
      existing.metadata = metadata;
      this.moveToFront(existing);
      return existing;
    }

    const node = createEvictionNode(key, metadata, this.nextSequence++, this);
    this.nodes.set(key, node);
    this.linkAtFront(node);
    this.total += metadata.byteSize;
    return node;
  }

  /**
   * Move a node to the front and record an access
   *
   * @returns the node, or undefined when the key is not resident
   */
  touch(key: CacheKey, now: number = Date.now()): EvictionNode | undefined {
    const node = this.nodes.get(key);
    if (!node) return undefined;

    recordAccess(node.metadata, now);
    this.moveToFront(node);
    return node;
  }

  /**
   * Look up a node without changing its position or counters
   */
  getNode(key: CacheKey): EvictionNode | undefined {
    return this.nodes.get(key);
  }

  has(key: CacheKey): boolean {
    return this.nodes.has(key);
  }

  /**
   * Replace a node's metadata in place (position unchanged)
   *
   * @returns false when the key is not resident
   */
  updateMetadata(key: CacheKey, metadata: CacheMetadata): boolean {
    const node = this.nodes.get(key);
    if (!node) return false;

    this.total += metadata.byteSize - node.metadata.byteSize;
    node.metadata = metadata;
    return true;
  }

  /**
   * Detach and discard a node; absent keys are ignored
   */
  remove(key: CacheKey): boolean {
    const node = this.nodes.get(key);
    if (!node) return false;

    this.unlink(node);
    node.owner = null;
    this.nodes.delete(key);
    this.total -= node.metadata.byteSize;
    return true;
  }

  /**
   * Remove every node
   */
  removeAll(): void {
    for (const node of this.nodes.values()) {
      node.prev = null;
      node.next = null;
      node.owner = null;
    }
    this.nodes.clear();
    this.head = null;
    this.tail = null;
    this.total = 0;
  }

  /**
   * Sum of byteSize over all nodes
   */
  totalSize(): number {
    return this.total;
  }

  get size(): number {
    return this.nodes.size;
  }

  /**
   * Keys from most to least recently used
   */
  *keys(): IterableIterator<CacheKey> {
    for (let node = this.head; node; node = node.next) {
      yield node.key;
    }
  }

  /**
   * Mapping from key to metadata for every resident node
   */
  allMetadata(): Record<CacheKey, CacheMetadata> {
    const result: Record<CacheKey, CacheMetadata> = {};
    for (let node = this.head; node; node = node.next) {
      result[node.key] = node.metadata;
    }
    return result;
  }

  /**
   * Remove the lowest-scoring node until totalSize() <= targetSize
   *
   * Stops as soon as the budget is met. Equal scores go to the node created
   * first.
   *
   * @returns removed keys in removal order
   */
  evictUntil(targetSize: number): CacheKey[] {
    const removed: CacheKey[] = [];

    while (this.total > targetSize && this.nodes.size > 0) {
      const victim = this.findLowestScoring();
      if (!victim) break;
      this.remove(victim.key);
      removed.push(victim.key);
    }

    return removed;
  }

  private findLowestScoring(): EvictionNode | undefined {
    const bounds = computeScoreBounds(Array.from(this.nodes.values(), (node) => node.metadata));

    let victim: EvictionNode | undefined;
    let victimScore = Infinity;

    for (const node of this.nodes.values()) {
      const score = evictionScore(node.metadata, bounds);
      if (score < victimScore || (score === victimScore && victim && node.sequence < victim.sequence)) {
        victim = node;
        victimScore = score;
      }
    }

    return victim;
  }

  private moveToFront(node: EvictionNode): void {
    if (this.head === node) return;
    this.unlink(node);
    this.linkAtFront(node);
  }

  private linkAtFront(node: EvictionNode): void {
    node.prev = null;
    node.next = this.head;
    if (this.head) {
      this.head.prev = node;
    }
    this.head = node;
    if (!this.tail) {
      this.tail = node;
    }
  }

  private unlink(node: EvictionNode): void {
    if (node.owner !== this) return;

    if (node.prev) {
      node.prev.next = node.next;
    } else if (this.head === node) {
      this.head = node.next;
    }

    if (node.next) {
      node.next.prev = node.prev;
    } else if (this.tail === node) {
      this.tail = node.prev;
    }

    node.prev = null;
    node.next = null;
  }
}
