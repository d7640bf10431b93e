/**
 * Eviction list node
 */

import type { CacheKey, CacheMetadata } from '@tiercache/types';

/**
 * One resident disk entry inside the eviction list
 *
 * `owner` points at the list that holds the node and is cleared on detach,
 * so a stale node can never unlink neighbours of another list.
 */
export interface EvictionNode {
  readonly key: CacheKey;
  metadata: CacheMetadata;
  /** Creation order within the owning list; breaks score ties */
  readonly sequence: number;
  prev: EvictionNode | null;
  next: EvictionNode | null;
  owner: object | null;
}

export function createEvictionNode(
  key: CacheKey,
  metadata: CacheMetadata,
  sequence: number,
  owner: object,
): EvictionNode {
  return { key, metadata, sequence, prev: null, next: null, owner };
}
