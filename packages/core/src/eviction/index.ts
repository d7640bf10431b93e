/**
 * Eviction module exports
 */

export { EvictionList } from './eviction-list.js';
export { type EvictionNode, createEvictionNode } from './eviction-node.js';
export {
  type ScoreInput,
  type ScoreBounds,
  RECENCY_WEIGHT,
  FREQUENCY_WEIGHT,
  computeScoreBounds,
  recencyComponent,
  frequencyComponent,
  evictionScore,
} from './scoring.js';
