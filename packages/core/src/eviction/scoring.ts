/**
 * Eviction scoring
 *
 * Blends recency and frequency into one score per entry. Recency carries
 * 70% of the weight and frequency 30%; both components are normalized to
 * [0, 1] across the entries being ranked, and the lowest score is evicted.
 */

export const RECENCY_WEIGHT = 0.7;
export const FREQUENCY_WEIGHT = 0.3;

/**
 * The two inputs the score is computed from
 */
export interface ScoreInput {
  lastAccessedAt: number;
  accessCount: number;
}

/**
 * Normalization bounds taken over the entries being ranked
 */
export interface ScoreBounds {
  oldestAccess: number;
  newestAccess: number;
  maxAccessCount: number;
}

/**
 * Compute normalization bounds for a set of entries
 */
export function computeScoreBounds(entries: Iterable<ScoreInput>): ScoreBounds {
  let oldestAccess = Infinity;
  let newestAccess = -Infinity;
  let maxAccessCount = 0;

  for (const entry of entries) {
    if (entry.lastAccessedAt < oldestAccess) oldestAccess = entry.lastAccessedAt;
    if (entry.lastAccessedAt > newestAccess) newestAccess = entry.lastAccessedAt;
    if (entry.accessCount > maxAccessCount) maxAccessCount = entry.accessCount;
  }

  if (oldestAccess === Infinity) {
    return { oldestAccess: 0, newestAccess: 0, maxAccessCount: 0 };
  }
  return { oldestAccess, newestAccess, maxAccessCount };
}

/**
 * Recency component: 0 for the least recently accessed entry, 1 for the most
 * recent. All entries score 1 when their access times are equal.
 */
export function recencyComponent(lastAccessedAt: number, bounds: ScoreBounds): number {
  const span = bounds.newestAccess - bounds.oldestAccess;
  if (span <= 0) return 1;
  return (lastAccessedAt - bounds.oldestAccess) / span;
}

/**
 * Frequency component: ln(1 + count) / ln(1 + maxCount), 0 when nothing has
 * been accessed.
 */
export function frequencyComponent(accessCount: number, bounds: ScoreBounds): number {
  if (bounds.maxAccessCount <= 0) return 0;
  return Math.log1p(Math.max(0, accessCount)) / Math.log1p(bounds.maxAccessCount);
}

/**
 * Blended eviction score (higher means more worth keeping)
 */
export function evictionScore(entry: ScoreInput, bounds: ScoreBounds): number {
  return (
    RECENCY_WEIGHT * recencyComponent(entry.lastAccessedAt, bounds) +
    FREQUENCY_WEIGHT * frequencyComponent(entry.accessCount, bounds)
  );
}
