/**
 * Request header merging
 */

/**
 * Merge header sets; later sets override earlier ones
 *
 * Order: configured defaults < header provider < per-call headers.
 *
 * @returns undefined when the merge is empty (no custom headers are sent)
 */
export function mergeRequestHeaders(
  ...sets: Array<Record<string, string> | undefined>
): Record<string, string> | undefined {
  const merged: Record<string, string> = {};
  for (const set of sets) {
    if (set) Object.assign(merged, set);
  }
  return Object.keys(merged).length > 0 ? merged : undefined;
}
