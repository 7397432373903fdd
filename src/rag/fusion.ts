/**
 * Weighted reciprocal rank fusion of ranked result lists.
 */

export const RRF_K = 60;

export interface Ranked {
  id: string;
}

/** Contribution of a 0-based rank. */
export function rrfScore(rank: number, k: number = RRF_K): number {
  return 1 / (k + rank + 1);
}

/**
 * Merge `lists` (each best first) into one list ordered by the summed
 * weighted RRF score. The first occurrence of an id supplies its item.
 */
export function fuseRankings<T extends Ranked>(
  lists: T[][],
  weights: number[],
  limit: number,
  k: number = RRF_K,
): (T & { score: number })[] {
  const fused = new Map<string, { item: T; score: number }>();
  lists.forEach((list, i) => {
    const weight = weights[i] ?? 1;
    list.forEach((item, rank) => {
      const entry = fused.get(item.id);
      const score = weight * rrfScore(rank, k);
      if (entry) entry.score += score;
      else fused.set(item.id, { item, score });
    });
  });
  return [...fused.values()]
    .sort((a, b) => b.score - a.score)
    .slice(0, limit)
    .map(({ item, score }) => ({ ...item, score }));
}
