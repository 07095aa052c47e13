const RRF_K = 60;

export interface FusedResult<T> {
  item: T;
  score: number;
}

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter((term) => term.length > 2);
}

/**
 * Rank items by how often the query's terms occur in their text. Items with
 * no matching term are left out; ties keep their input order.
 */
export function keywordRank<T>(query: string, items: T[], textOf: (item: T) => string): T[] {
  const terms = new Set(tokenize(query));
  if (terms.size === 0) return [];

  const scored = items.map((item) => {
    let score = 0;
    for (const token of tokenize(textOf(item))) {
      if (terms.has(token)) score += 1;
    }
    return { item, score };
  });

  return scored
    .filter((entry) => entry.score > 0)
    .sort((a, b) => b.score - a.score)
    .map((entry) => entry.item);
}

/** Reciprocal rank fusion: each list contributes 1 / (k + rank) per item. */
export function reciprocalRankFusion<T>(
  rankings: T[][],
  idOf: (item: T) => string,
  k: number = RRF_K,
): FusedResult<T>[] {
  const fused = new Map<string, FusedResult<T>>();

  for (const ranking of rankings) {
    ranking.forEach((item, index) => {
      const contribution = 1 / (k + index + 1);
      const id = idOf(item);
      const existing = fused.get(id);
      if (existing) {
        existing.score += contribution;
      } else {
        fused.set(id, { item, score: contribution });
      }
    });
  }

  return Array.from(fused.values()).sort((a, b) => b.score - a.score);
}
