/**
 * Fuzzy store-name scoring.
 *
 * 1.0 for a case-insensitive exact match, the length ratio when one name
 * contains the other, and the share of common words otherwise.
 */

export function normalizeName(name: string): string {
  return name.trim().toLowerCase().replace(/\s+/g, " ");
}

function words(name: string): Set<string> {
  return new Set(normalizeName(name).split(/[^\p{L}\p{N}]+/u).filter((w) => w.length > 0));
}

export function scoreName(query: string, candidate: string): number {
  const q = normalizeName(query);
  const c = normalizeName(candidate);
  if (!q || !c) return 0;

  if (q === c) return 1;

  if (c.includes(q) || q.includes(c)) {
    return Math.min(q.length, c.length) / Math.max(q.length, c.length);
  }

  const qWords = words(q);
  const cWords = words(c);
  let common = 0;
  for (const w of qWords) {
    if (cWords.has(w)) common++;
  }
  if (common === 0) return 0;
  return common / Math.max(qWords.size, cWords.size);
}

/**
 * Best-scoring item for a query, or undefined when nothing shares a word or
 * substring with it.
 */
export function bestNameMatch<T>(
  query: string,
  items: readonly T[],
  nameOf: (item: T) => string
): { item: T; score: number } | undefined {
  let best: { item: T; score: number } | undefined;
  for (const item of items) {
    const score = scoreName(query, nameOf(item));
    if (score > 0 && (!best || score > best.score)) {
      best = { item, score };
    }
  }
  return best;
}
