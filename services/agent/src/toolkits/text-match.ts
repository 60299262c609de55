const WORD = /[\p{L}\p{N}]+/gu;

/** Lowercased word tokens, ignoring one- and two-letter words. */
export function tokenize(text: string): Set<string> {
  const words = text.toLowerCase().match(WORD) ?? [];
  return new Set(words.filter((w) => w.length > 2));
}

/** Fraction of the query's tokens that also occur in `text` (0 when the query has none). */
export function overlapScore(query: string, text: string): number {
  const queryTokens = tokenize(query);
  if (queryTokens.size === 0) return 0;
  const textTokens = tokenize(text);
  let hits = 0;
  for (const token of queryTokens) {
    if (textTokens.has(token)) hits++;
  }
  return hits / queryTokens.size;
}
