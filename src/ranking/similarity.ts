import { distance } from 'fastest-levenshtein';

/**
 * Edit-distance similarity in [0, 1]: 1 for equal strings, 0 for nothing in common.
 */
export function similarity(a: string, b: string): number {
  const longest = Math.max(a.length, b.length);
  if (longest === 0) {
    return 1;
  }
  return 1 - distance(a, b) / longest;
}

/**
 * Best similarity between one token and any of the candidate tokens
 */
export function bestTokenSimilarity(token: string, candidates: readonly string[]): number {
  let best = 0;
  for (const candidate of candidates) {
    best = Math.max(best, similarity(token, candidate));
    if (best === 1) break;
  }
  return best;
}

/**
 * Similarity of a (possibly multi-word) keyword against tokenized text.
 * Multi-word keywords score the average of their tokens, so word order does not matter.
 */
export function keywordSimilarity(keyword: string, textTokens: readonly string[]): number {
  const parts = keyword.split(' ').filter(part => part.length > 0);
  if (parts.length === 0 || textTokens.length === 0) {
    return 0;
  }
  const total = parts.reduce((sum, part) => sum + bestTokenSimilarity(part, textTokens), 0);
  return total / parts.length;
}
