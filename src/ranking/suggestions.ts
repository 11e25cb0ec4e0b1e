import { KEYWORD_CATEGORIES, Lexicon } from '../lexicon/Lexicon';
import type { NormalizedQuery } from '../normalizer/QueryNormalizer';
import { similarity } from './similarity';

export interface SuggestionOptions {
  /** Default 6 */
  maxSuggestions?: number;
  /** Lowest similarity for a spelling suggestion. Default 0.6 */
  minSimilarity?: number;
}

const ARABIC_SCRIPT = /[\u0600-\u06FF]/;

/**
 * Terms to offer when a search comes back empty: the closest lexicon terms for
 * every keyword the lexicon does not know, then other garments written in the
 * query's script. Terms already in the query are never suggested.
 */
export function suggestSearchTerms(
  query: NormalizedQuery,
  lexicon: Lexicon,
  options: SuggestionOptions = {}
): string[] {
  const maxSuggestions = options.maxSuggestions ?? 6;
  const minSimilarity = options.minSimilarity ?? 0.6;

  const used = new Set(query.keywords.map(keyword => keyword.term));
  const suggestions: string[] = [];
  const add = (term: string): void => {
    if (!used.has(term) && !suggestions.includes(term)) {
      suggestions.push(term);
    }
  };

  const known = KEYWORD_CATEGORIES.flatMap(category => lexicon.termsIn(category));
  for (const keyword of query.keywords) {
    if (keyword.negated || keyword.category !== null) continue;
    known
      .map(term => ({ term, score: similarity(keyword.term, term) }))
      .filter(candidate => candidate.score >= minSimilarity)
      .sort((a, b) => b.score - a.score)
      .slice(0, 2)
      .forEach(candidate => add(candidate.term));
  }

  const arabic = ARABIC_SCRIPT.test(query.canonicalText);
  for (const term of lexicon.termsIn('garment')) {
    if (ARABIC_SCRIPT.test(term) === arabic) {
      add(term);
    }
  }

  return suggestions.slice(0, maxSuggestions);
}
