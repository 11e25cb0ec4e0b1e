import type { CatalogItem } from '../catalog/CatalogItem';
import type { NormalizedQuery } from '../normalizer/QueryNormalizer';
import { normalizeText, tokenize } from '../text/tokenize';
import { keywordSimilarity } from './similarity';
import LibLogger from '../logger';

const logger = LibLogger.get('FuzzyRanker');

export interface ScoredMatch {
  item: CatalogItem;
  /** Mean keyword similarity, minus negation penalties */
  similarityScore: number;
  businessWeight: number;
  /** A positive keyword occurs as whole words in the searchable text */
  exactMatch: boolean;
  /** 1-based position in the ranked list */
  rank: number;
}

export interface FuzzyRankerOptions {
  /** Candidates scoring below this are dropped unless they match exactly. Default 0.5 */
  minSimilarity?: number;
  /** Subtracted for every negated keyword found in a candidate. Default 0.5 */
  negationPenalty?: number;
}

interface Scored {
  item: CatalogItem;
  index: number;
  similarityScore: number;
  businessWeight: number;
  exactMatch: boolean;
}

const OUT_OF_STOCK_FACTOR = 0.5;
const BEST_SELLER_BONUS = 0.1;

/**
 * Name, category, tags and colors, normalized like queries are
 */
export function searchableText(item: CatalogItem): string {
  return normalizeText([item.name, item.category ?? '', ...(item.tags ?? []), ...(item.colors ?? [])].join(' '));
}

/**
 * Secondary relevance from rating, stock and best-seller status, in [0, 1]
 */
export function businessWeight(item: CatalogItem): number {
  let weight = Math.min(Math.max((item.rating ?? 0) / 5, 0), 1);
  if (item.stock === 0) {
    weight *= OUT_OF_STOCK_FACTOR;
  }
  if (item.isBestSeller) {
    weight += BEST_SELLER_BONUS;
  }
  return Math.min(weight, 1);
}

// Whole-phrase containment on token boundaries
const containsPhrase = (text: string, phrase: string): boolean =>
  ` ${text} `.includes(` ${phrase} `);

export class FuzzyRanker {
  private readonly minSimilarity: number;
  private readonly negationPenalty: number;

  constructor(options: FuzzyRankerOptions = {}) {
    this.minSimilarity = options.minSimilarity ?? 0.5;
    this.negationPenalty = options.negationPenalty ?? 0.5;
  }

  /**
   * Order candidates: exact matches first, then similarity, then business
   * weight, then input order. Returns at most `limit` matches.
   */
  rank(candidates: readonly CatalogItem[], query: NormalizedQuery, limit: number): ScoredMatch[] {
    if (limit <= 0 || candidates.length === 0) {
      return [];
    }

    const positive = query.keywords.filter(keyword => !keyword.negated).map(keyword => keyword.term);
    const negated = query.keywords.filter(keyword => keyword.negated).map(keyword => keyword.term);

    const scored: Scored[] = candidates.map((item, index) => {
      const text = searchableText(item);
      const tokens = tokenize(text);

      const similarityTotal = positive.reduce((sum, term) => sum + keywordSimilarity(term, tokens), 0);
      const baseSimilarity = positive.length > 0 ? similarityTotal / positive.length : 0;
      const negatedHits = negated.filter(term => containsPhrase(text, term)).length;

      return {
        item,
        index,
        similarityScore: Math.max(0, baseSimilarity - negatedHits * this.negationPenalty),
        businessWeight: businessWeight(item),
        exactMatch: negatedHits === 0 && positive.some(term => containsPhrase(text, term))
      };
    });

    const kept = positive.length === 0
      ? scored
      : scored.filter(entry => entry.exactMatch || entry.similarityScore >= this.minSimilarity);

    kept.sort((a, b) =>
      Number(b.exactMatch) - Number(a.exactMatch) ||
      b.similarityScore - a.similarityScore ||
      b.businessWeight - a.businessWeight ||
      a.index - b.index
    );

    const matches = kept.slice(0, limit).map((entry, position) => ({
      item: entry.item,
      similarityScore: entry.similarityScore,
      businessWeight: entry.businessWeight,
      exactMatch: entry.exactMatch,
      rank: position + 1
    }));

    logger.debug('Ranked candidates', {
      candidates: candidates.length,
      kept: kept.length,
      returned: matches.length,
      keywords: positive.length,
      negatedKeywords: negated.length
    });

    return matches;
  }
}
