import type { Lexicon, PriceBounds, PriceRangeName } from '../lexicon/Lexicon';
import type { NormalizedQuery } from './QueryNormalizer';

export interface SearchIntent {
  priceRange: PriceRangeName | null;
  /** Bounds of priceRange from the lexicon */
  priceBounds: PriceBounds | null;
  occasion: string | null;
  season: string | null;
  garments: string[];
  colors: string[];
  /** Colors the shopper asked to avoid */
  excludedColors: string[];
  wantsCompleteOutfit: boolean;
}

const INVERTED_RANGE: Record<PriceRangeName, PriceRangeName> = {
  very_low: 'high',
  low: 'high',
  medium: 'medium',
  high: 'low',
  very_high: 'low'
};

/**
 * Shopping intent read off the categorized keywords of a query.
 * "not expensive" reads as a low price range, "مش رخيص" as a high one.
 */
export function deriveSearchIntent(query: NormalizedQuery, lexicon: Lexicon): SearchIntent {
  let priceRange: PriceRangeName | null = null;
  let occasion: string | null = null;
  let season: string | null = null;
  const garments: string[] = [];
  const colors: string[] = [];
  const excludedColors: string[] = [];
  let wantsCompleteOutfit = false;

  for (const keyword of query.keywords) {
    switch (keyword.category) {
      case 'price': {
        const range = lexicon.priceRangeOf(keyword.term);
        if (range && priceRange === null) {
          priceRange = keyword.negated ? INVERTED_RANGE[range] : range;
        }
        break;
      }
      case 'occasion':
        if (!keyword.negated && occasion === null) occasion = keyword.term;
        break;
      case 'season':
        if (!keyword.negated && season === null) season = keyword.term;
        break;
      case 'garment':
        if (!keyword.negated) garments.push(keyword.term);
        break;
      case 'color':
        (keyword.negated ? excludedColors : colors).push(keyword.term);
        break;
      case 'outfit':
        wantsCompleteOutfit = wantsCompleteOutfit || !keyword.negated;
        break;
      default:
        break;
    }
  }

  return {
    priceRange,
    priceBounds: priceRange ? lexicon.priceBounds(priceRange) : null,
    occasion,
    season,
    garments,
    colors,
    excludedColors,
    wantsCompleteOutfit
  };
}
