import { CatalogClient, CatalogPage } from './catalog/CatalogClient';
import type { CatalogItem } from './catalog/CatalogItem';
import { MAX_PAGE_SIZE } from './catalog/ProductFilter';
import { OptionsValidationError } from './errors';
import type { CallOptions, Gateway, UpstreamResponse } from './Gateway';
import { createDefaultLexicon, Lexicon } from './lexicon/Lexicon';
import { NormalizedQuery, QueryNormalizer } from './normalizer/QueryNormalizer';
import { deriveSearchIntent, SearchIntent } from './normalizer/SearchIntent';
import { CacheStrategy } from './Options';
import { FuzzyRanker, FuzzyRankerOptions, ScoredMatch } from './ranking/FuzzyRanker';
import { SuggestionOptions, suggestSearchTerms } from './ranking/suggestions';
import LibLogger from './logger';

const logger = LibLogger.get('SearchOrchestrator');

export interface SearchResult {
  /** Ranked items, at most `limit` */
  items: CatalogItem[];
  matches: ScoredMatch[];
  query: NormalizedQuery;
  intent: SearchIntent;
  /** Envelope of the last upstream call; null when nothing was sent */
  response: UpstreamResponse | null;
  /** Alternative search terms, offered only when no item was found */
  suggestions: string[];
}

export interface SearchOrchestratorOptions {
  /** Defaults to the bundled lexicon */
  lexicon?: Lexicon;
  ranker?: FuzzyRankerOptions;
  suggestions?: SuggestionOptions;
  /** Page size of every text search. Default 25 */
  searchPageSize?: number;
  /** Size of the listing page ranked when no search finds anything. Default 60 */
  fallbackPageSize?: number;
}

const readPageSize = (name: string, value: number | undefined, fallback: number): number => {
  const size = value ?? fallback;
  if (!Number.isInteger(size) || size < 1 || size > MAX_PAGE_SIZE) {
    throw new OptionsValidationError(`${name} must be an integer between 1 and ${MAX_PAGE_SIZE}, got ${size}.`);
  }
  return size;
};

/**
 * Narrower searches to try when the full canonical text finds nothing:
 * all positive keywords, the first two, then the first one.
 */
export function keywordSearchTerms(query: NormalizedQuery): string[] {
  const terms = query.keywords.filter(keyword => !keyword.negated).map(keyword => keyword.term);
  if (terms.length === 0) {
    return [];
  }
  const candidates = [terms.join(' '), terms.slice(0, 2).join(' '), terms[0]];
  return candidates.filter((term, index) =>
    term !== query.canonicalText && candidates.indexOf(term) === index
  );
}

/**
 * Query in, ranked catalog items out.
 *
 * normalize → text search → keyword searches → popular listing → rank →
 * truncate. Upstream failures come back as an empty result carrying the
 * failed envelope.
 */
export class SearchOrchestrator {
  private readonly lexicon: Lexicon;
  private readonly normalizer: QueryNormalizer;
  private readonly ranker: FuzzyRanker;
  private readonly catalog: CatalogClient;
  private readonly suggestionOptions: SuggestionOptions;
  private readonly searchPageSize: number;
  private readonly fallbackPageSize: number;

  /**
   * @throws OptionsValidationError when a page size is not an integer between 1 and 100
   */
  constructor(gateway: Gateway, options: SearchOrchestratorOptions = {}) {
    this.searchPageSize = readPageSize('searchPageSize', options.searchPageSize, 25);
    this.fallbackPageSize = readPageSize('fallbackPageSize', options.fallbackPageSize, 60);
    this.lexicon = options.lexicon ?? createDefaultLexicon();
    this.normalizer = new QueryNormalizer(this.lexicon);
    this.ranker = new FuzzyRanker(options.ranker);
    this.suggestionOptions = options.suggestions ?? {};
    this.catalog = new CatalogClient(gateway);
  }

  async search(rawQuery: string, limit: number = 5, options: CallOptions = {}): Promise<SearchResult> {
    const query = this.normalizer.normalize(rawQuery);
    const intent = deriveSearchIntent(query, this.lexicon);

    if (query.canonicalText.length === 0) {
      logger.debug('Nothing left to search after normalization', { rawQuery });
      return this.emptyResult(query, intent, null);
    }

    let page = await this.searchText(query.canonicalText, options);
    for (const term of keywordSearchTerms(query)) {
      if (!page.response.success || page.items.length > 0) break;
      logger.debug('Search returned no candidates, trying keywords', { canonicalText: query.canonicalText, term });
      page = await this.searchText(term, options);
    }

    if (page.response.success && page.items.length === 0) {
      logger.debug('Keyword searches returned no candidates, ranking popular products instead', {
        canonicalText: query.canonicalText
      });
      page = await this.catalog.listProducts(1, this.fallbackPageSize, options);
    }

    if (!page.response.success) {
      logger.warning('Search failed upstream', {
        rawQuery,
        canonicalText: query.canonicalText,
        errorKind: page.response.errorKind,
        statusCode: page.response.statusCode
      });
      return this.emptyResult(query, intent, page.response);
    }

    const matches = this.ranker.rank(this.narrowByPrice(page.items, intent), query, limit);

    logger.debug('Search completed', {
      rawQuery,
      canonicalText: query.canonicalText,
      candidates: page.items.length,
      returned: matches.length,
      cached: page.response.cached
    });

    return {
      items: matches.map(match => match.item),
      matches,
      query,
      intent,
      response: page.response,
      suggestions: matches.length === 0 ? suggestSearchTerms(query, this.lexicon, this.suggestionOptions) : []
    };
  }

  private searchText(text: string, options: CallOptions): Promise<CatalogPage> {
    return this.catalog.filterProducts({ search: text, pageSize: this.searchPageSize }, CacheStrategy.MEDIUM_TERM, options);
  }

  private emptyResult(query: NormalizedQuery, intent: SearchIntent, response: UpstreamResponse | null): SearchResult {
    return {
      items: [],
      matches: [],
      query,
      intent,
      response,
      suggestions: suggestSearchTerms(query, this.lexicon, this.suggestionOptions)
    };
  }

  /**
   * Keep candidates inside the requested price range, unless none would remain
   */
  private narrowByPrice(candidates: CatalogItem[], intent: SearchIntent): CatalogItem[] {
    const bounds = intent.priceBounds;
    if (!bounds) {
      return candidates;
    }
    const inRange = candidates.filter(item =>
      typeof item.price !== 'undefined' &&
      item.price >= bounds.min &&
      (bounds.max === null || item.price <= bounds.max)
    );
    return inRange.length > 0 ? inRange : candidates;
  }
}
