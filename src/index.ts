export { Gateway } from './Gateway';
export type { CallOptions, GatewayStatus, UpstreamResponse } from './Gateway';
export { SearchOrchestrator, keywordSearchTerms } from './SearchOrchestrator';
export type { SearchOrchestratorOptions, SearchResult } from './SearchOrchestrator';

// Configuration
export {
  CacheStrategy,
  DEFAULT_CACHE_TTLS,
  DEFAULT_GATEWAY_OPTIONS,
  createOptions,
  validateOptions
} from './Options';
export type {
  BreakerConfig,
  CacheConfig,
  GatewayOptions,
  GatewayOptionsInput,
  RateLimitConfig,
  RateLimitMode,
  RetryConfig
} from './Options';
export { SystemClock, systemClock } from './clock/Clock';
export type { Clock } from './clock/Clock';

// Errors
export {
  CancellationError,
  CircuitOpenError,
  FilterValidationError,
  GatewayError,
  LexiconError,
  OptionsValidationError,
  RateLimitExceededError,
  TransientNetworkError,
  UpstreamClientError,
  UpstreamServerError,
  classifyError,
  errorFromStatus
} from './errors';
export type { ErrorKind } from './errors';

// Resilience building blocks
export { ResponseCache } from './cache/ResponseCache';
export type { CacheEntry, ResponseCacheConfig } from './cache/ResponseCache';
export type { CacheStats } from './CacheStats';
export { RateLimiter } from './resilience/RateLimiter';
export type { RatePermit } from './resilience/RateLimiter';
export { CircuitBreaker, CircuitState } from './resilience/CircuitBreaker';
export type { CircuitStateChange } from './resilience/CircuitBreaker';
export { RetryOrchestrator } from './resilience/RetryOrchestrator';
export type { RetryOutcome, RetryableOperation } from './resilience/RetryOrchestrator';
export { EvictionStrategy, LRUEvictionStrategy } from './eviction';
export type { EvictionContext } from './eviction';
export { createFingerprint, deterministicStringify } from './normalization';
export type { RequestParams } from './normalization';

// Events
export type {
  AnyGatewayEvent,
  GatewayEventListener,
  GatewayEventType,
  GatewaySubscription,
  GatewaySubscriptionOptions
} from './events/GatewayEventTypes';

// Transport
export { createFetchTransport } from './transport/fetchTransport';
export type { FetchTransportOptions } from './transport/fetchTransport';
export type { CatalogTransport, TransportRequest, TransportResponse } from './transport/Transport';

// Catalog
export { CatalogClient, CatalogEndpoints } from './catalog/CatalogClient';
export type { CatalogItemResult, CatalogPage } from './catalog/CatalogClient';
export { extractCatalogItem, extractCatalogItems, toCatalogItem } from './catalog/CatalogItem';
export type { CatalogItem } from './catalog/CatalogItem';
export { productFilterToParams, validateProductFilter } from './catalog/ProductFilter';
export type { ProductFilter } from './catalog/ProductFilter';

// Query understanding and ranking
export { createDefaultLexicon, createLexicon, parseLexiconTables } from './lexicon/Lexicon';
export type { KeywordCategory, Lexicon, LexiconTables, PriceBounds, PriceRangeName } from './lexicon/Lexicon';
export { QueryNormalizer } from './normalizer/QueryNormalizer';
export type { Keyword, NormalizedQuery } from './normalizer/QueryNormalizer';
export { deriveSearchIntent } from './normalizer/SearchIntent';
export type { SearchIntent } from './normalizer/SearchIntent';
export { FuzzyRanker, businessWeight, searchableText } from './ranking/FuzzyRanker';
export type { FuzzyRankerOptions, ScoredMatch } from './ranking/FuzzyRanker';
export { similarity, keywordSimilarity } from './ranking/similarity';
export { suggestSearchTerms } from './ranking/suggestions';
export type { SuggestionOptions } from './ranking/suggestions';
export { normalizeText, tokenize } from './text/tokenize';
