import { Clock, systemClock } from './clock/Clock';
import { OptionsValidationError } from './errors';
import { validateSizeConfig } from './utils/CacheSize';
import LibLogger from './logger';

const logger = LibLogger.get('Options');

/**
 * Per-call caching policy. Each strategy maps to a fixed TTL.
 */
export const CacheStrategy = {
  NO_CACHE: 'no_cache',
  SHORT_TERM: 'short_term',
  MEDIUM_TERM: 'medium_term',
  LONG_TERM: 'long_term'
} as const;

export type CacheStrategy = typeof CacheStrategy[keyof typeof CacheStrategy];

/** TTL in milliseconds for every cache strategy */
export type CacheStrategyTTLs = Readonly<Record<CacheStrategy, number>>;

export const DEFAULT_CACHE_TTLS: CacheStrategyTTLs = Object.freeze({
  no_cache: 0,
  short_term: 300 * 1000,
  medium_term: 900 * 1000,
  long_term: 3600 * 1000
});

/**
 * Response cache configuration
 */
export interface CacheConfig {
  /** Maximum number of cached responses */
  maxSize: number;
  /** Optional byte budget (e.g. '512KB', '5MB') on top of the entry count */
  maxSizeBytes?: string;
  /** TTL per strategy, in milliseconds */
  ttls: CacheStrategyTTLs;
}

/**
 * What to do when the rate window is full:
 * 'queue' waits for the oldest call to age out, 'reject' fails immediately.
 */
export type RateLimitMode = 'queue' | 'reject';

export interface RateLimitConfig {
  /** Calls permitted inside any trailing window */
  budget: number;
  /** Window length in milliseconds */
  windowMs: number;
  mode: RateLimitMode;
  /** Longest a queued caller may wait before being rejected */
  maxWaitMs: number;
}

export interface BreakerConfig {
  /** Consecutive failed calls that open the circuit */
  failureThreshold: number;
  /** Time the circuit stays open before a trial call is allowed */
  cooldownMs: number;
  /** Whether 4xx responses count as upstream failures */
  countClientErrors: boolean;
}

export interface RetryConfig {
  /** Retries after the initial attempt */
  maxRetries: number;
  /** Delay before the first retry; doubled for every further retry */
  baseDelayMs: number;
  maxDelayMs: number;
}

/**
 * Fully resolved gateway configuration
 */
export interface GatewayOptions {
  cache: CacheConfig;
  rateLimit: RateLimitConfig;
  breaker: BreakerConfig;
  retry: RetryConfig;
  /** Timeout for a single transport attempt */
  requestTimeoutMs: number;
  clock: Clock;
}

/**
 * Partial configuration accepted by {@link createOptions}
 */
export interface GatewayOptionsInput {
  cache?: Partial<Omit<CacheConfig, 'ttls'>> & { ttls?: Partial<Record<CacheStrategy, number>> };
  rateLimit?: Partial<RateLimitConfig>;
  breaker?: Partial<BreakerConfig>;
  retry?: Partial<RetryConfig>;
  requestTimeoutMs?: number;
  clock?: Clock;
}

const DEFAULT_WINDOW_MS = 60 * 1000;

export const DEFAULT_GATEWAY_OPTIONS: Omit<GatewayOptions, 'clock'> = {
  cache: {
    maxSize: 200,
    ttls: DEFAULT_CACHE_TTLS
  },
  rateLimit: {
    budget: 60,
    windowMs: DEFAULT_WINDOW_MS,
    mode: 'queue',
    maxWaitMs: DEFAULT_WINDOW_MS
  },
  breaker: {
    failureThreshold: 5,
    cooldownMs: 60 * 1000,
    countClientErrors: true
  },
  retry: {
    maxRetries: 3,
    baseDelayMs: 1000,
    maxDelayMs: 8000
  },
  requestTimeoutMs: 30 * 1000
};

const VALID_SECTION_PROPERTIES: Record<string, Set<string>> = {
  cache: new Set(['maxSize', 'maxSizeBytes', 'ttls']),
  rateLimit: new Set(['budget', 'windowMs', 'mode', 'maxWaitMs']),
  breaker: new Set(['failureThreshold', 'cooldownMs', 'countClientErrors']),
  retry: new Set(['maxRetries', 'baseDelayMs', 'maxDelayMs'])
};

const VALID_TOP_LEVEL_PROPERTIES = new Set([
  ...Object.keys(VALID_SECTION_PROPERTIES),
  'requestTimeoutMs',
  'clock'
]);

const PROPERTY_SUGGESTIONS: Record<string, string> = {
  'ratelimit': 'rateLimit',
  'rate_limit': 'rateLimit',
  'circuitBreaker': 'breaker',
  'circuit_breaker': 'breaker',
  'retries': 'retry',
  'timeout': 'requestTimeoutMs',
  'timeoutMs': 'requestTimeoutMs',
  'request_timeout_ms': 'requestTimeoutMs',
  'maxsize': 'maxSize',
  'max_size': 'maxSize',
  'maxItems': 'maxSize',
  'ttl': 'ttls',
  'limit': 'budget',
  'maxRequests': 'budget',
  'window': 'windowMs',
  'window_ms': 'windowMs',
  'threshold': 'failureThreshold',
  'failure_threshold': 'failureThreshold',
  'cooldown': 'cooldownMs',
  'resetTimeout': 'cooldownMs',
  'max_retries': 'maxRetries',
  'retryDelay': 'baseDelayMs',
  'delay': 'baseDelayMs'
};

const describeUnknown = (scope: string, unknown: string[], valid: Set<string>): string => {
  const suggestions = unknown.map(prop => {
    const suggestion = PROPERTY_SUGGESTIONS[prop];
    return suggestion ? `"${prop}" → "${suggestion}"` : `"${prop}"`;
  });
  return `Unknown ${scope} properties: ${unknown.join(', ')}.\n` +
    `Valid properties are: ${Array.from(valid).join(', ')}.\n` +
    `Did you mean: ${suggestions.join(', ')}?`;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const requirePositiveInteger = (name: string, value: number): void => {
  if (!Number.isInteger(value) || value <= 0) {
    throw new OptionsValidationError(`${name} must be a positive integer, got ${value}.`);
  }
};

const requireNonNegative = (name: string, value: number): void => {
  if (!Number.isFinite(value) || value < 0) {
    throw new OptionsValidationError(`${name} must be a non-negative number, got ${value}.`);
  }
};

/**
 * Reject unknown keys before defaults are merged in, so a misspelt option never
 * silently falls back to its default.
 */
export const validateOptionsInput = (input: GatewayOptionsInput): void => {
  const unknownTopLevel = Object.keys(input).filter(key => !VALID_TOP_LEVEL_PROPERTIES.has(key));
  if (unknownTopLevel.length > 0) {
    throw new OptionsValidationError(describeUnknown('configuration', unknownTopLevel, VALID_TOP_LEVEL_PROPERTIES));
  }

  for (const [section, valid] of Object.entries(VALID_SECTION_PROPERTIES)) {
    const value: unknown = Object.entries(input).find(([key]) => key === section)?.[1];
    if (typeof value === 'undefined') {
      continue;
    }
    if (!isRecord(value)) {
      throw new OptionsValidationError(`${section} must be an object.`);
    }
    const unknown = Object.keys(value).filter(key => !valid.has(key));
    if (unknown.length > 0) {
      throw new OptionsValidationError(describeUnknown(section, unknown, valid));
    }
  }

  if (input.cache?.ttls) {
    const strategies = new Set<string>(Object.values(CacheStrategy));
    const unknownStrategies = Object.keys(input.cache.ttls).filter(key => !strategies.has(key));
    if (unknownStrategies.length > 0) {
      throw new OptionsValidationError(
        `Unknown cache strategies in cache.ttls: ${unknownStrategies.join(', ')}. ` +
        `Valid strategies are: ${Array.from(strategies).join(', ')}.`
      );
    }
  }
};

/**
 * Validate resolved options
 */
export const validateOptions = (options: GatewayOptions): void => {
  requirePositiveInteger('cache.maxSize', options.cache.maxSize);
  if (typeof options.cache.maxSizeBytes !== 'undefined') {
    try {
      validateSizeConfig({ maxSizeBytes: options.cache.maxSizeBytes });
    } catch (error) {
      throw new OptionsValidationError(`cache: ${error instanceof Error ? error.message : String(error)}`);
    }
  }
  for (const [strategy, ttl] of Object.entries(options.cache.ttls)) {
    requireNonNegative(`cache.ttls.${strategy}`, ttl);
  }
  if (options.cache.ttls.no_cache !== 0) {
    throw new OptionsValidationError(
      `cache.ttls.no_cache must be 0, got ${options.cache.ttls.no_cache}. ` +
      `Suggestion: use short_term for brief caching.`
    );
  }

  requirePositiveInteger('rateLimit.budget', options.rateLimit.budget);
  requirePositiveInteger('rateLimit.windowMs', options.rateLimit.windowMs);
  requireNonNegative('rateLimit.maxWaitMs', options.rateLimit.maxWaitMs);
  if (options.rateLimit.mode !== 'queue' && options.rateLimit.mode !== 'reject') {
    throw new OptionsValidationError(
      `Invalid rateLimit.mode: "${String(options.rateLimit.mode)}". Valid modes are: queue, reject.`
    );
  }

  requirePositiveInteger('breaker.failureThreshold', options.breaker.failureThreshold);
  requireNonNegative('breaker.cooldownMs', options.breaker.cooldownMs);

  if (!Number.isInteger(options.retry.maxRetries) || options.retry.maxRetries < 0) {
    throw new OptionsValidationError(
      `retry.maxRetries must be a non-negative integer, got ${options.retry.maxRetries}. ` +
      `Suggestion: use 0 to disable retries.`
    );
  }
  requireNonNegative('retry.baseDelayMs', options.retry.baseDelayMs);
  requireNonNegative('retry.maxDelayMs', options.retry.maxDelayMs);
  if (options.retry.maxDelayMs < options.retry.baseDelayMs) {
    throw new OptionsValidationError(
      `retry.maxDelayMs (${options.retry.maxDelayMs}) must not be lower than retry.baseDelayMs (${options.retry.baseDelayMs}).`
    );
  }

  requirePositiveInteger('requestTimeoutMs', options.requestTimeoutMs);
};

/**
 * Create gateway options with defaults
 */
export const createOptions = (input: GatewayOptionsInput = {}): GatewayOptions => {
  validateOptionsInput(input);

  const windowMs = input.rateLimit?.windowMs ?? DEFAULT_GATEWAY_OPTIONS.rateLimit.windowMs;
  const options: GatewayOptions = {
    cache: {
      maxSize: input.cache?.maxSize ?? DEFAULT_GATEWAY_OPTIONS.cache.maxSize,
      maxSizeBytes: input.cache?.maxSizeBytes,
      ttls: Object.freeze({ ...DEFAULT_CACHE_TTLS, ...input.cache?.ttls })
    },
    rateLimit: {
      ...DEFAULT_GATEWAY_OPTIONS.rateLimit,
      ...input.rateLimit,
      // Queued callers never wait longer than one window unless told otherwise
      maxWaitMs: input.rateLimit?.maxWaitMs ?? windowMs
    },
    breaker: { ...DEFAULT_GATEWAY_OPTIONS.breaker, ...input.breaker },
    retry: { ...DEFAULT_GATEWAY_OPTIONS.retry, ...input.retry },
    requestTimeoutMs: input.requestTimeoutMs ?? DEFAULT_GATEWAY_OPTIONS.requestTimeoutMs,
    clock: input.clock ?? systemClock
  };

  try {
    validateOptions(options);
  } catch (error) {
    logger.error('Invalid gateway options', {
      component: 'gateway',
      operation: 'createOptions',
      error: error instanceof Error ? error.message : String(error)
    });
    throw error;
  }

  return options;
};

export const ttlForStrategy = (options: GatewayOptions, strategy: CacheStrategy): number =>
  options.cache.ttls[strategy];
