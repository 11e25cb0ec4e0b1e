import { ResponseCache } from './cache/ResponseCache';
import {
  CancellationError,
  CircuitOpenError,
  ErrorKind,
  GatewayError,
  RateLimitExceededError,
  TransientNetworkError,
  classifyError
} from './errors';
import { GatewayEventEmitter } from './events/GatewayEventEmitter';
import type {
  AnyGatewayEvent,
  GatewayEventListener,
  GatewaySubscription,
  GatewaySubscriptionOptions
} from './events/GatewayEventTypes';
import { createFingerprint, RequestParams } from './normalization';
import {
  CacheStrategy,
  GatewayOptions,
  GatewayOptionsInput,
  createOptions,
  ttlForStrategy
} from './Options';
import { CircuitBreaker, CircuitState } from './resilience/CircuitBreaker';
import { RateLimiter, RatePermit } from './resilience/RateLimiter';
import { RetryOrchestrator } from './resilience/RetryOrchestrator';
import type { CatalogTransport, TransportResponse } from './transport/Transport';
import LibLogger from './logger';

const logger = LibLogger.get('Gateway');

/**
 * Envelope returned for every logical call. Failures never surface as exceptions.
 */
export interface UpstreamResponse<T = unknown> {
  data: T | null;
  success: boolean;
  /** null on success */
  errorKind: ErrorKind | null;
  errorMessage: string | null;
  /** HTTP status of the final outcome; synthetic for gateway-side refusals */
  statusCode: number;
  /** Served from the response cache */
  cached: boolean;
  elapsedMs: number;
  /** Transport invocations made for this call (0 for cache hits and refusals) */
  attempts: number;
}

export interface CallOptions {
  signal?: AbortSignal;
}

export interface GatewayStatus {
  cacheSize: number;
  cacheMaxSize: number;
  cacheHitCount: number;
  cacheMissCount: number;
  rateLimitBudget: number;
  rateLimitUsed: number;
  breakerState: CircuitState;
  consecutiveFailures: number;
}

/**
 * Resilient read-through access to the catalog service.
 *
 * Each instance owns its own cache, rate window and breaker, so several
 * gateways (one per base URL, say) can coexist without sharing state.
 */
export class Gateway {
  private readonly options: GatewayOptions;
  private readonly cache: ResponseCache;
  private readonly limiter: RateLimiter;
  private readonly breaker: CircuitBreaker;
  private readonly retry: RetryOrchestrator;
  private readonly events = new GatewayEventEmitter();

  constructor(
    private readonly transport: CatalogTransport,
    input: GatewayOptionsInput = {}
  ) {
    this.options = createOptions(input);
    const { clock } = this.options;

    this.cache = new ResponseCache(this.options.cache, clock);
    this.limiter = new RateLimiter(this.options.rateLimit, clock);
    this.retry = new RetryOrchestrator(this.options.retry, clock);
    this.breaker = new CircuitBreaker(this.options.breaker, clock, change => {
      this.emit({
        type: 'breaker_state_changed',
        timestamp: change.at,
        from: change.from,
        to: change.to,
        consecutiveFailures: change.consecutiveFailures
      });
    });

    logger.info('Gateway created', {
      cacheMaxSize: this.options.cache.maxSize,
      rateLimit: `${this.options.rateLimit.budget}/${this.options.rateLimit.windowMs}ms (${this.options.rateLimit.mode})`,
      failureThreshold: this.options.breaker.failureThreshold,
      maxRetries: this.options.retry.maxRetries
    });
  }

  async call(
    endpoint: string,
    params: RequestParams = {},
    cacheStrategy: CacheStrategy = CacheStrategy.SHORT_TERM,
    callOptions: CallOptions = {}
  ): Promise<UpstreamResponse> {
    const { clock } = this.options;
    const { signal } = callOptions;
    const startedAt = clock.now();
    const fingerprint = createFingerprint(endpoint, params);
    const useCache = cacheStrategy !== CacheStrategy.NO_CACHE;

    if (useCache) {
      const entry = this.cache.lookup(fingerprint);
      if (entry) {
        logger.debug('Cache hit', { endpoint, fingerprint, strategy: cacheStrategy });
        this.emit({ type: 'cache_hit', timestamp: clock.now(), endpoint, fingerprint, strategy: cacheStrategy });
        return {
          data: entry.payload,
          success: true,
          errorKind: null,
          errorMessage: null,
          statusCode: 200,
          cached: true,
          elapsedMs: clock.now() - startedAt,
          attempts: 0
        };
      }
      this.emit({ type: 'cache_miss', timestamp: clock.now(), endpoint, fingerprint, strategy: cacheStrategy });
    }

    if (signal?.aborted) {
      return this.fail(endpoint, new CancellationError(), startedAt, 0);
    }

    if (!this.breaker.shouldAttempt()) {
      logger.debug('Circuit open, refusing call', { endpoint });
      return this.fail(endpoint, new CircuitOpenError(), startedAt, 0);
    }
    // shouldAttempt() only leaves the breaker HALF_OPEN for the caller it granted the trial to
    const isTrial = this.breaker.getState() === CircuitState.HALF_OPEN;

    let permit: RatePermit;
    try {
      permit = await this.limiter.acquire(signal);
    } catch (error) {
      this.releaseTrial(isTrial);
      return this.fail(endpoint, classifyError(error), startedAt, 0);
    }
    if (!permit.granted) {
      this.releaseTrial(isTrial);
      this.emit({ type: 'rate_limited', timestamp: clock.now(), endpoint, retryAfterMs: permit.retryAfterMs });
      return this.fail(endpoint, new RateLimitExceededError(permit.retryAfterMs), startedAt, 0);
    }

    const outcome = await this.retry.execute(
      (_attempt, attemptSignal) => this.attempt(endpoint, params, attemptSignal),
      signal
    );

    if (outcome.ok) {
      this.recordVerdict(isTrial, true);
      if (useCache && this.cache.store(fingerprint, outcome.value.data, ttlForStrategy(this.options, cacheStrategy))) {
        this.emit({ type: 'cache_stored', timestamp: clock.now(), endpoint, fingerprint, strategy: cacheStrategy });
      }
      return {
        data: outcome.value.data,
        success: true,
        errorKind: null,
        errorMessage: null,
        statusCode: outcome.value.status,
        cached: false,
        elapsedMs: clock.now() - startedAt,
        attempts: outcome.attempts
      };
    }

    const { error } = outcome;
    if (error.kind === 'cancelled') {
      this.releaseTrial(isTrial);
    } else if (error.kind === 'upstream_client' && !this.options.breaker.countClientErrors) {
      // The service answered; a 4xx says nothing about its health
      this.recordVerdict(isTrial, true);
    } else {
      this.recordVerdict(isTrial, false);
    }
    return this.fail(endpoint, error, startedAt, outcome.attempts);
  }

  /**
   * Snapshot of cache, limiter and breaker state. Expired entries are pruned
   * first, so `cacheSize` counts live entries only.
   */
  getStatus(): GatewayStatus {
    this.cache.pruneExpired();
    const stats = this.cache.getStats();
    return {
      cacheSize: this.cache.size(),
      cacheMaxSize: this.cache.getMaxSize(),
      cacheHitCount: stats.numHits,
      cacheMissCount: stats.numMisses,
      rateLimitBudget: this.limiter.getBudget(),
      rateLimitUsed: this.limiter.getUsed(),
      breakerState: this.breaker.getState(),
      consecutiveFailures: this.breaker.getConsecutiveFailures()
    };
  }

  /**
   * Drop the cached response for one request
   */
  invalidate(endpoint: string, params: RequestParams = {}): boolean {
    return this.cache.delete(createFingerprint(endpoint, params));
  }

  clearCache(): void {
    this.cache.clear();
    logger.info('Cache cleared');
  }

  /**
   * Clear the cache, its statistics, the rate window and the breaker
   */
  reset(): void {
    this.cache.clear();
    this.cache.resetStats();
    this.limiter.reset();
    this.breaker.reset();
    logger.info('Gateway reset');
  }

  subscribe(listener: GatewayEventListener, options?: GatewaySubscriptionOptions): GatewaySubscription {
    return this.events.subscribe(listener, options);
  }

  getOptions(): Readonly<GatewayOptions> {
    return this.options;
  }

  /**
   * One transport attempt with its own timeout. The attempt is aborted when
   * either the timeout fires or the caller's signal aborts.
   */
  private async attempt(endpoint: string, params: RequestParams, signal?: AbortSignal): Promise<TransportResponse> {
    const timeoutMs = this.options.requestTimeoutMs;
    const controller = new AbortController();
    let didTimeout = false;

    const onCallerAbort = () => controller.abort();
    signal?.addEventListener('abort', onCallerAbort, { once: true });
    const timeoutHandle = setTimeout(() => {
      didTimeout = true;
      controller.abort();
    }, timeoutMs);
    const aborted = new Promise<never>((_resolve, reject) => {
      controller.signal.addEventListener('abort', () => reject(new CancellationError('Request aborted')), { once: true });
    });

    try {
      return await Promise.race([this.transport({ endpoint, params }, controller.signal), aborted]);
    } catch (error) {
      if (didTimeout) {
        throw new TransientNetworkError(`Request timed out after ${timeoutMs}ms`, 408);
      }
      throw error;
    } finally {
      clearTimeout(timeoutHandle);
      signal?.removeEventListener('abort', onCallerAbort);
    }
  }

  private recordVerdict(isTrial: boolean, success: boolean): void {
    // A call admitted before the trial started must not decide the trial's outcome
    if (!isTrial && this.breaker.getState() === CircuitState.HALF_OPEN) {
      return;
    }
    if (success) {
      this.breaker.recordSuccess();
    } else {
      this.breaker.recordFailure();
    }
  }

  private releaseTrial(isTrial: boolean): void {
    if (isTrial) {
      this.breaker.releaseTrial();
    }
  }

  private fail(endpoint: string, error: GatewayError, startedAt: number, attempts: number): UpstreamResponse {
    const context = {
      endpoint,
      errorKind: error.kind,
      statusCode: error.statusCode,
      attempts,
      error: error.message
    };
    if (error.kind === 'cancelled' || error.kind === 'circuit_open') {
      logger.debug('Upstream call refused or cancelled', context);
    } else {
      logger.error('Upstream call failed', context);
    }
    this.emit({
      type: 'request_failed',
      timestamp: this.options.clock.now(),
      endpoint,
      errorKind: error.kind,
      statusCode: error.statusCode,
      attempts
    });

    return {
      data: null,
      success: false,
      errorKind: error.kind,
      errorMessage: error.message,
      statusCode: error.statusCode,
      cached: false,
      elapsedMs: this.options.clock.now() - startedAt,
      attempts
    };
  }

  private emit(event: AnyGatewayEvent): void {
    this.events.emit(event);
  }
}
