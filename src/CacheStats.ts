import LibLogger from './logger';

const logger = LibLogger.get('CacheStats');

/**
 * Response cache statistics
 */
export interface CacheStats {
  /** Total number of lookups */
  numRequests: number;
  /** Lookups that found a fresh entry */
  numHits: number;
  /** Lookups that found nothing, or only an expired entry */
  numMisses: number;
  /** Entries removed to respect the size limits */
  numEvictions: number;
  /** Entries dropped because their TTL had elapsed */
  numExpirations: number;
}

const emptyStats = (): CacheStats => ({
  numRequests: 0,
  numHits: 0,
  numMisses: 0,
  numEvictions: 0,
  numExpirations: 0
});

/**
 * Tracks hit/miss/eviction counters for the response cache
 */
export class CacheStatsManager {
  private stats: CacheStats = emptyStats();
  private lastLoggedRequests = 0;
  private readonly LOG_THRESHOLD = 100; // Log every 100 lookups

  incrementHits(): void {
    this.stats.numRequests++;
    this.stats.numHits++;
    this.maybeLogStats();
  }

  incrementMisses(): void {
    this.stats.numRequests++;
    this.stats.numMisses++;
    this.maybeLogStats();
  }

  incrementEvictions(count: number = 1): void {
    this.stats.numEvictions += count;
  }

  incrementExpirations(count: number = 1): void {
    this.stats.numExpirations += count;
  }

  /**
   * Hit rate as a fraction between 0 and 1
   */
  getHitRate(): number {
    return this.stats.numRequests > 0 ? this.stats.numHits / this.stats.numRequests : 0;
  }

  private maybeLogStats(): void {
    const requestsSinceLastLog = this.stats.numRequests - this.lastLoggedRequests;
    if (requestsSinceLastLog < this.LOG_THRESHOLD) {
      return;
    }

    logger.debug('Cache statistics update', {
      component: 'cache',
      subcomponent: 'CacheStatsManager',
      totalRequests: this.stats.numRequests,
      hits: this.stats.numHits,
      misses: this.stats.numMisses,
      evictions: this.stats.numEvictions,
      expirations: this.stats.numExpirations,
      hitRate: `${(this.getHitRate() * 100).toFixed(2)}%`
    });
    this.lastLoggedRequests = this.stats.numRequests;
  }

  /**
   * Get a copy of the current statistics
   */
  getStats(): CacheStats {
    return { ...this.stats };
  }

  reset(): void {
    this.stats = emptyStats();
    this.lastLoggedRequests = 0;
  }
}
