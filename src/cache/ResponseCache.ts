import { CacheStats, CacheStatsManager } from '../CacheStats';
import type { Clock } from '../clock/Clock';
import { EvictionStrategy } from '../eviction/EvictionStrategy';
import { LRUEvictionStrategy } from '../eviction/strategies/LRUEvictionStrategy';
import { estimateValueSize, formatBytes, parseSizeString } from '../utils/CacheSize';
import LibLogger from '../logger';

const logger = LibLogger.get('ResponseCache');

/**
 * A cached upstream payload. Entries are frozen and replaced wholesale on refresh.
 */
export interface CacheEntry<V = unknown> {
  readonly fingerprint: string;
  readonly payload: V;
  /** Clock time at which the entry was stored */
  readonly storedAt: number;
  /** Lifetime in milliseconds */
  readonly ttl: number;
}

export interface ResponseCacheConfig {
  maxSize: number;
  /** Optional byte budget such as '5MB' */
  maxSizeBytes?: string;
}

interface StoredEntry<V> {
  entry: CacheEntry<V>;
  sizeBytes: number;
}

export const isEntryFresh = (entry: CacheEntry<unknown>, now: number): boolean =>
  now < entry.storedAt + entry.ttl;

/**
 * Bounded in-memory cache of upstream responses keyed by request fingerprint.
 *
 * Expiry is lazy: an expired entry is removed by the lookup that finds it.
 * Capacity is enforced on store through the eviction strategy (LRU by default).
 */
export class ResponseCache<V = unknown> {
  private readonly entries = new Map<string, StoredEntry<V>>();
  private readonly statsManager = new CacheStatsManager();
  private readonly maxSize: number;
  private readonly maxSizeBytes: number | null;
  private currentSizeBytes = 0;

  constructor(
    config: ResponseCacheConfig,
    private readonly clock: Clock,
    private readonly evictionStrategy: EvictionStrategy = new LRUEvictionStrategy()
  ) {
    if (!Number.isInteger(config.maxSize) || config.maxSize <= 0) {
      throw new Error(`maxSize must be a positive integer, got ${config.maxSize}`);
    }
    this.maxSize = config.maxSize;
    this.maxSizeBytes = typeof config.maxSizeBytes === 'undefined' ? null : parseSizeString(config.maxSizeBytes);

    logger.debug('ResponseCache created', {
      component: 'cache',
      maxSize: this.maxSize,
      maxSizeBytes: this.maxSizeBytes === null ? 'unlimited' : formatBytes(this.maxSizeBytes),
      evictionStrategy: this.evictionStrategy.getStrategyName()
    });
  }

  /**
   * Fresh entry for the fingerprint, or undefined. Marks the entry most recently used.
   */
  lookup(fingerprint: string): CacheEntry<V> | undefined {
    const stored = this.entries.get(fingerprint);
    if (!stored) {
      this.statsManager.incrementMisses();
      return undefined;
    }

    if (!isEntryFresh(stored.entry, this.clock.now())) {
      logger.debug('Expired entry removed on lookup', { fingerprint, storedAt: stored.entry.storedAt, ttl: stored.entry.ttl });
      this.remove(fingerprint, stored);
      this.statsManager.incrementExpirations();
      this.statsManager.incrementMisses();
      return undefined;
    }

    this.evictionStrategy.onItemAccessed(fingerprint);
    this.statsManager.incrementHits();
    return stored.entry;
  }

  /**
   * Store a payload for `ttlMs` milliseconds.
   * @returns false when nothing was stored (ttlMs <= 0, or the payload exceeds the byte budget)
   */
  store(fingerprint: string, payload: V, ttlMs: number): boolean {
    if (ttlMs <= 0) {
      return false;
    }

    const sizeBytes = estimateValueSize(payload);
    if (this.maxSizeBytes !== null && sizeBytes > this.maxSizeBytes) {
      logger.warning('Payload larger than the cache byte budget, not cached', {
        fingerprint,
        size: formatBytes(sizeBytes),
        maxSizeBytes: formatBytes(this.maxSizeBytes)
      });
      return false;
    }

    const existing = this.entries.get(fingerprint);
    if (existing) {
      this.remove(fingerprint, existing);
    }

    const victims = this.evictionStrategy.selectForEviction({
      currentSize: { itemCount: this.entries.size, sizeBytes: this.currentSizeBytes },
      limits: { maxItems: this.maxSize, maxSizeBytes: this.maxSizeBytes },
      newItemSize: sizeBytes
    });
    for (const victim of victims) {
      const stored = this.entries.get(victim);
      if (stored) {
        this.remove(victim, stored);
        this.statsManager.incrementEvictions();
      }
    }
    if (victims.length > 0) {
      logger.debug('Evicted entries to make room', { evicted: victims.length, strategy: this.evictionStrategy.getStrategyName() });
    }

    const entry: CacheEntry<V> = Object.freeze({
      fingerprint,
      payload,
      storedAt: this.clock.now(),
      ttl: ttlMs
    });
    this.entries.set(fingerprint, { entry, sizeBytes });
    this.currentSizeBytes += sizeBytes;
    this.evictionStrategy.onItemAdded(fingerprint, sizeBytes);
    return true;
  }

  /**
   * Whether a fresh entry exists. Does not touch recency or statistics.
   */
  has(fingerprint: string): boolean {
    const stored = this.entries.get(fingerprint);
    return typeof stored !== 'undefined' && isEntryFresh(stored.entry, this.clock.now());
  }

  delete(fingerprint: string): boolean {
    const stored = this.entries.get(fingerprint);
    if (!stored) {
      return false;
    }
    this.remove(fingerprint, stored);
    return true;
  }

  /**
   * Drop every expired entry
   * @returns the number of entries removed
   */
  pruneExpired(): number {
    const now = this.clock.now();
    let removed = 0;
    for (const [fingerprint, stored] of Array.from(this.entries.entries())) {
      if (!isEntryFresh(stored.entry, now)) {
        this.remove(fingerprint, stored);
        removed++;
      }
    }
    if (removed > 0) {
      this.statsManager.incrementExpirations(removed);
      logger.debug('Pruned expired entries', { removed });
    }
    return removed;
  }

  clear(): void {
    this.entries.clear();
    this.evictionStrategy.clear();
    this.currentSizeBytes = 0;
  }

  /** Number of stored entries, expired ones included until they are touched */
  size(): number {
    return this.entries.size;
  }

  getMaxSize(): number {
    return this.maxSize;
  }

  getSizeBytes(): number {
    return this.currentSizeBytes;
  }

  getStats(): CacheStats {
    return this.statsManager.getStats();
  }

  resetStats(): void {
    this.statsManager.reset();
  }

  private remove(fingerprint: string, stored: StoredEntry<V>): void {
    this.entries.delete(fingerprint);
    this.currentSizeBytes -= stored.sizeBytes;
    this.evictionStrategy.onItemRemoved(fingerprint);
  }
}
