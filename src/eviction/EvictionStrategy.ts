/**
 * Current occupancy and limits of a cache, handed to a strategy when it has
 * to pick victims.
 */
export interface EvictionContext {
  currentSize: {
    itemCount: number;
    sizeBytes: number;
  };
  limits: {
    maxItems: number;
    /** null means no byte budget */
    maxSizeBytes: number | null;
  };
  /** Size of the entry about to be inserted */
  newItemSize?: number;
}

/**
 * Abstract base class for cache eviction strategies.
 * A strategy only tracks keys; storage stays with the cache that owns it.
 */
export abstract class EvictionStrategy {
  /**
   * Select which keys should be evicted to make room for a new entry
   * @returns keys to evict, oldest candidate first (empty if nothing has to go)
   */
  abstract selectForEviction(context: EvictionContext): string[];

  abstract onItemAccessed(key: string): void;

  abstract onItemAdded(key: string, estimatedSize: number): void;

  abstract onItemRemoved(key: string): void;

  /** Forget every tracked key */
  abstract clear(): void;

  abstract getStrategyName(): string;

  /**
   * Determine if eviction is needed based on current context
   */
  protected isEvictionNeeded(context: EvictionContext): boolean {
    const { currentSize, limits, newItemSize = 0 } = context;

    if (currentSize.itemCount >= limits.maxItems) {
      return true;
    }

    return limits.maxSizeBytes !== null &&
      (currentSize.sizeBytes + newItemSize) > limits.maxSizeBytes;
  }
}
