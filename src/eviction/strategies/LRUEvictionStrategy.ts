import { EvictionContext, EvictionStrategy } from '../EvictionStrategy';

/**
 * LRU (Least Recently Used) eviction strategy
 * Removes the entry that was read or written longest ago.
 *
 * Recency is kept in Map insertion order: touching a key moves it to the end,
 * so the first key is always the least recently used.
 */
export class LRUEvictionStrategy extends EvictionStrategy {
  private readonly recency = new Map<string, number>();

  selectForEviction(context: EvictionContext): string[] {
    if (!this.isEvictionNeeded(context)) {
      return [];
    }

    const { currentSize, limits, newItemSize = 0 } = context;
    const keysToEvict: string[] = [];
    let itemCount = currentSize.itemCount;
    let sizeBytes = currentSize.sizeBytes;

    for (const [key, size] of this.recency) {
      const overCount = itemCount >= limits.maxItems;
      const overBytes = limits.maxSizeBytes !== null && sizeBytes + newItemSize > limits.maxSizeBytes;
      if (!overCount && !overBytes) {
        break;
      }
      keysToEvict.push(key);
      itemCount--;
      sizeBytes -= size;
    }

    return keysToEvict;
  }

  onItemAccessed(key: string): void {
    const size = this.recency.get(key);
    if (typeof size === 'undefined') {
      return;
    }
    this.recency.delete(key);
    this.recency.set(key, size);
  }

  onItemAdded(key: string, estimatedSize: number): void {
    this.recency.delete(key);
    this.recency.set(key, estimatedSize);
  }

  onItemRemoved(key: string): void {
    this.recency.delete(key);
  }

  clear(): void {
    this.recency.clear();
  }

  getStrategyName(): string {
    return 'lru';
  }
}
