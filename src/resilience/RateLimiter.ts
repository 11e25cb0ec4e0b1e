import type { Clock } from '../clock/Clock';
import { CancellationError } from '../errors';
import type { RateLimitConfig } from '../Options';
import LibLogger from '../logger';

const logger = LibLogger.get('RateLimiter');

export type RatePermit =
  | { granted: true; waitedMs: number }
  | { granted: false; retryAfterMs: number };

/**
 * Sliding-window limiter: at most `budget` permits in any trailing `windowMs`.
 *
 * The window is a log of grant timestamps, oldest first. Every acquire purges
 * timestamps that have aged out before counting, so no background sweep exists.
 */
export class RateLimiter {
  private timestamps: number[] = [];

  constructor(
    private readonly config: RateLimitConfig,
    private readonly clock: Clock
  ) {
    if (config.budget <= 0) {
      throw new Error('budget must be > 0');
    }
  }

  /**
   * Obtain a permit. In `queue` mode this suspends until the oldest call leaves
   * the window, bounded by `maxWaitMs`.
   * @throws CancellationError when the signal aborts while waiting
   */
  async acquire(signal?: AbortSignal): Promise<RatePermit> {
    const startedAt = this.clock.now();

    for (;;) {
      if (signal?.aborted) {
        throw new CancellationError('Rate limit wait cancelled');
      }

      const now = this.clock.now();
      this.purge(now);

      if (this.timestamps.length < this.config.budget) {
        this.timestamps.push(now);
        return { granted: true, waitedMs: now - startedAt };
      }

      const retryAfterMs = Math.max(this.timestamps[0] + this.config.windowMs - now, 1);
      const waitedSoFar = now - startedAt;
      if (this.config.mode === 'reject' || waitedSoFar + retryAfterMs > this.config.maxWaitMs) {
        logger.warning('Rate limit budget exhausted', {
          mode: this.config.mode,
          budget: this.config.budget,
          windowMs: this.config.windowMs,
          retryAfterMs
        });
        return { granted: false, retryAfterMs };
      }

      logger.debug('Waiting for rate limit capacity', { retryAfterMs, waitedSoFar });
      await this.clock.sleep(retryAfterMs, signal);
    }
  }

  /** Permits granted within the current window */
  getUsed(): number {
    this.purge(this.clock.now());
    return this.timestamps.length;
  }

  getBudget(): number {
    return this.config.budget;
  }

  reset(): void {
    this.timestamps = [];
  }

  private purge(now: number): void {
    const cutoff = now - this.config.windowMs;
    let stale = 0;
    while (stale < this.timestamps.length && this.timestamps[stale] <= cutoff) {
      stale++;
    }
    if (stale > 0) {
      this.timestamps.splice(0, stale);
    }
  }
}
