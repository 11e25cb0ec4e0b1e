import { beforeEach, describe, expect, it } from 'vitest';
import { CancellationError } from '../../src/errors';
import type { RateLimitConfig } from '../../src/Options';
import { RateLimiter } from '../../src/resilience/RateLimiter';
import { FakeClock } from '../helpers/FakeClock';

describe('RateLimiter', () => {
  let clock: FakeClock;

  const limiter = (config: Partial<RateLimitConfig> = {}) =>
    new RateLimiter({ budget: 2, windowMs: 1000, mode: 'reject', maxWaitMs: 1000, ...config }, clock);

  beforeEach(() => {
    clock = new FakeClock();
  });

  it('should refuse a zero budget', () => {
    expect(() => limiter({ budget: 0 })).toThrow('budget must be > 0');
  });

  describe('reject mode', () => {
    it('should grant up to the budget and then refuse', async () => {
      const rateLimiter = limiter();

      expect(await rateLimiter.acquire()).toEqual({ granted: true, waitedMs: 0 });
      expect(await rateLimiter.acquire()).toEqual({ granted: true, waitedMs: 0 });
      expect(await rateLimiter.acquire()).toEqual({ granted: false, retryAfterMs: 1000 });
      expect(rateLimiter.getUsed()).toBe(2);
    });

    it('should report how long until the oldest call leaves the window', async () => {
      const rateLimiter = limiter();
      await rateLimiter.acquire();
      await rateLimiter.acquire();

      clock.advance(400);
      expect(await rateLimiter.acquire()).toEqual({ granted: false, retryAfterMs: 600 });

      clock.advance(600);
      expect(await rateLimiter.acquire()).toEqual({ granted: true, waitedMs: 0 });
    });

    it('should slide the window instead of resetting it', async () => {
      const rateLimiter = limiter();
      await rateLimiter.acquire();
      clock.advance(500);
      await rateLimiter.acquire();

      clock.advance(500);
      expect(rateLimiter.getUsed()).toBe(1);
      expect((await rateLimiter.acquire()).granted).toBe(true);
      expect(await rateLimiter.acquire()).toEqual({ granted: false, retryAfterMs: 500 });
    });

    it('should refuse the 61st call of a 60 per minute budget', async () => {
      const rateLimiter = limiter({ budget: 60, windowMs: 60000, maxWaitMs: 60000 });
      for (let i = 0; i < 60; i++) {
        expect((await rateLimiter.acquire()).granted).toBe(true);
      }

      expect(await rateLimiter.acquire()).toEqual({ granted: false, retryAfterMs: 60000 });
    });
  });

  describe('queue mode', () => {
    it('should wait for capacity and then grant', async () => {
      const rateLimiter = limiter({ mode: 'queue' });
      await rateLimiter.acquire();
      await rateLimiter.acquire();

      expect(await rateLimiter.acquire()).toEqual({ granted: true, waitedMs: 1000 });
      expect(clock.sleeps).toEqual([1000]);
    });

    it('should delay the 61st call of a 60 per minute budget by a full window', async () => {
      const rateLimiter = limiter({ mode: 'queue', budget: 60, windowMs: 60000, maxWaitMs: 60000 });
      for (let i = 0; i < 60; i++) {
        await rateLimiter.acquire();
      }

      expect(await rateLimiter.acquire()).toEqual({ granted: true, waitedMs: 60000 });
      expect(clock.sleeps).toEqual([60000]);
    });

    it('should refuse when the wait would exceed maxWaitMs', async () => {
      const rateLimiter = limiter({ mode: 'queue', maxWaitMs: 500 });
      await rateLimiter.acquire();
      await rateLimiter.acquire();

      expect(await rateLimiter.acquire()).toEqual({ granted: false, retryAfterMs: 1000 });
      expect(clock.sleeps).toEqual([]);
    });

    it('should serve concurrent callers within the budget', async () => {
      const rateLimiter = limiter({ mode: 'queue' });

      const permits = await Promise.all([rateLimiter.acquire(), rateLimiter.acquire(), rateLimiter.acquire()]);

      expect(permits.every(permit => permit.granted)).toBe(true);
      expect(clock.sleeps).toEqual([1000]);
    });

    it('should stop waiting when cancelled', async () => {
      const rateLimiter = limiter({ mode: 'queue' });
      const controller = new AbortController();
      controller.abort();

      await expect(rateLimiter.acquire(controller.signal)).rejects.toThrow(CancellationError);
      await expect(rateLimiter.acquire(controller.signal)).rejects.toThrow('Rate limit wait cancelled');
    });
  });

  it('should forget all calls on reset', async () => {
    const rateLimiter = limiter();
    await rateLimiter.acquire();
    await rateLimiter.acquire();
    rateLimiter.reset();

    expect(rateLimiter.getUsed()).toBe(0);
    expect(rateLimiter.getBudget()).toBe(2);
  });
});
