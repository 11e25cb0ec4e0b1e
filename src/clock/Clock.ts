import { CancellationError } from '../errors';

/**
 * Time source for every TTL, window and cooldown decision.
 * Production code uses {@link SystemClock}; tests drive a fake.
 */
export interface Clock {
  /** Milliseconds since the epoch */
  now(): number;
  /** Resolve after `ms`, or reject with CancellationError when the signal aborts */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export class SystemClock implements Clock {
  now(): number {
    return Date.now();
  }

  sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      return Promise.reject(new CancellationError('Wait cancelled'));
    }
    if (ms <= 0) {
      return Promise.resolve();
    }

    return new Promise((resolve, reject) => {
      const onAbort = () => {
        clearTimeout(timer);
        reject(new CancellationError('Wait cancelled'));
      };
      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      }, ms);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }
}

export const systemClock: Clock = new SystemClock();
