import type { Clock } from '../../src/clock/Clock';
import { CancellationError } from '../../src/errors';

/**
 * Manually driven clock. `sleep` advances time and resolves right away, so
 * backoff and rate-limit waits cost nothing in tests.
 */
export class FakeClock implements Clock {
  public readonly sleeps: number[] = [];
  private current: number;

  constructor(start: number = 1700000000000) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  advance(ms: number): void {
    this.current += ms;
  }

  sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      return Promise.reject(new CancellationError('Wait cancelled'));
    }
    this.sleeps.push(ms);
    this.current += Math.max(ms, 0);
    return Promise.resolve();
  }
}

export class Deferred<T> {
  readonly promise: Promise<T>;
  resolve: (value: T) => void = () => undefined;
  reject: (reason: unknown) => void = () => undefined;

  constructor() {
    this.promise = new Promise<T>((resolve, reject) => {
      this.resolve = resolve;
      this.reject = reject;
    });
  }
}
