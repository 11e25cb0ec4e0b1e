import type { Clock } from '../clock/Clock';
import type { BreakerConfig } from '../Options';
import LibLogger from '../logger';

const logger = LibLogger.get('CircuitBreaker');

export const CircuitState = {
  CLOSED: 'CLOSED',
  OPEN: 'OPEN',
  HALF_OPEN: 'HALF_OPEN'
} as const;

export type CircuitState = typeof CircuitState[keyof typeof CircuitState];

export interface CircuitStateChange {
  from: CircuitState;
  to: CircuitState;
  consecutiveFailures: number;
  at: number;
}

export type CircuitStateListener = (change: CircuitStateChange) => void;

/**
 * Consecutive-failure circuit breaker.
 *
 * Every method runs to completion without awaiting, so each check-and-apply is
 * atomic with respect to other callers on the event loop.
 */
export class CircuitBreaker {
  private state: CircuitState = CircuitState.CLOSED;
  private consecutiveFailures = 0;
  private openedAt = 0;
  private trialInFlight = false;

  constructor(
    private readonly config: Pick<BreakerConfig, 'failureThreshold' | 'cooldownMs'>,
    private readonly clock: Clock,
    private readonly onStateChange?: CircuitStateListener
  ) {}

  /**
   * Whether a call may go upstream now.
   *
   * After the cooldown the first caller moves the breaker to HALF_OPEN and is
   * granted the single trial; everyone else is refused until it resolves.
   */
  shouldAttempt(): boolean {
    switch (this.state) {
      case CircuitState.CLOSED:
        return true;
      case CircuitState.OPEN:
        if (this.clock.now() < this.openedAt + this.config.cooldownMs) {
          return false;
        }
        this.transition(CircuitState.HALF_OPEN);
        this.trialInFlight = true;
        return true;
      case CircuitState.HALF_OPEN:
        if (this.trialInFlight) {
          return false;
        }
        this.trialInFlight = true;
        return true;
    }
  }

  recordSuccess(): void {
    this.consecutiveFailures = 0;
    if (this.state === CircuitState.HALF_OPEN) {
      this.trialInFlight = false;
      this.transition(CircuitState.CLOSED);
    }
  }

  recordFailure(): void {
    this.consecutiveFailures++;

    if (this.state === CircuitState.HALF_OPEN) {
      this.trialInFlight = false;
      this.open();
      return;
    }

    if (this.state === CircuitState.CLOSED && this.consecutiveFailures >= this.config.failureThreshold) {
      this.open();
    }
  }

  /**
   * Give up the trial slot without a verdict, e.g. when the trial was cancelled
   * or refused by the rate limiter. The breaker stays HALF_OPEN.
   */
  releaseTrial(): void {
    this.trialInFlight = false;
  }

  getState(): CircuitState {
    return this.state;
  }

  getConsecutiveFailures(): number {
    return this.consecutiveFailures;
  }

  reset(): void {
    this.consecutiveFailures = 0;
    this.trialInFlight = false;
    this.openedAt = 0;
    if (this.state !== CircuitState.CLOSED) {
      this.transition(CircuitState.CLOSED);
    }
  }

  private open(): void {
    this.openedAt = this.clock.now();
    this.transition(CircuitState.OPEN);
    logger.warning('Circuit breaker opened', {
      consecutiveFailures: this.consecutiveFailures,
      failureThreshold: this.config.failureThreshold,
      cooldownMs: this.config.cooldownMs
    });
  }

  private transition(to: CircuitState): void {
    const from = this.state;
    this.state = to;
    logger.info('Circuit breaker state change', { from, to, consecutiveFailures: this.consecutiveFailures });
    this.onStateChange?.({ from, to, consecutiveFailures: this.consecutiveFailures, at: this.clock.now() });
  }
}
