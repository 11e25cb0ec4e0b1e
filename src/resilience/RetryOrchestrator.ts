import type { Clock } from '../clock/Clock';
import { CancellationError, classifyError, GatewayError } from '../errors';
import type { RetryConfig } from '../Options';
import LibLogger from '../logger';

const logger = LibLogger.get('RetryOrchestrator');

export type RetryOutcome<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: GatewayError; attempts: number };

/**
 * One attempt of a logical call. `attempt` starts at 1.
 */
export type RetryableOperation<T> = (attempt: number, signal?: AbortSignal) => Promise<T>;

/**
 * Runs a logical call with exponential backoff between retryable failures.
 * Never throws: the outcome carries either the value or the last classified error.
 */
export class RetryOrchestrator {
  constructor(
    private readonly config: RetryConfig,
    private readonly clock: Clock
  ) {}

  async execute<T>(operation: RetryableOperation<T>, signal?: AbortSignal): Promise<RetryOutcome<T>> {
    let attempts = 0;

    for (;;) {
      if (signal?.aborted) {
        return { ok: false, error: new CancellationError(), attempts };
      }

      attempts++;
      try {
        const value = await operation(attempts, signal);
        return { ok: true, value, attempts };
      } catch (caught) {
        const error = signal?.aborted ? new CancellationError() : classifyError(caught);

        if (!error.retryable || attempts > this.config.maxRetries) {
          logger.debug('Giving up', {
            attempts,
            errorKind: error.kind,
            statusCode: error.statusCode,
            reason: error.retryable ? 'retries exhausted' : 'terminal error'
          });
          return { ok: false, error, attempts };
        }

        const delay = this.getRetryDelay(attempts);
        logger.debug('Retrying after failure', {
          attempt: attempts,
          nextAttempt: attempts + 1,
          delayMs: delay,
          errorKind: error.kind,
          error: error.message
        });

        try {
          await this.clock.sleep(delay, signal);
        } catch (waitError) {
          return { ok: false, error: classifyError(waitError), attempts };
        }
      }
    }
  }

  /**
   * Delay before retry number `retry` (1-based): base * 2^(retry-1), capped.
   */
  getRetryDelay(retry: number): number {
    return Math.min(this.config.baseDelayMs * Math.pow(2, retry - 1), this.config.maxDelayMs);
  }
}
