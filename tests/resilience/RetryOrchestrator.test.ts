import { beforeEach, describe, expect, it, vi } from 'vitest';
import { UpstreamClientError, UpstreamServerError } from '../../src/errors';
import type { RetryConfig } from '../../src/Options';
import { RetryOrchestrator } from '../../src/resilience/RetryOrchestrator';
import { FakeClock } from '../helpers/FakeClock';

describe('RetryOrchestrator', () => {
  let clock: FakeClock;

  const orchestrator = (config: Partial<RetryConfig> = {}) =>
    new RetryOrchestrator({ maxRetries: 3, baseDelayMs: 1000, maxDelayMs: 8000, ...config }, clock);

  const operation = () => vi.fn((_attempt: number, _signal?: AbortSignal) => Promise.resolve('ok'));

  beforeEach(() => {
    clock = new FakeClock();
  });

  it('should return the first successful value', async () => {
    const op = operation();

    expect(await orchestrator().execute(op)).toEqual({ ok: true, value: 'ok', attempts: 1 });
    expect(clock.sleeps).toEqual([]);
  });

  it('should retry retryable failures with exponential backoff', async () => {
    const op = operation()
      .mockRejectedValueOnce(new UpstreamServerError('Upstream responded with 503', 503))
      .mockRejectedValueOnce(new UpstreamServerError('Upstream responded with 503', 503));

    const outcome = await orchestrator().execute(op);

    expect(outcome).toEqual({ ok: true, value: 'ok', attempts: 3 });
    expect(op).toHaveBeenCalledTimes(3);
    expect(op.mock.calls.map(call => call[0])).toEqual([1, 2, 3]);
    expect(clock.sleeps).toEqual([1000, 2000]);
  });

  it('should give up after maxRetries retries', async () => {
    const op = operation().mockRejectedValue(new UpstreamServerError('Upstream responded with 500', 500));

    const outcome = await orchestrator().execute(op);

    expect(outcome.ok).toBe(false);
    expect(outcome.attempts).toBe(4);
    if (!outcome.ok) {
      expect(outcome.error.kind).toBe('upstream_server');
      expect(outcome.error.statusCode).toBe(500);
    }
    expect(clock.sleeps).toEqual([1000, 2000, 4000]);
  });

  it('should not retry client errors', async () => {
    const op = operation().mockRejectedValue(new UpstreamClientError('Upstream responded with 404', 404));

    const outcome = await orchestrator().execute(op);

    expect(outcome.attempts).toBe(1);
    expect(outcome.ok ? null : outcome.error.kind).toBe('upstream_client');
    expect(clock.sleeps).toEqual([]);
  });

  it('should treat unknown errors as transient network failures', async () => {
    const op = operation().mockRejectedValueOnce(new Error('socket hang up'));

    expect(await orchestrator().execute(op)).toEqual({ ok: true, value: 'ok', attempts: 2 });
  });

  it('should not retry when maxRetries is 0', async () => {
    const op = operation().mockRejectedValue(new UpstreamServerError('Upstream responded with 502', 502));

    const outcome = await orchestrator({ maxRetries: 0 }).execute(op);

    expect(outcome.attempts).toBe(1);
    expect(outcome.ok).toBe(false);
  });

  it('should cap the backoff delay', () => {
    const retry = orchestrator({ baseDelayMs: 1000, maxDelayMs: 3000 });

    expect([1, 2, 3, 4].map(n => retry.getRetryDelay(n))).toEqual([1000, 2000, 3000, 3000]);
  });

  it('should not start when already cancelled', async () => {
    const controller = new AbortController();
    controller.abort();
    const op = operation();

    const outcome = await orchestrator().execute(op, controller.signal);

    expect(outcome.attempts).toBe(0);
    expect(outcome.ok ? null : outcome.error.kind).toBe('cancelled');
    expect(op).not.toHaveBeenCalled();
  });

  it('should report cancellation instead of the attempt error', async () => {
    const controller = new AbortController();
    const op = operation().mockImplementation(() => {
      controller.abort();
      return Promise.reject(new UpstreamServerError('Upstream responded with 503', 503));
    });

    const outcome = await orchestrator().execute(op, controller.signal);

    expect(outcome.attempts).toBe(1);
    expect(outcome.ok ? null : outcome.error.statusCode).toBe(499);
    expect(clock.sleeps).toEqual([]);
  });

  it('should pass the caller signal to every attempt', async () => {
    const controller = new AbortController();
    const op = operation();

    await orchestrator().execute(op, controller.signal);

    expect(op).toHaveBeenCalledWith(1, controller.signal);
  });
});
