import { vi } from 'vitest';
import type { TransportRequest, TransportResponse } from '../../src/transport/Transport';

/**
 * In-process stand-in for the catalog service. Answers every request with
 * `handler(request)`, or with an echo of the request when no handler is given.
 */
export const createTransport = (handler?: (request: TransportRequest) => unknown) =>
  vi.fn((request: TransportRequest, _signal: AbortSignal): Promise<TransportResponse> =>
    Promise.resolve({
      status: 200,
      data: handler ? handler(request) : { endpoint: request.endpoint, params: request.params }
    })
  );

export const product = (id: number, name: string, extra: Record<string, unknown> = {}): Record<string, unknown> => ({
  id,
  name,
  ...extra
});
