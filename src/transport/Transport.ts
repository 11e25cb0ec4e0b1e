import type { RequestParams } from '../normalization';

/**
 * A read-only request against one logical catalog endpoint.
 */
export interface TransportRequest {
  /** Path relative to the catalog base URL, e.g. `/products` */
  endpoint: string;
  params: RequestParams;
}

export interface TransportResponse {
  status: number;
  data: unknown;
}

/**
 * Performs a single attempt. Resolves only for 2xx responses; anything else
 * rejects, preferably with one of the GatewayError classes. Must honour the signal.
 */
export type CatalogTransport = (request: TransportRequest, signal: AbortSignal) => Promise<TransportResponse>;
