import {
  CancellationError,
  TransientNetworkError,
  UpstreamServerError,
  errorFromStatus
} from '../errors';
import type { RequestParams } from '../normalization';
import type { CatalogTransport, TransportRequest, TransportResponse } from './Transport';
import LibLogger from '../logger';

const logger = LibLogger.get('fetchTransport');

export interface FetchTransportOptions {
  baseUrl: string;
  /** Extra headers sent with every request (API keys and the like) */
  headers?: Record<string, string>;
  /** Value of Accept-Language, e.g. 'ar' or 'en' */
  language?: string;
  /** Defaults to the global fetch */
  fetch?: typeof fetch;
}

const toQueryValue = (value: unknown): string => {
  if (Array.isArray(value)) {
    return value.map(toQueryValue).join(',');
  }
  if (typeof value === 'object' && value !== null) {
    return JSON.stringify(value);
  }
  return String(value);
};

export const buildUrl = (baseUrl: string, endpoint: string, params: RequestParams): string => {
  const base = baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`;
  const url = new URL(endpoint.replace(/^\/+/, ''), base);
  for (const [key, value] of Object.entries(params)) {
    if (value === null || typeof value === 'undefined') {
      continue;
    }
    url.searchParams.set(key, toQueryValue(value));
  }
  return url.toString();
};

const parseBody = (text: string): unknown => {
  if (text.length === 0) {
    return null;
  }
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
};

const isAbortError = (error: unknown): boolean =>
  error instanceof Error && error.name === 'AbortError';

/**
 * fetch-based transport for the catalog service. Issues GET requests and maps
 * non-2xx statuses onto the gateway error taxonomy.
 */
export const createFetchTransport = (options: FetchTransportOptions): CatalogTransport => {
  const fetchImpl = options.fetch ?? fetch;
  const headers: Record<string, string> = {
    'Accept': 'application/json',
    ...(options.language ? { 'Accept-Language': options.language } : {}),
    ...options.headers
  };

  return async (request: TransportRequest, signal: AbortSignal): Promise<TransportResponse> => {
    const url = buildUrl(options.baseUrl, request.endpoint, request.params);

    let response: Response;
    let text: string;
    try {
      response = await fetchImpl(url, { method: 'GET', headers, signal });
      text = await response.text();
    } catch (error) {
      if (signal.aborted || isAbortError(error)) {
        throw new CancellationError('Request aborted');
      }
      throw new TransientNetworkError(error instanceof Error ? error.message : String(error));
    }

    const body = parseBody(text);
    if (!response.ok) {
      logger.debug('Upstream returned an error status', { endpoint: request.endpoint, status: response.status });
      throw errorFromStatus(response.status, body);
    }
    if (typeof body === 'string') {
      throw new UpstreamServerError('Upstream returned a non-JSON body', 502, body);
    }

    return { status: response.status, data: body };
  };
};
