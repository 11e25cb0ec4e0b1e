import { describe, expect, it, vi } from 'vitest';
import {
  CancellationError,
  TransientNetworkError,
  UpstreamClientError,
  UpstreamServerError
} from '../../src/errors';
import { buildUrl, createFetchTransport } from '../../src/transport/fetchTransport';

type FetchInput = Parameters<typeof fetch>[0];
type FetchInit = Parameters<typeof fetch>[1];

const fakeFetch = (body: string, status: number = 200) =>
  vi.fn((_input: FetchInput, _init?: FetchInit) => Promise.resolve(new Response(body, { status })));

describe('fetchTransport', () => {
  describe('buildUrl', () => {
    it('should join base URL, endpoint and query parameters', () => {
      expect(buildUrl('https://catalog.example.test/api/v1', '/filter-products', {
        search: 'red dress',
        colors: ['red', 'blue'],
        page: 1,
        category: null
      })).toBe('https://catalog.example.test/api/v1/filter-products?search=red+dress&colors=red%2Cblue&page=1');
    });

    it('should accept a base URL with a trailing slash', () => {
      expect(buildUrl('https://catalog.example.test/api/', 'products', {})).toBe('https://catalog.example.test/api/products');
    });

    it('should serialize nested objects as JSON', () => {
      expect(buildUrl('https://catalog.example.test', '/products', { sort: { by: 'price' } })).toBe(
        'https://catalog.example.test/products?sort=%7B%22by%22%3A%22price%22%7D'
      );
    });
  });

  describe('createFetchTransport', () => {
    it('should GET the endpoint and parse the JSON body', async () => {
      const fetchImpl = fakeFetch(JSON.stringify({ products: [] }));
      const transport = createFetchTransport({
        baseUrl: 'https://catalog.example.test',
        language: 'ar',
        headers: { 'X-Api-Key': 'test-secret' },
        fetch: fetchImpl
      });
      const controller = new AbortController();

      const response = await transport({ endpoint: '/products', params: { page: 2 } }, controller.signal);

      expect(response).toEqual({ status: 200, data: { products: [] } });
      expect(fetchImpl).toHaveBeenCalledWith('https://catalog.example.test/products?page=2', {
        method: 'GET',
        headers: {
          'Accept': 'application/json',
          'Accept-Language': 'ar',
          'X-Api-Key': 'test-secret'
        },
        signal: controller.signal
      });
    });

    it('should return null data for an empty body', async () => {
      const transport = createFetchTransport({ baseUrl: 'https://catalog.example.test', fetch: fakeFetch('') });

      const response = await transport({ endpoint: '/products', params: {} }, new AbortController().signal);

      expect(response).toEqual({ status: 200, data: null });
    });

    it('should raise client errors with the parsed body', async () => {
      const transport = createFetchTransport({
        baseUrl: 'https://catalog.example.test',
        fetch: fakeFetch(JSON.stringify({ message: 'not found' }), 404)
      });

      const pending = transport({ endpoint: '/product-details/9', params: {} }, new AbortController().signal);

      await expect(pending).rejects.toBeInstanceOf(UpstreamClientError);
      await expect(pending).rejects.toMatchObject({ statusCode: 404, body: { message: 'not found' } });
    });

    it('should raise server errors', async () => {
      const transport = createFetchTransport({
        baseUrl: 'https://catalog.example.test',
        fetch: fakeFetch('Service Unavailable', 503)
      });

      await expect(transport({ endpoint: '/products', params: {} }, new AbortController().signal)).rejects.toMatchObject({
        kind: 'upstream_server',
        statusCode: 503,
        body: 'Service Unavailable'
      });
    });

    it('should refuse a successful response that is not JSON', async () => {
      const transport = createFetchTransport({ baseUrl: 'https://catalog.example.test', fetch: fakeFetch('<html></html>') });

      const pending = transport({ endpoint: '/products', params: {} }, new AbortController().signal);

      await expect(pending).rejects.toBeInstanceOf(UpstreamServerError);
      await expect(pending).rejects.toMatchObject({ statusCode: 502, message: 'Upstream returned a non-JSON body' });
    });

    it('should map network failures to transient errors', async () => {
      const fetchImpl = vi.fn((_input: FetchInput, _init?: FetchInit) => Promise.reject(new TypeError('fetch failed')));
      const transport = createFetchTransport({ baseUrl: 'https://catalog.example.test', fetch: fetchImpl });

      const pending = transport({ endpoint: '/products', params: {} }, new AbortController().signal);

      await expect(pending).rejects.toBeInstanceOf(TransientNetworkError);
      await expect(pending).rejects.toThrow('fetch failed');
    });

    it('should map aborts to cancellation', async () => {
      const controller = new AbortController();
      const fetchImpl = vi.fn((_input: FetchInput, _init?: FetchInit) => {
        controller.abort();
        const error = new Error('This operation was aborted');
        error.name = 'AbortError';
        return Promise.reject(error);
      });
      const transport = createFetchTransport({ baseUrl: 'https://catalog.example.test', fetch: fetchImpl });

      await expect(transport({ endpoint: '/products', params: {} }, controller.signal)).rejects.toBeInstanceOf(CancellationError);
    });
  });
});
