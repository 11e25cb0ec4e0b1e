// Normalization utilities for cache keys
import { createHash } from 'node:crypto';

/**
 * Request parameters as accepted by the gateway. Nested values are allowed;
 * null and undefined entries are treated as absent.
 */
export type RequestParams = Readonly<Record<string, unknown>>;

// Drop null/undefined entries so that `{ a: 1 }` and `{ a: 1, b: undefined }` share a key
const compact = (value: unknown): unknown => {
  if (Array.isArray(value)) {
    return value.map(compact);
  }
  if (typeof value === 'object' && value !== null) {
    const result: Record<string, unknown> = {};
    for (const [key, child] of Object.entries(value)) {
      if (child !== null && typeof child !== 'undefined') {
        result[key] = compact(child);
      }
    }
    return result;
  }
  return value;
};

/**
 * JSON string with object keys sorted at every level. Array order is kept.
 */
export const deterministicStringify = (value: unknown): string => {
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value) ?? 'null';
  }

  if (Array.isArray(value)) {
    return '[' + value.map(deterministicStringify).join(',') + ']';
  }

  const keyValuePairs = Object.entries(value)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([key, child]) => JSON.stringify(key) + ':' + deterministicStringify(child));

  return '{' + keyValuePairs.join(',') + '}';
};

/**
 * Canonical form of an endpoint plus its parameters, before hashing.
 */
export const canonicalRequest = (endpoint: string, params: RequestParams = {}): string =>
  `${endpoint}:${deterministicStringify(compact(params))}`;

/**
 * Stable cache key for an upstream request. Parameter order does not matter;
 * different endpoints or parameter values never collide.
 */
export const createFingerprint = (endpoint: string, params: RequestParams = {}): string =>
  createHash('sha256').update(canonicalRequest(endpoint, params)).digest('hex');
