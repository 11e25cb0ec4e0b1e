import { FilterValidationError } from '../errors';
import type { RequestParams } from '../normalization';

/**
 * Every criterion the filter endpoint understands. All fields are optional;
 * page defaults to 1 and pageSize to 10.
 */
export interface ProductFilter {
  search?: string;
  productCode?: string;
  colors?: string[];
  sizes?: string[];
  material?: string;
  skuCode?: string;
  category?: string;
  minPrice?: number;
  maxPrice?: number;
  page?: number;
  pageSize?: number;
}

export const MAX_PAGE_SIZE = 100;
export const DEFAULT_PAGE_SIZE = 10;

const STRING_FIELDS = ['search', 'productCode', 'material', 'skuCode', 'category'] as const;
const LIST_FIELDS = ['colors', 'sizes'] as const;
const NUMBER_FIELDS = ['minPrice', 'maxPrice', 'page', 'pageSize'] as const;

const FILTER_FIELDS = new Set<string>([...STRING_FIELDS, ...LIST_FIELDS, ...NUMBER_FIELDS]);

// Upstream parameter name per field
const PARAM_NAMES: Record<keyof ProductFilter, string> = {
  search: 'search',
  productCode: 'product_code',
  colors: 'colors',
  sizes: 'sizes',
  material: 'material',
  skuCode: 'sku_code',
  category: 'category',
  minPrice: 'min_price',
  maxPrice: 'max_price',
  page: 'page',
  pageSize: 'page_size'
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Check a filter once at the boundary and return it typed.
 * @throws FilterValidationError listing every problem found
 */
export function validateProductFilter(input: unknown): ProductFilter {
  if (!isRecord(input)) {
    throw new FilterValidationError(['filter must be an object']);
  }

  const issues: string[] = [];
  const filter: ProductFilter = {};

  const unknown = Object.keys(input).filter(key => !FILTER_FIELDS.has(key));
  if (unknown.length > 0) {
    issues.push(`unknown fields: ${unknown.join(', ')} (valid fields are: ${Array.from(FILTER_FIELDS).join(', ')})`);
  }

  for (const field of STRING_FIELDS) {
    const value = input[field];
    if (typeof value === 'undefined' || value === null) continue;
    if (typeof value !== 'string' || value.trim() === '') {
      issues.push(`${field} must be a non-empty string`);
      continue;
    }
    filter[field] = value.trim();
  }

  for (const field of LIST_FIELDS) {
    const value = input[field];
    if (typeof value === 'undefined' || value === null) continue;
    if (!Array.isArray(value) || !value.every((entry): entry is string => typeof entry === 'string' && entry.trim() !== '')) {
      issues.push(`${field} must be a list of non-empty strings`);
      continue;
    }
    filter[field] = value.map(entry => entry.trim());
  }

  for (const field of NUMBER_FIELDS) {
    const value = input[field];
    if (typeof value === 'undefined' || value === null) continue;
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      issues.push(`${field} must be a number`);
      continue;
    }
    filter[field] = value;
  }

  if (typeof filter.minPrice !== 'undefined' && filter.minPrice < 0) {
    issues.push(`minPrice must not be negative, got ${filter.minPrice}`);
  }
  if (typeof filter.maxPrice !== 'undefined' && filter.maxPrice < 0) {
    issues.push(`maxPrice must not be negative, got ${filter.maxPrice}`);
  }
  if (typeof filter.minPrice !== 'undefined' && typeof filter.maxPrice !== 'undefined' && filter.minPrice > filter.maxPrice) {
    issues.push(`minPrice (${filter.minPrice}) must not exceed maxPrice (${filter.maxPrice})`);
  }
  if (typeof filter.page !== 'undefined' && (!Number.isInteger(filter.page) || filter.page < 1)) {
    issues.push(`page must be a positive integer, got ${filter.page}`);
  }
  if (typeof filter.pageSize !== 'undefined' &&
    (!Number.isInteger(filter.pageSize) || filter.pageSize < 1 || filter.pageSize > MAX_PAGE_SIZE)) {
    issues.push(`pageSize must be an integer between 1 and ${MAX_PAGE_SIZE}, got ${filter.pageSize}`);
  }

  if (issues.length > 0) {
    throw new FilterValidationError(issues);
  }
  return filter;
}

/**
 * Upstream request parameters for a validated filter
 */
export function productFilterToParams(filter: ProductFilter): RequestParams {
  const params: Record<string, unknown> = {};
  for (const field of [...STRING_FIELDS, ...LIST_FIELDS, ...NUMBER_FIELDS]) {
    const value = filter[field];
    if (typeof value !== 'undefined') {
      params[PARAM_NAMES[field]] = value;
    }
  }
  params.page = filter.page ?? 1;
  params.page_size = filter.pageSize ?? DEFAULT_PAGE_SIZE;
  return params;
}
