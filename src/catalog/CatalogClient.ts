import type { CallOptions, Gateway, UpstreamResponse } from '../Gateway';
import { CacheStrategy } from '../Options';
import { CatalogItem, extractCatalogItem, extractCatalogItems } from './CatalogItem';
import {
  DEFAULT_PAGE_SIZE,
  MAX_PAGE_SIZE,
  ProductFilter,
  productFilterToParams,
  validateProductFilter
} from './ProductFilter';
import LibLogger from '../logger';

const logger = LibLogger.get('CatalogClient');

/**
 * Logical endpoints of the catalog service
 */
export const CatalogEndpoints = {
  LIST: '/products',
  SEARCH: '/filter-products',
  CATEGORY: '/filter-products',
  detail: (id: string | number): string => `/product-details/${encodeURIComponent(String(id))}`,
  detailFallback: (id: string | number): string => `/product/${encodeURIComponent(String(id))}`
} as const;

export interface CatalogPage {
  items: CatalogItem[];
  /** Items matching before pagination, where known */
  total: number;
  response: UpstreamResponse;
}

export interface CatalogItemResult {
  item: CatalogItem | null;
  response: UpstreamResponse;
}

/**
 * Typed operations over the catalog endpoints. Every call goes through the
 * Gateway and therefore never throws on upstream failure; only an invalid
 * filter throws, before anything is sent.
 */
export class CatalogClient {
  constructor(private readonly gateway: Gateway) {}

  async listProducts(page: number = 1, pageSize: number = DEFAULT_PAGE_SIZE, options: CallOptions = {}): Promise<CatalogPage> {
    const filter = validateProductFilter({ page, pageSize });
    const response = await this.gateway.call(
      CatalogEndpoints.LIST,
      { page: filter.page, page_size: filter.pageSize },
      CacheStrategy.MEDIUM_TERM,
      options
    );
    return toPage(response);
  }

  /**
   * Product details, trying the legacy `/product/{id}` route when the
   * details route answers with an error status.
   */
  async getProductDetails(id: string | number, options: CallOptions = {}): Promise<CatalogItemResult> {
    const response = await this.gateway.call(CatalogEndpoints.detail(id), {}, CacheStrategy.LONG_TERM, options);
    if (response.success) {
      return { item: extractCatalogItem(response.data), response };
    }
    if (response.errorKind !== 'upstream_client' && response.errorKind !== 'upstream_server') {
      return { item: null, response };
    }

    logger.debug('Details endpoint failed, trying fallback endpoint', { id, statusCode: response.statusCode });
    const fallback = await this.gateway.call(CatalogEndpoints.detailFallback(id), {}, CacheStrategy.LONG_TERM, options);
    return { item: fallback.success ? extractCatalogItem(fallback.data) : null, response: fallback };
  }

  searchProductsByText(text: string, page: number = 1, pageSize: number = DEFAULT_PAGE_SIZE, options: CallOptions = {}): Promise<CatalogPage> {
    return this.filterProducts({ search: text, page, pageSize }, CacheStrategy.SHORT_TERM, options);
  }

  getProductsByCategory(category: string, page: number = 1, pageSize: number = DEFAULT_PAGE_SIZE, options: CallOptions = {}): Promise<CatalogPage> {
    return this.filterProducts({ category, page, pageSize }, CacheStrategy.MEDIUM_TERM, options);
  }

  getProductsByColor(colors: string[], page: number = 1, pageSize: number = DEFAULT_PAGE_SIZE, options: CallOptions = {}): Promise<CatalogPage> {
    return this.filterProducts({ colors, page, pageSize }, CacheStrategy.MEDIUM_TERM, options);
  }

  /**
   * @throws FilterValidationError when the filter is invalid
   */
  async filterProducts(
    filter: ProductFilter,
    cacheStrategy: CacheStrategy = CacheStrategy.MEDIUM_TERM,
    options: CallOptions = {}
  ): Promise<CatalogPage> {
    const validated = validateProductFilter(filter);
    const response = await this.gateway.call(
      CatalogEndpoints.SEARCH,
      productFilterToParams(validated),
      cacheStrategy,
      options
    );
    return toPage(response);
  }

  /**
   * Products priced within [minPrice, maxPrice]. The upstream price filter is
   * unreliable, so a larger page is fetched and filtered locally.
   */
  async getProductsByPriceRange(
    minPrice: number,
    maxPrice: number,
    page: number = 1,
    pageSize: number = DEFAULT_PAGE_SIZE,
    options: CallOptions = {}
  ): Promise<CatalogPage> {
    validateProductFilter({ minPrice, maxPrice, page, pageSize });

    const fetched = await this.filterProducts(
      { pageSize: Math.min(pageSize * 3, MAX_PAGE_SIZE) },
      CacheStrategy.MEDIUM_TERM,
      options
    );
    if (!fetched.response.success) {
      return fetched;
    }

    const inRange = fetched.items.filter(item =>
      typeof item.price !== 'undefined' && item.price >= minPrice && item.price <= maxPrice
    );
    const start = (page - 1) * pageSize;
    return {
      items: inRange.slice(start, start + pageSize),
      total: inRange.length,
      response: fetched.response
    };
  }
}

const toPage = (response: UpstreamResponse): CatalogPage => {
  const items = response.success ? extractCatalogItems(response.data) : [];
  return { items, total: items.length, response };
};
