/**
 * Catalog product as far as ranking and filtering need it. Everything else the
 * upstream record carries stays in `raw`.
 */
export interface CatalogItem {
  id: string;
  name: string;
  price?: number;
  /** 0 to 5 */
  rating?: number;
  ratingCount?: number;
  stock?: number;
  category?: string;
  tags?: string[];
  colors?: string[];
  sizes?: string[];
  description?: string;
  isBestSeller?: boolean;
  raw: Readonly<Record<string, unknown>>;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const readNumber = (value: unknown): number | undefined => {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
};

const readString = (value: unknown): string | undefined =>
  typeof value === 'string' && value.trim() !== '' ? value : undefined;

// Lists arrive either as arrays of strings/{ name } objects or as comma-separated strings
const readStringList = (value: unknown): string[] | undefined => {
  if (typeof value === 'string') {
    const parts = value.split(',').map(part => part.trim()).filter(part => part.length > 0);
    return parts.length > 0 ? parts : undefined;
  }
  if (!Array.isArray(value)) {
    return undefined;
  }
  const items = value
    .map(entry => readString(entry) ?? (isRecord(entry) ? readString(entry.name) : undefined))
    .filter((entry): entry is string => typeof entry !== 'undefined');
  return items.length > 0 ? items : undefined;
};

const readCategory = (value: unknown): string | undefined =>
  readString(value) ?? (isRecord(value) ? readString(value.name) : undefined);

const firstDefined = <T>(...values: (T | undefined)[]): T | undefined =>
  values.find(value => typeof value !== 'undefined');

/**
 * Map one upstream record onto a CatalogItem.
 * @returns null when the record has no usable id or name
 */
export function toCatalogItem(record: unknown): CatalogItem | null {
  if (!isRecord(record)) {
    return null;
  }

  const idValue = firstDefined(record.id, record.product_id, record.productId);
  const id = typeof idValue === 'number' ? String(idValue) : readString(idValue);
  const name = firstDefined(readString(record.name), readString(record.title), readString(record.product_name));
  if (!id || !name) {
    return null;
  }

  const item: CatalogItem = { id, name, raw: Object.freeze({ ...record }) };

  const price = firstDefined(readNumber(record.final_price), readNumber(record.price));
  if (typeof price !== 'undefined') item.price = price;

  const rating = readNumber(record.rating);
  if (typeof rating !== 'undefined') item.rating = rating;

  const ratingCount = firstDefined(readNumber(record.count_rating), readNumber(record.rating_count));
  if (typeof ratingCount !== 'undefined') item.ratingCount = ratingCount;

  const stock = firstDefined(readNumber(record.stock_quantity), readNumber(record.stock));
  if (typeof stock !== 'undefined') item.stock = stock;

  const category = firstDefined(readCategory(record.category), readString(record.category_name));
  if (category) item.category = category;

  const tags = readStringList(record.tags);
  if (tags) item.tags = tags;

  const colors = readStringList(record.colors);
  if (colors) item.colors = colors;

  const sizes = readStringList(record.sizes);
  if (sizes) item.sizes = sizes;

  const description = readString(record.description);
  if (description) item.description = description;

  if (typeof record.is_best_seller === 'boolean') item.isBestSeller = record.is_best_seller;
  else if (typeof record.isBestSeller === 'boolean') item.isBestSeller = record.isBestSeller;

  return item;
}

const productList = (payload: unknown): unknown[] => {
  if (Array.isArray(payload)) {
    return payload;
  }
  if (!isRecord(payload)) {
    return [];
  }
  if (Array.isArray(payload.products)) {
    return payload.products;
  }
  const { data } = payload;
  if (Array.isArray(data)) {
    return data;
  }
  if (isRecord(data) && Array.isArray(data.products)) {
    return data.products;
  }
  return [];
};

/**
 * Pull catalog items out of a search or listing payload. Accepts a bare array,
 * `{ products }`, `{ data: [...] }` and `{ data: { products } }`; records without
 * an id or name are skipped.
 */
export function extractCatalogItems(payload: unknown): CatalogItem[] {
  return productList(payload)
    .map(toCatalogItem)
    .filter((item): item is CatalogItem => item !== null);
}

/**
 * Single product from a detail payload: the record itself, `{ data: record }` or `{ product: record }`.
 */
export function extractCatalogItem(payload: unknown): CatalogItem | null {
  if (!isRecord(payload)) {
    return null;
  }
  const { data, product } = payload;
  if (isRecord(data)) return toCatalogItem(data);
  if (isRecord(product)) return toCatalogItem(product);
  return toCatalogItem(payload);
}
