// src/services/catalog/query-builder.ts
// Turns untrusted query-string values into a bounded CatalogQuery. Pure: no I/O,
// no mutation of its input. Malformed values fall back to defaults instead of
// failing, so a public search request never errors on user input.
import {
  SORT_OPTIONS,
  type CatalogQuery,
  type SearchFilter,
  type SortOption,
  type SortSpec,
} from '@/types/catalog';

export interface QueryBuilderOptions {
  defaultPageSize: number;
  maxPageSize: number;
  /** When given, a category outside this list is ignored. */
  knownCategories?: readonly string[];
}

export const DEFAULT_QUERY_OPTIONS: QueryBuilderOptions = {
  defaultPageSize: 20,
  maxPageSize: 100,
};

export const DEFAULT_SORT: SortOption = 'newest';
export const MAX_SEARCH_LENGTH = 100;

/** Query-string mapping as Express hands it over (values may be arrays or nested). */
export type RawCatalogParams = Readonly<Record<string, unknown>>;

const SORT_SPECS: Record<SortOption, SortSpec> = {
  newest: [
    { field: 'createdAt', direction: 'desc' },
    { field: 'id', direction: 'asc' },
  ],
  oldest: [
    { field: 'createdAt', direction: 'asc' },
    { field: 'id', direction: 'asc' },
  ],
  price_asc: [
    { field: 'price', direction: 'asc' },
    { field: 'id', direction: 'asc' },
  ],
  price_desc: [
    { field: 'price', direction: 'desc' },
    { field: 'id', direction: 'asc' },
  ],
  name_asc: [
    { field: 'name', direction: 'asc' },
    { field: 'id', direction: 'asc' },
  ],
  name_desc: [
    { field: 'name', direction: 'desc' },
    { field: 'id', direction: 'asc' },
  ],
};

const INTEGER_PATTERN = /^[+-]?\d+$/;
const DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)$/;
const TRUTHY_FLAG = /^(true|1|yes|on)$/i;

function readParam(params: RawCatalogParams, key: string): string | undefined {
  const value = params[key];
  if (typeof value === 'string') return value;
  // ?page=2&page=3 arrives as an array: first string wins
  if (Array.isArray(value)) {
    return value.find((v): v is string => typeof v === 'string');
  }
  return undefined;
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function parseInteger(value: string | undefined): number | undefined {
  const trimmed = value?.trim();
  if (!trimmed || !INTEGER_PATTERN.test(trimmed)) return undefined;
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : undefined;
}

/** Non-negative decimal, or undefined for anything else. */
export function parsePrice(value: string | undefined): number | undefined {
  const trimmed = value?.trim();
  if (!trimmed || !DECIMAL_PATTERN.test(trimmed)) return undefined;
  const parsed = Number(trimmed);
  if (!Number.isFinite(parsed) || parsed < 0) return undefined;
  return parsed === 0 ? 0 : parsed;
}

export function resolvePageSize(value: string | undefined, options: QueryBuilderOptions): number {
  const maxPageSize = Math.max(1, Math.floor(options.maxPageSize));
  const defaultPageSize = Math.min(maxPageSize, Math.max(1, Math.floor(options.defaultPageSize)));
  const requested = parseInteger(value);
  if (requested === undefined) return defaultPageSize;
  return Math.min(maxPageSize, Math.max(1, requested));
}

export function resolvePage(value: string | undefined, pageSize: number): number {
  const requested = parseInteger(value);
  if (requested === undefined || requested < 1) return 1;
  // keeps (page - 1) * pageSize a safe integer
  const lastAddressablePage = Math.floor(Number.MAX_SAFE_INTEGER / pageSize) + 1;
  return Math.min(requested, lastAddressablePage);
}

export function resolveSort(value: string | undefined): SortOption {
  const wanted = nonEmpty(value)?.toLowerCase();
  return SORT_OPTIONS.find((option) => option === wanted) ?? DEFAULT_SORT;
}

function resolveCategory(
  value: string | undefined,
  knownCategories: readonly string[] | undefined,
): string | undefined {
  const wanted = nonEmpty(value)?.toLowerCase();
  if (!wanted) return undefined;
  if (!knownCategories) return wanted;
  return knownCategories.some((c) => c.toLowerCase() === wanted) ? wanted : undefined;
}

function buildFilter(params: RawCatalogParams, options: QueryBuilderOptions): SearchFilter {
  const filter: SearchFilter = {};

  const text = nonEmpty(readParam(params, 'search'));
  if (text) filter.text = text.slice(0, MAX_SEARCH_LENGTH);

  const category = resolveCategory(readParam(params, 'category'), options.knownCategories);
  if (category) filter.category = category;

  let minPrice = parsePrice(readParam(params, 'minPrice'));
  let maxPrice = parsePrice(readParam(params, 'maxPrice'));
  // inverted range is swapped rather than rejected
  if (minPrice !== undefined && maxPrice !== undefined && minPrice > maxPrice) {
    [minPrice, maxPrice] = [maxPrice, minPrice];
  }
  if (minPrice !== undefined) filter.minPrice = minPrice;
  if (maxPrice !== undefined) filter.maxPrice = maxPrice;

  const available = nonEmpty(readParam(params, 'available'));
  if (available && TRUTHY_FLAG.test(available)) filter.availableOnly = true;

  return filter;
}

/**
 * Builds the filter, sort order and skip/limit window for a catalog search.
 * Unknown parameters are ignored; skip is never negative and limit never
 * exceeds `maxPageSize`.
 */
export function buildCatalogQuery(
  params: RawCatalogParams,
  options: QueryBuilderOptions = DEFAULT_QUERY_OPTIONS,
): CatalogQuery {
  const pageSize = resolvePageSize(readParam(params, 'pageSize'), options);
  const page = resolvePage(readParam(params, 'page'), pageSize);
  const sortOption = resolveSort(readParam(params, 'sort'));

  return {
    filter: buildFilter(params, options),
    // copied so a caller cannot alter the shared table
    sort: SORT_SPECS[sortOption].map((key) => ({ ...key })),
    sortOption,
    page,
    pageSize,
    skip: (page - 1) * pageSize,
    limit: pageSize,
  };
}
