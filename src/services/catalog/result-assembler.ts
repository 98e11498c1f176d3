// src/services/catalog/result-assembler.ts
import type { CatalogQuery, PageResult, Product } from '@/types/catalog';
import type { CatalogStore } from './catalog-store';

export function computePageCount(total: number, pageSize: number): number {
  if (pageSize <= 0) return 0;
  return Math.max(0, Math.ceil(total / pageSize));
}

/** Wraps a page of items in the pagination envelope. */
export function toPageResult<T>(
  items: T[],
  total: number,
  page: number,
  pageSize: number,
): PageResult<T> {
  return {
    items,
    total,
    page,
    pageSize,
    pageCount: computePageCount(total, pageSize),
    hasNext: page * pageSize < total,
    hasPrevious: page > 1,
  };
}

/**
 * Reads one page and the total match count. The two reads are not isolated from
 * each other: `total` is advisory and may drift under concurrent writes.
 * A page past the end yields an empty `items` list.
 */
export async function assembleCatalogPage(
  store: CatalogStore,
  query: CatalogQuery,
): Promise<PageResult<Product>> {
  const [items, total] = await Promise.all([
    store.find(query.filter, query.sort, query.skip, query.limit),
    store.count(query.filter),
  ]);

  return toPageResult(items.slice(0, query.limit), Math.max(0, total), query.page, query.pageSize);
}
