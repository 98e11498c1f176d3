// src/services/catalog/catalog-store.ts
// Storage seam for the catalog. The Mongo implementation lives beside it; tests
// plug in an in-memory one.
import type { CustomOrder, Product, SearchFilter, SortSpec } from '@/types/catalog';

export type DistinctField = 'category';

export interface CatalogStore {
  readonly name: string;
  find(filter: SearchFilter, sort: SortSpec, skip: number, limit: number): Promise<Product[]>;
  count(filter: SearchFilter): Promise<number>;
  /** Distinct non-empty values, sorted ascending. */
  distinct(field: DistinctField): Promise<string[]>;
  /** Returns the new order's identifier. */
  insertOrder(order: CustomOrder): Promise<string>;
  ping(): Promise<void>;
}
