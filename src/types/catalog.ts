// src/types/catalog.ts
// Shapes shared by the query builder, the store and the HTTP layer.

export interface Product {
  id: string;
  name: string;
  description: string;
  /** Open set: "cupcake", "bread", "tart", ... */
  category: string;
  price: number;
  available: boolean;
  createdAt: Date;
}

/**
 * Normalized search conditions. Every present field narrows the result set;
 * the conditions are AND-ed together.
 */
export interface SearchFilter {
  /** Substring matched case-insensitively against name OR description. */
  text?: string;
  /** Lower-cased; compared case-insensitively. */
  category?: string;
  minPrice?: number;
  maxPrice?: number;
  availableOnly?: boolean;
}

export type SortableField = 'createdAt' | 'price' | 'name' | 'id';
export type SortDirection = 'asc' | 'desc';

export interface SortKey {
  readonly field: SortableField;
  readonly direction: SortDirection;
}

/** Applied in order; the last key is always the `id` tie-breaker. */
export type SortSpec = readonly SortKey[];

export const SORT_OPTIONS = [
  'newest',
  'oldest',
  'price_asc',
  'price_desc',
  'name_asc',
  'name_desc',
] as const;

export type SortOption = (typeof SORT_OPTIONS)[number];

export interface PageRequest {
  page: number;
  pageSize: number;
}

export interface CatalogQuery extends PageRequest {
  filter: SearchFilter;
  sort: SortSpec;
  sortOption: SortOption;
  skip: number;
  limit: number;
}

export interface PageResult<T> {
  items: T[];
  total: number;
  page: number;
  pageSize: number;
  pageCount: number;
  hasNext: boolean;
  hasPrevious: boolean;
}

export interface CustomOrder {
  customerName: string;
  email: string;
  phone?: string;
  category: string;
  details: string;
  quantity: number;
  /** YYYY-MM-DD */
  neededBy?: string;
  budget?: number;
}
