// src/services/catalog/errors.ts

/** The backing store could not be reached or rejected a query. */
export class CatalogStoreError extends Error {
  readonly operation: string;

  constructor(operation: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Catalog store ${operation} failed: ${detail}`, { cause });
    this.name = 'CatalogStoreError';
    this.operation = operation;
  }
}
