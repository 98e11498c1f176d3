import { describe, it, expect, beforeEach } from 'vitest';
import { CatalogController } from '@/controllers/catalog.controller';
import { CatalogStoreError } from '@/services/catalog/errors';
import { InMemoryCatalogStore, makeProduct } from './helpers/in-memory-catalog-store';

function createController(store: InMemoryCatalogStore) {
  return new CatalogController({
    store,
    databaseName: 'bakery-test',
    pagination: { defaultPageSize: 20, maxPageSize: 100 },
  });
}

describe('CatalogController', () => {
  let store: InMemoryCatalogStore;
  let controller: CatalogController;

  beforeEach(() => {
    store = new InMemoryCatalogStore([
      makeProduct({ name: 'Vanilla cupcake', category: 'Cupcake', price: 4 }),
      makeProduct({ name: 'Red velvet cupcake', category: 'Cupcake', price: 7 }),
      makeProduct({ name: 'Salted caramel cupcake', category: 'Cupcake', price: 12 }),
      makeProduct({ name: 'Baguette', category: 'Bread', price: 3 }),
    ]);
    controller = createController(store);
  });

  describe('listProducts', () => {
    it('returns the pagination envelope with defaults', async () => {
      const result = await controller.listProducts({});

      expect(result.status).toBe(200);
      expect(result.body.items).toHaveLength(4);
      expect(result.body).toMatchObject({
        total: 4,
        page: 1,
        pageSize: 20,
        pageCount: 1,
        hasNext: false,
        hasPrevious: false,
      });
    });

    it('filters an inverted price range within a category', async () => {
      const result = await controller.listProducts({ category: 'cupcake', minPrice: '10', maxPrice: '5' });

      expect(result.body.items.map((p) => p.name)).toEqual(['Red velvet cupcake']);
      expect(result.body.total).toBe(1);
    });

    it('ignores a category the catalog does not have', async () => {
      const result = await controller.listProducts({ category: 'pie' });

      expect(result.body.total).toBe(4);
      expect(store.calls.distinct).toBe(1);
    });

    it('skips the category lookup when no category is asked for', async () => {
      await controller.listProducts({ search: 'cupcake' });
      expect(store.calls.distinct).toBe(0);
    });

    it('sorts by price when asked', async () => {
      const result = await controller.listProducts({ sort: 'price_asc', pageSize: '2' });

      expect(result.body.items.map((p) => p.price)).toEqual([3, 4]);
      expect(result.body.pageCount).toBe(2);
      expect(result.body.hasNext).toBe(true);
    });

    it('rejects when the store is down', async () => {
      store.failing = true;
      await expect(controller.listProducts({})).rejects.toBeInstanceOf(CatalogStoreError);
    });
  });

  describe('listCategories', () => {
    it('lists distinct categories in order', async () => {
      const result = await controller.listCategories();
      expect(result).toEqual({ status: 200, body: { categories: ['Bread', 'Cupcake'] } });
    });
  });

  describe('createOrder', () => {
    it('stores a valid order and returns its id', async () => {
      const result = await controller.createOrder({
        customerName: 'Ada',
        email: 'ada@example.com',
        category: 'cake',
        details: 'Two-tier lemon cake',
      });

      expect(result).toEqual({ status: 201, body: { success: true, data: { id: 'order-1' } } });
      expect(store.orders).toEqual([
        {
          id: 'order-1',
          customerName: 'Ada',
          email: 'ada@example.com',
          category: 'cake',
          details: 'Two-tier lemon cake',
          quantity: 1,
        },
      ]);
    });

    it('answers 400 with field errors for an invalid body', async () => {
      const result = await controller.createOrder({ customerName: 'Ada', email: 'nope', category: 'cake', details: 'x' });

      expect(result).toEqual({
        status: 400,
        body: {
          success: false,
          message: 'Invalid custom order',
          errors: [{ path: 'email', message: 'A valid email address is required' }],
          code: 'invalid_order',
        },
      });
      expect(store.orders).toHaveLength(0);
    });
  });

  describe('health', () => {
    it('reports a connected database', async () => {
      expect(await controller.health()).toEqual({
        status: 200,
        body: { status: 'healthy', api: 'running', database: 'connected', databaseName: 'bakery-test' },
      });
    });

    it('reports 503 when the ping fails', async () => {
      store.failing = true;

      expect(await controller.health()).toEqual({
        status: 503,
        body: {
          status: 'unhealthy',
          api: 'running',
          database: 'disconnected',
          error: 'Catalog store ping failed: connection refused',
        },
      });
    });
  });
});
