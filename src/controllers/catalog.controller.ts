// src/controllers/catalog.controller.ts
// Route logic, kept apart from Express so it can be driven directly. Each method
// returns the status and JSON body the route should send; store failures are
// thrown and left to the error middleware.
import type { CatalogStore } from '@/services/catalog/catalog-store';
import {
  buildCatalogQuery,
  type QueryBuilderOptions,
  type RawCatalogParams,
} from '@/services/catalog/query-builder';
import { assembleCatalogPage } from '@/services/catalog/result-assembler';
import { logger } from '@/services/logger';
import type { PageResult, Product } from '@/types/catalog';
import { validateCustomOrder } from '@/validation/order.validation';
import {
  errorBody,
  successBody,
  type ErrorResponse,
  type SuccessResponse,
} from '@/utils/errorResponse';

export interface ControllerResponse<T> {
  status: number;
  body: T;
}

export interface HealthBody {
  status: 'healthy' | 'unhealthy';
  api: 'running';
  database: 'connected' | 'disconnected';
  databaseName?: string;
  error?: string;
}

export interface CatalogControllerOptions {
  store: CatalogStore;
  databaseName: string;
  pagination: Pick<QueryBuilderOptions, 'defaultPageSize' | 'maxPageSize'>;
}

export class CatalogController {
  private readonly store: CatalogStore;
  private readonly databaseName: string;
  private readonly pagination: CatalogControllerOptions['pagination'];

  constructor(options: CatalogControllerOptions) {
    this.store = options.store;
    this.databaseName = options.databaseName;
    this.pagination = options.pagination;
  }

  /** GET /products */
  async listProducts(params: RawCatalogParams): Promise<ControllerResponse<PageResult<Product>>> {
    // a category only narrows the search when the store knows it
    const knownCategories =
      typeof params.category === 'string' || Array.isArray(params.category)
        ? await this.store.distinct('category')
        : undefined;

    const query = buildCatalogQuery(params, { ...this.pagination, knownCategories });
    logger.debug('Catalog query', {
      filter: query.filter,
      sort: query.sortOption,
      skip: query.skip,
      limit: query.limit,
    });

    const page = await assembleCatalogPage(this.store, query);
    return { status: 200, body: page };
  }

  /** GET /categories */
  async listCategories(): Promise<ControllerResponse<{ categories: string[] }>> {
    const categories = await this.store.distinct('category');
    return { status: 200, body: { categories } };
  }

  /** POST /orders */
  async createOrder(
    body: unknown,
  ): Promise<ControllerResponse<SuccessResponse<{ id: string }> | ErrorResponse>> {
    const validation = validateCustomOrder(body);
    if (!validation.success) {
      return {
        status: 400,
        body: errorBody('Invalid custom order', 'invalid_order', validation.error),
      };
    }

    const id = await this.store.insertOrder(validation.data);
    logger.info('Custom order received', { id, category: validation.data.category });
    return { status: 201, body: successBody({ id }) };
  }

  /** GET /health */
  async health(): Promise<ControllerResponse<HealthBody>> {
    try {
      await this.store.ping();
      return {
        status: 200,
        body: {
          status: 'healthy',
          api: 'running',
          database: 'connected',
          databaseName: this.databaseName,
        },
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.warn('Health check failed', { message });
      return {
        status: 503,
        body: { status: 'unhealthy', api: 'running', database: 'disconnected', error: message },
      };
    }
  }
}
