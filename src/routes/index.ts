/** API route aggregator. */
import express from 'express';
import type { CatalogController } from '@/controllers/catalog.controller';
import { createProductsRouter } from './products';
import { createCategoriesRouter } from './categories';
import { createOrdersRouter } from './orders';

export function createApiRouter(controller: CatalogController) {
  const router = express.Router();
  router.use('/products', createProductsRouter(controller));
  router.use('/categories', createCategoriesRouter(controller));
  router.use('/orders', createOrdersRouter(controller));
  return router;
}
