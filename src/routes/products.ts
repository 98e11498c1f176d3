/**
 * GET /api/products?search=&category=&minPrice=&maxPrice=&available=&page=&pageSize=&sort=
 *
 * Response:
 * { items, total, page, pageSize, pageCount, hasNext, hasPrevious }
 *
 * Malformed query values fall back to defaults; this route never answers 4xx
 * for filter input.
 */
import express from 'express';
import type { CatalogController } from '@/controllers/catalog.controller';
import { respond } from './respond';

export function createProductsRouter(controller: CatalogController) {
  const router = express.Router();

  router.get('/', respond((req) => controller.listProducts(req.query)));

  return router;
}
