// GET /api/categories → { categories: string[] }, sorted ascending
import express from 'express';
import type { CatalogController } from '@/controllers/catalog.controller';
import { respond } from './respond';

export function createCategoriesRouter(controller: CatalogController) {
  const router = express.Router();

  router.get('/', respond(() => controller.listCategories()));

  return router;
}
