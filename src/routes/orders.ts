/**
 * POST /api/orders
 *
 * Request body:
 * {
 *   customerName: string,
 *   email: string,
 *   phone?: string,
 *   category: string,
 *   details: string,
 *   quantity?: number,
 *   neededBy?: "YYYY-MM-DD",
 *   budget?: number
 * }
 *
 * 201 { success: true, data: { id } } | 400 { success: false, message, errors, code }
 */
import express from 'express';
import type { CatalogController } from '@/controllers/catalog.controller';
import { respond } from './respond';

export function createOrdersRouter(controller: CatalogController) {
  const router = express.Router();

  router.post('/', respond((req) => controller.createOrder(req.body)));

  return router;
}
