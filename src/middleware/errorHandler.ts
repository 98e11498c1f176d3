import type { Request, Response, NextFunction } from 'express';
import { CatalogStoreError } from '@/services/catalog/errors';
import { logger } from '@/services/logger';
import { errorBody, type ErrorResponse } from '@/utils/errorResponse';
import { getCorrelationId } from './correlation';

export interface ErrorResult {
  status: number;
  body: ErrorResponse;
}

function hasStatus(err: unknown): err is { status: number; type?: unknown } {
  return typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number';
}

/** Maps a thrown value to the HTTP status and body sent to the client. */
export function toErrorResult(err: unknown): ErrorResult {
  if (err instanceof CatalogStoreError) {
    return {
      status: 503,
      body: errorBody('The catalog is temporarily unavailable', 'store_unavailable'),
    };
  }

  // body-parser failures (malformed JSON, oversized body) carry a 4xx status
  if (hasStatus(err) && err.status >= 400 && err.status < 500) {
    const code = typeof err.type === 'string' ? err.type : 'bad_request';
    return { status: err.status, body: errorBody('Malformed request', code) };
  }

  return {
    status: 500,
    body: errorBody('Internal Server Error', 'internal_error'),
  };
}

export function errorHandler(err: unknown, req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    next(err);
    return;
  }

  const result = toErrorResult(err);
  const context = {
    correlationId: getCorrelationId(res),
    method: req.method,
    path: req.originalUrl,
    error: err instanceof Error ? err.message : String(err),
  };
  if (result.status >= 500) {
    logger.error('Request failed', context);
  } else {
    logger.warn('Request rejected', context);
  }

  res.status(result.status).json(result.body);
}

export function notFoundHandler(req: Request, res: Response): void {
  res
    .status(404)
    .json(errorBody(`Route ${req.method} ${req.path} not found`, 'not_found'));
}
