// src/middleware/correlation.ts — correlation ID for request logs
import type { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'crypto';

export const CORRELATION_HEADER = 'x-correlation-id';

export function attachCorrelationId(
  req: Request,
  res: Response,
  next: NextFunction,
): void {
  const headerId = req.header(CORRELATION_HEADER)?.trim();
  const correlationId = headerId ? headerId.slice(0, 128) : randomUUID();

  res.locals.correlationId = correlationId;
  res.setHeader(CORRELATION_HEADER, correlationId);
  next();
}

export function getCorrelationId(res: Response): string | undefined {
  const id: unknown = res.locals.correlationId;
  return typeof id === 'string' ? id : undefined;
}
