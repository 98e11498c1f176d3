// src/middleware/rate-limit.ts — per-IP limiter for the public API
import rateLimit from 'express-rate-limit';
import { errorBody } from '@/utils/errorResponse';

export function createRateLimiter(maxPerMinute: number) {
  return rateLimit({
    windowMs: 60 * 1000,
    max: maxPerMinute,
    standardHeaders: true,
    legacyHeaders: false,
    message: errorBody('Too many requests, please try again later.', 'rate_limited'),
  });
}
