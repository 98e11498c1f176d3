import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import compression from 'compression';

import type { AppConfig } from '@/config/app.config';
import type { CatalogController } from '@/controllers/catalog.controller';
import { attachCorrelationId } from '@/middleware/correlation';
import { createRateLimiter } from '@/middleware/rate-limit';
import { errorHandler, notFoundHandler } from '@/middleware/errorHandler';
import { createApiRouter } from '@/routes';
import { respond } from '@/routes/respond';
import { logger } from '@/services/logger';
import { requestTimeout } from '@/stability/errorHandlers';

export interface AppDependencies {
  config: AppConfig;
  controller: CatalogController;
}

const ENDPOINTS = [
  '/health - Health check',
  '/api/products - Search and browse products',
  '/api/categories - List product categories',
  '/api/orders - Submit a custom order',
];

export function createApp({ config, controller }: AppDependencies) {
  const app = express();

  // Security middleware
  app.use(helmet());

  app.use(cors({
    origin: config.corsOrigin,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-Correlation-Id'],
    credentials: false,
  }));

  if (config.nodeEnv === 'production') {
    app.use(createRateLimiter(config.rateLimitPerMinute));
  }

  app.use(attachCorrelationId);
  app.use(requestTimeout(config.requestTimeoutMs));

  app.use(express.json({ limit: '100kb' }));
  app.use(compression());

  // Access logs go through the app logger
  app.use(morgan(config.nodeEnv === 'development' ? 'dev' : 'combined', {
    stream: { write: (line: string) => { logger.info(line.trimEnd()); } },
  }));

  app.get('/', (_req, res) => {
    res.status(200).json({
      message: 'Bakery Catalog API',
      status: 'running',
      endpoints: ENDPOINTS,
    });
  });

  app.get('/health', respond(() => controller.health()));

  app.use('/api', createApiRouter(controller));

  // Error handling middleware
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
