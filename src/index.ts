// Load environment variables FIRST
import dotenv from 'dotenv';
import path from 'path';
dotenv.config({ path: path.resolve(process.cwd(), '.env') });

import { loadAppConfig } from '@/config/app.config';
import { CatalogController } from '@/controllers/catalog.controller';
import { closeDatabase, connectDatabase } from '@/services/database';
import { logger, setLogLevel } from '@/services/logger';
import {
  onShutdown,
  setServerInstance,
  setupGracefulShutdown,
  setupUncaughtExceptionHandler,
  setupUnhandledRejectionHandler,
} from '@/stability/errorHandlers';
import { createApp } from './app';

setupUnhandledRejectionHandler();
setupUncaughtExceptionHandler();
setupGracefulShutdown();

const startServer = async () => {
  const config = loadAppConfig();
  setLogLevel(config.logLevel);

  const { client, store } = await connectDatabase(config);
  onShutdown(() => closeDatabase(client));

  const controller = new CatalogController({
    store,
    databaseName: config.databaseName,
    pagination: config.pagination,
  });
  const app = createApp({ config, controller });

  const server = app.listen(config.port, '0.0.0.0', () => {
    logger.info(`Server running on http://localhost:${config.port}`);
    logger.info(`Environment: ${config.nodeEnv}`);
    logger.info(`Health check: http://localhost:${config.port}/health`);
  });
  setServerInstance(server);
};

startServer().catch((error: unknown) => {
  logger.fatal('Failed to start server', {
    message: error instanceof Error ? error.message : String(error),
  });
  process.exit(1);
});
