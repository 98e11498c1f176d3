// Process-level error handlers, graceful shutdown and request timeouts

import type { Server } from 'http';
import type { Request, Response, NextFunction } from 'express';
import { logger } from '@/services/logger';
import { errorBody } from '@/utils/errorResponse';

type CleanupTask = () => Promise<void>;

let serverInstance: Server | null = null;
const cleanupTasks: CleanupTask[] = [];
let shuttingDown = false;

const SHUTDOWN_TIMEOUT_MS = 15000;

/**
 * Set server instance for graceful shutdown
 */
export function setServerInstance(server: Server): void {
  serverInstance = server;
}

/** Registers work to run once the HTTP server stops accepting requests. */
export function onShutdown(task: CleanupTask): void {
  cleanupTasks.push(task);
}

export function setupUnhandledRejectionHandler(): void {
  process.on('unhandledRejection', (reason: unknown) => {
    logger.error('Unhandled Promise Rejection', {
      reason: reason instanceof Error ? reason.message : String(reason),
      stack: reason instanceof Error ? reason.stack : undefined,
    });

    if (process.env.NODE_ENV !== 'production') {
      // fail fast outside production
      process.exit(1);
    }
  });
}

export function setupUncaughtExceptionHandler(): void {
  process.on('uncaughtException', (error: Error) => {
    logger.fatal('Uncaught Exception', { message: error.message, stack: error.stack });
    void gracefulShutdown('uncaughtException', 1);
  });
}

export function setupGracefulShutdown(): void {
  const signals: NodeJS.Signals[] = ['SIGTERM', 'SIGINT'];

  signals.forEach(signal => {
    process.on(signal, () => {
      logger.info(`Received ${signal}, starting graceful shutdown...`);
      void gracefulShutdown(signal, 0);
    });
  });
}

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}

async function gracefulShutdown(reason: string, exitCode: number): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info(`Graceful shutdown initiated: ${reason}`);

  const forceExit = setTimeout(() => {
    logger.error('Forced shutdown after timeout');
    process.exit(1);
  }, SHUTDOWN_TIMEOUT_MS);
  forceExit.unref();

  try {
    if (serverInstance) {
      await closeServer(serverInstance);
      logger.info('HTTP server closed');
    }
    for (const task of cleanupTasks) {
      await task();
    }
    logger.info('Cleanup completed');
    clearTimeout(forceExit);
    process.exit(exitCode);
  } catch (error) {
    logger.error('Error during shutdown', {
      message: error instanceof Error ? error.message : String(error),
    });
    clearTimeout(forceExit);
    process.exit(1);
  }
}

/**
 * Answers 408 when a request is still open after `timeoutMs`.
 */
export function requestTimeout(timeoutMs: number = 15000) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const timeout = setTimeout(() => {
      if (!res.headersSent) {
        logger.warn('Request timed out', { method: req.method, path: req.originalUrl, timeoutMs });
        res
          .status(408)
          .json(errorBody(`Request exceeded ${timeoutMs}ms timeout`, 'request_timeout'));
      }
    }, timeoutMs);

    // Clear timeout when response is sent
    res.on('finish', () => {
      clearTimeout(timeout);
    });

    res.on('close', () => {
      clearTimeout(timeout);
    });

    next();
  };
}
