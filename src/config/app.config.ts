/** App configuration, read from the environment once at startup. */
import { z } from 'zod';

const intFromEnv = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

export const appConfigSchema = z
  .object({
    PORT: intFromEnv(4000),
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    LOG_LEVEL: z.enum(['silly', 'trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
    MONGODB_URI: z.string().trim().optional(),
    DATABASE_NAME: z.string().trim().min(1).default('bakery'),
    PRODUCTS_COLLECTION: z.string().trim().min(1).default('products'),
    ORDERS_COLLECTION: z.string().trim().min(1).default('custom-orders'),
    CORS_ORIGIN: z.string().default('http://localhost:3000'),
    DEFAULT_PAGE_SIZE: intFromEnv(20),
    MAX_PAGE_SIZE: intFromEnv(100),
    RATE_LIMIT_PER_MINUTE: intFromEnv(100),
    REQUEST_TIMEOUT_MS: intFromEnv(15000),
  })
  .refine((env) => env.DEFAULT_PAGE_SIZE <= env.MAX_PAGE_SIZE, {
    message: 'DEFAULT_PAGE_SIZE must not exceed MAX_PAGE_SIZE',
    path: ['DEFAULT_PAGE_SIZE'],
  });

export type LogLevelName = z.infer<typeof appConfigSchema>['LOG_LEVEL'];

export interface AppConfig {
  port: number;
  nodeEnv: 'development' | 'production' | 'test';
  logLevel: LogLevelName;
  mongodbUri: string | undefined;
  databaseName: string;
  productsCollection: string;
  ordersCollection: string;
  /** `'*'` allows every origin. */
  corsOrigin: string[] | '*';
  pagination: {
    defaultPageSize: number;
    maxPageSize: number;
  };
  rateLimitPerMinute: number;
  requestTimeoutMs: number;
}

export class ConfigError extends Error {
  constructor(readonly issues: Array<{ path: string; message: string }>) {
    super(`Invalid configuration: ${issues.map((i) => `${i.path}: ${i.message}`).join('; ')}`);
    this.name = 'ConfigError';
  }
}

function parseCorsOrigin(raw: string): string[] | '*' {
  const origins = raw
    .split(',')
    .map((o) => o.trim())
    .filter((o) => o.length > 0);
  return origins.includes('*') ? '*' : origins;
}

/**
 * Builds the typed config from an env mapping. Empty strings count as unset so
 * that a blank line in `.env` falls back to the default.
 */
export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== ''),
  );
  const result = appConfigSchema.safeParse(cleaned);

  if (!result.success) {
    throw new ConfigError(
      result.error.errors.map((e) => ({
        path: e.path.join('.') || 'root',
        message: e.message,
      })),
    );
  }

  const parsed = result.data;
  return {
    port: parsed.PORT,
    nodeEnv: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL,
    mongodbUri: parsed.MONGODB_URI,
    databaseName: parsed.DATABASE_NAME,
    productsCollection: parsed.PRODUCTS_COLLECTION,
    ordersCollection: parsed.ORDERS_COLLECTION,
    corsOrigin: parseCorsOrigin(parsed.CORS_ORIGIN),
    pagination: {
      defaultPageSize: parsed.DEFAULT_PAGE_SIZE,
      maxPageSize: parsed.MAX_PAGE_SIZE,
    },
    rateLimitPerMinute: parsed.RATE_LIMIT_PER_MINUTE,
    requestTimeoutMs: parsed.REQUEST_TIMEOUT_MS,
  };
}
