// src/services/logger.ts — structured logging for the catalog API
import { Logger } from 'tslog';
import type { LogLevelName } from '@/config/app.config';

const LOG_LEVELS: Record<LogLevelName, number> = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
};

function levelFromEnv(): number {
  const raw = process.env.LOG_LEVEL?.trim().toLowerCase();
  const match = Object.entries(LOG_LEVELS).find(([name]) => name === raw);
  return match ? match[1] : LOG_LEVELS.info;
}

export const logger = new Logger({
  name: 'bakery-catalog-api',
  minLevel: levelFromEnv(),
  prettyLogTemplate: '{{yyyy}}-{{mm}}-{{dd}} {{hh}}:{{MM}}:{{ss}} {{logLevelName}} ',
  type: process.env.NODE_ENV === 'test' ? 'hidden' : 'pretty',
});

export function setLogLevel(level: LogLevelName): void {
  logger.settings.minLevel = LOG_LEVELS[level];
}
