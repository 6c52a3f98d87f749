/**
 * Structured logging for routers and the simulation driver
 */

import { pino, type Logger } from 'pino';

export type { Logger };

export type LogLevel =
  | 'fatal'
  | 'error'
  | 'warn'
  | 'info'
  | 'debug'
  | 'trace'
  | 'silent';

export interface LoggerOptions {
  name?: string;
  level?: LogLevel;
}

const LOG_LEVELS: readonly LogLevel[] = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Resolve the effective level: explicit option, then LOG_LEVEL, then info
 */
export function resolveLogLevel(level?: LogLevel): LogLevel {
  if (level) return level;
  const fromEnv = process.env.LOG_LEVEL;
  if (fromEnv && isLogLevel(fromEnv)) return fromEnv;
  return 'info';
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    name: options.name ?? 'tickroute',
    level: resolveLogLevel(options.level),
  });
}
