import pino, { type Logger } from 'pino';
import { InvalidArgumentError } from './error';

export type { Logger };

export interface LoggerOptions {
  // pino level name; falls back to REST_CLIENT_LOG_LEVEL, then info
  level?: string;
}

export const isLogLevel = (level: string): boolean => {
  return level === 'silent' || Object.hasOwn(pino.levels.values, level);
};

export const createLogger = (opts: LoggerOptions = {}): Logger => {
  const level = opts.level || process.env.REST_CLIENT_LOG_LEVEL || 'info';
  if (!isLogLevel(level)) {
    throw new InvalidArgumentError(`Unknown log level "${level}"`);
  }
  return pino({ name: 'rest-client', level });
};

let defaultLogger: Logger | undefined;

/**
 * Shared logger used when a caller does not supply one. Built on first use, so
 * a bad REST_CLIENT_LOG_LEVEL surfaces there rather than on import.
 */
export const getDefaultLogger = (): Logger => {
  defaultLogger ??= createLogger();
  return defaultLogger;
};
