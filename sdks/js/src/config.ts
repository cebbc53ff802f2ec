import { InvalidArgumentError } from './error';
import { isLogLevel } from './logger';

// Connect/read timeout applied when none is configured: 5 minutes
export const DEFAULT_TIMEOUT_MS = 1000 * 60 * 5;

export interface ProxySettings {
  uri: string;
  username?: string;
  password?: string;
}

export interface RestClientConfig {
  serverUrl?: string;
  timeoutMs: number;
  proxy?: ProxySettings;
  logLevel: string;
}

const parseLogLevel = (raw: string | undefined): string => {
  const level = raw?.trim() || 'info';
  if (!isLogLevel(level)) {
    throw new InvalidArgumentError(`REST_CLIENT_LOG_LEVEL must be a pino level, got "${raw}"`);
  }
  return level;
};

const parseTimeout = (raw: string | undefined): number => {
  if (raw === undefined || raw.trim() === '') {
    return DEFAULT_TIMEOUT_MS;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new InvalidArgumentError(`REST_CLIENT_TIMEOUT_MS must be a non-negative integer, got "${raw}"`);
  }
  return value;
};

/**
 * Read client settings from the environment.
 */
export const loadRestClientConfig = (env: NodeJS.ProcessEnv = process.env): RestClientConfig => {
  const proxyUrl = env.REST_CLIENT_PROXY_URL?.trim();

  return {
    serverUrl: env.REST_CLIENT_SERVER_URL?.trim() || undefined,
    timeoutMs: parseTimeout(env.REST_CLIENT_TIMEOUT_MS),
    proxy: proxyUrl ? { uri: proxyUrl } : undefined,
    logLevel: parseLogLevel(env.REST_CLIENT_LOG_LEVEL),
  };
};
