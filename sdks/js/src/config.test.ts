import { describe, expect, it } from 'vitest';
import { DEFAULT_TIMEOUT_MS, loadRestClientConfig } from './config';
import { InvalidArgumentError } from './error';

describe('loadRestClientConfig', () => {
  it('falls back to defaults', () => {
    expect(loadRestClientConfig({})).toEqual({
      serverUrl: undefined,
      timeoutMs: DEFAULT_TIMEOUT_MS,
      proxy: undefined,
      logLevel: 'info',
    });
    expect(DEFAULT_TIMEOUT_MS).toBe(300_000);
  });

  it('reads every setting from the environment', () => {
    const config = loadRestClientConfig({
      REST_CLIENT_SERVER_URL: ' https://api.example.test ',
      REST_CLIENT_TIMEOUT_MS: '0',
      REST_CLIENT_PROXY_URL: 'http://proxy.example.test:3128',
      REST_CLIENT_LOG_LEVEL: 'debug',
    });

    expect(config).toEqual({
      serverUrl: 'https://api.example.test',
      timeoutMs: 0,
      proxy: { uri: 'http://proxy.example.test:3128' },
      logLevel: 'debug',
    });
  });

  it.each(['abc', '-1', '1.5'])('rejects timeout %s', (raw) => {
    expect(() => loadRestClientConfig({ REST_CLIENT_TIMEOUT_MS: raw })).toThrow(InvalidArgumentError);
  });

  it('treats an empty log level as unset', () => {
    expect(loadRestClientConfig({ REST_CLIENT_LOG_LEVEL: '' }).logLevel).toBe('info');
  });

  it('rejects a log level pino does not know', () => {
    expect(() => loadRestClientConfig({ REST_CLIENT_LOG_LEVEL: 'verbose' })).toThrow(
      new InvalidArgumentError('REST_CLIENT_LOG_LEVEL must be a pino level, got "verbose"')
    );
  });
});
