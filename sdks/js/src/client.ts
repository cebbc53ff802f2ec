import axios, { type AxiosInstance, type AxiosProxyConfig, type AxiosRequestConfig } from 'axios';
import type { BackoffConfig } from './backoff';
import { DEFAULT_TIMEOUT_MS, loadRestClientConfig, type ProxySettings } from './config';
import { InvalidArgumentError } from './error';
import { greaterThanOrEqualToZero, notNull } from './guards';
import { axiosAttempt, type HttpAttempt, type HttpResponse } from './http';
import { createLogger, getDefaultLogger, type Logger } from './logger';
import { runLongPoll } from './longPoll';
import { parseTyped, type ResponseDecoder, type StatusCodes } from './responseValidator';

export type RestClientOptions = {
  serverUrl: string;
  // Connect/read timeout in milliseconds. 0 means no timeout.
  timeoutMs?: number;
  proxy?: ProxySettings;
  logger?: Logger;
  // Delays between polls of a long request
  longPoll?: BackoffConfig;
  defaultHeaders?: Record<string, string>;
  // Additional axios config override if needed
  axiosConfigOverride?: AxiosRequestConfig;
};

const DEFAULT_PORTS: Record<string, number> = {
  'http:': 80,
  'https:': 443,
};

const toAxiosProxy = (proxy: ProxySettings): AxiosProxyConfig => {
  let url: URL;
  try {
    url = new URL(proxy.uri);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new InvalidArgumentError(`Invalid proxy URI: ${reason}`, { cause: err });
  }
  if (!url.hostname) {
    throw new InvalidArgumentError(`Invalid proxy URI: missing host in ${proxy.uri}`);
  }

  const config: AxiosProxyConfig = {
    protocol: url.protocol.replace(/:$/, ''),
    host: url.hostname,
    port: url.port ? Number(url.port) : DEFAULT_PORTS[url.protocol] ?? 80,
  };
  if (proxy.username !== undefined) {
    config.auth = { username: proxy.username, password: proxy.password ?? '' };
  }
  return config;
};

type TransportSettings = {
  serverUrl: string;
  timeoutMs: number;
  proxy?: ProxySettings;
  headers: Record<string, string>;
  axiosConfigOverride?: AxiosRequestConfig;
};

const buildHttpClient = (settings: TransportSettings): AxiosInstance => {
  return axios.create({
    baseURL: settings.serverUrl,
    timeout: settings.timeoutMs,
    headers: settings.headers,
    proxy: settings.proxy ? toAxiosProxy(settings.proxy) : false,
    ...settings.axiosConfigOverride,
  });
};

/**
 * REST client for services that complete requests asynchronously: the server
 * answers 202 Accepted until the result is ready, and the client keeps polling.
 */
export class RestClient {
  private settings: TransportSettings;
  private readonly longPoll?: BackoffConfig;
  private http: AxiosInstance;

  protected readonly logger: Logger;

  constructor(opts: RestClientOptions) {
    notNull(opts.serverUrl, 'serverUrl');
    const timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    greaterThanOrEqualToZero(timeoutMs, 'timeout');

    this.settings = {
      serverUrl: opts.serverUrl,
      timeoutMs,
      proxy: opts.proxy,
      headers: opts.defaultHeaders ?? { Accept: 'application/json' },
      axiosConfigOverride: opts.axiosConfigOverride,
    };
    this.longPoll = opts.longPoll;
    this.logger = opts.logger ?? getDefaultLogger();
    this.http = buildHttpClient(this.settings);
  }

  /**
   * Sets the proxy settings to be used by the client. Pass undefined to
   * connect directly.
   */
  setProxy(proxy: ProxySettings | undefined): void {
    this.rebuild({ ...this.settings, proxy });
  }

  getProxy(): ProxySettings | undefined {
    return this.settings.proxy;
  }

  /**
   * Sets the connect/read timeout in milliseconds. 0 means no timeout.
   */
  setTimeout(timeoutMs: number): void {
    greaterThanOrEqualToZero(timeoutMs, 'timeout');
    this.rebuild({ ...this.settings, timeoutMs });
  }

  getTimeout(): number {
    return this.settings.timeoutMs;
  }

  setServerUrl(serverUrl: string): void {
    notNull(serverUrl, 'serverUrl');
    this.settings = { ...this.settings, serverUrl };
    this.http.defaults.baseURL = serverUrl;
  }

  getServerUrl(): string {
    return this.settings.serverUrl;
  }

  // Settings are only committed once the new transport has been built
  private rebuild(settings: TransportSettings): void {
    this.http = buildHttpClient(settings);
    this.settings = settings;
  }

  /**
   * An HttpAttempt issuing `config` through the client's current transport.
   */
  attempt(config: AxiosRequestConfig): HttpAttempt {
    return axiosAttempt(this.http, config);
  }

  sendLongRequest(attempt: HttpAttempt, name: string, signal?: AbortSignal): Promise<HttpResponse> {
    return runLongPoll(attempt, name, { signal, logger: this.logger, backoff: this.longPoll });
  }

  parseResponseWithJsonData<T>(
    response: HttpResponse,
    validStatusCodes: StatusCodes,
    decoder: ResponseDecoder<T>
  ): Promise<T> {
    return parseTyped(response, validStatusCodes, decoder);
  }

  /**
   * Issue `config`, poll while the server reports the operation as running,
   * then validate and decode the final response.
   */
  async longRequest<T>(
    config: AxiosRequestConfig,
    name: string,
    validStatusCodes: StatusCodes,
    decoder: ResponseDecoder<T>,
    signal?: AbortSignal
  ): Promise<T> {
    const response = await this.sendLongRequest(this.attempt(config), name, signal);
    return this.parseResponseWithJsonData(response, validStatusCodes, decoder);
  }
}

/**
 * Build a client from REST_CLIENT_* environment variables.
 */
export function createRestClientFromEnv(env: NodeJS.ProcessEnv = process.env): RestClient {
  const config = loadRestClientConfig(env);
  if (!config.serverUrl) {
    throw new InvalidArgumentError('REST_CLIENT_SERVER_URL is not set');
  }
  return new RestClient({
    serverUrl: config.serverUrl,
    timeoutMs: config.timeoutMs,
    proxy: config.proxy,
    logger: createLogger({ level: config.logLevel }),
  });
}
