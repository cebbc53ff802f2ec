export { RestClient, createRestClientFromEnv } from './client';
export type { RestClientOptions } from './client';

export * from './config';
export * from './error';
export * from './backoff';
export * from './http';
export * from './logger';

export * from './longPoll';
export * from './responseValidator';
