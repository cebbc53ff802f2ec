import { InterruptedOperationError } from './error';

export interface BackoffConfig {
  initialDelay: number;
  maxDelay: number;
  backoffFactor: number;
}

// Delays used while a long request is still running on the server
export const longRequestBackoff: BackoffConfig = {
  initialDelay: 2000,
  maxDelay: 10_000,
  backoffFactor: 1.5,
};

export const nextDelay = (delay: number, config: BackoffConfig = longRequestBackoff): number => {
  return Math.min(config.maxDelay, Math.floor(delay * config.backoffFactor));
};

export type Sleeper = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Wait for `ms` milliseconds. Aborting the signal cancels the timer and rejects
 * with an InterruptedOperationError.
 */
export const sleep: Sleeper = (ms, signal) => {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new InterruptedOperationError({ cause: signal.reason }));
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(new InterruptedOperationError({ cause: signal?.reason }));
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
};
