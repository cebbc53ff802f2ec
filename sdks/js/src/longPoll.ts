import {
  type BackoffConfig,
  longRequestBackoff,
  nextDelay,
  sleep as defaultSleep,
  type Sleeper,
} from './backoff';
import { InterruptedOperationError } from './error';
import { HTTP_STATUS_ACCEPTED, type HttpAttempt, type HttpResponse, withResponse } from './http';
import { getDefaultLogger, type Logger } from './logger';

export interface LongPollOptions {
  // Aborting cancels the wait between attempts
  signal?: AbortSignal;
  logger?: Logger;
  backoff?: BackoffConfig;
  sleep?: Sleeper;
}

/**
 * Call `attempt` until the server stops answering 202 Accepted, waiting with a
 * growing delay between calls. The first non-202 response is returned as-is,
 * successful or not; checking its status is left to the caller.
 *
 * There is no attempt limit. Pass an AbortSignal to bound the total wait.
 * Errors thrown by `attempt` are not retried.
 */
export const runLongPoll = async (
  attempt: HttpAttempt,
  operationName: string,
  opts: LongPollOptions = {}
): Promise<HttpResponse> => {
  const {
    signal,
    logger = getDefaultLogger(),
    backoff = longRequestBackoff,
    sleep = defaultSleep,
  } = opts;

  if (signal?.aborted) {
    throw new InterruptedOperationError({ cause: signal.reason });
  }

  let delay = backoff.initialDelay;
  while (true) {
    const response = await attempt();
    if (response.statusCode !== HTTP_STATUS_ACCEPTED) {
      return response;
    }

    // The body of a 202 is never read; it is released before the wait.
    await withResponse(response, async () => {
      logger.debug(
        { operation: operationName, delayMs: delay },
        `${operationName}: Still running... Retrying in ${delay} ms`
      );
    });
    await sleep(delay, signal);

    delay = nextDelay(delay, backoff);
  }
};
