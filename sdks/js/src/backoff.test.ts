import { afterEach, describe, expect, it, vi } from 'vitest';
import { longRequestBackoff, nextDelay, sleep } from './backoff';
import { InterruptedOperationError } from './error';

describe('nextDelay', () => {
  it('grows by half and rounds down', () => {
    expect(nextDelay(2000)).toBe(3000);
    expect(nextDelay(3000)).toBe(4500);
    expect(nextDelay(4500)).toBe(6750);
    expect(nextDelay(3333)).toBe(4999);
  });

  it('never exceeds the maximum delay', () => {
    expect(nextDelay(6750)).toBe(longRequestBackoff.maxDelay);
    expect(nextDelay(10_000)).toBe(10_000);
  });

  it('follows a custom configuration', () => {
    expect(nextDelay(100, { initialDelay: 100, maxDelay: 1000, backoffFactor: 3 })).toBe(300);
  });
});

describe('sleep', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('resolves once the delay has passed', async () => {
    vi.useFakeTimers();
    const done = vi.fn();
    const pending = sleep(1000).then(done);

    await vi.advanceTimersByTimeAsync(999);
    expect(done).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(1);
    await pending;
    expect(done).toHaveBeenCalledTimes(1);
  });

  it('rejects when the signal aborts and clears its timer', async () => {
    vi.useFakeTimers();
    const controller = new AbortController();
    const pending = sleep(5000, controller.signal);

    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(InterruptedOperationError);
    expect(vi.getTimerCount()).toBe(0);
  });

  it('rejects at once when the signal is already aborted', async () => {
    const controller = new AbortController();
    const reason = new Error('deadline exceeded');
    controller.abort(reason);

    const err = await sleep(5000, controller.signal).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(InterruptedOperationError);
    expect(err).toMatchObject({ message: 'Long request interrupted!', cause: reason });
  });
});
