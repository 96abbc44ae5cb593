/**
 * Time primitives shared by the gateway, the executor and the retry helper.
 */

import { TimeoutError } from './errors.js';

/**
 * Clock returning epoch milliseconds. Injected everywhere time matters.
 */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

/**
 * Sleep that resolves early (without throwing) when `signal` aborts.
 */
export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export const sleep: SleepFn = (ms, signal) =>
  new Promise<void>((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });

/**
 * Run `operation` with a deadline.
 *
 * The operation receives a signal that aborts on timeout or when `parent`
 * aborts. On timeout the returned promise rejects with TimeoutError even if
 * the operation ignores its signal; the timer is always cleared.
 */
export async function withTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  parent?: AbortSignal
): Promise<T> {
  const controller = new AbortController();
  const forwardAbort = (): void => {
    controller.abort(parent?.reason);
  };
  if (parent?.aborted) {
    controller.abort(parent.reason);
  } else {
    parent?.addEventListener('abort', forwardAbort, { once: true });
  }

  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new TimeoutError(timeoutMs);
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([operation(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener('abort', forwardAbort);
  }
}
