/**
 * Bounded retry with exponential backoff.
 *
 * The one retry primitive in the codebase: the executor applies it per
 * action, the LLM provider per request. Never throws; the result says whether
 * the operation eventually succeeded and how many attempts it took.
 */

import { sleep as defaultSleep, type SleepFn } from './timeout.js';

export interface RetryPolicy {
  /** Retries after the first attempt (0 = single attempt) */
  maxRetries: number;
  /** Delay before the first retry */
  baseDelayMs: number;
  /** Upper bound for any single delay */
  maxDelayMs: number;
  /** Growth factor between retries (default: 2) */
  factor?: number | undefined;
}

export interface RetryOptions extends RetryPolicy {
  /** Decide whether a failure is worth another attempt (default: always) */
  shouldRetry?: ((error: unknown, attempt: number) => boolean) | undefined;
  /** Called before each wait */
  onRetry?: ((info: { attempt: number; delayMs: number; error: unknown }) => void) | undefined;
  /** Stops retrying (not the current attempt) when aborted */
  signal?: AbortSignal | undefined;
  sleep?: SleepFn | undefined;
}

export type RetryResult<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: unknown; attempts: number };

/**
 * Delay before retry number `retry` (1-based): base * factor^(retry-1), capped.
 */
export function calculateBackoff(retry: number, policy: RetryPolicy): number {
  const factor = policy.factor ?? 2;
  const delay = policy.baseDelayMs * Math.pow(factor, Math.max(0, retry - 1));
  return Math.min(delay, policy.maxDelayMs);
}

export async function retryWithBackoff<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<RetryResult<T>> {
  const wait = options.sleep ?? defaultSleep;
  const maxAttempts = Math.max(0, options.maxRetries) + 1;
  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      const value = await operation(attempt);
      return { ok: true, value, attempts: attempt };
    } catch (error) {
      lastError = error;

      const retryable = options.shouldRetry?.(error, attempt) ?? true;
      if (!retryable || attempt === maxAttempts || options.signal?.aborted) {
        return { ok: false, error, attempts: attempt };
      }

      const delayMs = calculateBackoff(attempt, options);

      options.onRetry?.({ attempt, delayMs, error });
      await wait(delayMs, options.signal);
      if (options.signal?.aborted) {
        return { ok: false, error, attempts: attempt };
      }
    }
  }

  return { ok: false, error: lastError, attempts: maxAttempts };
}
