/**
 * Fixed-attempt retry with linear backoff (attempt N waits delay * N)
 */

import { TransportError } from '../errors.js';

export interface LinearRetryOptions {
  attempts: number;
  delayMs: number;
  isRetryable?: (error: unknown) => boolean;
  onRetry?: (attempt: number, error: unknown, delayMs: number) => void;
  sleep?: (ms: number) => Promise<void>;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Transport failures are retried unless marked otherwise; anything else is not
 */
export function isRetryableTransportError(error: unknown): boolean {
  return error instanceof TransportError && error.retryable;
}

/**
 * Delay before the next attempt; a server-sent Retry-After wins when longer
 */
export function retryDelay(attempt: number, delayMs: number, error: unknown): number {
  const linear = delayMs * attempt;
  if (error instanceof TransportError && error.retryAfterMs !== undefined) {
    return Math.max(linear, error.retryAfterMs);
  }
  return linear;
}

/**
 * Run an operation, retrying failures up to `attempts` times in total.
 * The last error is rethrown once attempts are exhausted.
 */
export async function withLinearRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: LinearRetryOptions
): Promise<T> {
  const attempts = Math.max(1, options.attempts);
  const isRetryable = options.isRetryable ?? isRetryableTransportError;
  const wait = options.sleep ?? sleep;

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (attempt >= attempts || !isRetryable(error)) {
        throw error;
      }
      const delay = retryDelay(attempt, options.delayMs, error);
      options.onRetry?.(attempt, error, delay);
      await wait(delay);
    }
  }
}
