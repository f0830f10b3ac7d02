/**
 * Bounded retry for idempotent operations that return a Result.
 */

import type { Result } from 'neverthrow';

export interface RetryOptions<E> {
  /** Extra attempts after the first one */
  retries: number;
  /** Base delay; attempt n waits n * delayMs */
  delayMs: number;
  isRetryable: (error: E) => boolean;
  onRetry?: ((error: E, attempt: number) => void) | undefined;
  sleep?: ((ms: number) => Promise<void>) | undefined;
}

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

/**
 * Runs the operation until it succeeds, fails with a non-retryable error,
 * or the retry budget is spent. The last result is returned as-is.
 */
export const withRetry = async <T, E>(
  operation: () => Promise<Result<T, E>>,
  options: RetryOptions<E>
): Promise<Result<T, E>> => {
  const sleep = options.sleep ?? defaultSleep;
  let attempt = 0;

  for (;;) {
    const result = await operation();
    if (result.isOk() || attempt >= options.retries || !options.isRetryable(result.error)) {
      return result;
    }

    attempt += 1;
    options.onRetry?.(result.error, attempt);
    await sleep(options.delayMs * attempt);
  }
};
