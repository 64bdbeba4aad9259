import { setTimeout as sleep } from 'timers/promises';

export interface RetryOptions {
  /** Total attempts including the first one. */
  attempts: number;
  delayMs: number;
  isRetryable: (error: unknown) => boolean;
  onRetry?: ((error: unknown, attempt: number) => void) | undefined;
}

/**
 * Runs fn, retrying after a fixed delay while the error is retryable and
 * attempts remain. The last error is rethrown.
 */
export async function callWithRetry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  let lastError: unknown;

  for (let attempt = 1; attempt <= options.attempts; attempt++) {
    try {
      return await fn();
    } catch (e: unknown) {
      lastError = e;
      if (attempt >= options.attempts || !options.isRetryable(e)) {
        throw e;
      }
      options.onRetry?.(e, attempt);
      await sleep(options.delayMs);
    }
  }

  throw lastError;
}
