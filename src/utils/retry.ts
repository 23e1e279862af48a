/**
 * Bounded exponential backoff.
 *
 * Delay before attempt n (n >= 2) is `baseDelayMs * 2^(n-2)`, so with a 1s
 * base the schedule is 1s, 2s, 4s, ...
 */

export interface RetryOptions {
  /** Total attempts including the first one (>= 1) */
  maxAttempts: number;
  baseDelayMs: number;
  /** Returns false for errors that must not be retried */
  isRetryable: (err: unknown) => boolean;
  /** Label used in log lines, e.g. "[validation]" */
  logPrefix: string;
  /** Called with the attempt number before each attempt */
  onAttempt?: (attempt: number) => void;
}

export function backoffDelay(baseDelayMs: number, attempt: number): number {
  return baseDelayMs * 2 ** Math.max(0, attempt - 2);
}

export function sleep(ms: number): Promise<void> {
  if (ms <= 0) return Promise.resolve();
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Runs `fn` until it resolves, it throws a non-retryable error, or
 * `maxAttempts` is reached. The last error is rethrown unchanged.
 */
export async function withRetry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  const maxAttempts = Math.max(1, options.maxAttempts);

  for (let attempt = 1; ; attempt++) {
    if (attempt > 1) {
      await sleep(backoffDelay(options.baseDelayMs, attempt));
    }
    options.onAttempt?.(attempt);

    try {
      return await fn(attempt);
    } catch (err) {
      if (attempt >= maxAttempts || !options.isRetryable(err)) {
        throw err;
      }
      console.warn(`${options.logPrefix} Attempt failed, retrying`, {
        attempt,
        maxAttempts,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }
}
