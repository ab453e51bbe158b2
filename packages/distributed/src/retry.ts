export interface RetryOptions {
  /** Retries after the first attempt. `0` disables retrying. */
  readonly maxRetries: number;
  /** Base delay; attempt `n` waits `retryDelayMs * 2^(n - 1)` before the next try. */
  readonly retryDelayMs: number;
  /** Default: every error is retryable. */
  readonly isRetryable?: (error: unknown) => boolean;
  readonly onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}

/** Run `operation` until it succeeds, fails with a non-retryable error or runs out of retries. */
export async function withRetry<T>(operation: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  for (let attempt = 1; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      const retryable = options.isRetryable?.(error) ?? true;
      if (!retryable || attempt > options.maxRetries) throw error;

      const delayMs = options.retryDelayMs * Math.pow(2, attempt - 1);
      options.onRetry?.(error, attempt, delayMs);
      await sleep(delayMs);
    }
  }
}
