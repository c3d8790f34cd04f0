export interface RetryConfig {
  /** Total attempts, including the first one. */
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 8000,
  multiplier: 2,
};

export interface RetryAttempt {
  attempt: number;
  error: unknown;
  /** Delay before the next attempt, absent when giving up. */
  nextDelayMs?: number;
}

export interface RetryOptions {
  shouldRetry?: (error: unknown) => boolean;
  onFailedAttempt?: (info: RetryAttempt) => void;
  signal?: AbortSignal;
}

/** Delay before attempt `attempt + 1`, for a 1-based `attempt`. */
export function backoffDelay(config: RetryConfig, attempt: number): number {
  const delay = config.initialDelayMs * Math.pow(config.multiplier, attempt - 1);
  return Math.min(delay, config.maxDelayMs);
}

/**
 * Runs `fn` until it resolves, the error is not retryable, or attempts run out.
 * The last error is rethrown as-is so callers keep their own error types.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  config: RetryConfig = DEFAULT_RETRY_CONFIG,
  options: RetryOptions = {},
): Promise<T> {
  const shouldRetry = options.shouldRetry ?? (() => true);

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      const giveUp = attempt >= config.maxAttempts || !shouldRetry(error) || options.signal?.aborted === true;
      const nextDelayMs = giveUp ? undefined : backoffDelay(config, attempt);
      options.onFailedAttempt?.({ attempt, error, nextDelayMs });
      if (nextDelayMs === undefined) {
        throw error;
      }
      await sleep(nextDelayMs, options.signal);
      if (options.signal?.aborted) {
        throw error;
      }
    }
  }
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0 || signal?.aborted) {
    return Promise.resolve();
  }
  return new Promise((resolve) => {
    const timer = setTimeout(done, ms);
    function done() {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    }
    signal?.addEventListener('abort', done, { once: true });
  });
}
