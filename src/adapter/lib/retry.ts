export interface RetryOptions {
  attempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
}

export interface RetryHooks {
  shouldRetry: (err: unknown) => boolean;
  onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
}

export function backoffDelay(attempt: number, opts: RetryOptions): number {
  return Math.min(opts.initialDelayMs * 2 ** (attempt - 1), opts.maxDelayMs);
}

/**
 * Runs `fn` up to `opts.attempts` times, sleeping with exponential backoff
 * between attempts. Errors rejected by `shouldRetry` are rethrown at once.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  opts: RetryOptions & RetryHooks,
): Promise<T> {
  const attempts = Math.max(1, opts.attempts);

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      if (attempt >= attempts || !opts.shouldRetry(err)) {
        throw err;
      }
      const delayMs = backoffDelay(attempt, opts);
      opts.onRetry?.(err, attempt, delayMs);
      await new Promise((r) => setTimeout(r, delayMs));
    }
  }
}
