export type SleepFn = (ms: number) => Promise<void>;

export interface RetryPolicy {
  maxAttempts: number;
  /** Delay before the attempt following `attempt` (1-based). */
  backoff(attempt: number): number;
  isRetryable(error: unknown): boolean;
}

export interface RetryHooks {
  sleep?: SleepFn;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

export type RetryOutcome<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: unknown; attempts: number };

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function exponentialBackoff(baseDelayMs: number, maxDelayMs: number): (attempt: number) => number {
  return (attempt) => Math.min(baseDelayMs * 2 ** (Math.max(1, attempt) - 1), maxDelayMs);
}

export function createRetryPolicy(options: {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  isRetryable: (error: unknown) => boolean;
}): RetryPolicy {
  return {
    maxAttempts: Math.max(1, options.maxAttempts),
    backoff: exponentialBackoff(options.baseDelayMs, options.maxDelayMs),
    isRetryable: options.isRetryable,
  };
}

export async function attemptWithRetry<T>(
  policy: RetryPolicy,
  operation: (attempt: number) => Promise<T>,
  hooks: RetryHooks = {},
): Promise<RetryOutcome<T>> {
  const wait = hooks.sleep ?? sleep;

  for (let attempt = 1; ; attempt += 1) {
    try {
      const value = await operation(attempt);
      return { ok: true, value, attempts: attempt };
    } catch (error) {
      if (attempt >= policy.maxAttempts || !policy.isRetryable(error)) {
        return { ok: false, error, attempts: attempt };
      }
      const delayMs = policy.backoff(attempt);
      hooks.onRetry?.(error, attempt, delayMs);
      await wait(delayMs);
    }
  }
}
