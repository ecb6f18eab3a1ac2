export interface BackoffPolicy {
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
}

export interface RetryPolicy extends BackoffPolicy {
  readonly maxAttempts: number;
}

export const DEFAULT_WRITE_RETRY_POLICY: RetryPolicy = Object.freeze({
  maxAttempts: 5,
  baseDelayMs: 20,
  maxDelayMs: 500,
});

export const DEFAULT_READ_BACKOFF_POLICY: BackoffPolicy = Object.freeze({
  baseDelayMs: 2,
  maxDelayMs: 25,
});

/** Delay before retry number `attempt + 1`, doubling from `baseDelayMs` and capped at `maxDelayMs`. */
export function computeBackoffDelay(attempt: number, policy: BackoffPolicy): number {
  const exponent = Math.max(0, attempt - 1);
  return Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** exponent);
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}
