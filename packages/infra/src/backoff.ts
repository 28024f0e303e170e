// packages/infra/src/backoff.ts

export interface BackoffOptions {
  minDelay?: number; // default 1000
  maxDelay?: number; // default 30000
  jitter?: boolean; // default true
}

/** Reconnect schedule: backoff plus an attempt budget (0 = unlimited) */
export interface RetryPolicy extends BackoffOptions {
  maxAttempts?: number;
}

/**
 * Exponential backoff delay (pure apart from jitter)
 *
 * delay = min(maxDelay, 2^attempt * minDelay), plus up to 10% jitter
 */
export function computeBackoff(attempt: number, opts: BackoffOptions = {}): number {
  const { minDelay = 1000, maxDelay = 30000, jitter = true } = opts;
  const exponential = Math.min(maxDelay, Math.pow(2, Math.max(0, attempt)) * minDelay);
  if (!jitter) {
    return exponential;
  }
  return exponential + Math.floor(Math.random() * exponential * 0.1);
}

/**
 * Delay before the next try after `failedAttempts` failures,
 * or undefined once the budget is spent.
 */
export function nextRetryDelay(failedAttempts: number, policy: RetryPolicy = {}): number | undefined {
  const { maxAttempts = 0 } = policy;
  if (maxAttempts > 0 && failedAttempts >= maxAttempts) {
    return undefined;
  }
  return computeBackoff(failedAttempts - 1, policy);
}
