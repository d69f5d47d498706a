/**
 * Opt-in retry helper with exponential backoff and jitter.
 *
 * The client itself never retries. Callers who want to can wrap a call:
 *
 * ```ts
 * const response = await retry(() => client.completeChat(request), { maxRetries: 3 });
 * ```
 *
 *   - Exponential backoff: `min(baseDelay * multiplier^attempt, maxDelay)`
 *   - Jitter: `delay * random(0.5, 1.5)`
 *   - `RateLimitError.retry_after` overrides the computed delay
 *   - Only `SDKError`s with `retryable === true` are retried
 */

import { RateLimitError, SDKError } from "../types/index.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Configuration for retry behavior. */
export interface RetryPolicy {
  /** Total retry attempts (not counting the initial call). Default: 2. */
  maxRetries: number;
  /** Initial delay in milliseconds. Default: 1000. */
  baseDelay: number;
  /** Maximum delay between retries in milliseconds. Default: 60000. */
  maxDelay: number;
  /** Exponential backoff factor. Default: 2. */
  backoffMultiplier: number;
  /** Whether to add random jitter (+/- 50%). Default: true. */
  jitter: boolean;
  /** Called before each retry with the error, attempt number, and delay. */
  onRetry?: (error: SDKError, attempt: number, delay: number) => void;
  /** Replaceable for tests. Default: a `setTimeout` promise. */
  sleep?: (ms: number) => Promise<void>;
}

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

const DEFAULT_POLICY: RetryPolicy = {
  maxRetries: 2,
  baseDelay: 1000,
  maxDelay: 60000,
  backoffMultiplier: 2,
  jitter: true,
};

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

/**
 * Calculate the delay for a given attempt.
 *
 * `attempt` is 0-indexed (first retry = attempt 0).
 */
export function calculateDelay(attempt: number, policy: RetryPolicy): number {
  const delay = Math.min(
    policy.baseDelay * Math.pow(policy.backoffMultiplier, attempt),
    policy.maxDelay,
  );
  return policy.jitter ? delay * (0.5 + Math.random()) : delay;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Delay before the next attempt, or `undefined` when the server asked for a
 * longer wait than `maxDelay` allows.
 */
function delayFor(error: SDKError, attempt: number, policy: RetryPolicy): number | undefined {
  if (error instanceof RateLimitError && error.retry_after !== undefined && error.retry_after > 0) {
    const retryAfterMs = error.retry_after * 1000;
    return retryAfterMs > policy.maxDelay ? undefined : retryAfterMs;
  }
  return calculateDelay(attempt, policy);
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Execute `fn`, retrying retryable `SDKError`s according to the policy.
 *
 * Non-retryable errors, non-SDK errors and rate limits asking for more than
 * `maxDelay` are re-thrown immediately.
 */
export async function retry<T>(
  fn: () => Promise<T>,
  policy?: Partial<RetryPolicy>,
): Promise<T> {
  const p: RetryPolicy = { ...DEFAULT_POLICY, ...policy };
  const sleep = p.sleep ?? defaultSleep;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (err: unknown) {
      if (attempt >= p.maxRetries || !(err instanceof SDKError) || !err.retryable) {
        throw err;
      }

      const delay = delayFor(err, attempt, p);
      if (delay === undefined) throw err;

      p.onRetry?.(err, attempt, delay);
      await sleep(delay);
    }
  }
}
