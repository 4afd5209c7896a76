/**
 * Tradeflow — Retry policy
 * One reusable exponential-backoff loop, parameterized per caller.
 */
import { CoordinatorError } from "./errors.js";

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface RetryOptions extends RetryPolicy {
  shouldRetry?: (error: unknown) => boolean;
  /** Awaited before sleeping; attempt is the one that just failed (1-based). */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void | Promise<void>;
  sleep?: (ms: number) => Promise<void>;
}

export function defaultSleep(ms: number): Promise<void> {
  return new Promise((r) => setTimeout(r, ms));
}

/** Delay before the retry that follows `attempt`: base * 2^(attempt-1), capped. */
export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  const delay = policy.baseDelayMs * 2 ** (attempt - 1);
  return Math.min(delay, policy.maxDelayMs);
}

/** Longest a retried call can run: every attempt times out and every backoff is slept. */
export function worstCaseDurationMs(policy: RetryPolicy, attemptTimeoutMs: number): number {
  let total = policy.maxAttempts * attemptTimeoutMs;
  for (let attempt = 1; attempt < policy.maxAttempts; attempt++) {
    total += backoffDelay(policy, attempt);
  }
  return total;
}

/** Coordinator errors carry their own verdict; anything else is assumed transient. */
export function isRetryable(error: unknown): boolean {
  if (error instanceof CoordinatorError) return error.retryable;
  return true;
}

/**
 * Run `fn` until it resolves or the policy gives up. `fn` receives the
 * 1-based attempt number. The last error is rethrown unchanged.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const shouldRetry = options.shouldRetry ?? isRetryable;
  const sleep = options.sleep ?? defaultSleep;
  const maxAttempts = Math.max(1, options.maxAttempts);

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      if (attempt >= maxAttempts || !shouldRetry(error)) throw error;

      const delayMs = backoffDelay(options, attempt);
      if (options.onRetry) await options.onRetry(error, attempt, delayMs);
      await sleep(delayMs);
    }
  }
}
