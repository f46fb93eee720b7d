/**
 * Bounded retry with exponential backoff, and a client-side timeout.
 */

import { TransientStoreError } from '../errors.js';

export interface RetryPolicy {
  /** Total attempts including the first (default: 3) */
  maxAttempts: number;
  /** Delay before the second attempt in ms (default: 200) */
  initialDelayMs: number;
  /** Upper bound for any single delay in ms (default: 2000) */
  maxDelayMs: number;
  /** Multiplier applied per attempt (default: 2) */
  backoffFactor: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  initialDelayMs: 200,
  maxDelayMs: 2000,
  backoffFactor: 2,
};

export type RetryOutcome<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: unknown; attempts: number };

export interface RetryOptions {
  policy?: Partial<RetryPolicy>;
  /** Whether an error is worth another attempt */
  shouldRetry: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

/**
 * Delay before attempt `attempt + 1`, given `attempt` attempts already failed.
 */
export function computeBackoffDelay(attempt: number, policy: RetryPolicy): number {
  const delay = policy.initialDelayMs * Math.pow(policy.backoffFactor, attempt - 1);
  return Math.min(delay, policy.maxDelayMs);
}

export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<RetryOutcome<T>> {
  const policy = { ...DEFAULT_RETRY_POLICY, ...options.policy };
  const maxAttempts = Math.max(1, policy.maxAttempts);

  let attempt = 0;
  while (true) {
    attempt++;
    try {
      const value = await operation(attempt);
      return { ok: true, value, attempts: attempt };
    } catch (error) {
      if (attempt >= maxAttempts || !options.shouldRetry(error)) {
        return { ok: false, error, attempts: attempt };
      }
      const delayMs = computeBackoffDelay(attempt, policy);
      options.onRetry?.(error, attempt, delayMs);
      if (delayMs > 0) await sleep(delayMs);
    }
  }
}

/**
 * Reject with TransientStoreError if `promise` has not settled after `timeoutMs`.
 * A timeout of 0 or less disables the bound.
 */
export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  if (timeoutMs <= 0) return promise;

  let timeoutId: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(
      () => reject(new TransientStoreError(`${label} timed out after ${timeoutMs}ms`)),
      timeoutMs
    );
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timeoutId);
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Let queued I/O callbacks run between synchronous extraction steps.
 */
export function yieldToEventLoop(): Promise<void> {
  return new Promise(resolve => setImmediate(resolve));
}
