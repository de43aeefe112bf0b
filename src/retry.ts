import type { FailureDetail, RetryOverrides } from './types.js';

export interface RetryPolicy {
  /** Total attempts including the first one */
  maxAttempts: number;
  /** Delay before the second attempt, in milliseconds */
  baseBackoff: number;
  backoffMultiplier: number;
  /** Response statuses treated as transient. Empty by default. */
  retryableStatuses: number[];
  /** Retry assertion mismatches on a received response */
  retryAssertions: boolean;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 1,
  baseBackoff: 200,
  backoffMultiplier: 2,
  retryableStatuses: [],
  retryAssertions: false,
};

export type AttemptResult<T> =
  | { ok: true; value: T }
  | { ok: false; failures: FailureDetail[]; status?: number; value?: T };

export type FailureClass = 'transient' | 'terminal';

export interface RetryResult<T> {
  status: 'passed' | 'flaky' | 'failed' | 'cancelled';
  attempts: number;
  /** The last attempt's result */
  last: AttemptResult<T>;
}

export function mergePolicy(base: RetryPolicy, overrides?: RetryOverrides): RetryPolicy {
  if (!overrides) return base;
  return {
    maxAttempts: overrides.attempts ?? base.maxAttempts,
    baseBackoff: overrides.backoff ?? base.baseBackoff,
    backoffMultiplier: overrides.multiplier ?? base.backoffMultiplier,
    retryableStatuses: overrides.retryOn ?? base.retryableStatuses,
    retryAssertions: overrides.assertions ?? base.retryAssertions,
  };
}

/**
 * Connection failures and timeouts are transient. A response whose status is
 * in `retryableStatuses` is transient. Other assertion mismatches are
 * deterministic unless the policy opts in; protocol errors never retry.
 */
export function classify<T>(result: AttemptResult<T>, policy: RetryPolicy): FailureClass {
  if (result.ok) return 'terminal';
  for (const failure of result.failures) {
    if (failure.kind === 'transport') {
      return failure.reason === 'protocol' ? 'terminal' : 'transient';
    }
  }
  if (result.status !== undefined && policy.retryableStatuses.includes(result.status)) {
    return 'transient';
  }
  if (policy.retryAssertions && result.failures.some((f) => f.kind === 'assertion')) {
    return 'transient';
  }
  return 'terminal';
}

/** Delay after the given failed attempt (1-based) */
export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return Math.max(0, policy.baseBackoff * policy.backoffMultiplier ** (attempt - 1));
}

export function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve(false);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve(true);
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export interface RetryOptions {
  /** Aborting stops further attempts and backoff waits */
  signal?: AbortSignal;
  wait?: (ms: number, signal?: AbortSignal) => Promise<boolean>;
  onRetry?: (attempt: number, delayMs: number) => void;
}

/**
 * Runs `attempt` until it succeeds, fails terminally, or the policy's
 * attempts are exhausted. Backoff applies only between attempts.
 */
export async function withRetry<T>(
  attempt: (attemptNumber: number) => Promise<AttemptResult<T>>,
  policy: RetryPolicy,
  options: RetryOptions = {}
): Promise<RetryResult<T>> {
  const wait = options.wait ?? sleep;
  const maxAttempts = Math.max(1, Math.floor(policy.maxAttempts));
  let attempts = 0;

  for (;;) {
    attempts += 1;
    const result = await attempt(attempts);
    if (result.ok) {
      return { status: attempts > 1 ? 'flaky' : 'passed', attempts, last: result };
    }
    if (attempts >= maxAttempts || classify(result, policy) === 'terminal') {
      return { status: 'failed', attempts, last: result };
    }
    if (options.signal?.aborted) {
      return { status: 'cancelled', attempts, last: result };
    }
    const delay = backoffDelay(policy, attempts);
    options.onRetry?.(attempts, delay);
    const waited = await wait(delay, options.signal);
    if (!waited) {
      return { status: 'cancelled', attempts, last: result };
    }
  }
}
