import { describe, expect, it, vi } from 'vitest';
import {
  DEFAULT_RETRY_POLICY,
  backoffDelay,
  classify,
  mergePolicy,
  withRetry,
  type AttemptResult,
  type RetryPolicy,
} from '../../src/retry.js';
import type { FailureDetail } from '../../src/types.js';

const policy: RetryPolicy = { ...DEFAULT_RETRY_POLICY, maxAttempts: 3, baseBackoff: 100, backoffMultiplier: 2 };

const connectionFailure: FailureDetail = { kind: 'transport', reason: 'connection', message: 'ECONNRESET' };
const protocolFailure: FailureDetail = { kind: 'transport', reason: 'protocol', message: 'bad response' };
const assertionFailure: FailureDetail = {
  kind: 'assertion',
  message: 'Status mismatch: expected 200, got 404',
  mismatch: {
    check: 'status',
    locator: 'status',
    reason: 'unequal',
    expected: 200,
    actual: 404,
    message: 'Status mismatch: expected 200, got 404',
  },
};

const noWait = (_ms: number) => Promise.resolve(true);

describe('classify', () => {
  it('treats connection errors and timeouts as transient', () => {
    expect(classify({ ok: false, failures: [connectionFailure] }, policy)).toBe('transient');
    expect(classify({ ok: false, failures: [{ ...connectionFailure, reason: 'timeout' }] }, policy)).toBe('transient');
  });

  it('never retries protocol errors', () => {
    expect(classify({ ok: false, failures: [protocolFailure] }, policy)).toBe('terminal');
  });

  it('retries statuses only when the policy lists them', () => {
    const result: AttemptResult<null> = { ok: false, status: 503, failures: [assertionFailure] };
    expect(classify(result, policy)).toBe('terminal');
    expect(classify(result, { ...policy, retryableStatuses: [503] })).toBe('transient');
  });

  it('retries assertion mismatches only when opted in', () => {
    const result: AttemptResult<null> = { ok: false, status: 404, failures: [assertionFailure] };
    expect(classify(result, { ...policy, retryAssertions: true })).toBe('transient');
  });
});

describe('backoffDelay', () => {
  it('grows geometrically from the base', () => {
    expect([1, 2, 3].map((n) => backoffDelay(policy, n))).toEqual([100, 200, 400]);
  });
});

describe('mergePolicy', () => {
  it('lets per-test overrides win', () => {
    expect(mergePolicy(policy, { attempts: 5, retryOn: [502] })).toEqual({
      ...policy,
      maxAttempts: 5,
      retryableStatuses: [502],
    });
    expect(mergePolicy(policy, undefined)).toBe(policy);
  });
});

describe('withRetry', () => {
  it('reports flaky when a later attempt succeeds', async () => {
    const attempt = vi.fn()
      .mockResolvedValueOnce({ ok: false, failures: [connectionFailure] })
      .mockResolvedValueOnce({ ok: false, failures: [connectionFailure] })
      .mockResolvedValueOnce({ ok: true, value: 'done' });
    const wait = vi.fn(noWait);

    const result = await withRetry<string>(attempt, policy, { wait });

    expect(result.status).toBe('flaky');
    expect(result.attempts).toBe(3);
    expect(result.last).toEqual({ ok: true, value: 'done' });
    expect(wait.mock.calls.map(([ms]) => ms)).toEqual([100, 200]);
  });

  it('does not retry a deterministic assertion failure', async () => {
    const attempt = vi.fn().mockResolvedValue({ ok: false, status: 404, failures: [assertionFailure] });
    const result = await withRetry(attempt, policy, { wait: noWait });
    expect(result.status).toBe('failed');
    expect(result.attempts).toBe(1);
    expect(attempt).toHaveBeenCalledTimes(1);
  });

  it('waits only between attempts', async () => {
    const attempt = vi.fn().mockResolvedValue({ ok: false, failures: [connectionFailure] });
    const wait = vi.fn(noWait);
    const result = await withRetry(attempt, policy, { wait });
    expect(result.status).toBe('failed');
    expect(result.attempts).toBe(3);
    expect(wait).toHaveBeenCalledTimes(2);
  });

  it('passes first time without waiting', async () => {
    const wait = vi.fn(noWait);
    const result = await withRetry(() => Promise.resolve({ ok: true as const, value: 1 }), policy, { wait });
    expect(result).toEqual({ status: 'passed', attempts: 1, last: { ok: true, value: 1 } });
    expect(wait).not.toHaveBeenCalled();
  });

  it('stops when the signal aborts during backoff', async () => {
    const controller = new AbortController();
    const attempt = vi.fn().mockResolvedValue({ ok: false, failures: [connectionFailure] });
    const wait = vi.fn(() => {
      controller.abort();
      return Promise.resolve(false);
    });
    const result = await withRetry(attempt, policy, { signal: controller.signal, wait });
    expect(result.status).toBe('cancelled');
    expect(result.attempts).toBe(1);
  });
});
