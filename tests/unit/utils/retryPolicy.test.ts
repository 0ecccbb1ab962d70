/**
 * RetryPolicy Unit Tests
 *
 * Tests:
 * - Transient error classification (status, code, name, message)
 * - Exponential backoff with cap and jitter
 * - Retry until success, give up after maxAttempts
 * - No retry for permanent errors
 * - Abort stops further attempts
 */

import { describe, it, expect, vi } from 'vitest';

import { RetryPolicy, errorStatus, isTransientError } from '../../../src/utils/RetryPolicy.js';

function statusError(status: number): Error {
  return Object.assign(new Error(`HTTP ${status}`), { status });
}

function noSleep() {
  return vi.fn((_ms: number, _signal?: AbortSignal) => Promise.resolve());
}

describe('isTransientError', () => {
  it('retries rate limits, overload and server errors', () => {
    expect(isTransientError(statusError(429))).toBe(true);
    expect(isTransientError(statusError(503))).toBe(true);
    expect(isTransientError(statusError(529))).toBe(true);
  });

  it('does not retry client errors', () => {
    expect(isTransientError(statusError(400))).toBe(false);
    expect(isTransientError(statusError(401))).toBe(false);
  });

  it('retries network error codes', () => {
    expect(isTransientError(Object.assign(new Error('reset'), { code: 'ECONNRESET' }))).toBe(true);
  });

  it('never retries aborts or non-errors', () => {
    const abort = new Error('aborted');
    abort.name = 'AbortError';
    expect(isTransientError(abort)).toBe(false);
    expect(isTransientError('timeout')).toBe(false);
  });

  it('falls back to the message', () => {
    expect(isTransientError(new Error('socket hang up'))).toBe(true);
    expect(isTransientError(new Error('invalid json'))).toBe(false);
  });
});

describe('errorStatus', () => {
  it('reads status, statusCode or response.status', () => {
    expect(errorStatus({ status: 404 })).toBe(404);
    expect(errorStatus({ statusCode: 502 })).toBe(502);
    expect(errorStatus({ response: { status: 403 } })).toBe(403);
    expect(errorStatus(new Error('plain'))).toBeUndefined();
  });
});

describe('RetryPolicy', () => {
  it('rejects maxAttempts below 1', () => {
    expect(() => new RetryPolicy({ maxAttempts: 0 })).toThrow(RangeError);
  });

  it('computes capped exponential delays', () => {
    const policy = new RetryPolicy({ baseDelayMs: 1000, maxDelayMs: 3000, jitter: false });

    expect(policy.delayFor(1)).toBe(1000);
    expect(policy.delayFor(2)).toBe(2000);
    expect(policy.delayFor(3)).toBe(3000);
  });

  it('applies jitter between 50% and 100%', () => {
    const policy = new RetryPolicy({ baseDelayMs: 1000 }, { random: () => 0 });

    expect(policy.delayFor(1)).toBe(500);
  });

  it('retries transient failures until success', async () => {
    const sleep = noSleep();
    const onRetry = vi.fn();
    const policy = new RetryPolicy({ maxAttempts: 3, jitter: false }, { sleep });
    const operation = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(statusError(503))
      .mockResolvedValueOnce('done');

    await expect(policy.execute(operation, { onRetry })).resolves.toBe('done');
    expect(operation).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(1000, undefined);
    expect(onRetry).toHaveBeenCalledWith(expect.objectContaining({ attempt: 1, maxAttempts: 3, delayMs: 1000 }));
  });

  it('gives up after maxAttempts and rethrows the last error', async () => {
    const policy = new RetryPolicy({ maxAttempts: 2, jitter: false }, { sleep: noSleep() });
    const last = statusError(502);
    const operation = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(statusError(503))
      .mockRejectedValueOnce(last);

    await expect(policy.execute(operation)).rejects.toBe(last);
    expect(operation).toHaveBeenCalledTimes(2);
  });

  it('does not retry permanent errors', async () => {
    const sleep = noSleep();
    const policy = new RetryPolicy({}, { sleep });
    const operation = vi.fn<(attempt: number) => Promise<string>>().mockRejectedValue(statusError(401));

    await expect(policy.execute(operation)).rejects.toThrow('HTTP 401');
    expect(operation).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('stops when the signal is aborted', async () => {
    const controller = new AbortController();
    const policy = new RetryPolicy({}, { sleep: noSleep() });
    const operation = vi.fn<(attempt: number) => Promise<string>>().mockImplementation(async () => {
      controller.abort(new Error('cancelled by user'));
      throw statusError(503);
    });

    await expect(policy.execute(operation, { signal: controller.signal })).rejects.toThrow('cancelled by user');
    expect(operation).toHaveBeenCalledTimes(1);
  });
});
