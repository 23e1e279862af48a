/**
 * Tests for bounded exponential backoff
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { backoffDelay, withRetry } from '../retry.js';

const options = {
  maxAttempts: 3,
  baseDelayMs: 0,
  isRetryable: () => true,
  logPrefix: '[test]',
};

describe('backoffDelay', () => {
  it('doubles from the base delay starting at the second attempt', () => {
    expect([2, 3, 4, 5].map((attempt) => backoffDelay(1000, attempt))).toEqual([1000, 2000, 4000, 8000]);
  });
});

describe('withRetry', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('returns the first successful result', async () => {
    const fn = vi.fn().mockResolvedValue('ok');

    await expect(withRetry(fn, options)).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(1);
    expect(fn).toHaveBeenCalledWith(1);
  });

  it('retries until success', async () => {
    const fn = vi.fn().mockRejectedValueOnce(new Error('one')).mockResolvedValueOnce('two');

    await expect(withRetry(fn, options)).resolves.toBe('two');
    expect(fn.mock.calls).toEqual([[1], [2]]);
  });

  it('rethrows the last error after maxAttempts', async () => {
    const fn = vi
      .fn()
      .mockRejectedValueOnce(new Error('first'))
      .mockRejectedValueOnce(new Error('second'))
      .mockRejectedValueOnce(new Error('third'));

    await expect(withRetry(fn, options)).rejects.toThrow('third');
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('does not retry a non-retryable error', async () => {
    const fn = vi.fn().mockRejectedValue(new Error('fatal'));

    await expect(withRetry(fn, { ...options, isRetryable: () => false })).rejects.toThrow('fatal');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('waits between attempts', async () => {
    vi.useFakeTimers();
    const fn = vi.fn().mockRejectedValueOnce(new Error('once')).mockResolvedValueOnce('done');

    const result = withRetry(fn, { ...options, baseDelayMs: 1000 });
    await vi.advanceTimersByTimeAsync(999);
    expect(fn).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(1);
    await expect(result).resolves.toBe('done');
    expect(fn).toHaveBeenCalledTimes(2);
  });
});
