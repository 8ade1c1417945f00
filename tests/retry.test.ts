/**
 * Retry Utility Tests
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { backoffDelay, withRetry } from '../src/utils/retry.js';

describe('backoffDelay', () => {
  it('should grow linearly with the attempt number', () => {
    expect(backoffDelay(1, 1500)).toBe(1500);
    expect(backoffDelay(2, 1500)).toBe(3000);
    expect(backoffDelay(3, 1500)).toBe(4500);
  });

  it('should respect the cap', () => {
    expect(backoffDelay(5, 1500, 4000)).toBe(4000);
  });
});

describe('withRetry', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should return the first successful result', async () => {
    const operation = vi.fn().mockResolvedValue('ok');

    await expect(withRetry(operation, 3, 'test', { baseDelayMs: 0 })).resolves.toBe('ok');
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('should retry until success', async () => {
    const operation = vi
      .fn()
      .mockRejectedValueOnce(new Error('first'))
      .mockRejectedValueOnce(new Error('second'))
      .mockResolvedValue('third time');

    await expect(withRetry(operation, 3, 'test', { baseDelayMs: 0 })).resolves.toBe('third time');
    expect(operation).toHaveBeenCalledTimes(3);
  });

  it('should rethrow the last error once attempts are exhausted', async () => {
    const operation = vi
      .fn()
      .mockRejectedValueOnce(new Error('first'))
      .mockRejectedValueOnce(new Error('second'))
      .mockRejectedValueOnce(new Error('last'));

    await expect(withRetry(operation, 3, 'test', { baseDelayMs: 0 })).rejects.toThrow('last');
    expect(operation).toHaveBeenCalledTimes(3);
  });

  it('should make at least one attempt for a zero budget', async () => {
    const operation = vi.fn().mockRejectedValue(new Error('nope'));

    await expect(withRetry(operation, 0, 'test', { baseDelayMs: 0 })).rejects.toThrow('nope');
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('should stop early when shouldRetry returns false', async () => {
    const operation = vi.fn().mockRejectedValue(new Error('permanent'));
    const shouldRetry = vi.fn().mockReturnValue(false);

    await expect(withRetry(operation, 5, 'test', { baseDelayMs: 0, shouldRetry })).rejects.toThrow('permanent');
    expect(operation).toHaveBeenCalledTimes(1);
    expect(shouldRetry).toHaveBeenCalledWith(expect.any(Error), 1);
  });

  it('should wait base * attempt between attempts', async () => {
    vi.useFakeTimers();
    const delays: number[] = [];
    const operation = vi
      .fn()
      .mockRejectedValueOnce(new Error('a'))
      .mockRejectedValueOnce(new Error('b'))
      .mockResolvedValue('done');

    const promise = withRetry(operation, 3, 'test', {
      baseDelayMs: 100,
      onRetry: (_error, _attempt, delayMs) => delays.push(delayMs),
    });

    await vi.advanceTimersByTimeAsync(100);
    expect(operation).toHaveBeenCalledTimes(2);
    await vi.advanceTimersByTimeAsync(200);

    await expect(promise).resolves.toBe('done');
    expect(delays).toEqual([100, 200]);
    expect(operation).toHaveBeenCalledTimes(3);
  });
});
