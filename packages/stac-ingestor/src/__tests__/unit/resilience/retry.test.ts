/**
 * Retry Executor Tests
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { RetryExecutor, RetryExhaustedError } from '../../../resilience/retry.js';
import type { RetryAttempt, RetryConfig } from '../../../resilience/types.js';

class TransientError extends Error {}

function config(overrides: Partial<RetryConfig> = {}): RetryConfig {
  return {
    maxAttempts: 3,
    initialDelayMs: 1,
    maxDelayMs: 10,
    backoffMultiplier: 2,
    jitterFactor: 0,
    isRetryable: (error) => error instanceof TransientError,
    ...overrides,
  };
}

describe('RetryExecutor', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should return the value and attempt count on first success', async () => {
    const executor = new RetryExecutor(config());

    expect(await executor.execute(async () => 'ok')).toEqual({ value: 'ok', attempts: 1 });
  });

  it('should retry transient failures until success', async () => {
    const onRetry = vi.fn<(attempt: RetryAttempt) => void>();
    const executor = new RetryExecutor(config(), onRetry);
    const fn = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new TransientError('busy'))
      .mockRejectedValueOnce(new TransientError('busy'))
      .mockResolvedValue('done');

    const result = await executor.execute(fn);

    expect(result).toEqual({ value: 'done', attempts: 3 });
    expect(fn.mock.calls.map(([attempt]) => attempt)).toEqual([1, 2, 3]);
    expect(onRetry.mock.calls.map(([attempt]) => attempt.delayMs)).toEqual([1, 2]);
  });

  it('should stop after maxAttempts total attempts', async () => {
    const executor = new RetryExecutor(config());
    const fn = vi.fn<() => Promise<never>>().mockRejectedValue(new TransientError('still busy'));

    const error = await executor.execute(fn).catch((e: unknown) => e);

    expect(fn).toHaveBeenCalledTimes(3);
    expect(error).toBeInstanceOf(RetryExhaustedError);
    if (error instanceof RetryExhaustedError) {
      expect(error.message).toBe('Retry exhausted after 3 attempts: still busy');
      expect(error.exhausted).toBe(true);
      expect(error.attempts.map((a) => a.delayMs)).toEqual([1, 2, 0]);
    }
  });

  it('should not retry a non-retryable failure', async () => {
    const executor = new RetryExecutor(config());
    const fatal = new Error('constraint violated');
    const fn = vi.fn<() => Promise<never>>().mockRejectedValue(fatal);

    const error = await executor.execute(fn).catch((e: unknown) => e);

    expect(fn).toHaveBeenCalledTimes(1);
    expect(error).toBeInstanceOf(RetryExhaustedError);
    if (error instanceof RetryExhaustedError) {
      expect(error.lastError).toBe(fatal);
      expect(error.exhausted).toBe(false);
    }
  });

  it('should wrap thrown non-errors', async () => {
    const executor = new RetryExecutor(config({ maxAttempts: 1 }));

    const error = await executor.execute(() => Promise.reject('plain string')).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RetryExhaustedError);
    if (error instanceof RetryExhaustedError) {
      expect(error.lastError.message).toBe('plain string');
    }
  });

  describe('calculateDelay', () => {
    it('should grow exponentially and cap at maxDelayMs', () => {
      const executor = new RetryExecutor(config({ initialDelayMs: 100, maxDelayMs: 500 }));

      expect([1, 2, 3, 4].map((n) => executor.calculateDelay(n))).toEqual([100, 200, 400, 500]);
    });

    it('should apply jitter within the configured band', () => {
      const executor = new RetryExecutor(config({ initialDelayMs: 100, jitterFactor: 0.1, maxDelayMs: 1000 }));

      vi.spyOn(Math, 'random').mockReturnValue(0);
      expect(executor.calculateDelay(1)).toBe(90);

      vi.spyOn(Math, 'random').mockReturnValue(0.5);
      expect(executor.calculateDelay(1)).toBe(100);
    });
  });
});
