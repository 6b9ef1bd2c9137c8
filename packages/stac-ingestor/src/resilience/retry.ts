/**
 * Retry with Exponential Backoff
 *
 * Retries failed operations with exponential backoff and jitter.
 *
 * DESIGN:
 * - Exponential backoff: delay = initial * (multiplier ^ (attempt - 1)), capped
 * - Jitter: randomness prevents synchronized retries across batches
 * - Retry predicate: only transient failures are retried
 */

import type { RetryAttempt, RetryConfig } from './types.js';

/**
 * Retry exhausted error (thrown after the final attempt or a non-retryable failure)
 */
export class RetryExhaustedError extends Error {
  readonly attempts: readonly RetryAttempt[];
  readonly lastError: Error;

  constructor(attempts: readonly RetryAttempt[], lastError: Error) {
    super(`Retry exhausted after ${attempts.length} attempts: ${lastError.message}`);
    this.name = 'RetryExhaustedError';
    this.attempts = attempts;
    this.lastError = lastError;
  }

  /**
   * True when the last failure was retryable (i.e. attempts ran out)
   */
  get exhausted(): boolean {
    return this.attempts[this.attempts.length - 1]?.retryable ?? false;
  }
}

/**
 * Retry executor with exponential backoff
 *
 * @example
 * ```typescript
 * const retry = new RetryExecutor({
 *   maxAttempts: 4,
 *   initialDelayMs: 200,
 *   maxDelayMs: 5000,
 *   backoffMultiplier: 2,
 *   jitterFactor: 0.1,
 *   isRetryable: (error) => error instanceof StoreUnavailableError,
 * });
 *
 * const results = await retry.execute(() => store.bulkWrite(items));
 * ```
 */
export class RetryExecutor {
  private readonly config: RetryConfig;
  private readonly onRetry?: (attempt: RetryAttempt) => void;

  constructor(config: RetryConfig, onRetry?: (attempt: RetryAttempt) => void) {
    this.config = config;
    this.onRetry = onRetry;
  }

  /**
   * Execute function with retry logic
   *
   * @throws {RetryExhaustedError} With every recorded attempt
   */
  async execute<T>(fn: (attemptNumber: number) => Promise<T>): Promise<{ value: T; attempts: number }> {
    const attempts: RetryAttempt[] = [];
    const startTime = Date.now();

    for (let attempt = 1; ; attempt++) {
      try {
        const value = await fn(attempt);
        return { value, attempts: attempt };
      } catch (error) {
        const lastError = error instanceof Error ? error : new Error(String(error));
        const retryable = this.config.isRetryable(lastError);
        const isLastAttempt = attempt >= this.config.maxAttempts;
        const delay = retryable && !isLastAttempt ? this.calculateDelay(attempt) : 0;

        const attemptRecord: RetryAttempt = {
          attemptNumber: attempt,
          delayMs: delay,
          totalElapsedMs: Date.now() - startTime,
          error: lastError,
          retryable,
        };
        attempts.push(attemptRecord);

        if (!retryable || isLastAttempt) {
          throw new RetryExhaustedError(attempts, lastError);
        }

        this.onRetry?.(attemptRecord);
        await this.sleep(delay);
      }
    }
  }

  /**
   * Calculate exponential backoff delay with jitter
   */
  calculateDelay(attempt: number): number {
    const exponentialDelay =
      this.config.initialDelayMs * Math.pow(this.config.backoffMultiplier, attempt - 1);

    const cappedDelay = Math.min(exponentialDelay, this.config.maxDelayMs);

    // Jitter range: [delay * (1 - jitterFactor), delay * (1 + jitterFactor)]
    const jitterRange = cappedDelay * this.config.jitterFactor;
    const jitter = Math.random() * 2 * jitterRange - jitterRange;

    return Math.max(0, Math.floor(cappedDelay + jitter));
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
