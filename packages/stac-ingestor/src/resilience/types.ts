/**
 * Resilience Types
 */

/**
 * Retry policy with exponential backoff and jitter
 */
export interface RetryConfig {
  /** Total attempts, first try included */
  readonly maxAttempts: number;
  readonly initialDelayMs: number;
  readonly maxDelayMs: number;
  readonly backoffMultiplier: number;
  /** 0-1; delay varies within [delay * (1 - f), delay * (1 + f)] */
  readonly jitterFactor: number;
  /** Only errors matching this predicate are retried */
  readonly isRetryable: (error: Error) => boolean;
}

export interface RetryAttempt {
  readonly attemptNumber: number;
  /** Delay scheduled before the next attempt (0 on the final attempt) */
  readonly delayMs: number;
  readonly totalElapsedMs: number;
  readonly error: Error;
  readonly retryable: boolean;
}

export interface BulkheadConfig {
  readonly name: string;
  readonly maxConcurrent: number;
  /** Requests allowed to wait for a slot; beyond this they are rejected */
  readonly maxQueueSize: number;
  /** Maximum time a request may wait for a slot (unset = wait indefinitely) */
  readonly queueTimeoutMs?: number;
}

export interface BulkheadStats {
  readonly name: string;
  readonly activeCount: number;
  readonly queuedCount: number;
  readonly rejectedCount: number;
  readonly completedCount: number;
  readonly avgExecutionMs: number;
}
