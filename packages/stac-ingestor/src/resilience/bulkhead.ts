/**
 * Bulkhead Isolation Pattern
 *
 * Limits concurrent executions per operation type and queues overflow.
 * The coordinator runs one bulkhead for record validation (bounded queue,
 * overflow deferred) and one for batch commits (backpressure on the store).
 *
 * DESIGN:
 * - Limit concurrent executions
 * - Queue overflow requests, optionally with a wait timeout
 * - Fail fast when the queue is full
 */

import type { BulkheadConfig, BulkheadStats } from './types.js';

/**
 * Bulkhead rejection error (thrown when capacity exceeded)
 */
export class BulkheadRejectionError extends Error {
  readonly bulkheadName: string;
  readonly stats: BulkheadStats;

  constructor(bulkheadName: string, stats: BulkheadStats) {
    super(`Bulkhead '${bulkheadName}' capacity exceeded`);
    this.name = 'BulkheadRejectionError';
    this.bulkheadName = bulkheadName;
    this.stats = stats;
  }
}

/**
 * Queue timeout error (thrown when request times out in queue)
 */
export class QueueTimeoutError extends Error {
  readonly queueWaitMs: number;
  readonly timeoutMs: number;

  constructor(queueWaitMs: number, timeoutMs: number) {
    super(`Queue timeout after ${queueWaitMs}ms (limit: ${timeoutMs}ms)`);
    this.name = 'QueueTimeoutError';
    this.queueWaitMs = queueWaitMs;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Queued execution request
 */
interface QueuedRequest {
  readonly start: () => void;
  readonly reject: (error: Error) => void;
  timeoutHandle?: ReturnType<typeof setTimeout>;
}

/**
 * Bulkhead Isolator
 *
 * @example
 * ```typescript
 * const bulkhead = new Bulkhead({
 *   name: 'validation',
 *   maxConcurrent: 16,
 *   maxQueueSize: 1000,
 * });
 *
 * const verdict = await bulkhead.execute(() => pipeline.process(payload));
 * ```
 */
export class Bulkhead {
  private readonly config: BulkheadConfig;
  private activeCount = 0;
  private readonly queue: QueuedRequest[] = [];
  private rejectedCount = 0;
  private completedCount = 0;
  private totalExecutionMs = 0;

  constructor(config: BulkheadConfig) {
    this.config = config;
  }

  /**
   * Execute function with bulkhead protection
   *
   * @throws {BulkheadRejectionError} When no slot and no queue capacity remain
   * @throws {QueueTimeoutError} When the request waited longer than queueTimeoutMs
   */
  async execute<T>(fn: () => Promise<T>): Promise<T> {
    if (this.activeCount < this.config.maxConcurrent) {
      return this.executeImmediate(fn);
    }

    if (this.queue.length >= this.config.maxQueueSize) {
      this.rejectedCount++;
      throw new BulkheadRejectionError(this.config.name, this.getStats());
    }

    return this.enqueue(fn);
  }

  private async executeImmediate<T>(fn: () => Promise<T>): Promise<T> {
    this.activeCount++;
    const startTime = Date.now();

    try {
      return await fn();
    } finally {
      this.activeCount--;
      this.completedCount++;
      this.totalExecutionMs += Date.now() - startTime;

      this.processNextQueued();
    }
  }

  private enqueue<T>(fn: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const queuedAt = Date.now();

      const request: QueuedRequest = {
        start: () => {
          this.executeImmediate(fn).then(resolve, reject);
        },
        reject,
      };

      const timeoutMs = this.config.queueTimeoutMs;
      if (timeoutMs !== undefined) {
        request.timeoutHandle = setTimeout(() => {
          const index = this.queue.indexOf(request);
          if (index !== -1) {
            this.queue.splice(index, 1);
          }
          reject(new QueueTimeoutError(Date.now() - queuedAt, timeoutMs));
        }, timeoutMs);
      }

      this.queue.push(request);
    });
  }

  private processNextQueued(): void {
    if (this.activeCount >= this.config.maxConcurrent) {
      return;
    }

    const request = this.queue.shift();
    if (!request) {
      return;
    }

    if (request.timeoutHandle) {
      clearTimeout(request.timeoutHandle);
    }

    request.start();
  }

  /**
   * Get current bulkhead statistics
   */
  getStats(): BulkheadStats {
    return {
      name: this.config.name,
      activeCount: this.activeCount,
      queuedCount: this.queue.length,
      rejectedCount: this.rejectedCount,
      completedCount: this.completedCount,
      avgExecutionMs:
        this.completedCount > 0 ? this.totalExecutionMs / this.completedCount : 0,
    };
  }
}
