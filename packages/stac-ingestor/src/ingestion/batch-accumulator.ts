/**
 * Batch Accumulator
 *
 * Groups validated records into bounded batches so the catalog store sees
 * one bulk write per batch instead of one write per record.
 *
 * SEAL TRIGGERS (whichever comes first):
 * - the open batch reaches maxBatchSize
 * - maxWaitMs elapses since the open batch received its first record
 * - an explicit flush()
 *
 * CONCURRENCY: offer() and flush() run to completion without yielding, so
 * on the event loop they form a single-writer critical section. A sealed
 * batch is frozen before it leaves the accumulator.
 */

import { randomUUID } from 'node:crypto';
import { DuplicateSubmissionError } from '../core/errors.js';
import type { Batch, BatchEntry, SealTrigger } from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';

const log = createLogger({ module: 'batch-accumulator' });

export interface BatchAccumulatorOptions {
  readonly maxBatchSize: number;
  readonly maxWaitMs: number;
  /** Clock override for tests */
  readonly now?: () => number;
}

export type SealHandler = (batch: Batch) => void;

export class BatchAccumulator {
  private entries: BatchEntry[] = [];
  private readonly submissionIds = new Set<string>();
  private openedAt: number | null = null;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private sealedCount = 0;
  private readonly now: () => number;

  constructor(
    private readonly options: BatchAccumulatorOptions,
    private readonly onSeal: SealHandler
  ) {
    this.now = options.now ?? Date.now;
  }

  /**
   * Append a validated record to the open batch
   *
   * Seals and hands off the batch when it becomes full.
   *
   * @throws {DuplicateSubmissionError} If the submission is already in the open batch
   */
  offer(entry: BatchEntry): void {
    if (this.submissionIds.has(entry.submissionId)) {
      throw new DuplicateSubmissionError(entry.submissionId);
    }

    this.entries.push(entry);
    this.submissionIds.add(entry.submissionId);

    if (this.openedAt === null) {
      this.openedAt = this.now();
      this.timer = setTimeout(() => this.sealAndEmit('timeout'), this.options.maxWaitMs);
    }

    if (this.entries.length >= this.options.maxBatchSize) {
      this.sealAndEmit('size');
    }
  }

  /**
   * Seal and return the open batch, replacing it with an empty one
   *
   * The returned batch is NOT passed to the seal handler.
   *
   * @returns The sealed batch, or null when the open batch is empty
   */
  flush(): Batch | null {
    return this.seal('manual');
  }

  /**
   * Number of records in the open batch
   */
  get pendingCount(): number {
    return this.entries.length;
  }

  get sealedBatches(): number {
    return this.sealedCount;
  }

  /**
   * Cancel the wait timer. Records still in the open batch stay there
   * until flush() is called.
   */
  close(): void {
    this.clearTimer();
  }

  private sealAndEmit(trigger: SealTrigger): void {
    const batch = this.seal(trigger);
    if (batch) {
      this.onSeal(batch);
    }
  }

  private seal(trigger: SealTrigger): Batch | null {
    this.clearTimer();

    if (this.entries.length === 0 || this.openedAt === null) {
      return null;
    }

    const batch: Batch = Object.freeze({
      id: `batch_${randomUUID()}`,
      createdAt: this.openedAt,
      sealedAt: this.now(),
      trigger,
      entries: Object.freeze(this.entries),
    });

    this.entries = [];
    this.submissionIds.clear();
    this.openedAt = null;
    this.sealedCount++;

    log.debug('Batch sealed', { batchId: batch.id, size: batch.entries.length, trigger });
    return batch;
  }

  private clearTimer(): void {
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }
}
