/**
 * Ingestion Coordinator
 *
 * Accepts records one at a time, drives each through validation, feeds valid
 * records to the batch accumulator, commits sealed batches and resolves every
 * caller's promise with that record's own outcome.
 *
 * STATE MACHINE (per submission):
 *   received → validating → rejected
 *                         → accumulating → batched → committing → committed | rejected | deferred
 *   received | validating → cancelled (settles as a rejected outcome)
 *
 * A submission is checked for cancellation before validation starts and
 * again before it is offered to the accumulator; the status sink can report
 * cancellations made outside this process.
 *
 * BACKPRESSURE:
 * - validation bulkhead: `validation.concurrency` slots, `ingestion.maxPendingValidations`
 *   waiting; overflow is deferred immediately, and so is a submission that waited
 *   longer than `ingestion.maxQueueWaitMs`
 * - commit bulkhead: `writer.maxConcurrentCommits` batches in flight against the store
 *
 * TYPE SAFETY: Nuclear-level strictness. No `any`, no loose casts.
 */

import type { IngestorConfig } from '../core/config.js';
import { CoordinatorClosedError, DuplicateSubmissionError, IngestionStateError } from '../core/errors.js';
import { cancelledReason, deferred, rejected, storeUnavailableReason } from '../core/reasons.js';
import type {
  Batch,
  CatalogRecord,
  CommitOutcome,
  NonEmptyReasons,
  SubmissionState,
  ValidationReason,
  ValidationVerdict,
} from '../core/types.js';
import { deepFreeze } from '../core/utils/freeze.js';
import { createLogger } from '../core/utils/logger.js';
import { Bulkhead, BulkheadRejectionError, QueueTimeoutError } from '../resilience/bulkhead.js';
import type { BulkheadStats } from '../resilience/types.js';
import type { RecordValidationPipeline } from '../validators/pipeline.js';
import { BatchAccumulator } from './batch-accumulator.js';
import type { CatalogWriter, CommitReport } from './catalog-writer.js';

const log = createLogger({ module: 'coordinator' });

// ============================================================================
// Types
// ============================================================================

/**
 * One state change of one submission
 */
export interface SubmissionTransition {
  readonly submissionId: string;
  readonly state: SubmissionState;
  /** Epoch ms */
  readonly at: number;
  readonly itemId?: string;
  readonly collectionId?: string;
  readonly batchId?: string;
  readonly reasons?: readonly ValidationReason[];
}

/**
 * Receives every transition (e.g. the persistent status store)
 */
export interface IngestionStatusSink {
  record(transition: SubmissionTransition): void;
  /** True when the submission was cancelled through the sink (e.g. by an operator) */
  isCancelled?(submissionId: string): boolean;
}

/**
 * Receives batches deferred as a whole (e.g. the dead-letter queue)
 */
export interface DeadLetterSink {
  enqueue(batch: Batch, reasons: NonEmptyReasons): string;
}

export interface IngestionCoordinatorDeps {
  readonly pipeline: Pick<RecordValidationPipeline, 'process'>;
  readonly writer: Pick<CatalogWriter, 'commit'>;
  readonly config: IngestorConfig;
  readonly statusSink?: IngestionStatusSink;
  readonly deadLetters?: DeadLetterSink;
}

export interface CoordinatorStats {
  readonly submitted: number;
  readonly committed: number;
  readonly rejected: number;
  readonly deferred: number;
  /** Cancelled submissions; their outcomes are rejections but are not counted under `rejected` */
  readonly cancelled: number;
  readonly inFlight: number;
  readonly openBatchSize: number;
  readonly sealedBatches: number;
  readonly deadLetteredBatches: number;
  readonly validation: BulkheadStats;
  readonly commits: BulkheadStats;
}

interface PendingSubmission {
  state: SubmissionState;
  itemId?: string;
  collectionId?: string;
  batchId?: string;
  readonly resolve: (outcome: CommitOutcome) => void;
}

// ============================================================================
// Coordinator
// ============================================================================

export class IngestionCoordinator {
  private readonly pending = new Map<string, PendingSubmission>();
  private readonly validations = new Set<Promise<void>>();
  private readonly commits = new Set<Promise<void>>();
  private readonly listeners: Array<(transition: SubmissionTransition) => void> = [];
  private readonly accumulator: BatchAccumulator;
  private readonly validationBulkhead: Bulkhead;
  private readonly commitBulkhead: Bulkhead;
  private closed = false;
  private counters = { submitted: 0, committed: 0, rejected: 0, deferred: 0, cancelled: 0, deadLettered: 0 };

  constructor(private readonly deps: IngestionCoordinatorDeps) {
    const { config } = deps;

    this.accumulator = new BatchAccumulator(config.batch, (batch) => this.dispatch(batch));
    this.validationBulkhead = new Bulkhead({
      name: 'validation',
      maxConcurrent: config.validation.concurrency,
      maxQueueSize: config.ingestion.maxPendingValidations,
      queueTimeoutMs: config.ingestion.maxQueueWaitMs > 0 ? config.ingestion.maxQueueWaitMs : undefined,
    });
    this.commitBulkhead = new Bulkhead({
      name: 'commit',
      maxConcurrent: config.writer.maxConcurrentCommits,
      maxQueueSize: Number.POSITIVE_INFINITY,
    });
  }

  /**
   * Submit one record
   *
   * Resolves once the record is committed, rejected or deferred. The promise
   * only rejects for misuse: a closed coordinator or a submission id that is
   * already in flight.
   */
  submit(record: CatalogRecord): Promise<CommitOutcome> {
    const { submissionId } = record;

    if (this.closed) {
      return Promise.reject(new CoordinatorClosedError());
    }
    if (this.pending.has(submissionId)) {
      return Promise.reject(new DuplicateSubmissionError(submissionId));
    }

    let payload: unknown;
    try {
      payload = deepFreeze(structuredClone(record.payload));
    } catch (error) {
      this.counters.submitted++;
      this.counters.rejected++;
      return Promise.resolve(
        rejected(submissionId, [
          {
            category: 'spec_violation',
            code: 'invalid_type',
            message: `Record payload is not plain JSON: ${error instanceof Error ? error.message : String(error)}`,
          },
        ])
      );
    }

    this.counters.submitted++;

    return new Promise<CommitOutcome>((resolve) => {
      const entry: PendingSubmission = { state: 'received', resolve };
      this.pending.set(submissionId, entry);
      this.transition(submissionId, 'received');

      const task: Promise<void> = this.validate(submissionId, entry, payload).finally(() => {
        this.validations.delete(task);
      });
      this.validations.add(task);
    });
  }

  /**
   * Current state of an in-flight submission (undefined once settled)
   */
  getState(submissionId: string): SubmissionState | undefined {
    return this.pending.get(submissionId)?.state;
  }

  /**
   * Cancel a submission that has not been batched yet
   *
   * The caller's promise resolves at once with a rejected outcome carrying a
   * `cancelled` reason; a validation still running for it is discarded.
   *
   * @returns false when no such submission is in flight
   * @throws {IngestionStateError} When the submission already reached the accumulator
   */
  cancel(submissionId: string): boolean {
    const entry = this.pending.get(submissionId);
    if (!entry) {
      return false;
    }
    if (entry.state !== 'received' && entry.state !== 'validating') {
      throw new IngestionStateError(submissionId, entry.state, 'cancel');
    }

    this.settleCancelled(submissionId);
    return true;
  }

  /**
   * Subscribe to state transitions
   *
   * @returns Unsubscribe function
   */
  onTransition(listener: (transition: SubmissionTransition) => void): () => void {
    this.listeners.push(listener);
    return () => {
      const index = this.listeners.indexOf(listener);
      if (index !== -1) {
        this.listeners.splice(index, 1);
      }
    };
  }

  /**
   * Seal the open batch and wait until every in-flight submission settled
   */
  async drain(): Promise<void> {
    while (
      this.validations.size > 0 ||
      this.commits.size > 0 ||
      this.accumulator.pendingCount > 0
    ) {
      if (this.validations.size > 0) {
        await Promise.all([...this.validations]);
        continue;
      }

      const batch = this.accumulator.flush();
      if (batch) {
        this.dispatch(batch);
      }

      await Promise.all([...this.commits]);
    }
  }

  /**
   * Refuse new submissions, then drain
   */
  async close(): Promise<void> {
    this.closed = true;
    await this.drain();
    this.accumulator.close();
  }

  getStats(): CoordinatorStats {
    return {
      submitted: this.counters.submitted,
      committed: this.counters.committed,
      rejected: this.counters.rejected,
      deferred: this.counters.deferred,
      cancelled: this.counters.cancelled,
      inFlight: this.pending.size,
      openBatchSize: this.accumulator.pendingCount,
      sealedBatches: this.accumulator.sealedBatches,
      deadLetteredBatches: this.counters.deadLettered,
      validation: this.validationBulkhead.getStats(),
      commits: this.commitBulkhead.getStats(),
    };
  }

  // ==========================================================================
  // Validation
  // ==========================================================================

  private async validate(submissionId: string, entry: PendingSubmission, payload: unknown): Promise<void> {
    try {
      let verdict: ValidationVerdict | null;
      try {
        verdict = await this.validationBulkhead.execute(async () => {
          if (!this.isCurrent(submissionId, entry) || this.wasCancelled(submissionId)) {
            return null;
          }
          this.transition(submissionId, 'validating');
          return this.deps.pipeline.process(payload);
        });
      } catch (error) {
        if (this.isCurrent(submissionId, entry)) {
          this.settle(deferred(submissionId, [validationFailureReason(error)]));
        }
        return;
      }

      if (!this.isCurrent(submissionId, entry)) {
        return;
      }
      if (verdict === null || this.wasCancelled(submissionId)) {
        this.settleCancelled(submissionId);
        return;
      }
      if (verdict.status === 'invalid') {
        this.settle(rejected(submissionId, verdict.reasons));
        return;
      }

      entry.itemId = verdict.item.id;
      entry.collectionId = verdict.item.collection;

      this.transition(submissionId, 'accumulating');
      this.accumulator.offer({ submissionId, item: verdict.item });
    } catch (error) {
      log.error('Unexpected failure while validating submission', {
        submissionId,
        error: error instanceof Error ? error.message : String(error),
      });
      if (this.isCurrent(submissionId, entry)) {
        this.settle(
          deferred(submissionId, [
            storeUnavailableReason(
              'internal_error',
              `Submission could not be processed: ${error instanceof Error ? error.message : String(error)}`
            ),
          ])
        );
      }
    }
  }

  /**
   * False once the submission settled (or its id was reused by a later submission)
   */
  private isCurrent(submissionId: string, entry: PendingSubmission): boolean {
    return this.pending.get(submissionId) === entry;
  }

  private wasCancelled(submissionId: string): boolean {
    try {
      return this.deps.statusSink?.isCancelled?.(submissionId) ?? false;
    } catch (error) {
      log.error('Status sink failed to report cancellation', {
        submissionId,
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }

  // ==========================================================================
  // Commit
  // ==========================================================================

  /**
   * Hand a sealed batch to the writer (through the commit bulkhead)
   */
  private dispatch(batch: Batch): void {
    for (const entry of batch.entries) {
      const pending = this.pending.get(entry.submissionId);
      if (pending) {
        pending.batchId = batch.id;
      }
      this.transition(entry.submissionId, 'batched');
    }

    const task: Promise<void> = this.commitBulkhead
      .execute(() => this.commitBatch(batch))
      .catch((error: unknown) => {
        this.deferBatch(batch, error);
      })
      .finally(() => {
        this.commits.delete(task);
      });
    this.commits.add(task);
  }

  private async commitBatch(batch: Batch): Promise<void> {
    for (const entry of batch.entries) {
      this.transition(entry.submissionId, 'committing');
    }

    let report: CommitReport;
    try {
      report = await this.deps.writer.commit(batch);
    } catch (error) {
      this.deferBatch(batch, error);
      return;
    }

    for (const outcome of report.outcomes) {
      this.settle(outcome);
    }

    const deferredOutcomes = report.outcomes.filter((o) => o.status === 'deferred');
    if (deferredOutcomes.length === batch.entries.length) {
      const first = deferredOutcomes[0];
      if (first && first.status === 'deferred') {
        this.deadLetter(batch, first.reasons);
      }
    }
  }

  private deferBatch(batch: Batch, error: unknown): void {
    const reason = storeUnavailableReason(
      'store_error',
      `Catalog write failed: ${error instanceof Error ? error.message : String(error)}`
    );
    log.child({ batchId: batch.id }).error('Batch commit failed', { error });

    for (const entry of batch.entries) {
      this.settle(deferred(entry.submissionId, [reason], entry.item.id));
    }
    this.deadLetter(batch, [reason]);
  }

  private deadLetter(batch: Batch, reasons: NonEmptyReasons): void {
    const { deadLetters } = this.deps;
    if (!deadLetters || !this.deps.config.deadLetter.enabled) {
      return;
    }

    const batchLog = log.child({ batchId: batch.id });
    try {
      const id = deadLetters.enqueue(batch, reasons);
      this.counters.deadLettered++;
      batchLog.warn('Batch dead-lettered', { deadLetterId: id, size: batch.entries.length });
    } catch (error) {
      batchLog.error('Failed to dead-letter batch', { error });
    }
  }

  // ==========================================================================
  // State
  // ==========================================================================

  private settleCancelled(submissionId: string): void {
    log.info('Submission cancelled', { submissionId });
    this.settle(rejected(submissionId, [cancelledReason(submissionId)]), 'cancelled');
  }

  /**
   * @param state - State reported to the sink; the outcome status unless cancelled
   */
  private settle(outcome: CommitOutcome, state: SubmissionState = outcome.status): void {
    const entry = this.pending.get(outcome.submissionId);
    if (!entry) {
      return;
    }

    this.pending.delete(outcome.submissionId);
    if (state === 'cancelled') {
      this.counters.cancelled++;
    } else {
      this.counters[outcome.status]++;
    }
    this.emit({
      submissionId: outcome.submissionId,
      state,
      at: Date.now(),
      itemId: outcome.itemId ?? entry.itemId,
      collectionId: entry.collectionId,
      batchId: entry.batchId,
      ...(outcome.status !== 'committed' && { reasons: outcome.reasons }),
    });
    entry.resolve(outcome);
  }

  private transition(submissionId: string, state: SubmissionState): void {
    const entry = this.pending.get(submissionId);
    if (!entry) {
      return;
    }

    entry.state = state;
    this.emit({
      submissionId,
      state,
      at: Date.now(),
      itemId: entry.itemId,
      collectionId: entry.collectionId,
      batchId: entry.batchId,
    });
  }

  private emit(transition: SubmissionTransition): void {
    try {
      this.deps.statusSink?.record(transition);
    } catch (error) {
      log.error('Status sink failed to record transition', {
        submissionId: transition.submissionId,
        state: transition.state,
        error: error instanceof Error ? error.message : String(error),
      });
    }

    for (const listener of this.listeners) {
      try {
        listener(transition);
      } catch (error) {
        log.error('Transition listener error', {
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }
}

/**
 * Reason for a submission whose validation could not run to a verdict
 */
function validationFailureReason(error: unknown): ValidationReason {
  if (error instanceof BulkheadRejectionError) {
    return storeUnavailableReason(
      'ingestion_saturated',
      `Too many submissions awaiting validation (${error.stats.queuedCount} queued); resubmit later`
    );
  }

  if (error instanceof QueueTimeoutError) {
    return storeUnavailableReason(
      'ingestion_saturated',
      `Submission waited ${error.timeoutMs}ms for a validation slot; resubmit later`
    );
  }

  return storeUnavailableReason(
    'lookup_failed',
    `Catalog lookup failed during validation: ${error instanceof Error ? error.message : String(error)}`
  );
}

