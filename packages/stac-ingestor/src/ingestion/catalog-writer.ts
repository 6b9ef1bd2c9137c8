/**
 * Catalog Writer
 *
 * Commits a sealed batch with one bulk write per attempt and reports one
 * outcome per record, in batch order.
 *
 * FAILURE HANDLING:
 * - Per-record store refusal (duplicate id, ...) → that record Rejected
 * - StoreUnavailableError → whole batch retried with exponential backoff
 * - Retries exhausted → every record Deferred, report.exhausted = true
 * - Any other store failure → every record Deferred, no retry
 */

import type { IngestorConfig } from '../core/config.js';
import { StoreProtocolError, StoreUnavailableError } from '../core/errors.js';
import { committed, deferred, rejected } from '../core/reasons.js';
import type {
  Batch,
  CatalogStore,
  CommitOutcome,
  StoreWriteResult,
  ValidationReason,
} from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';
import { RetryExecutor, RetryExhaustedError } from '../resilience/retry.js';

const log = createLogger({ module: 'catalog-writer' });

export interface CommitReport {
  readonly batchId: string;
  readonly outcomes: readonly CommitOutcome[];
  /** Bulk write attempts made */
  readonly attempts: number;
  /** True when transient failures outlasted the retry budget */
  readonly exhausted: boolean;
}

export class CatalogWriter {
  private readonly retry: RetryExecutor;

  constructor(
    private readonly store: Pick<CatalogStore, 'bulkWrite'>,
    config: IngestorConfig['writer']
  ) {
    this.retry = new RetryExecutor(
      {
        maxAttempts: config.maxAttempts,
        initialDelayMs: config.initialDelayMs,
        maxDelayMs: config.maxDelayMs,
        backoffMultiplier: config.backoffMultiplier,
        jitterFactor: config.jitterFactor,
        isRetryable: (error) => error instanceof StoreUnavailableError,
      },
      (attempt) =>
        log.warn('Bulk write failed, retrying', {
          attempt: attempt.attemptNumber,
          delayMs: attempt.delayMs,
          error: attempt.error.message,
        })
    );
  }

  async commit(batch: Batch): Promise<CommitReport> {
    const items = batch.entries.map((entry) => entry.item);
    const batchLog = log.child({ batchId: batch.id, size: batch.entries.length });

    try {
      const { value: results, attempts } = await this.retry.execute(async () => {
        const results = await this.store.bulkWrite(items);
        if (results.length !== items.length) {
          throw new StoreProtocolError(items.length, results.length);
        }
        return results;
      });

      const outcomes = batch.entries.map((entry, index) =>
        toOutcome(entry.submissionId, entry.item.id, entry.item.collection, results[index])
      );

      batchLog.info('Batch committed', {
        committed: outcomes.filter((o) => o.status === 'committed').length,
        rejected: outcomes.filter((o) => o.status === 'rejected').length,
        attempts,
      });

      return { batchId: batch.id, outcomes, attempts, exhausted: false };
    } catch (error) {
      if (!(error instanceof RetryExhaustedError)) {
        throw error;
      }

      const exhausted = error.exhausted;
      const reason: ValidationReason = exhausted
        ? {
            category: 'store_unavailable',
            code: 'retries_exhausted',
            message: `Catalog store unavailable after ${error.attempts.length} attempts: ${error.lastError.message}`,
          }
        : {
            category: 'store_unavailable',
            code: 'store_error',
            message: `Catalog store write failed: ${error.lastError.message}`,
          };

      batchLog.error('Batch deferred', {
        attempts: error.attempts.length,
        exhausted,
        error: error.lastError.message,
      });

      return {
        batchId: batch.id,
        outcomes: batch.entries.map((entry) => deferred(entry.submissionId, [reason], entry.item.id)),
        attempts: error.attempts.length,
        exhausted,
      };
    }
  }
}

function toOutcome(
  submissionId: string,
  itemId: string,
  collectionId: string,
  result: StoreWriteResult
): CommitOutcome {
  if (result.ok) {
    return committed(submissionId, itemId);
  }

  return rejected(
    submissionId,
    [
      {
        category: 'store_rejected',
        code: result.code,
        message: result.message,
        collectionId,
      },
    ],
    itemId
  );
}
