/**
 * Replay of dead-lettered batches
 *
 * Re-commits batches from the deferred batch queue once their backoff has
 * elapsed. Items were validated before they were deferred, so replay goes
 * straight to the catalog writer.
 */

import type { CommitOutcome } from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';
import type { DeferredBatchQueue } from '../persistence/deferred-batch-queue.js';
import type { CatalogWriter } from './catalog-writer.js';
import type { IngestionStatusSink } from './coordinator.js';

const log = createLogger({ module: 'deferred-replay' });

export interface ReplayOptions {
  /** Maximum batches replayed in this pass (default 10) */
  readonly limit?: number;
  /** Receives the final state of every replayed submission */
  readonly statusSink?: IngestionStatusSink;
}

export interface ReplaySummary {
  readonly attempted: number;
  readonly resolved: number;
  /** Batches scheduled for another replay */
  readonly rescheduled: number;
  /** Batches that ran out of replays */
  readonly exhausted: number;
  readonly outcomes: readonly CommitOutcome[];
}

/**
 * Replay every batch whose next replay time has passed
 *
 * A batch is resolved once the store accepted the write, even when some of
 * its records were rejected (duplicates of an earlier partial commit, for
 * instance). It is rescheduled when every record came back deferred.
 */
export async function replayDeferredBatches(
  queue: Pick<DeferredBatchQueue, 'getReplayable' | 'markReplaying' | 'markResolved' | 'recordFailure'>,
  writer: Pick<CatalogWriter, 'commit'>,
  options: ReplayOptions = {}
): Promise<ReplaySummary> {
  const replayable = queue.getReplayable(options.limit ?? 10);
  const outcomes: CommitOutcome[] = [];
  let resolved = 0;
  let rescheduled = 0;
  let exhausted = 0;

  for (const deferred of replayable) {
    queue.markReplaying(deferred.id);

    let error: string | undefined;
    try {
      const report = await writer.commit(deferred.batch);
      const allDeferred = report.outcomes.every((outcome) => outcome.status === 'deferred');

      if (allDeferred) {
        const first = report.outcomes[0];
        error = first && first.status === 'deferred' ? first.reasons[0].message : 'Batch deferred again';
      } else {
        outcomes.push(...report.outcomes);
        report.outcomes.forEach((outcome) => {
          const entry = deferred.batch.entries.find((e) => e.submissionId === outcome.submissionId);
          options.statusSink?.record({
            submissionId: outcome.submissionId,
            state: outcome.status,
            at: Date.now(),
            itemId: outcome.itemId,
            collectionId: entry?.item.collection,
            batchId: deferred.batch.id,
            ...(outcome.status !== 'committed' && { reasons: outcome.reasons }),
          });
        });
      }
    } catch (caught) {
      error = caught instanceof Error ? caught.message : String(caught);
    }

    if (error === undefined) {
      queue.markResolved(deferred.id);
      resolved++;
      log.info('Deferred batch replayed', { deferredId: deferred.id, batchId: deferred.batch.id });
      continue;
    }

    const status = queue.recordFailure(deferred.id, error);
    if (status === 'exhausted') {
      exhausted++;
      log.error('Deferred batch exhausted its replays', {
        deferredId: deferred.id,
        batchId: deferred.batch.id,
        error,
      });
    } else {
      rescheduled++;
      log.warn('Deferred batch replay failed', { deferredId: deferred.id, error });
    }
  }

  return { attempted: replayable.length, resolved, rescheduled, exhausted, outcomes };
}
