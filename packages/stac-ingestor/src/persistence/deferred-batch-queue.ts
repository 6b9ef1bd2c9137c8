/**
 * Deferred Batch Queue
 *
 * Persistent dead-letter queue for batches the catalog writer deferred after
 * exhausting its retries. Keeps the validated items so a later replay can
 * commit them without re-running validation.
 *
 * DESIGN PRINCIPLES:
 * - Persist deferrals immediately (no silent drops)
 * - Exponential backoff between replays
 * - Exhausted after maxReplays failed replays
 * - Resume-friendly (process restart safe)
 */

import type Database from 'better-sqlite3';
import { z } from 'zod';
import type { Batch, BatchEntry, NonEmptyReasons, SealTrigger } from '../core/types.js';
import type { DeadLetterSink } from '../ingestion/coordinator.js';
import { SpecValidator } from '../validators/spec-validator.js';
import { parseNonEmptyReasons } from './row-schemas.js';
import { openDatabase, runMigrations, type Migration } from './sqlite-database.js';

// ============================================================================
// Types
// ============================================================================

export type DeferredBatchStatus = 'pending' | 'replaying' | 'exhausted' | 'resolved';

/**
 * Dead-lettered batch
 */
export interface DeferredBatch {
  /** Queue record id */
  readonly id: string;

  /** The sealed batch, entries restored as typed items */
  readonly batch: Batch;

  /** Reasons the batch was deferred */
  readonly reasons: NonEmptyReasons;

  readonly status: DeferredBatchStatus;

  /** Failed replays so far */
  readonly replayCount: number;

  readonly maxReplays: number;

  /** Last replay error message */
  readonly lastError?: string;

  /** Next replay time (ISO 8601) */
  readonly nextReplayAt?: string;

  /** ISO 8601 */
  readonly createdAt: string;

  /** ISO 8601 */
  readonly resolvedAt?: string;
}

export interface DeferredBatchStats {
  readonly total: number;
  readonly pending: number;
  readonly replaying: number;
  readonly exhausted: number;
  readonly resolved: number;
  /** Records held in unresolved batches */
  readonly unresolvedRecords: number;
}

export interface DeferredBatchQueueOptions {
  readonly maxReplays: number;
  readonly replayDelayMs: number;
  readonly replayBackoffMultiplier: number;
  /** Clock override for tests */
  readonly now?: () => number;
}

// ============================================================================
// Schema
// ============================================================================

const MIGRATIONS: readonly Migration[] = [
  {
    version: 1,
    name: 'deferred_batches',
    up: (db) => {
      db.exec(`
        CREATE TABLE deferred_batches (
          id TEXT PRIMARY KEY,
          batch_id TEXT NOT NULL,
          batch_json TEXT NOT NULL,
          size INTEGER NOT NULL,
          reasons_json TEXT NOT NULL,
          status TEXT NOT NULL CHECK (status IN ('pending', 'replaying', 'exhausted', 'resolved')),
          replay_count INTEGER NOT NULL DEFAULT 0,
          max_replays INTEGER NOT NULL,
          last_error TEXT,
          next_replay_at INTEGER,
          created_at TEXT NOT NULL,
          resolved_at TEXT
        );

        CREATE INDEX idx_deferred_batches_replay ON deferred_batches(status, next_replay_at);
      `);
    },
  },
];

const DeferredRowSchema = z.object({
  id: z.string(),
  batch_json: z.string(),
  reasons_json: z.string(),
  status: z.enum(['pending', 'replaying', 'exhausted', 'resolved']),
  replay_count: z.number().int(),
  max_replays: z.number().int(),
  last_error: z.string().nullable(),
  next_replay_at: z.number().nullable(),
  created_at: z.string(),
  resolved_at: z.string().nullable(),
});

type DeferredRow = z.infer<typeof DeferredRowSchema>;

const StoredBatchSchema = z.object({
  id: z.string(),
  createdAt: z.number(),
  sealedAt: z.number(),
  trigger: z.enum(['size', 'timeout', 'manual']) satisfies z.ZodType<SealTrigger>,
  entries: z.array(z.object({ submissionId: z.string(), item: z.unknown() })),
});

const SELECT_COLUMNS = `
  id, batch_json, reasons_json, status, replay_count, max_replays,
  last_error, next_replay_at, created_at, resolved_at
`;

// ============================================================================
// Queue
// ============================================================================

/**
 * Deferred Batch Queue
 *
 * @example
 * ```typescript
 * const queue = new DeferredBatchQueue(db, config.deadLetter);
 *
 * for (const deferred of queue.getReplayable(10)) {
 *   queue.markReplaying(deferred.id);
 *   const report = await writer.commit(deferred.batch);
 *   if (report.exhausted) {
 *     queue.recordFailure(deferred.id, 'store still unavailable');
 *   } else {
 *     queue.markResolved(deferred.id);
 *   }
 * }
 * ```
 */
export class DeferredBatchQueue implements DeadLetterSink {
  private readonly db: Database.Database;
  private readonly validator = new SpecValidator();
  private readonly now: () => number;

  constructor(
    dbPath: string | Database.Database,
    private readonly options: DeferredBatchQueueOptions
  ) {
    this.db = typeof dbPath === 'string' ? openDatabase(dbPath) : dbPath;
    this.now = options.now ?? Date.now;
    runMigrations(this.db, 'deferred_batches', MIGRATIONS);
  }

  /**
   * Persist a deferred batch
   *
   * Idempotent per batch id.
   *
   * @returns Queue record id
   */
  enqueue(batch: Batch, reasons: NonEmptyReasons): string {
    const id = `dlq_${batch.id}`;
    const now = this.now();

    this.db.prepare(`
      INSERT INTO deferred_batches (
        id, batch_id, batch_json, size, reasons_json, status,
        replay_count, max_replays, next_replay_at, created_at
      ) VALUES (?, ?, ?, ?, ?, 'pending', 0, ?, ?, ?)
      ON CONFLICT (id) DO NOTHING
    `).run(
      id,
      batch.id,
      JSON.stringify(batch),
      batch.entries.length,
      JSON.stringify(reasons),
      this.options.maxReplays,
      now + this.options.replayDelayMs,
      new Date(now).toISOString()
    );

    return id;
  }

  /**
   * Batches whose next replay time has passed, oldest first
   */
  getReplayable(limit = 50): DeferredBatch[] {
    const rows = z.array(DeferredRowSchema).parse(
      this.db.prepare(`
        SELECT ${SELECT_COLUMNS}
        FROM deferred_batches
        WHERE status IN ('pending', 'replaying')
          AND (next_replay_at IS NULL OR next_replay_at <= ?)
        ORDER BY next_replay_at ASC, created_at ASC
        LIMIT ?
      `).all(this.now(), limit)
    );

    return rows.map((row) => this.toDeferredBatch(row));
  }

  get(id: string): DeferredBatch | null {
    const row = this.db.prepare(`SELECT ${SELECT_COLUMNS} FROM deferred_batches WHERE id = ?`).get(id);
    return row === undefined ? null : this.toDeferredBatch(DeferredRowSchema.parse(row));
  }

  /**
   * All queue records, optionally filtered by status, newest first
   */
  list(status?: DeferredBatchStatus, limit = 100): DeferredBatch[] {
    const rows = z.array(DeferredRowSchema).parse(
      status
        ? this.db
            .prepare(`SELECT ${SELECT_COLUMNS} FROM deferred_batches WHERE status = ? ORDER BY created_at DESC LIMIT ?`)
            .all(status, limit)
        : this.db
            .prepare(`SELECT ${SELECT_COLUMNS} FROM deferred_batches ORDER BY created_at DESC LIMIT ?`)
            .all(limit)
    );

    return rows.map((row) => this.toDeferredBatch(row));
  }

  markReplaying(id: string): void {
    this.db.prepare(`
      UPDATE deferred_batches SET status = 'replaying' WHERE id = ? AND status IN ('pending', 'replaying')
    `).run(id);
  }

  markResolved(id: string): void {
    this.db.prepare(`
      UPDATE deferred_batches
      SET status = 'resolved', resolved_at = ?, next_replay_at = NULL
      WHERE id = ?
    `).run(new Date(this.now()).toISOString(), id);
  }

  /**
   * Record a failed replay
   *
   * Schedules the next replay with exponential backoff, or marks the batch
   * exhausted once maxReplays failed replays were recorded.
   *
   * @returns The new status
   */
  recordFailure(id: string, error: string): DeferredBatchStatus {
    const record = this.get(id);
    if (!record) {
      throw new Error(`Deferred batch ${id} not found`);
    }

    const replayCount = record.replayCount + 1;
    const status: DeferredBatchStatus = replayCount >= record.maxReplays ? 'exhausted' : 'pending';
    const nextReplayAt =
      status === 'exhausted' ? null : this.now() + this.calculateReplayDelay(replayCount);

    this.db.prepare(`
      UPDATE deferred_batches
      SET replay_count = ?, last_error = ?, status = ?, next_replay_at = ?
      WHERE id = ?
    `).run(replayCount, error, status, nextReplayAt, id);

    return status;
  }

  stats(): DeferredBatchStats {
    const rows = z
      .array(z.object({ status: z.string(), count: z.number(), records: z.number() }))
      .parse(
        this.db.prepare(`
          SELECT status, COUNT(*) AS count, SUM(size) AS records
          FROM deferred_batches
          GROUP BY status
        `).all()
      );

    const counts: Record<string, number> = {};
    let unresolvedRecords = 0;
    for (const row of rows) {
      counts[row.status] = row.count;
      if (row.status !== 'resolved') {
        unresolvedRecords += row.records;
      }
    }

    return {
      total: rows.reduce((sum, row) => sum + row.count, 0),
      pending: counts.pending ?? 0,
      replaying: counts.replaying ?? 0,
      exhausted: counts.exhausted ?? 0,
      resolved: counts.resolved ?? 0,
      unresolvedRecords,
    };
  }

  close(): void {
    this.db.close();
  }

  // ========================================================================
  // Private Methods
  // ========================================================================

  /**
   * Delay before the replay following the given number of failed replays
   */
  private calculateReplayDelay(replayCount: number): number {
    return this.options.replayDelayMs * Math.pow(this.options.replayBackoffMultiplier, replayCount);
  }

  private toDeferredBatch(row: DeferredRow): DeferredBatch {
    return {
      id: row.id,
      batch: this.restoreBatch(row.batch_json),
      reasons: parseNonEmptyReasons(row.reasons_json),
      status: row.status,
      replayCount: row.replay_count,
      maxReplays: row.max_replays,
      lastError: row.last_error ?? undefined,
      nextReplayAt: row.next_replay_at === null ? undefined : new Date(row.next_replay_at).toISOString(),
      createdAt: row.created_at,
      resolvedAt: row.resolved_at ?? undefined,
    };
  }

  /**
   * Rebuild a batch from its stored JSON, re-parsing each item
   */
  private restoreBatch(json: string): Batch {
    const stored = StoredBatchSchema.parse(JSON.parse(json));

    const entries = stored.entries.map((entry): BatchEntry => {
      const verdict = this.validator.validate(entry.item);
      if (!verdict.item) {
        throw new Error(
          `Stored entry ${entry.submissionId} of batch ${stored.id} is not a valid STAC item`
        );
      }
      return { submissionId: entry.submissionId, item: verdict.item };
    });

    return {
      id: stored.id,
      createdAt: stored.createdAt,
      sealedAt: stored.sealedAt,
      trigger: stored.trigger,
      entries,
    };
  }
}
