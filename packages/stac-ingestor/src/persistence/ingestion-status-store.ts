/**
 * Ingestion Status Store
 *
 * Persistent record of every submission's lifecycle state, so operators can
 * look up what happened to a record after the submitting process is gone.
 *
 * The coordinator reports transitions synchronously (better-sqlite3), one
 * upsert per transition, and asks the store whether a submission was
 * cancelled before validating and batching it.
 *
 * A cancelled row ignores later transitions of that submission. A fresh
 * `received` transition restarts any row (clearing its operator note), so
 * submission ids can be reused across runs.
 */

import type Database from 'better-sqlite3';
import { z } from 'zod';
import { IngestionStateError } from '../core/errors.js';
import type { SubmissionState, ValidationReason } from '../core/types.js';
import type { IngestionStatusSink, SubmissionTransition } from '../ingestion/coordinator.js';
import { parseReasons, SubmissionStateSchema } from './row-schemas.js';
import { openDatabase, runMigrations, type Migration } from './sqlite-database.js';

// ============================================================================
// Types
// ============================================================================

export interface IngestionRecord {
  readonly submissionId: string;
  readonly state: SubmissionState;
  readonly itemId?: string;
  readonly collectionId?: string;
  readonly batchId?: string;
  readonly reasons: readonly ValidationReason[];
  /** Free-text operator note */
  readonly note?: string;
  /** ISO 8601 */
  readonly createdAt: string;
  /** ISO 8601 */
  readonly updatedAt: string;
}

export interface ListIngestionsOptions {
  readonly status?: SubmissionState;
  /** Default 50 */
  readonly limit?: number;
  /** Submission id after which to continue (from a previous page) */
  readonly cursor?: string;
}

export interface IngestionUpdate {
  /** null clears the note */
  readonly note: string | null;
}

export interface IngestionPage {
  readonly records: readonly IngestionRecord[];
  readonly nextCursor?: string;
}

/** States in which a submission has not yet been validated */
const CANCELLABLE_STATES: ReadonlySet<SubmissionState> = new Set(['received', 'validating']);

const MIGRATIONS: readonly Migration[] = [
  {
    version: 1,
    name: 'submissions',
    up: (db) => {
      db.exec(`
        CREATE TABLE submissions (
          submission_id TEXT PRIMARY KEY,
          state TEXT NOT NULL CHECK (state IN (
            'received', 'validating', 'accumulating', 'batched', 'committing',
            'committed', 'rejected', 'deferred', 'cancelled'
          )),
          item_id TEXT,
          collection_id TEXT,
          batch_id TEXT,
          reasons_json TEXT NOT NULL DEFAULT '[]',
          created_at TEXT NOT NULL,
          updated_at TEXT NOT NULL
        );

        CREATE INDEX idx_submissions_state ON submissions(state, submission_id);
      `);
    },
  },
  {
    version: 2,
    name: 'submission_notes',
    up: (db) => {
      db.exec(`ALTER TABLE submissions ADD COLUMN note TEXT`);
    },
  },
];

const SubmissionRowSchema = z.object({
  submission_id: z.string(),
  state: SubmissionStateSchema,
  item_id: z.string().nullable(),
  collection_id: z.string().nullable(),
  batch_id: z.string().nullable(),
  reasons_json: z.string(),
  note: z.string().nullable(),
  created_at: z.string(),
  updated_at: z.string(),
});

type SubmissionRow = z.infer<typeof SubmissionRowSchema>;

// ============================================================================
// Store
// ============================================================================

export class IngestionStatusStore implements IngestionStatusSink {
  private readonly db: Database.Database;

  constructor(dbPath: string | Database.Database = '.stac-ingestor/state.db') {
    this.db = typeof dbPath === 'string' ? openDatabase(dbPath) : dbPath;
    runMigrations(this.db, 'ingestion_status', MIGRATIONS);
  }

  /**
   * Upsert the submission's current state
   */
  record(transition: SubmissionTransition): void {
    const at = new Date(transition.at).toISOString();

    this.db.prepare(`
      INSERT INTO submissions (
        submission_id, state, item_id, collection_id, batch_id, reasons_json, created_at, updated_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT (submission_id) DO UPDATE SET
        state = excluded.state,
        item_id = COALESCE(excluded.item_id, submissions.item_id),
        collection_id = COALESCE(excluded.collection_id, submissions.collection_id),
        batch_id = COALESCE(excluded.batch_id, submissions.batch_id),
        reasons_json = excluded.reasons_json,
        note = CASE WHEN excluded.state = 'received' THEN NULL ELSE submissions.note END,
        created_at = CASE WHEN excluded.state = 'received' THEN excluded.created_at ELSE submissions.created_at END,
        updated_at = excluded.updated_at
      WHERE submissions.state != 'cancelled' OR excluded.state IN ('cancelled', 'received')
    `).run(
      transition.submissionId,
      transition.state,
      transition.itemId ?? null,
      transition.collectionId ?? null,
      transition.batchId ?? null,
      JSON.stringify(transition.reasons ?? []),
      at,
      at
    );
  }

  isCancelled(submissionId: string): boolean {
    const row = this.db.prepare(`SELECT state FROM submissions WHERE submission_id = ?`).get(submissionId);
    return row !== undefined && z.object({ state: SubmissionStateSchema }).parse(row).state === 'cancelled';
  }

  get(submissionId: string): IngestionRecord | null {
    const row = this.db.prepare(`SELECT * FROM submissions WHERE submission_id = ?`).get(submissionId);
    return row === undefined ? null : toRecord(SubmissionRowSchema.parse(row));
  }

  list(options: ListIngestionsOptions = {}): IngestionPage {
    const limit = options.limit ?? 50;
    const clauses: string[] = [];
    const params: Array<string | number> = [];

    if (options.status) {
      clauses.push('state = ?');
      params.push(options.status);
    }
    if (options.cursor) {
      clauses.push('submission_id > ?');
      params.push(options.cursor);
    }

    const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';
    const rows = z.array(SubmissionRowSchema).parse(
      this.db
        .prepare(`SELECT * FROM submissions ${where} ORDER BY submission_id LIMIT ?`)
        .all(...params, limit + 1)
    );

    const page = rows.slice(0, limit).map(toRecord);
    const last = page[page.length - 1];
    return rows.length > limit && last ? { records: page, nextCursor: last.submissionId } : { records: page };
  }

  /**
   * Cancel a submission that has not finished validation
   *
   * @returns The cancelled record, or null when the id is unknown
   * @throws {IngestionStateError} When the submission is past validation
   */
  cancel(submissionId: string): IngestionRecord | null {
    const cancelTx = this.db.transaction((): IngestionRecord | null => {
      const current = this.get(submissionId);
      if (!current) {
        return null;
      }
      if (!CANCELLABLE_STATES.has(current.state)) {
        throw new IngestionStateError(submissionId, current.state, 'cancel');
      }

      this.db.prepare(`
        UPDATE submissions SET state = 'cancelled', updated_at = ? WHERE submission_id = ?
      `).run(new Date().toISOString(), submissionId);

      return this.get(submissionId);
    });

    return cancelTx();
  }

  /**
   * Set or clear the operator note of a submission in any state
   *
   * @returns The updated record, or null when the id is unknown
   */
  update(submissionId: string, patch: IngestionUpdate): IngestionRecord | null {
    const result = this.db
      .prepare(`UPDATE submissions SET note = ?, updated_at = ? WHERE submission_id = ?`)
      .run(patch.note, new Date().toISOString(), submissionId);

    return result.changes === 0 ? null : this.get(submissionId);
  }

  /**
   * Counts per state
   */
  countByState(): Partial<Record<SubmissionState, number>> {
    const rows = z
      .array(z.object({ state: SubmissionStateSchema, count: z.number() }))
      .parse(this.db.prepare(`SELECT state, COUNT(*) AS count FROM submissions GROUP BY state`).all());

    const counts: Partial<Record<SubmissionState, number>> = {};
    for (const row of rows) {
      counts[row.state] = row.count;
    }
    return counts;
  }

  close(): void {
    this.db.close();
  }
}

function toRecord(row: SubmissionRow): IngestionRecord {
  return {
    submissionId: row.submission_id,
    state: row.state,
    itemId: row.item_id ?? undefined,
    collectionId: row.collection_id ?? undefined,
    batchId: row.batch_id ?? undefined,
    reasons: parseReasons(row.reasons_json),
    note: row.note ?? undefined,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}
