/**
 * pgstac Catalog Store
 *
 * Catalog store for a PostgreSQL database running the pgstac schema,
 * accessed through node-postgres (pg).
 *
 * WRITE PATH: one transaction per batch, one savepoint per item around
 * `pgstac.create_item`, so an item the database refuses is rejected without
 * aborting the rest of the batch.
 *
 * ERROR MAPPING (SQLSTATE):
 * - 23505 unique_violation       → rejected `duplicate_id`
 * - 23503 foreign_key_violation  → rejected `collection_missing`
 * - other 23xxx                  → rejected `constraint_violation`
 * - 22xxx data exceptions        → rejected `invalid_item`
 * - P0001 raise_exception        → rejected `item_refused` (pgstac's own checks)
 * - 08xxx, 53xxx, 57P0x, 40001, 40P01, socket errors → StoreUnavailableError
 * - anything else aborts the batch and propagates unchanged
 */

import { Pool } from 'pg';
import { z } from 'zod';
import { StoreUnavailableError } from '../core/errors.js';
import type { CatalogStore, StacItem, StoreWriteResult } from '../core/types.js';
import { logger } from '../core/utils/logger.js';
import type { CollectionRegistry, CollectionSummary } from '../services/collection-publisher.js';
import type { StacCollection } from '../validators/stac-schema.js';

// ============================================================================
// Connection surface
// ============================================================================

export interface PgQueryResult {
  readonly rows: unknown[];
  readonly rowCount: number | null;
}

export interface PgClientLike {
  query(text: string, values?: unknown[]): Promise<PgQueryResult>;
  release(): void;
}

/**
 * The part of pg.Pool this store uses
 */
export interface PgPoolLike {
  query(text: string, values?: unknown[]): Promise<PgQueryResult>;
  connect(): Promise<PgClientLike>;
  end(): Promise<void>;
}

/**
 * Pool with production settings and a pool-level error handler
 */
export function createPgPool(connectionString: string): Pool {
  const pool = new Pool({
    connectionString,
    max: 10,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 2_000,
  });

  pool.on('error', (err: Error) => {
    logger.error('Unexpected PostgreSQL pool error', {
      error: err.message,
      stack: err.stack,
    });
  });

  return pool;
}

// ============================================================================
// Error classification
// ============================================================================

const TRANSIENT_SQLSTATES = new Set(['57P01', '57P02', '57P03', '40001', '40P01']);
const TRANSIENT_SQLSTATE_CLASSES = ['08', '53'];
const TRANSIENT_SOCKET_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT', 'EPIPE']);

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function isTransientPgError(error: unknown): boolean {
  const code = errorCode(error);
  if (code === undefined) {
    return false;
  }
  return (
    TRANSIENT_SQLSTATES.has(code) ||
    TRANSIENT_SOCKET_CODES.has(code) ||
    TRANSIENT_SQLSTATE_CLASSES.some((prefix) => code.length === 5 && code.startsWith(prefix))
  );
}

/**
 * Errors that concern one item rather than the connection or the schema
 */
function isItemRejection(code: string): boolean {
  return code.length === 5 && (code.startsWith('22') || code.startsWith('23') || code === 'P0001');
}

function itemRejection(item: StacItem, code: string, error: unknown): StoreWriteResult {
  const detail = error instanceof Error ? error.message : String(error);
  switch (code) {
    case '23505':
      return {
        ok: false,
        code: 'duplicate_id',
        message: `Item ${item.id} already exists in collection ${item.collection}`,
      };
    case '23503':
      return { ok: false, code: 'collection_missing', message: `Collection ${item.collection} does not exist` };
    case 'P0001':
      return { ok: false, code: 'item_refused', message: `pgstac refused item ${item.id}: ${detail}` };
    default:
      return code.startsWith('22')
        ? { ok: false, code: 'invalid_item', message: `Item ${item.id} holds a value PostgreSQL rejects: ${detail}` }
        : { ok: false, code: 'constraint_violation', message: `Item ${item.id} violates a constraint: ${detail}` };
  }
}

function toStoreError(error: unknown): Error {
  const normalized = error instanceof Error ? error : new Error(String(error));
  if (isTransientPgError(error)) {
    return new StoreUnavailableError(
      `pgstac unavailable: ${normalized.message}`,
      errorCode(error) ?? 'UNKNOWN',
      normalized
    );
  }
  return normalized;
}

// ============================================================================
// Store
// ============================================================================

const CountRowSchema = z.object({ count: z.coerce.number() });
const ItemRowSchema = z.object({ content: z.record(z.string(), z.unknown()).nullable() });
const CollectionRowSchema = z.object({
  id: z.string(),
  title: z.string().nullable(),
  updated: z.string().nullable(),
  item_count: z.coerce.number(),
});

export class PgstacCatalogStore implements CatalogStore, CollectionRegistry {
  constructor(private readonly pool: PgPoolLike) {}

  async collectionExists(collectionId: string): Promise<boolean> {
    const result = await this.query(`SELECT 1 FROM pgstac.collections WHERE id = $1`, [collectionId]);
    return result.rows.length > 0;
  }

  async bulkWrite(items: readonly StacItem[]): Promise<readonly StoreWriteResult[]> {
    let client: PgClientLike;
    try {
      client = await this.pool.connect();
    } catch (error) {
      throw toStoreError(error);
    }

    try {
      await client.query('BEGIN');

      const results: StoreWriteResult[] = [];
      for (const item of items) {
        results.push(await this.writeItem(client, item));
      }

      await client.query('COMMIT');
      return results;
    } catch (error) {
      await this.rollback(client);
      throw toStoreError(error);
    } finally {
      client.release();
    }
  }

  async upsertCollection(collection: StacCollection): Promise<'created' | 'updated'> {
    const existed = await this.collectionExists(collection.id);
    await this.query(`SELECT pgstac.upsert_collection($1::jsonb)`, [JSON.stringify(collection)]);
    return existed ? 'updated' : 'created';
  }

  async deleteCollection(collectionId: string): Promise<boolean> {
    if (!(await this.collectionExists(collectionId))) {
      return false;
    }
    await this.query(`SELECT pgstac.delete_collection($1)`, [collectionId]);
    return true;
  }

  async countItems(collectionId: string): Promise<number> {
    const result = await this.query(
      `SELECT COUNT(*) AS count FROM pgstac.items WHERE collection = $1`,
      [collectionId]
    );
    return CountRowSchema.parse(result.rows[0]).count;
  }

  async listCollections(): Promise<CollectionSummary[]> {
    const result = await this.query(`
      SELECT c.id, c.content->>'title' AS title, c.content->>'updated' AS updated,
             (SELECT COUNT(*) FROM pgstac.items i WHERE i.collection = c.id) AS item_count
      FROM pgstac.collections c
      ORDER BY c.id
    `);

    return z.array(CollectionRowSchema).parse(result.rows).map((row) => ({
      id: row.id,
      title: row.title ?? undefined,
      itemCount: row.item_count,
      updatedAt: row.updated ?? '',
    }));
  }

  /**
   * Stored item document as pgstac hydrates it
   */
  async getItem(collectionId: string, itemId: string): Promise<Readonly<Record<string, unknown>> | null> {
    const result = await this.query(`SELECT pgstac.get_item($1, $2) AS content`, [itemId, collectionId]);
    const [row] = result.rows;
    return row === undefined ? null : ItemRowSchema.parse(row).content;
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  private async writeItem(client: PgClientLike, item: StacItem): Promise<StoreWriteResult> {
    await client.query('SAVEPOINT item_write');
    try {
      await client.query(`SELECT pgstac.create_item($1::jsonb)`, [JSON.stringify(item)]);
      await client.query('RELEASE SAVEPOINT item_write');
      return { ok: true };
    } catch (error) {
      const code = errorCode(error);
      if (code === undefined || !isItemRejection(code)) {
        throw error;
      }

      await client.query('ROLLBACK TO SAVEPOINT item_write');
      return itemRejection(item, code, error);
    }
  }

  private async rollback(client: PgClientLike): Promise<void> {
    try {
      await client.query('ROLLBACK');
    } catch (error) {
      logger.warn('pgstac rollback failed', {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private async query(text: string, values?: unknown[]): Promise<PgQueryResult> {
    try {
      return await this.pool.query(text, values);
    } catch (error) {
      throw toStoreError(error);
    }
  }
}
