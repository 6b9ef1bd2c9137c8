/**
 * SQLite Catalog Store
 *
 * Local catalog backed by better-sqlite3. Used for development, tests and
 * single-node deployments; production catalogs run on pgstac.
 *
 * ARCHITECTURE:
 * - Synchronous better-sqlite3 behind the async CatalogStore surface
 * - One transaction per bulk write (a batch is one atomic unit)
 * - Items keyed by (collection_id, id); duplicates are refused per record
 * - SQLITE_BUSY / SQLITE_LOCKED surface as StoreUnavailableError so the
 *   writer retries them
 */

import Database from 'better-sqlite3';
import { z } from 'zod';
import { StoreUnavailableError } from '../core/errors.js';
import type { CatalogStore, StacItem, StoreWriteResult } from '../core/types.js';
import { isRecord } from '../validators/geometry.js';
import type { StacCollection } from '../validators/stac-schema.js';
import type { CollectionRegistry, CollectionSummary } from '../services/collection-publisher.js';
import { openDatabase, runMigrations, type Migration } from './sqlite-database.js';

const MIGRATIONS: readonly Migration[] = [
  {
    version: 1,
    name: 'catalog_schema',
    up: (db) => {
      db.exec(`
        CREATE TABLE collections (
          id TEXT PRIMARY KEY,
          title TEXT,
          description TEXT NOT NULL,
          license TEXT NOT NULL,
          content_json TEXT NOT NULL,
          created_at TEXT NOT NULL,
          updated_at TEXT NOT NULL
        );

        CREATE TABLE items (
          collection_id TEXT NOT NULL REFERENCES collections(id) ON DELETE CASCADE,
          id TEXT NOT NULL,
          datetime TEXT,
          start_datetime TEXT,
          end_datetime TEXT,
          bbox_json TEXT,
          geometry_json TEXT,
          content_json TEXT NOT NULL,
          ingested_at TEXT NOT NULL,
          PRIMARY KEY (collection_id, id)
        );

        CREATE INDEX idx_items_datetime ON items(collection_id, datetime);
      `);
    },
  },
];

const ExistsRowSchema = z.object({ found: z.number() });
const CountRowSchema = z.object({ count: z.number() });
const ContentRowSchema = z.object({ content_json: z.string() });
const CollectionRowSchema = z.object({
  id: z.string(),
  title: z.string().nullable(),
  updated_at: z.string(),
  item_count: z.number(),
});

const TRANSIENT_CODES = new Set(['SQLITE_BUSY', 'SQLITE_LOCKED', 'SQLITE_BUSY_SNAPSHOT', 'SQLITE_BUSY_RECOVERY']);

export class SqliteCatalogStore implements CatalogStore, CollectionRegistry {
  private readonly db: Database.Database;
  private readonly writeBatch: (items: readonly StacItem[]) => StoreWriteResult[];

  constructor(dbPath: string | Database.Database = '.stac-ingestor/catalog.db') {
    this.db = typeof dbPath === 'string' ? openDatabase(dbPath) : dbPath;
    runMigrations(this.db, 'catalog', MIGRATIONS);

    const collectionLookup = this.db.prepare(`SELECT 1 AS found FROM collections WHERE id = ?`);
    const insertItem = this.db.prepare(`
      INSERT INTO items (
        collection_id, id, datetime, start_datetime, end_datetime,
        bbox_json, geometry_json, content_json, ingested_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT (collection_id, id) DO NOTHING
    `);

    this.writeBatch = this.db.transaction((items: readonly StacItem[]): StoreWriteResult[] => {
      const now = new Date().toISOString();

      return items.map((item): StoreWriteResult => {
        if (collectionLookup.get(item.collection) === undefined) {
          return {
            ok: false,
            code: 'collection_missing',
            message: `Collection ${item.collection} does not exist`,
          };
        }

        const info = insertItem.run(
          item.collection,
          item.id,
          stringProperty(item, 'datetime'),
          stringProperty(item, 'start_datetime'),
          stringProperty(item, 'end_datetime'),
          item.bbox ? JSON.stringify(item.bbox) : null,
          item.geometry ? JSON.stringify(item.geometry) : null,
          JSON.stringify(item),
          now
        );

        if (info.changes === 0) {
          return {
            ok: false,
            code: 'duplicate_id',
            message: `Item ${item.id} already exists in collection ${item.collection}`,
          };
        }
        return { ok: true };
      });
    });
  }

  // ============================================================================
  // CatalogStore
  // ============================================================================

  async collectionExists(collectionId: string): Promise<boolean> {
    return this.guard(() => {
      const row = this.db.prepare(`SELECT 1 AS found FROM collections WHERE id = ?`).get(collectionId);
      return row !== undefined && ExistsRowSchema.parse(row).found === 1;
    });
  }

  async bulkWrite(items: readonly StacItem[]): Promise<readonly StoreWriteResult[]> {
    return this.guard(() => this.writeBatch(items));
  }

  // ============================================================================
  // CollectionRegistry
  // ============================================================================

  async upsertCollection(collection: StacCollection): Promise<'created' | 'updated'> {
    return this.guard(() => {
      const now = new Date().toISOString();
      const existed =
        this.db.prepare(`SELECT 1 AS found FROM collections WHERE id = ?`).get(collection.id) !== undefined;

      this.db.prepare(`
        INSERT INTO collections (id, title, description, license, content_json, created_at, updated_at)
        VALUES (?, ?, ?, ?, ?, ?, ?)
        ON CONFLICT (id) DO UPDATE SET
          title = excluded.title,
          description = excluded.description,
          license = excluded.license,
          content_json = excluded.content_json,
          updated_at = excluded.updated_at
      `).run(
        collection.id,
        collection.title ?? null,
        collection.description,
        collection.license,
        JSON.stringify(collection),
        now,
        now
      );

      return existed ? 'updated' : 'created';
    });
  }

  async deleteCollection(collectionId: string): Promise<boolean> {
    return this.guard(() => {
      const info = this.db.prepare(`DELETE FROM collections WHERE id = ?`).run(collectionId);
      return info.changes > 0;
    });
  }

  async countItems(collectionId: string): Promise<number> {
    return this.guard(() =>
      CountRowSchema.parse(
        this.db.prepare(`SELECT COUNT(*) AS count FROM items WHERE collection_id = ?`).get(collectionId)
      ).count
    );
  }

  async listCollections(): Promise<CollectionSummary[]> {
    return this.guard(() => {
      const rows = z.array(CollectionRowSchema).parse(
        this.db.prepare(`
          SELECT c.id, c.title, c.updated_at, COUNT(i.id) AS item_count
          FROM collections c
          LEFT JOIN items i ON i.collection_id = c.id
          GROUP BY c.id
          ORDER BY c.id
        `).all()
      );

      return rows.map((row) => ({
        id: row.id,
        title: row.title ?? undefined,
        itemCount: row.item_count,
        updatedAt: row.updated_at,
      }));
    });
  }

  async getCollection(collectionId: string): Promise<Readonly<Record<string, unknown>> | null> {
    return this.guard(() => {
      const row = this.db.prepare(`SELECT content_json FROM collections WHERE id = ?`).get(collectionId);
      return row === undefined ? null : parseDocument(ContentRowSchema.parse(row).content_json);
    });
  }

  /**
   * Stored item document, exactly as committed
   */
  async getItem(collectionId: string, itemId: string): Promise<Readonly<Record<string, unknown>> | null> {
    return this.guard(() => {
      const row = this.db
        .prepare(`SELECT content_json FROM items WHERE collection_id = ? AND id = ?`)
        .get(collectionId, itemId);
      return row === undefined ? null : parseDocument(ContentRowSchema.parse(row).content_json);
    });
  }

  close(): void {
    this.db.close();
  }

  /**
   * Run a statement, mapping lock contention to StoreUnavailableError
   */
  private guard<T>(operation: () => T): T {
    try {
      return operation();
    } catch (error) {
      throw toStoreError(error);
    }
  }
}

/**
 * Classify a better-sqlite3 failure
 */
export function toStoreError(error: unknown): Error {
  if (error instanceof Database.SqliteError && TRANSIENT_CODES.has(error.code)) {
    return new StoreUnavailableError(`SQLite catalog unavailable: ${error.message}`, error.code, error);
  }
  return error instanceof Error ? error : new Error(String(error));
}

function stringProperty(item: StacItem, key: string): string | null {
  const value = item.properties[key];
  return typeof value === 'string' ? value : null;
}

function parseDocument(json: string): Readonly<Record<string, unknown>> {
  const value: unknown = JSON.parse(json);
  if (!isRecord(value)) {
    throw new Error('Stored catalog document is not a JSON object');
  }
  return value;
}
