/**
 * pgstac Catalog Store Tests
 *
 * Runs against a scripted stand-in for pg.Pool; no database is contacted.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { StoreUnavailableError } from '../../../core/errors.js';
import { CatalogWriter } from '../../../ingestion/catalog-writer.js';
import {
  isTransientPgError,
  PgstacCatalogStore,
  type PgClientLike,
  type PgPoolLike,
  type PgQueryResult,
} from '../../../persistence/pgstac-catalog-store.js';
import { makeBatch, stacCollection, stacItem, TEST_COLLECTION, testConfig } from '../../utils/fixtures.js';

type Handler = (text: string, values: unknown[] | undefined) => PgQueryResult;

function pgError(code: string, message = `pg error ${code}`): Error {
  return Object.assign(new Error(message), { code });
}

function rows(...values: unknown[]): PgQueryResult {
  return { rows: values, rowCount: values.length };
}

class FakePool implements PgPoolLike {
  readonly queries: string[] = [];
  releases = 0;
  connectError: Error | null = null;
  ended = false;

  constructor(private readonly handler: Handler = () => rows()) {}

  async query(text: string, values?: unknown[]): Promise<PgQueryResult> {
    this.queries.push(text.trim());
    return this.handler(text, values);
  }

  async connect(): Promise<PgClientLike> {
    if (this.connectError) {
      throw this.connectError;
    }
    return {
      query: (text, values) => this.query(text, values),
      release: () => {
        this.releases++;
      },
    };
  }

  async end(): Promise<void> {
    this.ended = true;
  }
}

/**
 * Fail pgstac.create_item for the n-th call (1-based)
 */
function failCreate(nth: number, error: Error): Handler {
  let calls = 0;
  return (text) => {
    if (text.includes('pgstac.create_item')) {
      calls++;
      if (calls === nth) {
        throw error;
      }
    }
    return rows();
  };
}

describe('PgstacCatalogStore', () => {
  let pool: FakePool;
  let store: PgstacCatalogStore;

  beforeEach(() => {
    pool = new FakePool();
    store = new PgstacCatalogStore(pool);
  });

  describe('collectionExists', () => {
    it('should be true when a row comes back', async () => {
      store = new PgstacCatalogStore(new FakePool(() => rows({ '?column?': 1 })));

      expect(await store.collectionExists(TEST_COLLECTION)).toBe(true);
    });

    it('should be false for no rows', async () => {
      expect(await store.collectionExists('ghost')).toBe(false);
    });

    it('should surface connection loss as unavailable', async () => {
      store = new PgstacCatalogStore(
        new FakePool(() => {
          throw pgError('57P01', 'terminating connection due to administrator command');
        })
      );

      await expect(store.collectionExists(TEST_COLLECTION)).rejects.toThrow(StoreUnavailableError);
    });
  });

  describe('bulkWrite', () => {
    it('should write every item inside one transaction', async () => {
      const results = await store.bulkWrite([stacItem('a'), stacItem('b')]);

      expect(results).toEqual([{ ok: true }, { ok: true }]);
      expect(pool.queries).toEqual([
        'BEGIN',
        'SAVEPOINT item_write',
        'SELECT pgstac.create_item($1::jsonb)',
        'RELEASE SAVEPOINT item_write',
        'SAVEPOINT item_write',
        'SELECT pgstac.create_item($1::jsonb)',
        'RELEASE SAVEPOINT item_write',
        'COMMIT',
      ]);
      expect(pool.releases).toBe(1);
    });

    it('should reject a duplicate without aborting the batch', async () => {
      pool = new FakePool(failCreate(1, pgError('23505')));
      store = new PgstacCatalogStore(pool);

      const results = await store.bulkWrite([stacItem('a'), stacItem('b')]);

      expect(results).toEqual([
        { ok: false, code: 'duplicate_id', message: `Item a already exists in collection ${TEST_COLLECTION}` },
        { ok: true },
      ]);
      expect(pool.queries.slice(0, 4)).toEqual([
        'BEGIN',
        'SAVEPOINT item_write',
        'SELECT pgstac.create_item($1::jsonb)',
        'ROLLBACK TO SAVEPOINT item_write',
      ]);
      expect(pool.queries[pool.queries.length - 1]).toBe('COMMIT');
    });

    it('should reject an item whose collection is missing', async () => {
      pool = new FakePool(failCreate(1, pgError('23503')));
      store = new PgstacCatalogStore(pool);

      expect(await store.bulkWrite([stacItem('a')])).toEqual([
        { ok: false, code: 'collection_missing', message: `Collection ${TEST_COLLECTION} does not exist` },
      ]);
    });

    it('should reject an item that breaks a NOT NULL constraint and commit the rest', async () => {
      pool = new FakePool(failCreate(2, pgError('23502', 'null value in column "datetime" violates not-null constraint')));
      store = new PgstacCatalogStore(pool);

      const results = await store.bulkWrite([stacItem('a'), stacItem('b'), stacItem('c')]);

      expect(results).toEqual([
        { ok: true },
        {
          ok: false,
          code: 'constraint_violation',
          message: 'Item b violates a constraint: null value in column "datetime" violates not-null constraint',
        },
        { ok: true },
      ]);
      expect(pool.queries.filter((q) => q === 'ROLLBACK TO SAVEPOINT item_write')).toHaveLength(1);
      expect(pool.queries[pool.queries.length - 1]).toBe('COMMIT');
    });

    it('should commit the rest of a batch through the writer when one item breaks a constraint', async () => {
      pool = new FakePool(failCreate(2, pgError('23502', 'null value in column "datetime" violates not-null constraint')));
      const writer = new CatalogWriter(new PgstacCatalogStore(pool), testConfig().writer);

      const report = await writer.commit(makeBatch([stacItem('a'), stacItem('b'), stacItem('c')]));

      expect(report.outcomes.map((o) => o.status)).toEqual(['committed', 'rejected', 'committed']);
      expect(report.attempts).toBe(1);
    });

    it('should reject an item holding a malformed value', async () => {
      pool = new FakePool(failCreate(1, pgError('22P02', 'invalid input syntax for type timestamp')));
      store = new PgstacCatalogStore(pool);

      expect(await store.bulkWrite([stacItem('a')])).toEqual([
        {
          ok: false,
          code: 'invalid_item',
          message: 'Item a holds a value PostgreSQL rejects: invalid input syntax for type timestamp',
        },
      ]);
    });

    it('should reject an item refused by a pgstac check', async () => {
      pool = new FakePool(failCreate(1, pgError('P0001', 'partition for datetime out of range')));
      store = new PgstacCatalogStore(pool);

      expect(await store.bulkWrite([stacItem('a')])).toEqual([
        { ok: false, code: 'item_refused', message: 'pgstac refused item a: partition for datetime out of range' },
      ]);
    });

    it('should roll back and report a transient failure', async () => {
      pool = new FakePool(failCreate(2, pgError('40P01', 'deadlock detected')));
      store = new PgstacCatalogStore(pool);

      const failure = store.bulkWrite([stacItem('a'), stacItem('b')]);

      await expect(failure).rejects.toThrow(StoreUnavailableError);
      await expect(failure).rejects.toMatchObject({ code: '40P01' });
      expect(pool.queries[pool.queries.length - 1]).toBe('ROLLBACK');
      expect(pool.releases).toBe(1);
    });

    it('should pass a non-transient failure through unchanged', async () => {
      const undefinedTable = pgError('42P01', 'relation "pgstac.items" does not exist');
      pool = new FakePool(failCreate(1, undefinedTable));
      store = new PgstacCatalogStore(pool);

      await expect(store.bulkWrite([stacItem('a')])).rejects.toBe(undefinedTable);
      expect(pool.releases).toBe(1);
    });

    it('should report a refused connection as unavailable', async () => {
      pool.connectError = pgError('ECONNREFUSED', 'connect ECONNREFUSED 127.0.0.1:5432');

      await expect(store.bulkWrite([stacItem('a')])).rejects.toThrow(StoreUnavailableError);
      expect(pool.releases).toBe(0);
    });
  });

  describe('collections', () => {
    it('should upsert through pgstac and report the action', async () => {
      let exists = false;
      pool = new FakePool((text) => (text.includes('FROM pgstac.collections') && exists ? rows({ found: 1 }) : rows()));
      store = new PgstacCatalogStore(pool);

      expect(await store.upsertCollection(stacCollection())).toBe('created');
      exists = true;
      expect(await store.upsertCollection(stacCollection())).toBe('updated');
      expect(pool.queries.filter((q) => q.startsWith('SELECT pgstac.upsert_collection'))).toHaveLength(2);
    });

    it('should not call delete for an unknown collection', async () => {
      expect(await store.deleteCollection('ghost')).toBe(false);
      expect(pool.queries.some((q) => q.includes('delete_collection'))).toBe(false);
    });

    it('should coerce counts returned as strings', async () => {
      store = new PgstacCatalogStore(new FakePool(() => rows({ count: '7' })));

      expect(await store.countItems(TEST_COLLECTION)).toBe(7);
    });

    it('should map collection rows to summaries', async () => {
      store = new PgstacCatalogStore(
        new FakePool(() =>
          rows({ id: TEST_COLLECTION, title: 'Test collection', updated: null, item_count: '3' })
        )
      );

      expect(await store.listCollections()).toEqual([
        { id: TEST_COLLECTION, title: 'Test collection', itemCount: 3, updatedAt: '' },
      ]);
    });

    it('should read an item back through pgstac.get_item', async () => {
      const document = { id: 'a', collection: TEST_COLLECTION };
      store = new PgstacCatalogStore(new FakePool(() => rows({ content: document })));

      expect(await store.getItem(TEST_COLLECTION, 'a')).toEqual(document);
    });

    it('should return null for an unknown item', async () => {
      store = new PgstacCatalogStore(new FakePool(() => rows({ content: null })));

      expect(await store.getItem(TEST_COLLECTION, 'ghost')).toBeNull();
    });

    it('should end the pool on close', async () => {
      await store.close();

      expect(pool.ended).toBe(true);
    });
  });
});

describe('isTransientPgError', () => {
  it('should classify SQLSTATE codes and socket errors', () => {
    expect(isTransientPgError(pgError('08006'))).toBe(true);
    expect(isTransientPgError(pgError('53300'))).toBe(true);
    expect(isTransientPgError(pgError('40001'))).toBe(true);
    expect(isTransientPgError(pgError('ECONNRESET'))).toBe(true);
    expect(isTransientPgError(pgError('23505'))).toBe(false);
    expect(isTransientPgError(new Error('no code'))).toBe(false);
    expect(isTransientPgError('not an error')).toBe(false);
  });
});
