/**
 * Catalog Writer Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { StoreUnavailableError } from '../../../core/errors.js';
import type { StacItem, StoreWriteResult } from '../../../core/types.js';
import { CatalogWriter } from '../../../ingestion/catalog-writer.js';
import { InMemoryCatalogStore } from '../../utils/fakes.js';
import { makeBatch, stacItem, TEST_COLLECTION, testConfig } from '../../utils/fixtures.js';

describe('CatalogWriter', () => {
  let store: InMemoryCatalogStore;
  let writer: CatalogWriter;

  beforeEach(() => {
    store = new InMemoryCatalogStore([TEST_COLLECTION]);
    writer = new CatalogWriter(store, testConfig().writer);
  });

  it('should report one outcome per record in batch order', async () => {
    store.seedItem(stacItem('b'));
    const batch = makeBatch([stacItem('a'), stacItem('b'), stacItem('c')]);

    const report = await writer.commit(batch);

    expect(report.outcomes).toEqual([
      { status: 'committed', submissionId: 'sub-1', itemId: 'a' },
      {
        status: 'rejected',
        submissionId: 'sub-2',
        itemId: 'b',
        reasons: [
          {
            category: 'store_rejected',
            code: 'duplicate_id',
            message: `Item b already exists in collection ${TEST_COLLECTION}`,
            collectionId: TEST_COLLECTION,
          },
        ],
      },
      { status: 'committed', submissionId: 'sub-3', itemId: 'c' },
    ]);
    expect(report).toMatchObject({ batchId: 'batch_test', attempts: 1, exhausted: false });
    expect(store.bulkWriteCalls).toBe(1);
  });

  it('should retry transient failures and then commit', async () => {
    store.failNextWrites(new StoreUnavailableError('throttled', 'THROTTLED'));

    const report = await writer.commit(makeBatch([stacItem('a'), stacItem('b')]));

    expect(report.attempts).toBe(2);
    expect(report.outcomes.map((o) => o.status)).toEqual(['committed', 'committed']);
    expect(store.bulkWriteCalls).toBe(2);
  });

  it('should defer every record after exactly maxAttempts transient failures', async () => {
    store.writeError = new StoreUnavailableError('store down', 'UNAVAILABLE');

    const report = await writer.commit(makeBatch([stacItem('a'), stacItem('b')]));

    expect(store.bulkWriteCalls).toBe(3);
    expect(report.attempts).toBe(3);
    expect(report.exhausted).toBe(true);
    expect(report.outcomes).toEqual(
      ['a', 'b'].map((itemId, index) => ({
        status: 'deferred',
        submissionId: `sub-${index + 1}`,
        itemId,
        reasons: [
          {
            category: 'store_unavailable',
            code: 'retries_exhausted',
            message: 'Catalog store unavailable after 3 attempts: store down',
          },
        ],
      }))
    );
  });

  it('should not retry a non-transient failure', async () => {
    store.writeError = new Error('constraint blew up');

    const report = await writer.commit(makeBatch([stacItem('a')]));

    expect(store.bulkWriteCalls).toBe(1);
    expect(report.exhausted).toBe(false);
    expect(report.outcomes).toEqual([
      {
        status: 'deferred',
        submissionId: 'sub-1',
        itemId: 'a',
        reasons: [
          { category: 'store_unavailable', code: 'store_error', message: 'Catalog store write failed: constraint blew up' },
        ],
      },
    ]);
  });

  it('should defer the batch when the store returns the wrong number of results', async () => {
    const shortStore = {
      bulkWrite: async (_items: readonly StacItem[]): Promise<readonly StoreWriteResult[]> => [{ ok: true }],
    };
    const shortWriter = new CatalogWriter(shortStore, testConfig().writer);

    const report = await shortWriter.commit(makeBatch([stacItem('a'), stacItem('b')]));

    expect(report.outcomes.map((o) => o.status)).toEqual(['deferred', 'deferred']);
    const first = report.outcomes[0];
    expect(first.status === 'deferred' && first.reasons[0].message).toBe(
      'Catalog store write failed: Store returned 1 write results for a batch of 2'
    );
  });

  it('should reject records whose collection is gone', async () => {
    const report = await writer.commit(makeBatch([stacItem('a', { collection: 'removed' })]));

    expect(report.outcomes).toEqual([
      {
        status: 'rejected',
        submissionId: 'sub-1',
        itemId: 'a',
        reasons: [
          {
            category: 'store_rejected',
            code: 'collection_missing',
            message: 'Collection removed does not exist',
            collectionId: 'removed',
          },
        ],
      },
    ]);
  });
});
