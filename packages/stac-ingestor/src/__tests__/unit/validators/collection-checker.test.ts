/**
 * Collection Existence Checker Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { CollectionExistenceChecker } from '../../../validators/collection-checker.js';
import { InMemoryCatalogStore } from '../../utils/fakes.js';
import { stacItem, TEST_COLLECTION } from '../../utils/fixtures.js';

describe('CollectionExistenceChecker', () => {
  let store: InMemoryCatalogStore;
  let clock: number;

  beforeEach(() => {
    store = new InMemoryCatalogStore([TEST_COLLECTION]);
    clock = 1_000;
  });

  function checker(cacheTtlMs = 60_000): CollectionExistenceChecker {
    return new CollectionExistenceChecker(store, { cacheTtlMs, now: () => clock });
  }

  it('should pass for a registered collection', async () => {
    expect(await checker().checkCollection(stacItem())).toEqual({ check: 'collection', reasons: [] });
  });

  it('should report a missing collection', async () => {
    const verdict = await checker().checkCollection(stacItem('scene-001', { collection: 'ghost' }));

    expect(verdict.reasons).toEqual([
      {
        category: 'collection_missing',
        code: 'not_found',
        collectionId: 'ghost',
        message: "Collection 'ghost' does not exist in the catalog",
      },
    ]);
  });

  it('should cache positive lookups until the TTL passes', async () => {
    const subject = checker(500);

    await subject.checkCollection(stacItem());
    clock += 499;
    await subject.checkCollection(stacItem());
    expect(store.lookups).toBe(1);

    clock += 1;
    await subject.checkCollection(stacItem());
    expect(store.lookups).toBe(2);
  });

  it('should not cache negative lookups', async () => {
    const subject = checker();
    const orphan = stacItem('scene-001', { collection: 'late' });

    expect((await subject.checkCollection(orphan)).reasons).toHaveLength(1);
    store.collections.add('late');
    expect((await subject.checkCollection(orphan)).reasons).toEqual([]);
    expect(store.lookups).toBe(2);
  });

  it('should share one store read between concurrent lookups', async () => {
    const subject = checker();

    await Promise.all([subject.checkCollection(stacItem('a')), subject.checkCollection(stacItem('b'))]);

    expect(store.lookups).toBe(1);
  });

  it('should not cache when the TTL is zero', async () => {
    const subject = checker(0);

    await subject.checkCollection(stacItem());
    await subject.checkCollection(stacItem());

    expect(store.lookups).toBe(2);
  });

  it('should forget a collection on invalidate', async () => {
    const subject = checker();

    await subject.checkCollection(stacItem());
    subject.invalidate(TEST_COLLECTION);
    store.collections.delete(TEST_COLLECTION);

    expect((await subject.checkCollection(stacItem())).reasons[0]?.code).toBe('not_found');
  });

  it('should propagate store failures without poisoning later lookups', async () => {
    const subject = checker();
    store.lookupError = new Error('connection refused');

    await expect(subject.checkCollection(stacItem())).rejects.toThrow('connection refused');

    store.lookupError = null;
    expect((await subject.checkCollection(stacItem())).reasons).toEqual([]);
    expect(store.lookups).toBe(2);
  });
});
