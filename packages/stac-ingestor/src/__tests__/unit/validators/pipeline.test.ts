/**
 * Record Validation Pipeline Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { AssetAccessibilityChecker } from '../../../validators/asset-checker.js';
import { CollectionExistenceChecker } from '../../../validators/collection-checker.js';
import { RecordValidationPipeline } from '../../../validators/pipeline.js';
import { SpecValidator } from '../../../validators/spec-validator.js';
import { FakeAssetProbe, InMemoryCatalogStore } from '../../utils/fakes.js';
import { stacItemPayload, TEST_COLLECTION } from '../../utils/fixtures.js';

describe('RecordValidationPipeline', () => {
  let store: InMemoryCatalogStore;
  let probe: FakeAssetProbe;
  let pipeline: RecordValidationPipeline;

  function build(assetScript: ConstructorParameters<typeof FakeAssetProbe>[0] = {}): void {
    probe = new FakeAssetProbe(assetScript);
    pipeline = new RecordValidationPipeline(
      new SpecValidator(),
      new CollectionExistenceChecker(store, { cacheTtlMs: 0 }),
      new AssetAccessibilityChecker(probe, { probeTimeoutMs: 100 })
    );
  }

  beforeEach(() => {
    store = new InMemoryCatalogStore([TEST_COLLECTION]);
    build();
  });

  it('should return the typed item for a valid record', async () => {
    const verdict = await pipeline.process(stacItemPayload());

    expect(verdict.status).toBe('valid');
    if (verdict.status === 'valid') {
      expect(verdict.item.id).toBe('scene-001');
    }
  });

  it('should skip I/O checks when the STAC schema check fails', async () => {
    const payload = stacItemPayload();
    delete payload.id;

    const verdict = await pipeline.process(payload);

    expect(verdict.status).toBe('invalid');
    expect(store.lookups).toBe(0);
    expect(probe.calls).toEqual([]);
  });

  it('should merge collection reasons before asset reasons', async () => {
    build({ 'https://data.example.com/scene-001/thumb.png': { status: 'unreachable', detail: 'HTTP 404' } });

    const verdict = await pipeline.process(stacItemPayload('scene-001', { collection: 'ghost' }));

    expect(verdict.status).toBe('invalid');
    if (verdict.status === 'invalid') {
      expect(verdict.reasons.map((r) => r.category)).toEqual(['collection_missing', 'asset_unreachable']);
    }
  });

  it('should reject when the collection lookup fails', async () => {
    store.lookupError = new Error('connection refused');

    await expect(pipeline.process(stacItemPayload())).rejects.toThrow('connection refused');
  });

  it('should give the same verdict for the same record and catalog state', async () => {
    const payload = stacItemPayload('scene-001', { collection: 'ghost' });

    expect(await pipeline.process(payload)).toEqual(await pipeline.process(payload));
  });
});
