/**
 * Test fixtures: STAC documents, batches and a fast-retry config
 */

import { createConfig, type DeepPartial, type IngestorConfig } from '../../core/config.js';
import type { Batch, CatalogRecord, StacItem } from '../../core/types.js';
import { SpecValidator } from '../../validators/spec-validator.js';
import { StacCollectionSchema, type StacCollection } from '../../validators/stac-schema.js';

export const TEST_COLLECTION = 'sentinel-test';

/**
 * Raw, spec-valid item payload (a plain mutable object)
 */
export function stacItemPayload(id = 'scene-001', overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    type: 'Feature',
    stac_version: '1.0.0',
    id,
    collection: TEST_COLLECTION,
    geometry: {
      type: 'Polygon',
      coordinates: [
        [
          [10, 45],
          [11, 45],
          [11, 46],
          [10, 46],
          [10, 45],
        ],
      ],
    },
    bbox: [10, 45, 11, 46],
    properties: {
      datetime: '2024-05-01T10:00:00Z',
      title: 'original',
    },
    links: [],
    assets: {
      visual: { href: `https://data.example.com/${id}/visual.tif`, roles: ['data'] },
      thumbnail: { href: `https://data.example.com/${id}/thumb.png`, roles: ['thumbnail'] },
    },
    ...overrides,
  };
}

/**
 * Typed item produced by the spec validator
 */
export function stacItem(id = 'scene-001', overrides: Record<string, unknown> = {}): StacItem {
  const verdict = new SpecValidator().validate(stacItemPayload(id, overrides));
  if (!verdict.item) {
    throw new Error(`Fixture item ${id} is invalid: ${verdict.reasons.map((r) => r.message).join('; ')}`);
  }
  return verdict.item;
}

export function record(submissionId: string, payload: unknown): CatalogRecord {
  return { submissionId, payload };
}

export function collectionDocument(id = TEST_COLLECTION): Record<string, unknown> {
  return {
    type: 'Collection',
    stac_version: '1.0.0',
    id,
    title: 'Test collection',
    description: 'Collection used in tests',
    license: 'CC-BY-4.0',
    extent: {
      spatial: { bbox: [[-180, -90, 180, 90]] },
      temporal: { interval: [['2024-01-01T00:00:00Z', null]] },
    },
    links: [],
  };
}

export function stacCollection(id = TEST_COLLECTION): StacCollection {
  return StacCollectionSchema.parse(collectionDocument(id));
}

/**
 * Sealed batch with submission ids sub-1, sub-2, ...
 */
export function makeBatch(items: readonly StacItem[], id = 'batch_test'): Batch {
  return {
    id,
    createdAt: 1_000,
    sealedAt: 1_010,
    trigger: 'manual',
    entries: items.map((item, index) => ({ submissionId: `sub-${index + 1}`, item })),
  };
}

/**
 * Config with millisecond retry delays and no jitter
 */
export function testConfig(overrides: DeepPartial<IngestorConfig> = {}): IngestorConfig {
  return createConfig({
    ...overrides,
    batch: { maxBatchSize: 2, maxWaitMs: 1_000, ...overrides.batch },
    assets: { probeTimeoutMs: 100, ...overrides.assets },
    writer: {
      maxAttempts: 3,
      initialDelayMs: 1,
      maxDelayMs: 5,
      jitterFactor: 0,
      ...overrides.writer,
    },
  });
}
