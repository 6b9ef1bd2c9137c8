/**
 * Component wiring for CLI commands
 *
 * Builds the catalog store, validation pipeline, writer, coordinator and
 * local state stores from one IngestorConfig.
 *
 * @module cli/lib/runtime
 */

import type { IngestorConfig } from '../../core/config.js';
import type { CatalogStore } from '../../core/types.js';
import { CatalogWriter } from '../../ingestion/catalog-writer.js';
import { IngestionCoordinator } from '../../ingestion/coordinator.js';
import { DeferredBatchQueue } from '../../persistence/deferred-batch-queue.js';
import { IngestionStatusStore } from '../../persistence/ingestion-status-store.js';
import { createPgPool, PgstacCatalogStore } from '../../persistence/pgstac-catalog-store.js';
import { SqliteCatalogStore } from '../../persistence/sqlite-catalog-store.js';
import { openDatabase } from '../../persistence/sqlite-database.js';
import { createAssetProbe } from '../../probes/index.js';
import { CollectionPublisher, type CollectionRegistry } from '../../services/collection-publisher.js';
import { AssetAccessibilityChecker } from '../../validators/asset-checker.js';
import { CollectionExistenceChecker } from '../../validators/collection-checker.js';
import { RecordValidationPipeline } from '../../validators/pipeline.js';
import { SpecValidator } from '../../validators/spec-validator.js';

export type RuntimeCatalogStore = CatalogStore & CollectionRegistry & { close(): void | Promise<void> };

/**
 * Open the configured catalog store
 */
export function openCatalogStore(config: IngestorConfig['store']): RuntimeCatalogStore {
  if (config.driver === 'pgstac') {
    if (!config.pgConnectionString) {
      throw new Error('store.pgConnectionString is required for the pgstac driver');
    }
    return new PgstacCatalogStore(createPgPool(config.pgConnectionString));
  }
  return new SqliteCatalogStore(config.sqlitePath);
}

export interface Runtime {
  readonly config: IngestorConfig;
  readonly store: RuntimeCatalogStore;
  readonly collectionChecker: CollectionExistenceChecker;
  readonly pipeline: RecordValidationPipeline;
  readonly writer: CatalogWriter;
  readonly statusStore: IngestionStatusStore;
  readonly deadLetters: DeferredBatchQueue;
  readonly publisher: CollectionPublisher;
  createCoordinator(): IngestionCoordinator;
  close(): Promise<void>;
}

export function createRuntime(config: IngestorConfig): Runtime {
  const store = openCatalogStore(config.store);
  const stateDb = openDatabase(config.state.databasePath);
  const statusStore = new IngestionStatusStore(stateDb);
  const deadLetters = new DeferredBatchQueue(stateDb, config.deadLetter);

  const collectionChecker = new CollectionExistenceChecker(store, {
    cacheTtlMs: config.collections.cacheTtlMs,
  });
  const pipeline = new RecordValidationPipeline(
    new SpecValidator(),
    collectionChecker,
    new AssetAccessibilityChecker(createAssetProbe(config.assets), {
      probeTimeoutMs: config.assets.probeTimeoutMs,
    })
  );
  const writer = new CatalogWriter(store, config.writer);
  const publisher = new CollectionPublisher(store, (collectionId) =>
    collectionChecker.invalidate(collectionId)
  );

  return {
    config,
    store,
    collectionChecker,
    pipeline,
    writer,
    statusStore,
    deadLetters,
    publisher,
    createCoordinator: () =>
      new IngestionCoordinator({ pipeline, writer, config, statusSink: statusStore, deadLetters }),
    close: async () => {
      await store.close();
      stateDb.close();
    },
  };
}
