/**
 * STAC Ingestor
 *
 * Validates incoming STAC items (spec, asset reachability, parent
 * collection) and commits them to a catalog in bounded batches.
 *
 * @packageDocumentation
 */

// Core
export * from './core/types.js';
export * from './core/errors.js';
export { committed, deferred, rejected, formatReason, isNonEmpty } from './core/reasons.js';
export {
  DEFAULT_CONFIG,
  createConfig,
  validateConfig,
  type DeepPartial,
  type IngestorConfig,
  type StoreDriver,
} from './core/config.js';
export { Logger, logger, createLogger, type LogLevel, type LogMetadata, type LoggerConfig } from './core/utils/logger.js';

// Validation
export { SpecValidator, issueToReason } from './validators/spec-validator.js';
export { StacItemSchema, StacCollectionSchema, type StacCollection } from './validators/stac-schema.js';
export { parseGeometry, type GeometryIssue } from './validators/geometry.js';
export { AssetAccessibilityChecker, assetReferences, type AssetCheckerOptions } from './validators/asset-checker.js';
export { CollectionExistenceChecker, type CollectionCheckerOptions } from './validators/collection-checker.js';
export { RecordValidationPipeline } from './validators/pipeline.js';

// Asset probes
export {
  HttpAssetProbe,
  S3AssetProbe,
  FileAssetProbe,
  SchemeRoutingAssetProbe,
  createAssetProbe,
} from './probes/index.js';

// Ingestion
export { BatchAccumulator, type BatchAccumulatorOptions, type SealHandler } from './ingestion/batch-accumulator.js';
export { CatalogWriter, type CommitReport } from './ingestion/catalog-writer.js';
export {
  IngestionCoordinator,
  type CoordinatorStats,
  type DeadLetterSink,
  type IngestionCoordinatorDeps,
  type IngestionStatusSink,
  type SubmissionTransition,
} from './ingestion/coordinator.js';
export { replayDeferredBatches, type ReplayOptions, type ReplaySummary } from './ingestion/deferred-replay.js';

// Persistence
export { SqliteCatalogStore } from './persistence/sqlite-catalog-store.js';
export {
  PgstacCatalogStore,
  createPgPool,
  isTransientPgError,
  type PgClientLike,
  type PgPoolLike,
} from './persistence/pgstac-catalog-store.js';
export {
  IngestionStatusStore,
  type IngestionPage,
  type IngestionRecord,
  type ListIngestionsOptions,
} from './persistence/ingestion-status-store.js';
export {
  DeferredBatchQueue,
  type DeferredBatch,
  type DeferredBatchQueueOptions,
  type DeferredBatchStats,
  type DeferredBatchStatus,
} from './persistence/deferred-batch-queue.js';
export { openDatabase, runMigrations, type Migration } from './persistence/sqlite-database.js';

// Services
export {
  CollectionPublisher,
  type CollectionRegistry,
  type CollectionSummary,
  type PublishResult,
} from './services/collection-publisher.js';

// Resilience
export { RetryExecutor, RetryExhaustedError } from './resilience/retry.js';
export { Bulkhead, BulkheadRejectionError, QueueTimeoutError } from './resilience/bulkhead.js';
