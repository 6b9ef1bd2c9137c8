/**
 * STAC Ingestor Configuration
 *
 * Explicit configuration passed into each component at construction.
 * No ambient global state: tests build their own config with createConfig().
 *
 * TYPE SAFETY: All configuration is strongly typed and immutable.
 */

import { ConfigValidationError } from './errors.js';

// ============================================================================
// Configuration Types
// ============================================================================

export type StoreDriver = 'sqlite' | 'pgstac';

export interface IngestorConfig {
  /** Batch accumulation */
  readonly batch: {
    /** Seal a batch once it holds this many records */
    readonly maxBatchSize: number;
    /** Seal a batch this long after its first record arrived */
    readonly maxWaitMs: number;
  };

  /** Asset accessibility probing */
  readonly assets: {
    /** Per-asset probe timeout; a slow probe becomes a timed_out reason */
    readonly probeTimeoutMs: number;
    /**
     * HTTPS endpoint template for s3:// hrefs.
     * `{bucket}` and `{region}` are substituted.
     */
    readonly s3Endpoint: string;
    readonly s3Region: string;
    readonly userAgent: string;
  };

  /** Collection existence lookups */
  readonly collections: {
    /** TTL for positive lookups (0 disables caching) */
    readonly cacheTtlMs: number;
  };

  /** Record validation */
  readonly validation: {
    /** Maximum records validating at once */
    readonly concurrency: number;
  };

  /** Submission intake */
  readonly ingestion: {
    /** Submissions allowed to wait for a validation slot before new ones are deferred */
    readonly maxPendingValidations: number;
    /** Longest a queued submission waits for a validation slot before it is deferred; 0 waits indefinitely */
    readonly maxQueueWaitMs: number;
  };

  /** Catalog writer retry policy */
  readonly writer: {
    /** Total bulk write attempts per batch (first try included) */
    readonly maxAttempts: number;
    readonly initialDelayMs: number;
    readonly maxDelayMs: number;
    readonly backoffMultiplier: number;
    /** Jitter factor (0-1) applied to each backoff delay */
    readonly jitterFactor: number;
    /** Maximum batches committing at once */
    readonly maxConcurrentCommits: number;
  };

  /** Dead-letter handling for batches deferred after retry exhaustion */
  readonly deadLetter: {
    readonly enabled: boolean;
    readonly maxReplays: number;
    readonly replayDelayMs: number;
    readonly replayBackoffMultiplier: number;
  };

  /** Catalog store connection */
  readonly store: {
    readonly driver: StoreDriver;
    readonly sqlitePath: string;
    readonly pgConnectionString?: string;
  };

  /** Local ingestion state (status tracking, dead-letter queue) */
  readonly state: {
    readonly databasePath: string;
  };
}

/**
 * Default configuration
 *
 * - 100-record batches sealed after at most 2 seconds
 * - 5-second per-asset probe timeout
 * - 4 bulk write attempts with exponential backoff from 200ms
 */
export const DEFAULT_CONFIG: IngestorConfig = {
  batch: {
    maxBatchSize: 100,
    maxWaitMs: 2_000,
  },
  assets: {
    probeTimeoutMs: 5_000,
    s3Endpoint: 'https://{bucket}.s3.{region}.amazonaws.com',
    s3Region: 'us-west-2',
    userAgent: 'stac-ingestor/0.1',
  },
  collections: {
    cacheTtlMs: 60_000,
  },
  validation: {
    concurrency: 16,
  },
  ingestion: {
    maxPendingValidations: 1_000,
    maxQueueWaitMs: 30_000,
  },
  writer: {
    maxAttempts: 4,
    initialDelayMs: 200,
    maxDelayMs: 5_000,
    backoffMultiplier: 2,
    jitterFactor: 0.1,
    maxConcurrentCommits: 2,
  },
  deadLetter: {
    enabled: true,
    maxReplays: 5,
    replayDelayMs: 60_000,
    replayBackoffMultiplier: 2,
  },
  store: {
    driver: 'sqlite',
    sqlitePath: '.stac-ingestor/catalog.db',
  },
  state: {
    databasePath: '.stac-ingestor/state.db',
  },
};

/**
 * Deep partial type for nested configuration objects
 */
export type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends object ? DeepPartial<T[P]> : T[P];
};

/**
 * Create configuration by merging overrides onto defaults, then validate it
 *
 * @throws {ConfigValidationError} When a merged value is out of range
 */
export function createConfig(
  overrides: DeepPartial<IngestorConfig> = {}
): IngestorConfig {
  const config: IngestorConfig = {
    batch: { ...DEFAULT_CONFIG.batch, ...overrides.batch },
    assets: { ...DEFAULT_CONFIG.assets, ...overrides.assets },
    collections: { ...DEFAULT_CONFIG.collections, ...overrides.collections },
    validation: { ...DEFAULT_CONFIG.validation, ...overrides.validation },
    ingestion: { ...DEFAULT_CONFIG.ingestion, ...overrides.ingestion },
    writer: { ...DEFAULT_CONFIG.writer, ...overrides.writer },
    deadLetter: { ...DEFAULT_CONFIG.deadLetter, ...overrides.deadLetter },
    store: { ...DEFAULT_CONFIG.store, ...overrides.store },
    state: { ...DEFAULT_CONFIG.state, ...overrides.state },
  };

  validateConfig(config);
  return config;
}

/**
 * Reject configurations the components cannot run with
 */
export function validateConfig(config: IngestorConfig): void {
  const issues: string[] = [];

  const positiveInts: ReadonlyArray<[string, number]> = [
    ['batch.maxBatchSize', config.batch.maxBatchSize],
    ['validation.concurrency', config.validation.concurrency],
    ['writer.maxAttempts', config.writer.maxAttempts],
    ['writer.maxConcurrentCommits', config.writer.maxConcurrentCommits],
    ['deadLetter.maxReplays', config.deadLetter.maxReplays],
  ];
  for (const [name, value] of positiveInts) {
    if (!Number.isInteger(value) || value < 1) {
      issues.push(`${name} must be a positive integer (got ${value})`);
    }
  }

  const positiveDurations: ReadonlyArray<[string, number]> = [
    ['batch.maxWaitMs', config.batch.maxWaitMs],
    ['assets.probeTimeoutMs', config.assets.probeTimeoutMs],
  ];
  for (const [name, value] of positiveDurations) {
    if (!Number.isFinite(value) || value <= 0) {
      issues.push(`${name} must be greater than 0 (got ${value})`);
    }
  }

  const nonNegatives: ReadonlyArray<[string, number]> = [
    ['collections.cacheTtlMs', config.collections.cacheTtlMs],
    ['ingestion.maxPendingValidations', config.ingestion.maxPendingValidations],
    ['ingestion.maxQueueWaitMs', config.ingestion.maxQueueWaitMs],
    ['writer.initialDelayMs', config.writer.initialDelayMs],
    ['writer.maxDelayMs', config.writer.maxDelayMs],
    ['deadLetter.replayDelayMs', config.deadLetter.replayDelayMs],
  ];
  for (const [name, value] of nonNegatives) {
    if (Number.isNaN(value) || value < 0) {
      issues.push(`${name} must be >= 0 (got ${value})`);
    }
  }

  if (config.writer.backoffMultiplier < 1) {
    issues.push(`writer.backoffMultiplier must be >= 1 (got ${config.writer.backoffMultiplier})`);
  }
  if (config.deadLetter.replayBackoffMultiplier < 1) {
    issues.push(
      `deadLetter.replayBackoffMultiplier must be >= 1 (got ${config.deadLetter.replayBackoffMultiplier})`
    );
  }
  if (config.writer.jitterFactor < 0 || config.writer.jitterFactor > 1) {
    issues.push(`writer.jitterFactor must be between 0 and 1 (got ${config.writer.jitterFactor})`);
  }
  if (config.store.driver === 'pgstac' && !config.store.pgConnectionString) {
    issues.push('store.pgConnectionString is required when store.driver is pgstac');
  }

  if (issues.length > 0) {
    throw new ConfigValidationError(issues);
  }
}
