/**
 * STAC Ingestor CLI Configuration
 *
 * Loads configuration from .stac-ingestorrc (YAML or JSON) with environment
 * variable overrides and defaults.
 *
 * Configuration precedence (highest to lowest):
 * 1. Command-line options
 * 2. Environment variables (STAC_INGESTOR_*)
 * 3. Config file (.stac-ingestorrc or --config path)
 * 4. Default values
 *
 * @module cli/lib/config
 */

import { existsSync, readFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import {
  createConfig,
  DEFAULT_CONFIG,
  type DeepPartial,
  type IngestorConfig,
  type StoreDriver,
} from '../../core/config.js';
import { ConfigValidationError } from '../../core/errors.js';

// ============================================================================
// Config File Schema
// ============================================================================

const positiveInt = z.number().int().positive();
const positiveNumber = z.number().positive();

const ConfigFileSchema = z
  .object({
    batch: z
      .object({ maxBatchSize: positiveInt, maxWaitMs: positiveNumber })
      .partial()
      .strict(),
    assets: z
      .object({
        probeTimeoutMs: positiveNumber,
        s3Endpoint: z.string().url(),
        s3Region: z.string().min(1),
        userAgent: z.string().min(1),
      })
      .partial()
      .strict(),
    collections: z.object({ cacheTtlMs: z.number().nonnegative() }).partial().strict(),
    validation: z.object({ concurrency: positiveInt }).partial().strict(),
    ingestion: z
      .object({ maxPendingValidations: positiveInt, maxQueueWaitMs: z.number().int().nonnegative() })
      .partial()
      .strict(),
    writer: z
      .object({
        maxAttempts: positiveInt,
        initialDelayMs: z.number().nonnegative(),
        maxDelayMs: z.number().nonnegative(),
        backoffMultiplier: z.number().min(1),
        jitterFactor: z.number().min(0).max(1),
        maxConcurrentCommits: positiveInt,
      })
      .partial()
      .strict(),
    deadLetter: z
      .object({
        enabled: z.boolean(),
        maxReplays: positiveInt,
        replayDelayMs: z.number().nonnegative(),
        replayBackoffMultiplier: z.number().min(1),
      })
      .partial()
      .strict(),
    store: z
      .object({
        driver: z.enum(['sqlite', 'pgstac']),
        sqlitePath: z.string().min(1),
        pgConnectionString: z.string().min(1),
      })
      .partial()
      .strict(),
    state: z.object({ databasePath: z.string().min(1) }).partial().strict(),
  })
  .partial()
  .strict();

type ConfigFile = z.infer<typeof ConfigFileSchema>;

// ============================================================================
// Configuration Loading
// ============================================================================

/**
 * Standard config file names to search for
 */
const CONFIG_FILE_NAMES = [
  '.stac-ingestorrc',
  '.stac-ingestorrc.yaml',
  '.stac-ingestorrc.yml',
  '.stac-ingestorrc.json',
];

/**
 * Find config file in a directory or its parents
 */
export function findConfigFile(startDir: string): string | null {
  let dir = resolve(startDir);

  for (;;) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }

    const parent = resolve(dir, '..');
    if (parent === dir) {
      return null;
    }
    dir = parent;
  }
}

/**
 * Parse and validate config file content (YAML, which also covers JSON)
 *
 * @throws {ConfigValidationError} When the content is malformed or has unknown keys
 */
export function parseConfigFile(content: string, source = 'config file'): ConfigFile {
  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (error) {
    throw new ConfigValidationError([
      `${source}: ${error instanceof Error ? error.message : String(error)}`,
    ]);
  }

  const result = ConfigFileSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigValidationError(
      result.error.errors.map((issue) =>
        issue.path.length > 0 ? `${source}: ${issue.path.join('.')}: ${issue.message}` : `${source}: ${issue.message}`
      )
    );
  }
  return result.data;
}

type Env = Readonly<Record<string, string | undefined>>;

/**
 * Environment variable reader with prefix
 */
class EnvReader {
  constructor(private readonly env: Env) {}

  string(name: string): string | undefined {
    const value = this.env[`STAC_INGESTOR_${name}`];
    return value === undefined || value === '' ? undefined : value;
  }

  number(name: string): number | undefined {
    const value = this.string(name);
    if (value === undefined) return undefined;
    const num = Number(value);
    if (Number.isNaN(num)) {
      throw new ConfigValidationError([`STAC_INGESTOR_${name} must be a number (got "${value}")`]);
    }
    return num;
  }

  bool(name: string): boolean | undefined {
    const value = this.string(name);
    if (value === undefined) return undefined;
    return value.toLowerCase() === 'true' || value === '1';
  }

  driver(name: string): StoreDriver | undefined {
    const value = this.string(name);
    if (value === undefined) return undefined;
    if (value !== 'sqlite' && value !== 'pgstac') {
      throw new ConfigValidationError([`STAC_INGESTOR_${name} must be sqlite or pgstac (got "${value}")`]);
    }
    return value;
  }
}

/**
 * Load configuration options
 */
export interface LoadConfigOptions {
  /** Explicit config file path */
  readonly configPath?: string;
  /** CLI flag overrides */
  readonly overrides?: DeepPartial<IngestorConfig>;
  /** Defaults to process.env */
  readonly env?: Env;
  /** Directory to search for a config file; defaults to process.cwd() */
  readonly cwd?: string;
}

export interface LoadedConfig {
  readonly config: IngestorConfig;
  /** Resolved config file path */
  readonly configPath: string | null;
}

/**
 * Load and merge configuration from all sources
 *
 * @throws {ConfigValidationError} When any layer is invalid or the merged result is out of range
 */
export function loadConfig(options: LoadConfigOptions = {}): LoadedConfig {
  const env = new EnvReader(options.env ?? process.env);
  const flags = options.overrides ?? {};

  let configPath: string | null = null;
  let file: ConfigFile = {};

  const explicitPath = options.configPath ?? env.string('CONFIG');
  if (explicitPath) {
    configPath = resolve(options.cwd ?? process.cwd(), explicitPath);
    if (!existsSync(configPath)) {
      throw new ConfigValidationError([`Config file not found: ${configPath}`]);
    }
  } else {
    configPath = findConfigFile(options.cwd ?? process.cwd());
  }

  if (configPath) {
    file = parseConfigFile(readFileSync(configPath, 'utf-8'), configPath);
  }

  const D = DEFAULT_CONFIG;

  const config = createConfig({
    batch: {
      maxBatchSize:
        flags.batch?.maxBatchSize ?? env.number('BATCH_SIZE') ?? file.batch?.maxBatchSize ?? D.batch.maxBatchSize,
      maxWaitMs:
        flags.batch?.maxWaitMs ?? env.number('BATCH_WAIT_MS') ?? file.batch?.maxWaitMs ?? D.batch.maxWaitMs,
    },
    assets: {
      probeTimeoutMs:
        flags.assets?.probeTimeoutMs ??
        env.number('PROBE_TIMEOUT_MS') ??
        file.assets?.probeTimeoutMs ??
        D.assets.probeTimeoutMs,
      s3Endpoint:
        flags.assets?.s3Endpoint ?? env.string('S3_ENDPOINT') ?? file.assets?.s3Endpoint ?? D.assets.s3Endpoint,
      s3Region: flags.assets?.s3Region ?? env.string('S3_REGION') ?? file.assets?.s3Region ?? D.assets.s3Region,
      userAgent: file.assets?.userAgent ?? D.assets.userAgent,
    },
    collections: {
      cacheTtlMs:
        flags.collections?.cacheTtlMs ??
        env.number('COLLECTION_CACHE_TTL_MS') ??
        file.collections?.cacheTtlMs ??
        D.collections.cacheTtlMs,
    },
    validation: {
      concurrency:
        flags.validation?.concurrency ??
        env.number('CONCURRENCY') ??
        file.validation?.concurrency ??
        D.validation.concurrency,
    },
    ingestion: {
      maxPendingValidations:
        flags.ingestion?.maxPendingValidations ??
        env.number('MAX_PENDING') ??
        file.ingestion?.maxPendingValidations ??
        D.ingestion.maxPendingValidations,
      maxQueueWaitMs:
        env.number('QUEUE_WAIT_MS') ?? file.ingestion?.maxQueueWaitMs ?? D.ingestion.maxQueueWaitMs,
    },
    writer: {
      maxAttempts:
        flags.writer?.maxAttempts ?? env.number('WRITE_ATTEMPTS') ?? file.writer?.maxAttempts ?? D.writer.maxAttempts,
      initialDelayMs: file.writer?.initialDelayMs ?? D.writer.initialDelayMs,
      maxDelayMs: file.writer?.maxDelayMs ?? D.writer.maxDelayMs,
      backoffMultiplier: file.writer?.backoffMultiplier ?? D.writer.backoffMultiplier,
      jitterFactor: file.writer?.jitterFactor ?? D.writer.jitterFactor,
      maxConcurrentCommits:
        flags.writer?.maxConcurrentCommits ??
        env.number('MAX_CONCURRENT_COMMITS') ??
        file.writer?.maxConcurrentCommits ??
        D.writer.maxConcurrentCommits,
    },
    deadLetter: {
      enabled:
        flags.deadLetter?.enabled ?? env.bool('DEAD_LETTER') ?? file.deadLetter?.enabled ?? D.deadLetter.enabled,
      maxReplays: file.deadLetter?.maxReplays ?? D.deadLetter.maxReplays,
      replayDelayMs:
        env.number('REPLAY_DELAY_MS') ?? file.deadLetter?.replayDelayMs ?? D.deadLetter.replayDelayMs,
      replayBackoffMultiplier: file.deadLetter?.replayBackoffMultiplier ?? D.deadLetter.replayBackoffMultiplier,
    },
    store: {
      driver: flags.store?.driver ?? env.driver('STORE_DRIVER') ?? file.store?.driver ?? D.store.driver,
      sqlitePath:
        flags.store?.sqlitePath ?? env.string('SQLITE_PATH') ?? file.store?.sqlitePath ?? D.store.sqlitePath,
      pgConnectionString:
        flags.store?.pgConnectionString ??
        env.string('PG_CONNECTION_STRING') ??
        file.store?.pgConnectionString ??
        D.store.pgConnectionString,
    },
    state: {
      databasePath:
        flags.state?.databasePath ?? env.string('STATE_DB') ?? file.state?.databasePath ?? D.state.databasePath,
    },
  });

  return { config, configPath };
}
