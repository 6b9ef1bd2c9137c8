/**
 * Ingest Command
 *
 * Validate STAC items from a file and commit them to the catalog.
 *
 * Usage:
 *   stac-ingestor ingest <file> [options]
 *
 * Options:
 *   --prefix <prefix>          Submission id prefix (default: file name)
 *   --batch-size <n>           Records per batch
 *   --batch-wait-ms <ms>       Maximum wait before a partial batch is sealed
 *   --concurrency <n>          Records validating at once
 *   --probe-timeout-ms <ms>    Per-asset probe timeout
 *   --no-dead-letter           Do not dead-letter deferred batches
 *
 * Examples:
 *   stac-ingestor ingest items.ndjson
 *   cat items.ndjson | stac-ingestor ingest - --prefix nightly --json
 *
 * Exit code 1 when any record was rejected or deferred.
 */

import type { Command } from 'commander';
import type { DeepPartial, IngestorConfig } from '../../core/config.js';
import type { CatalogRecord, CommitOutcome } from '../../core/types.js';
import type { IngestionCoordinator } from '../../ingestion/coordinator.js';
import { readRecords } from '../lib/input.js';
import {
  EXIT_CODES,
  globalOptions,
  loadCommandConfig,
  parsePositiveInt,
  type ExitCode,
  type GlobalOptions,
} from '../lib/context.js';
import { formatJson, formatReasons, summarizeOutcomes } from '../lib/output.js';
import { createRuntime } from '../lib/runtime.js';

export interface IngestOptions {
  readonly prefix?: string;
  readonly batchSize?: number;
  readonly batchWaitMs?: number;
  readonly concurrency?: number;
  readonly probeTimeoutMs?: number;
  readonly deadLetter: boolean;
}

export function registerIngestCommand(program: Command): void {
  program
    .command('ingest <file>')
    .description('Validate STAC items from an NDJSON or JSON file ("-" for stdin) and commit them')
    .option('--prefix <prefix>', 'Submission id prefix (default: file name)')
    .option('--batch-size <n>', 'Records per batch', parsePositiveInt)
    .option('--batch-wait-ms <ms>', 'Maximum wait before a partial batch is sealed', parsePositiveInt)
    .option('--concurrency <n>', 'Records validating at once', parsePositiveInt)
    .option('--probe-timeout-ms <ms>', 'Per-asset probe timeout', parsePositiveInt)
    .option('--no-dead-letter', 'Do not dead-letter deferred batches')
    .action(async (file: string, options: IngestOptions, command: Command) => {
      process.exitCode = await executeIngest(file, options, globalOptions(command));
    });
}

export function ingestOverrides(options: IngestOptions): DeepPartial<IngestorConfig> {
  return {
    batch: { maxBatchSize: options.batchSize, maxWaitMs: options.batchWaitMs },
    validation: { concurrency: options.concurrency },
    assets: { probeTimeoutMs: options.probeTimeoutMs },
    ...(options.deadLetter === false && { deadLetter: { enabled: false } }),
  };
}

async function executeIngest(file: string, options: IngestOptions, globals: GlobalOptions): Promise<ExitCode> {
  const { config } = loadCommandConfig(globals, ingestOverrides(options));
  const records = await readRecords(file, options.prefix);
  const runtime = createRuntime(config);

  try {
    const coordinator = runtime.createCoordinator();
    const startTime = Date.now();
    const outcomes = await submitAll(
      coordinator,
      records,
      config.ingestion.maxPendingValidations + config.validation.concurrency
    );
    await coordinator.close();

    const summary = summarizeOutcomes(outcomes);
    const durationMs = Date.now() - startTime;

    if (globals.json) {
      console.log(formatJson({ file, total: records.length, ...summary, durationMs, outcomes }));
    } else {
      for (const outcome of outcomes) {
        if (outcome.status === 'committed') continue;
        console.log(`✗ ${outcome.submissionId}${outcome.itemId ? ` (${outcome.itemId})` : ''}: ${outcome.status}`);
        console.log(formatReasons(outcome.reasons));
      }
      console.log(
        `\n${records.length} records: ${summary.committed} committed, ${summary.rejected} rejected, ${summary.deferred} deferred (${durationMs}ms)`
      );
    }

    return summary.committed === records.length ? EXIT_CODES.SUCCESS : EXIT_CODES.FAILURES;
  } finally {
    await runtime.close();
  }
}

/**
 * Submit records keeping at most `window` unresolved at once, then drain so
 * the last partial batch commits without waiting out maxWaitMs
 *
 * @returns Outcomes in record order
 */
export async function submitAll(
  coordinator: Pick<IngestionCoordinator, 'submit' | 'drain'>,
  records: readonly CatalogRecord[],
  window: number
): Promise<CommitOutcome[]> {
  const outcomes = new Map<number, CommitOutcome>();
  const inflight = new Set<Promise<void>>();

  for (const [index, record] of records.entries()) {
    const task: Promise<void> = coordinator
      .submit(record)
      .then((outcome) => {
        outcomes.set(index, outcome);
      })
      .finally(() => {
        inflight.delete(task);
      });
    inflight.add(task);

    if (inflight.size >= window) {
      await Promise.race(inflight);
    }
  }
  await coordinator.drain();
  await Promise.all(inflight);

  return records.map((record, index) => {
    const outcome = outcomes.get(index);
    if (!outcome) {
      throw new Error(`No outcome recorded for submission ${record.submissionId}`);
    }
    return outcome;
  });
}
