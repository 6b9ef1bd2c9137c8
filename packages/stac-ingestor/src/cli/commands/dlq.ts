/**
 * Dead-Letter Queue Commands
 *
 * Registers deferred batch subcommands:
 * - list: dead-lettered batches
 * - stats: counts by status
 * - replay: re-commit batches whose backoff has elapsed
 */

import type { Command } from 'commander';
import { replayDeferredBatches } from '../../ingestion/deferred-replay.js';
import { DeferredBatchQueue, type DeferredBatchStatus } from '../../persistence/deferred-batch-queue.js';
import {
  EXIT_CODES,
  globalOptions,
  loadCommandConfig,
  parsePositiveInt,
  type GlobalOptions,
} from '../lib/context.js';
import { formatJson, formatTable, summarizeOutcomes } from '../lib/output.js';
import { createRuntime } from '../lib/runtime.js';

const STATUSES: readonly DeferredBatchStatus[] = ['pending', 'replaying', 'exhausted', 'resolved'];

function parseStatus(value: string | undefined): DeferredBatchStatus | undefined {
  if (value === undefined) {
    return undefined;
  }
  const status = STATUSES.find((s) => s === value);
  if (!status) {
    throw new Error(`Unknown status "${value}" (expected one of ${STATUSES.join(', ')})`);
  }
  return status;
}

function withQueue<T>(globals: GlobalOptions, action: (queue: DeferredBatchQueue) => T): T {
  const { config } = loadCommandConfig(globals);
  const queue = new DeferredBatchQueue(config.state.databasePath, config.deadLetter);
  try {
    return action(queue);
  } finally {
    queue.close();
  }
}

export function registerDlqCommands(program: Command): void {
  const dlq = program.command('dlq').description('Inspect and replay dead-lettered batches');

  dlq
    .command('list')
    .description('List dead-lettered batches')
    .option('--status <status>', `Filter by status: ${STATUSES.join('|')}`)
    .option('--limit <n>', 'Max results', parsePositiveInt, 100)
    .action((options: { readonly status?: string; readonly limit: number }, command: Command) => {
      const globals = globalOptions(command);
      const batches = withQueue(globals, (queue) => queue.list(parseStatus(options.status), options.limit));

      if (globals.json) {
        console.log(formatJson(batches));
        return;
      }
      console.log(
        formatTable(batches, [
          { header: 'ID', value: (b) => b.id },
          { header: 'Status', value: (b) => b.status },
          { header: 'Records', value: (b) => b.batch.entries.length, align: 'right' },
          { header: 'Replays', value: (b) => `${b.replayCount}/${b.maxReplays}` },
          { header: 'Next replay', value: (b) => b.nextReplayAt },
          { header: 'Last error', value: (b) => b.lastError ?? b.reasons[0].message },
        ])
      );
    });

  dlq
    .command('stats')
    .description('Dead-letter queue counts')
    .action((_options: unknown, command: Command) => {
      const globals = globalOptions(command);
      const stats = withQueue(globals, (queue) => queue.stats());

      if (globals.json) {
        console.log(formatJson(stats));
        return;
      }
      console.log(`Total:      ${stats.total}`);
      console.log(`Pending:    ${stats.pending}`);
      console.log(`Replaying:  ${stats.replaying}`);
      console.log(`Exhausted:  ${stats.exhausted}`);
      console.log(`Resolved:   ${stats.resolved}`);
      console.log(`Records awaiting replay: ${stats.unresolvedRecords}`);
    });

  dlq
    .command('replay')
    .description('Re-commit dead-lettered batches whose backoff has elapsed')
    .option('--limit <n>', 'Max batches to replay', parsePositiveInt, 10)
    .action(async (options: { readonly limit: number }, command: Command) => {
      const globals = globalOptions(command);
      const { config } = loadCommandConfig(globals);
      const runtime = createRuntime(config);

      try {
        const summary = await replayDeferredBatches(runtime.deadLetters, runtime.writer, {
          limit: options.limit,
          statusSink: runtime.statusStore,
        });

        if (globals.json) {
          console.log(formatJson(summary));
        } else {
          const counts = summarizeOutcomes(summary.outcomes);
          console.log(
            `${summary.attempted} batches replayed: ${summary.resolved} resolved, ` +
              `${summary.rescheduled} rescheduled, ${summary.exhausted} exhausted`
          );
          console.log(`Records: ${counts.committed} committed, ${counts.rejected} rejected`);
        }

        if (summary.rescheduled > 0 || summary.exhausted > 0) {
          process.exitCode = EXIT_CODES.FAILURES;
        }
      } finally {
        await runtime.close();
      }
    });
}
