/**
 * Ingestion Status Commands
 *
 * Registers submission status subcommands:
 * - list: submissions by state, paginated
 * - get: one submission with its reasons
 * - cancel: mark a submission that never finished validation as cancelled
 * - update: set or clear an operator note on a submission
 */

import type { Command } from 'commander';
import { IngestionStateError } from '../../core/errors.js';
import type { SubmissionState } from '../../core/types.js';
import { IngestionStatusStore, type IngestionRecord } from '../../persistence/ingestion-status-store.js';
import { SubmissionStateSchema } from '../../persistence/row-schemas.js';
import {
  EXIT_CODES,
  errorMessage,
  globalOptions,
  loadCommandConfig,
  parsePositiveInt,
  type GlobalOptions,
} from '../lib/context.js';
import { formatJson, formatReasons, formatTable } from '../lib/output.js';

interface UpdateOptions {
  readonly note?: string;
  readonly clearNote?: boolean;
}

interface ListOptions {
  readonly status?: string;
  readonly limit: number;
  readonly cursor?: string;
}

function withStatusStore<T>(globals: GlobalOptions, action: (store: IngestionStatusStore) => T): T {
  const { config } = loadCommandConfig(globals);
  const store = new IngestionStatusStore(config.state.databasePath);
  try {
    return action(store);
  } finally {
    store.close();
  }
}

function parseState(value: string | undefined): SubmissionState | undefined {
  if (value === undefined) {
    return undefined;
  }
  const result = SubmissionStateSchema.safeParse(value);
  if (!result.success) {
    throw new Error(`Unknown status "${value}" (expected one of ${SubmissionStateSchema.options.join(', ')})`);
  }
  return result.data;
}

function printRecord(record: IngestionRecord): void {
  console.log(`Submission: ${record.submissionId}`);
  console.log(`State:      ${record.state}`);
  if (record.itemId) console.log(`Item:       ${record.itemId}`);
  if (record.collectionId) console.log(`Collection: ${record.collectionId}`);
  if (record.batchId) console.log(`Batch:      ${record.batchId}`);
  if (record.note) console.log(`Note:       ${record.note}`);
  console.log(`Created:    ${record.createdAt}`);
  console.log(`Updated:    ${record.updatedAt}`);
  if (record.reasons.length > 0) {
    console.log('Reasons:');
    console.log(formatReasons(record.reasons, '  '));
  }
}

export function registerIngestionCommands(program: Command): void {
  const ingestions = program.command('ingestions').description('Inspect submission status');

  ingestions
    .command('list')
    .description('List submissions')
    .option('--status <state>', 'Filter by state')
    .option('--limit <n>', 'Max results', parsePositiveInt, 50)
    .option('--cursor <id>', 'Continue after this submission id')
    .action((options: ListOptions, command: Command) => {
      const globals = globalOptions(command);
      const page = withStatusStore(globals, (store) =>
        store.list({ status: parseState(options.status), limit: options.limit, cursor: options.cursor })
      );

      if (globals.json) {
        console.log(formatJson(page));
        return;
      }
      console.log(
        formatTable(page.records, [
          { header: 'Submission', value: (r) => r.submissionId },
          { header: 'State', value: (r) => r.state },
          { header: 'Item', value: (r) => r.itemId },
          { header: 'Collection', value: (r) => r.collectionId },
          { header: 'Reasons', value: (r) => r.reasons.length, align: 'right' },
          { header: 'Updated', value: (r) => r.updatedAt },
        ])
      );
      if (page.nextCursor) {
        console.log(`\nMore results: --cursor ${page.nextCursor}`);
      }
    });

  ingestions
    .command('get <id>')
    .description('Show one submission')
    .action((id: string, _options: unknown, command: Command) => {
      const globals = globalOptions(command);
      const record = withStatusStore(globals, (store) => store.get(id));

      if (!record) {
        console.error(`Submission ${id} not found`);
        process.exitCode = EXIT_CODES.FAILURES;
        return;
      }
      if (globals.json) {
        console.log(formatJson(record));
      } else {
        printRecord(record);
      }
    });

  ingestions
    .command('cancel <id>')
    .description('Cancel a submission that has not finished validation')
    .action((id: string, _options: unknown, command: Command) => {
      const globals = globalOptions(command);

      try {
        const record = withStatusStore(globals, (store) => store.cancel(id));
        if (!record) {
          console.error(`Submission ${id} not found`);
          process.exitCode = EXIT_CODES.FAILURES;
          return;
        }
        console.log(globals.json ? formatJson(record) : `Submission ${id} cancelled`);
      } catch (error) {
        if (!(error instanceof IngestionStateError)) {
          throw error;
        }
        console.error(errorMessage(error));
        process.exitCode = EXIT_CODES.FAILURES;
      }
    });

  ingestions
    .command('update <id>')
    .description('Set or clear the operator note of a submission')
    .option('--note <text>', 'Note to attach')
    .option('--clear-note', 'Remove the note')
    .action((id: string, options: UpdateOptions, command: Command) => {
      const globals = globalOptions(command);
      if ((options.note === undefined) === (options.clearNote !== true)) {
        console.error('Pass exactly one of --note or --clear-note');
        process.exitCode = EXIT_CODES.ERRORS;
        return;
      }

      const record = withStatusStore(globals, (store) => store.update(id, { note: options.note ?? null }));
      if (!record) {
        console.error(`Submission ${id} not found`);
        process.exitCode = EXIT_CODES.FAILURES;
        return;
      }
      console.log(globals.json ? formatJson(record) : `Submission ${id} updated`);
    });
}
