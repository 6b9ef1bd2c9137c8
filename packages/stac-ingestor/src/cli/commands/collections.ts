/**
 * Collection Commands
 *
 * Registers collection management subcommands:
 * - publish: validate a STAC collection document and upsert it
 * - delete: remove a collection (refused while items remain, unless --force)
 * - list: collections with item counts
 */

import type { Command } from 'commander';
import { CollectionInUseError, CollectionValidationError } from '../../core/errors.js';
import { EXIT_CODES, errorMessage, globalOptions, loadCommandConfig, type GlobalOptions } from '../lib/context.js';
import { readJsonDocument } from '../lib/input.js';
import { formatJson, formatTable } from '../lib/output.js';
import { openCatalogStore } from '../lib/runtime.js';
import { CollectionPublisher } from '../../services/collection-publisher.js';

/**
 * Run an action against a publisher over the configured store
 */
async function withPublisher<T>(
  globals: GlobalOptions,
  action: (publisher: CollectionPublisher) => Promise<T>
): Promise<T> {
  const { config } = loadCommandConfig(globals);
  const store = openCatalogStore(config.store);
  try {
    return await action(new CollectionPublisher(store));
  } finally {
    await store.close();
  }
}

export function registerCollectionCommands(program: Command): void {
  const collections = program.command('collections').description('Manage STAC collections in the catalog');

  collections
    .command('publish <file>')
    .description('Validate a STAC collection document and create or update it')
    .action(async (file: string, _options: unknown, command: Command) => {
      const globals = globalOptions(command);
      const document = await readJsonDocument(file);

      try {
        const result = await withPublisher(globals, (publisher) => publisher.publish(document));
        console.log(
          globals.json ? formatJson(result) : `Collection ${result.collectionId} ${result.action}`
        );
      } catch (error) {
        if (!(error instanceof CollectionValidationError)) {
          throw error;
        }
        if (globals.json) {
          console.log(formatJson({ success: false, issues: error.issues }));
        } else {
          console.error('Invalid collection document:');
          for (const issue of error.issues) {
            console.error(`  - ${issue}`);
          }
        }
        process.exitCode = EXIT_CODES.FAILURES;
      }
    });

  collections
    .command('delete <id>')
    .description('Delete a collection')
    .option('--force', 'Delete even when items still belong to the collection')
    .action(async (id: string, options: { readonly force?: boolean }, command: Command) => {
      const globals = globalOptions(command);

      try {
        const deleted = await withPublisher(globals, (publisher) =>
          publisher.delete(id, { force: options.force })
        );
        if (globals.json) {
          console.log(formatJson({ collectionId: id, deleted }));
        } else {
          console.log(deleted ? `Collection ${id} deleted` : `Collection ${id} not found`);
        }
        if (!deleted) {
          process.exitCode = EXIT_CODES.FAILURES;
        }
      } catch (error) {
        if (!(error instanceof CollectionInUseError)) {
          throw error;
        }
        console.error(`${errorMessage(error)}; pass --force to delete them too`);
        process.exitCode = EXIT_CODES.FAILURES;
      }
    });

  collections
    .command('list')
    .description('List collections with item counts')
    .action(async (_options: unknown, command: Command) => {
      const globals = globalOptions(command);
      const summaries = await withPublisher(globals, (publisher) => publisher.list());

      if (globals.json) {
        console.log(formatJson(summaries));
        return;
      }
      console.log(
        formatTable(summaries, [
          { header: 'ID', value: (c) => c.id },
          { header: 'Title', value: (c) => c.title },
          { header: 'Items', value: (c) => c.itemCount, align: 'right' },
          { header: 'Updated', value: (c) => c.updatedAt },
        ])
      );
    });
}
