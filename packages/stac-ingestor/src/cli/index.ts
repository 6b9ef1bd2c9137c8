/**
 * STAC Ingestor CLI
 *
 * @module cli
 */

import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { Command, CommanderError } from 'commander';
import { z } from 'zod';
import { ConfigValidationError } from '../core/errors.js';
import { registerCollectionCommands } from './commands/collections.js';
import { registerDlqCommands } from './commands/dlq.js';
import { registerIngestCommand } from './commands/ingest.js';
import { registerIngestionCommands } from './commands/ingestions.js';
import { registerValidateCommand } from './commands/validate.js';
import { EXIT_CODES, errorMessage, type ExitCode } from './lib/context.js';

function getVersion(): string {
  const packageJsonPath = join(dirname(fileURLToPath(import.meta.url)), '..', '..', 'package.json');
  try {
    const packageJson = z.object({ version: z.string() }).parse(JSON.parse(readFileSync(packageJsonPath, 'utf-8')));
    return packageJson.version;
  } catch {
    return '0.0.0';
  }
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('stac-ingestor')
    .description('Validate STAC items and ingest them into a catalog')
    .version(getVersion(), '-V, --version', 'Output the version number')
    .option('--config <path>', 'Path to config file (default: .stac-ingestorrc)')
    .option('--json', 'Output as JSON (machine-readable)')
    .option('-v, --verbose', 'Debug logging (same as LOG_LEVEL=debug)')
    // Inherited by subcommands: usage errors surface in main() as CommanderError
    .exitOverride();

  registerIngestCommand(program);
  registerValidateCommand(program);
  registerCollectionCommands(program);
  registerIngestionCommands(program);
  registerDlqCommands(program);

  return program;
}

/**
 * Run the CLI and resolve with the process exit code
 */
export async function main(argv: readonly string[]): Promise<ExitCode | number> {
  const program = createProgram();

  try {
    await program.parseAsync([...argv]);
    return typeof process.exitCode === 'number' ? process.exitCode : EXIT_CODES.SUCCESS;
  } catch (error) {
    if (error instanceof CommanderError) {
      // --help and --version land here with exit code 0
      return error.exitCode;
    }
    if (error instanceof ConfigValidationError) {
      console.error(`Configuration error: ${error.message}`);
      return EXIT_CODES.CONFIG_ERROR;
    }
    console.error(`Error: ${errorMessage(error)}`);
    return EXIT_CODES.ERRORS;
  }
}
