/**
 * Shared command plumbing: global options, exit codes, argument parsers
 *
 * @module cli/lib/context
 */

import { InvalidArgumentError, type Command } from 'commander';
import type { DeepPartial, IngestorConfig } from '../../core/config.js';
import { loadConfig, type LoadedConfig } from './config.js';

export const EXIT_CODES = {
  SUCCESS: 0,
  /** Some records were rejected or deferred */
  FAILURES: 1,
  ERRORS: 2,
  CONFIG_ERROR: 3,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Options declared on the root program
 */
export interface GlobalOptions {
  readonly config?: string;
  readonly json?: boolean;
}

export function globalOptions(command: Command): GlobalOptions {
  return command.optsWithGlobals<GlobalOptions>();
}

export function loadCommandConfig(
  globals: GlobalOptions,
  overrides: DeepPartial<IngestorConfig> = {}
): LoadedConfig {
  return loadConfig({ configPath: globals.config, overrides });
}

/**
 * Commander argument parser for positive integers
 */
export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
