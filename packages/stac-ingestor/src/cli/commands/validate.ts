/**
 * Validate Command
 *
 * Run records through validation without committing anything.
 *
 * Usage:
 *   stac-ingestor validate <file> [--spec-only]
 *
 * --spec-only checks the STAC item spec alone: no asset probes, no catalog
 * lookups, no database files opened.
 */

import type { Command } from 'commander';
import type { CatalogRecord, ValidationVerdict } from '../../core/types.js';
import { ensureReasons } from '../../core/reasons.js';
import { SpecValidator } from '../../validators/spec-validator.js';
import {
  EXIT_CODES,
  globalOptions,
  loadCommandConfig,
  parsePositiveInt,
  type ExitCode,
  type GlobalOptions,
} from '../lib/context.js';
import { readRecords } from '../lib/input.js';
import { formatJson, formatReasons } from '../lib/output.js';
import { createRuntime } from '../lib/runtime.js';

interface ValidateOptions {
  readonly specOnly?: boolean;
  readonly concurrency?: number;
  readonly probeTimeoutMs?: number;
}

interface RecordVerdict {
  readonly submissionId: string;
  readonly verdict: ValidationVerdict;
}

export function registerValidateCommand(program: Command): void {
  program
    .command('validate <file>')
    .description('Validate STAC items without committing them')
    .option('--spec-only', 'Check the item spec only (no asset probes or catalog lookups)')
    .option('--concurrency <n>', 'Records validating at once', parsePositiveInt)
    .option('--probe-timeout-ms <ms>', 'Per-asset probe timeout', parsePositiveInt)
    .action(async (file: string, options: ValidateOptions, command: Command) => {
      process.exitCode = await executeValidate(file, options, globalOptions(command));
    });
}

async function executeValidate(
  file: string,
  options: ValidateOptions,
  globals: GlobalOptions
): Promise<ExitCode> {
  const records = await readRecords(file);

  const results = options.specOnly
    ? validateSpecOnly(records)
    : await validateWithCatalog(records, options, globals);

  const invalid = results.filter((r) => r.verdict.status === 'invalid');

  if (globals.json) {
    console.log(
      formatJson({
        file,
        total: results.length,
        valid: results.length - invalid.length,
        invalid: invalid.length,
        results: invalid.map((r) => ({
          submissionId: r.submissionId,
          reasons: r.verdict.status === 'invalid' ? r.verdict.reasons : [],
        })),
      })
    );
  } else {
    for (const { submissionId, verdict } of invalid) {
      if (verdict.status !== 'invalid') continue;
      console.log(`✗ ${submissionId}`);
      console.log(formatReasons(verdict.reasons));
    }
    console.log(`\n${results.length} records: ${results.length - invalid.length} valid, ${invalid.length} invalid`);
  }

  return invalid.length === 0 ? EXIT_CODES.SUCCESS : EXIT_CODES.FAILURES;
}

async function validateWithCatalog(
  records: readonly CatalogRecord[],
  options: ValidateOptions,
  globals: GlobalOptions
): Promise<RecordVerdict[]> {
  const { config } = loadCommandConfig(globals, {
    validation: { concurrency: options.concurrency },
    assets: { probeTimeoutMs: options.probeTimeoutMs },
  });
  const runtime = createRuntime(config);

  try {
    return await validateAll(
      (payload) => runtime.pipeline.process(payload),
      records,
      config.validation.concurrency
    );
  } finally {
    await runtime.close();
  }
}

function validateSpecOnly(records: readonly CatalogRecord[]): RecordVerdict[] {
  const validator = new SpecValidator();

  return records.map(({ submissionId, payload }): RecordVerdict => {
    const result = validator.validate(payload);
    if (result.item) {
      return { submissionId, verdict: { status: 'valid', item: result.item } };
    }
    return {
      submissionId,
      verdict: {
        status: 'invalid',
        reasons: ensureReasons(result.reasons, {
          category: 'spec_violation',
          code: 'invalid_value',
          message: 'Record failed validation',
        }),
      },
    };
  });
}

/**
 * Validate records with bounded concurrency, preserving record order
 */
export async function validateAll(
  validate: (payload: unknown) => Promise<ValidationVerdict>,
  records: readonly CatalogRecord[],
  concurrency: number
): Promise<RecordVerdict[]> {
  const results: RecordVerdict[] = [];

  for (let start = 0; start < records.length; start += concurrency) {
    const chunk = records.slice(start, start + concurrency);
    const verdicts = await Promise.all(chunk.map((record) => validate(record.payload)));
    chunk.forEach((record, i) => {
      results.push({ submissionId: record.submissionId, verdict: verdicts[i] });
    });
  }

  return results;
}
