/**
 * Output Formatting for CLI Commands
 *
 * @module cli/lib/output
 */

import { formatReason } from '../../core/reasons.js';
import type { CommitOutcome, ValidationReason } from '../../core/types.js';

/**
 * Column definition for table output
 */
export interface TableColumn<T> {
  readonly header: string;
  readonly value: (row: T) => string | number | undefined;
  readonly align?: 'left' | 'right';
}

/**
 * Format rows as a fixed-width table
 */
export function formatTable<T>(rows: readonly T[], columns: readonly TableColumn<T>[]): string {
  if (rows.length === 0) {
    return 'No entries found.';
  }

  const cells = rows.map((row) => columns.map((col) => String(col.value(row) ?? '')));
  const widths = columns.map((col, i) =>
    Math.max(col.header.length, ...cells.map((rowCells) => rowCells[i].length))
  );

  const pad = (value: string, i: number): string =>
    columns[i].align === 'right' ? value.padStart(widths[i]) : value.padEnd(widths[i]);

  const headerRow = columns.map((col, i) => pad(col.header, i)).join(' | ');
  const separator = widths.map((w) => '-'.repeat(w)).join('-+-');
  const dataRows = cells.map((rowCells) => rowCells.map(pad).join(' | '));

  return [headerRow, separator, ...dataRows].map((line) => line.trimEnd()).join('\n');
}

/**
 * Format data as JSON
 */
export function formatJson<T>(data: T, pretty = true): string {
  return pretty ? JSON.stringify(data, null, 2) : JSON.stringify(data);
}

/**
 * Indented reason lines for a failed record
 */
export function formatReasons(reasons: readonly ValidationReason[], indent = '    '): string {
  return reasons.map((reason) => `${indent}${formatReason(reason)}`).join('\n');
}

/**
 * Count outcomes by status
 */
export function summarizeOutcomes(outcomes: readonly CommitOutcome[]): Record<CommitOutcome['status'], number> {
  const summary = { committed: 0, rejected: 0, deferred: 0 };
  for (const outcome of outcomes) {
    summary[outcome.status]++;
  }
  return summary;
}
