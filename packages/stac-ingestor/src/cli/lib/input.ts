/**
 * Record input files
 *
 * Accepts:
 * - NDJSON: one item per line (blank lines skipped)
 * - JSON FeatureCollection: items taken from `features`
 * - JSON array of items
 * - a single JSON item
 *
 * Each record gets the submission id `<prefix>-<n>` (1-based position).
 *
 * @module cli/lib/input
 */

import { readFile } from 'node:fs/promises';
import { basename, extname } from 'node:path';
import type { CatalogRecord } from '../../core/types.js';
import { isRecord } from '../../validators/geometry.js';

export class InputParseError extends Error {
  constructor(
    message: string,
    public readonly line?: number
  ) {
    super(line === undefined ? message : `Line ${line}: ${message}`);
    this.name = 'InputParseError';
  }
}

/**
 * Split file content into records
 *
 * @throws {InputParseError} When neither a JSON document nor valid NDJSON
 */
export function parseRecords(content: string, prefix: string): CatalogRecord[] {
  const payloads = parsePayloads(content);
  return payloads.map((payload, index) => ({
    submissionId: `${prefix}-${index + 1}`,
    payload,
  }));
}

/**
 * Read a records file (or stdin when path is '-')
 */
export async function readRecords(path: string, prefix?: string): Promise<CatalogRecord[]> {
  const content = path === '-' ? await readStdin() : await readFile(path, 'utf-8');
  return parseRecords(content, prefix ?? defaultPrefix(path));
}

/**
 * Read and parse a single JSON document (e.g. a collection)
 */
export async function readJsonDocument(path: string): Promise<unknown> {
  const content = path === '-' ? await readStdin() : await readFile(path, 'utf-8');
  try {
    const document: unknown = JSON.parse(content);
    return document;
  } catch (error) {
    throw new InputParseError(`Invalid JSON in ${path}: ${error instanceof Error ? error.message : String(error)}`);
  }
}

export function defaultPrefix(path: string): string {
  if (path === '-') {
    return 'stdin';
  }
  const name = basename(path);
  return name.slice(0, name.length - extname(name).length) || name;
}

function parsePayloads(content: string): unknown[] {
  const trimmed = content.trim();
  if (trimmed.length === 0) {
    return [];
  }

  let document: unknown;
  let isDocument = true;
  try {
    document = JSON.parse(trimmed);
  } catch {
    isDocument = false;
  }

  if (!isDocument) {
    return parseNdjson(content);
  }

  if (Array.isArray(document)) {
    return document;
  }
  if (isRecord(document) && document.type === 'FeatureCollection') {
    if (!Array.isArray(document.features)) {
      throw new InputParseError('FeatureCollection has no features array');
    }
    return document.features;
  }
  return [document];
}

function parseNdjson(content: string): unknown[] {
  const payloads: unknown[] = [];
  const lines = content.split(/\r?\n/);

  lines.forEach((line, index) => {
    if (line.trim().length === 0) {
      return;
    }
    try {
      const payload: unknown = JSON.parse(line);
      payloads.push(payload);
    } catch (error) {
      throw new InputParseError(error instanceof Error ? error.message : String(error), index + 1);
    }
  });

  return payloads;
}

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf-8');
}
