/**
 * Record Input Tests
 */

import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { defaultPrefix, InputParseError, parseRecords, readJsonDocument, readRecords } from '../../../cli/lib/input.js';

describe('parseRecords', () => {
  it('should split NDJSON and skip blank lines', () => {
    expect(parseRecords('{"id":"a"}\n\n{"id":"b"}\n', 'nightly')).toEqual([
      { submissionId: 'nightly-1', payload: { id: 'a' } },
      { submissionId: 'nightly-2', payload: { id: 'b' } },
    ]);
  });

  it('should take items from a FeatureCollection', () => {
    const content = JSON.stringify({ type: 'FeatureCollection', features: [{ id: 'a' }, { id: 'b' }] });

    expect(parseRecords(content, 'fc').map((r) => r.submissionId)).toEqual(['fc-1', 'fc-2']);
  });

  it('should accept a JSON array or a single item', () => {
    expect(parseRecords('[{"id":"a"}]', 'arr')).toEqual([{ submissionId: 'arr-1', payload: { id: 'a' } }]);
    expect(parseRecords('{\n  "id": "solo"\n}', 'one')).toEqual([{ submissionId: 'one-1', payload: { id: 'solo' } }]);
  });

  it('should return nothing for empty input', () => {
    expect(parseRecords('  \n', 'empty')).toEqual([]);
  });

  it('should keep non-object lines as payloads for validation to reject', () => {
    expect(parseRecords('{"id":"a"}\n42\n', 'mixed')[1]).toEqual({ submissionId: 'mixed-2', payload: 42 });
  });

  it('should report the line of malformed NDJSON', () => {
    const parse = (): unknown => parseRecords('{"id":"a"}\n{oops\n', 'bad');

    expect(parse).toThrow(InputParseError);
    try {
      parse();
    } catch (error) {
      expect(error).toBeInstanceOf(InputParseError);
      if (error instanceof InputParseError) {
        expect(error.line).toBe(2);
        expect(error.message.startsWith('Line 2: ')).toBe(true);
      }
    }
  });

  it('should refuse a FeatureCollection without features', () => {
    expect(() => parseRecords('{"type":"FeatureCollection"}', 'fc')).toThrow(
      'FeatureCollection has no features array'
    );
  });
});

describe('defaultPrefix', () => {
  it('should derive the prefix from the file name', () => {
    expect(defaultPrefix('-')).toBe('stdin');
    expect(defaultPrefix('/data/items.ndjson')).toBe('items');
    expect(defaultPrefix('archive.tar.gz')).toBe('archive.tar');
    expect(defaultPrefix('.hidden')).toBe('.hidden');
  });
});

describe('file input', () => {
  let dir: string;

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), 'stac-input-'));
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should read records with the file name as prefix', async () => {
    const path = join(dir, 'scenes.ndjson');
    writeFileSync(path, '{"id":"a"}\n{"id":"b"}\n');

    expect((await readRecords(path)).map((r) => r.submissionId)).toEqual(['scenes-1', 'scenes-2']);
    expect((await readRecords(path, 'batch7')).map((r) => r.submissionId)).toEqual(['batch7-1', 'batch7-2']);
  });

  it('should name the file when a JSON document is malformed', async () => {
    const path = join(dir, 'collection.json');
    writeFileSync(path, '{"id": ');

    const error = await readJsonDocument(path).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(InputParseError);
    expect(error instanceof Error && error.message.startsWith(`Invalid JSON in ${path}: `)).toBe(true);
  });
});
