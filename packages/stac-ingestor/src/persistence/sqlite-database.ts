/**
 * SQLite connection setup and schema migrations
 *
 * Shared by the local catalog store, the ingestion status store and the
 * deferred batch queue. Each owner declares its migrations under its own
 * scope so several owners can share one database file.
 */

import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import Database from 'better-sqlite3';
import { z } from 'zod';

/**
 * Migration definition
 */
export interface Migration {
  readonly version: number;
  readonly name: string;
  readonly up: (db: Database.Database) => void;
}

const VersionRowSchema = z.object({ version: z.number().int().nullable() });

/**
 * Open a database file (or `:memory:`) with the pragmas every store relies on
 */
export function openDatabase(path: string): Database.Database {
  if (path !== ':memory:') {
    mkdirSync(dirname(path), { recursive: true });
  }

  const db = new Database(path);

  // Concurrent reads while a batch commits
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');
  db.pragma('synchronous = NORMAL');
  db.pragma('busy_timeout = 2000');

  return db;
}

/**
 * Apply pending migrations of one scope in a single transaction
 *
 * @returns Schema version of the scope after migrating
 */
export function runMigrations(
  db: Database.Database,
  scope: string,
  migrations: readonly Migration[]
): number {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      scope TEXT NOT NULL,
      version INTEGER NOT NULL,
      name TEXT NOT NULL,
      applied_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now')),
      PRIMARY KEY (scope, version)
    );
  `);

  const currentVersion = getSchemaVersion(db, scope);
  const pending = [...migrations]
    .sort((a, b) => a.version - b.version)
    .filter((migration) => migration.version > currentVersion);

  const apply = db.transaction(() => {
    for (const migration of pending) {
      migration.up(db);
      db.prepare(`
        INSERT INTO schema_migrations (scope, version, name)
        VALUES (?, ?, ?)
      `).run(scope, migration.version, migration.name);
    }
  });
  apply();

  return getSchemaVersion(db, scope);
}

/**
 * Current schema version of a scope (0 when nothing applied)
 */
export function getSchemaVersion(db: Database.Database, scope: string): number {
  const row = VersionRowSchema.parse(
    db.prepare(`SELECT MAX(version) AS version FROM schema_migrations WHERE scope = ?`).get(scope)
  );
  return row.version ?? 0;
}
