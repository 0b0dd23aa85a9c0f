import Database from 'better-sqlite3';
import fs from 'node:fs';
import path from 'node:path';

export interface Db {
  sqlite: Database.Database;
}

const SCHEMA_VERSION = 1;

export function openDb(dbPath: string): Db {
  fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  const sqlite = new Database(dbPath, { timeout: 10_000 });
  sqlite.pragma('journal_mode = WAL');
  return { sqlite };
}

/** Creates the catalog tables if they are missing; no-op on an up-to-date file. */
export function ensureSchema(db: Db) {
  const sqlite = db.sqlite;

  sqlite.exec(
    `CREATE TABLE IF NOT EXISTS schema_meta (
      id INTEGER PRIMARY KEY CHECK (id = 1),
      version INTEGER NOT NULL,
      updated_at TEXT NOT NULL
    );`
  );

  const row = sqlite.prepare<[], { version: number }>('SELECT version FROM schema_meta WHERE id=1').get();
  const current = row?.version ?? 0;
  if (current === SCHEMA_VERSION) return;

  // v1 bootstrap
  if (current === 0) {
    sqlite.exec(
      `CREATE TABLE IF NOT EXISTS file (
        filename TEXT PRIMARY KEY,
        location TEXT NOT NULL,
        modified_at TEXT NOT NULL,
        size INTEGER NOT NULL CHECK (size >= 0),
        index_type TEXT NOT NULL,
        product TEXT NOT NULL,
        timestep TEXT NOT NULL,
        experiment TEXT NOT NULL,
        model TEXT NOT NULL,
        ensemble TEXT NOT NULL,
        variable TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_file_location ON file(location);
      `
    );

    sqlite
      .prepare('INSERT OR REPLACE INTO schema_meta (id, version, updated_at) VALUES (1, ?, ?)')
      .run(1, new Date().toISOString());
  }
}
