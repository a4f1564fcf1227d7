import Database from 'better-sqlite3';
import type BetterSqlite3 from 'better-sqlite3';
import fs from 'node:fs';
import path from 'node:path';
import { DEVLOG_RELAY_DB_PATH } from '../utils/paths.js';
import { MIGRATIONS } from './schema.js';
import { debug } from '../utils/logger.js';

let _db: BetterSqlite3.Database | null = null;

const MIGRATIONS_TABLE = `
  CREATE TABLE IF NOT EXISTS _migrations (
    version INTEGER PRIMARY KEY,
    description TEXT NOT NULL,
    applied_at TEXT NOT NULL DEFAULT (datetime('now'))
  )
`;

function schemaVersion(db: BetterSqlite3.Database): number {
  const row = db.prepare('SELECT MAX(version) AS v FROM _migrations').get() as {
    v: number | null;
  };
  return row.v ?? 0;
}

/**
 * Bring the schema up to date and return the versions applied. Each
 * migration runs in its own IMMEDIATE transaction that re-reads the version,
 * so relay processes sharing a database file apply it exactly once.
 */
export function runMigrations(db: BetterSqlite3.Database): number[] {
  db.exec(MIGRATIONS_TABLE);
  const record = db.prepare('INSERT INTO _migrations (version, description) VALUES (?, ?)');

  const applied: number[] = [];
  for (const migration of MIGRATIONS) {
    const apply = db.transaction((): boolean => {
      if (schemaVersion(db) >= migration.version) return false;
      db.exec(migration.up);
      record.run(migration.version, migration.description);
      return true;
    });

    if (apply.immediate()) {
      debug(`Applied migration ${migration.version}: ${migration.description}`);
      applied.push(migration.version);
    }
  }
  return applied;
}

export function openDatabase(dbPath: string): BetterSqlite3.Database {
  if (dbPath !== ':memory:') {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }

  const db = new Database(dbPath);
  db.pragma('journal_mode = WAL');
  // Concurrent pushes from several machines wait for the writer lock
  db.pragma('busy_timeout = 5000');

  runMigrations(db);
  return db;
}

export function initStore(
  dbPath: string = DEVLOG_RELAY_DB_PATH,
): BetterSqlite3.Database {
  closeStore();
  _db = openDatabase(dbPath);
  return _db;
}

export function getStore(): BetterSqlite3.Database {
  if (!_db) {
    throw new Error('Store not initialized. Call initStore() first.');
  }
  return _db;
}

export function closeStore(): void {
  if (_db) {
    _db.close();
    _db = null;
  }
}
