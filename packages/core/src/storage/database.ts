// packages/core/src/storage/database.ts

import Database from 'better-sqlite3';
import { StorageError } from '../utils/errors.js';

const SCHEMA_VERSION = '1';

const MIGRATIONS = [
  // Full debate documents
  `CREATE TABLE IF NOT EXISTS debates (
    id            TEXT PRIMARY KEY,
    topic_title   TEXT NOT NULL,
    document      TEXT NOT NULL,
    created_at    TEXT NOT NULL
  )`,

  // Listing index (insertion order = seq)
  `CREATE TABLE IF NOT EXISTS debate_index (
    seq           INTEGER PRIMARY KEY AUTOINCREMENT,
    debate_id     TEXT NOT NULL,
    topic_title   TEXT NOT NULL,
    created_at    TEXT NOT NULL
  )`,
  'CREATE INDEX IF NOT EXISTS idx_debate_index_debate ON debate_index(debate_id)',

  // Schema meta
  `CREATE TABLE IF NOT EXISTS schema_meta (
    key   TEXT PRIMARY KEY,
    value TEXT NOT NULL
  )`,
];

/**
 * Open a SQLite database and run migrations.
 * Pass ':memory:' for in-memory databases (testing).
 */
export function openDatabase(dbPath: string): Database.Database {
  try {
    const db = new Database(dbPath);
    configurePragmas(db);
    runMigrations(db);
    return db;
  } catch (err) {
    throw new StorageError(
      `Failed to open database at "${dbPath}": ${err instanceof Error ? err.message : String(err)}`,
      'open',
    );
  }
}

function configurePragmas(db: Database.Database): void {
  db.pragma('journal_mode = WAL');
  db.pragma('busy_timeout = 5000');
}

/**
 * Run all schema migrations. Idempotent (uses IF NOT EXISTS).
 */
export function runMigrations(db: Database.Database): void {
  db.transaction(() => {
    for (const sql of MIGRATIONS) {
      db.exec(sql);
    }
    db.prepare("INSERT OR REPLACE INTO schema_meta(key, value) VALUES ('version', ?)").run(
      SCHEMA_VERSION,
    );
    db.prepare(
      "INSERT OR IGNORE INTO schema_meta(key, value) VALUES ('created_at', datetime('now'))",
    ).run();
  })();
}

/** Get the current schema version. */
export function getSchemaVersion(db: Database.Database): string | null {
  const row = db.prepare("SELECT value FROM schema_meta WHERE key = 'version'").get() as
    | { value: string }
    | undefined;
  return row?.value ?? null;
}
