import Database from 'better-sqlite3';
import path from 'node:path';

export type DB = Database.Database;

let _db: DB | null = null;

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS jobs (
    seq INTEGER PRIMARY KEY AUTOINCREMENT,
    id TEXT NOT NULL UNIQUE,
    artifact_ref TEXT NOT NULL,
    status TEXT NOT NULL CHECK (status IN ('pending','uploading','analyzing','completed','failed')),
    progress REAL NOT NULL DEFAULT 0,
    error TEXT,
    result TEXT,
    attempts INTEGER NOT NULL DEFAULT 0,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_jobs_status_created ON jobs(status, created_at);
  CREATE TABLE IF NOT EXISTS config (
    key TEXT PRIMARY KEY,
    value TEXT NOT NULL
  );
`;

export function resolveDBPath() {
  return process.env.UPLOADCTL_DB ?? path.resolve(process.cwd(), 'queue.db');
}

/**
 * Open (or create) a queue database. Pass ':memory:' for a throwaway one.
 */
export function openDB(file: string): DB {
  const db = new Database(file);
  if (file !== ':memory:') {
    db.pragma('journal_mode = WAL');
    db.pragma('synchronous = FULL');
  }
  db.pragma('busy_timeout = 5000');
  db.exec(SCHEMA);
  return db;
}

export function getDB() {
  if (_db) return _db;
  _db = openDB(resolveDBPath());
  return _db;
}

export function closeDB() {
  _db?.close();
  _db = null;
}
