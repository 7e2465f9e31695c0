import Database from 'better-sqlite3';
import { mkdirSync } from 'fs';
import { dirname } from 'path';

export function createDatabase(dbPath?: string): Database.Database {
  if (dbPath && dbPath !== ':memory:') {
    mkdirSync(dirname(dbPath), { recursive: true });
  }
  const db = new Database(dbPath || ':memory:');

  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');

  db.exec(`
    CREATE TABLE IF NOT EXISTS devices (
      ip TEXT PRIMARY KEY,
      dns_name TEXT,
      port INTEGER,
      username TEXT,
      password TEXT,
      timeout INTEGER,
      simulated INTEGER NOT NULL DEFAULT 0,
      firmware_info TEXT,
      simulation TEXT,
      created_at TEXT NOT NULL DEFAULT (datetime('now'))
    );

    CREATE TABLE IF NOT EXISTS update_runs (
      id TEXT PRIMARY KEY,
      trigger TEXT NOT NULL,
      options TEXT NOT NULL DEFAULT '{}',
      latest_version TEXT NOT NULL DEFAULT 'Unknown',
      total INTEGER NOT NULL DEFAULT 0,
      checked INTEGER NOT NULL DEFAULT 0,
      needs_update INTEGER NOT NULL DEFAULT 0,
      updated INTEGER NOT NULL DEFAULT 0,
      success INTEGER NOT NULL DEFAULT 0,
      failed INTEGER NOT NULL DEFAULT 0,
      started_at TEXT NOT NULL,
      finished_at TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS update_results (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      run_id TEXT NOT NULL REFERENCES update_runs(id) ON DELETE CASCADE,
      position INTEGER NOT NULL,
      ip TEXT NOT NULL,
      success INTEGER NOT NULL,
      status TEXT NOT NULL,
      message TEXT NOT NULL,
      current_version TEXT NOT NULL,
      previous_version TEXT NOT NULL,
      latest_version TEXT NOT NULL,
      needs_update INTEGER NOT NULL,
      update_started INTEGER NOT NULL,
      update_completed INTEGER NOT NULL,
      error_kind TEXT,
      elapsed_ms INTEGER NOT NULL DEFAULT 0,
      timeout_seconds INTEGER
    );

    CREATE INDEX IF NOT EXISTS idx_update_results_run ON update_results(run_id, position);
    CREATE INDEX IF NOT EXISTS idx_update_runs_started ON update_runs(started_at);
  `);

  return db;
}
