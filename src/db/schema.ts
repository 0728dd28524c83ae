import Database from 'better-sqlite3';
import * as fs from 'fs';
import * as path from 'path';

/**
 * Open (or create) the service database. Pass ':memory:' for a throwaway store.
 */
export function openDatabase(dataPath: string | ':memory:'): Database.Database {
  let db: Database.Database;

  if (dataPath === ':memory:') {
    db = new Database(':memory:');
  } else {
    // Ensure data directory exists
    if (!fs.existsSync(dataPath)) {
      fs.mkdirSync(dataPath, { recursive: true });
    }
    db = new Database(path.join(dataPath, 'tasks.db'));
    // Enable WAL mode for better concurrency
    db.pragma('journal_mode = WAL');
  }

  initSchema(db);
  return db;
}

function initSchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS tasks (
      id TEXT PRIMARY KEY,
      config TEXT NOT NULL,
      status TEXT NOT NULL DEFAULT 'queued',
      downloaded_bytes INTEGER NOT NULL DEFAULT 0,
      total_bytes INTEGER,
      error_message TEXT,
      last_exit_code INTEGER,
      created_at INTEGER NOT NULL,
      started_at INTEGER,
      completed_at INTEGER,
      updated_at INTEGER NOT NULL
    )
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS task_logs (
      task_id TEXT NOT NULL,
      seq INTEGER NOT NULL,
      timestamp INTEGER NOT NULL,
      level TEXT NOT NULL,
      kind TEXT NOT NULL,
      message TEXT NOT NULL,
      PRIMARY KEY (task_id, seq)
    )
  `);

  // Log rows are append-only
  db.exec(`
    CREATE TRIGGER IF NOT EXISTS task_logs_no_update
    BEFORE UPDATE ON task_logs
    BEGIN
      SELECT RAISE(ABORT, 'task log entries are immutable');
    END
  `);

  db.exec(`
    CREATE INDEX IF NOT EXISTS idx_tasks_status ON tasks(status);
    CREATE INDEX IF NOT EXISTS idx_tasks_created ON tasks(created_at);
  `);

  console.log('[DB] Schema initialized');
}
