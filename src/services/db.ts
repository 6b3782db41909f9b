import Database from 'better-sqlite3';
import fs from 'node:fs';
import path from 'node:path';

export type SqliteDatabase = Database.Database;

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS jobs (
    id TEXT PRIMARY KEY,
    query TEXT NOT NULL,
    analysis_type TEXT NOT NULL,
    requested_agents_json TEXT NOT NULL,
    status TEXT NOT NULL,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL,
    deadline_at TEXT NOT NULL,
    report_json TEXT
  );

  CREATE INDEX IF NOT EXISTS idx_jobs_status
    ON jobs(status);

  CREATE INDEX IF NOT EXISTS idx_jobs_created_at
    ON jobs(created_at);

  CREATE TABLE IF NOT EXISTS agent_tasks (
    job_id TEXT NOT NULL,
    agent TEXT NOT NULL,
    position INTEGER NOT NULL,
    sub_status TEXT NOT NULL,
    source TEXT,
    started_at TEXT,
    finished_at TEXT,
    result_json TEXT,
    error_json TEXT,
    PRIMARY KEY (job_id, agent),
    FOREIGN KEY(job_id) REFERENCES jobs(id) ON DELETE CASCADE
  );

  CREATE TABLE IF NOT EXISTS job_errors (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    job_id TEXT NOT NULL,
    agent TEXT NOT NULL,
    code TEXT NOT NULL,
    message TEXT NOT NULL,
    at TEXT NOT NULL,
    FOREIGN KEY(job_id) REFERENCES jobs(id) ON DELETE CASCADE
  );
`;

/**
 * Open (or create) the job database and apply the schema.
 * Pass `':memory:'` for a throwaway in-process database.
 */
export function openDatabase(filePath: string): SqliteDatabase {
  if (filePath !== ':memory:') {
    const directory = path.dirname(path.resolve(filePath));
    if (!fs.existsSync(directory)) {
      fs.mkdirSync(directory, { recursive: true });
    }
  }

  const db = new Database(filePath);
  db.pragma('foreign_keys = ON');
  if (filePath !== ':memory:') {
    db.pragma('journal_mode = WAL');
  }
  db.exec(SCHEMA);
  return db;
}
