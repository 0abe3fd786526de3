/**
 * SQLite Storage Backend
 *
 * Connection setup and schema for the mailbox mirror and the workflow
 * audit tables, using better-sqlite3.
 */

import Database from "better-sqlite3";
import * as fs from "node:fs";
import * as path from "node:path";
import { StorageError, errorMessage } from "../errors.js";

export type SqliteDatabase = Database.Database;

/** Current time in the ISO format used by every TEXT timestamp column */
const NOW_SQL = "(strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))";

/**
 * Open (and if needed create) a database. Pass ":memory:" for a throwaway one.
 */
export function openDatabase(filename: string): SqliteDatabase {
  if (filename !== ":memory:") {
    fs.mkdirSync(path.dirname(filename), { recursive: true });
  }

  let db: SqliteDatabase;
  try {
    db = new Database(filename);
  } catch (err) {
    throw new StorageError(`Cannot open database ${filename}: ${errorMessage(err)}`, { cause: err });
  }

  db.pragma("journal_mode = WAL");
  db.pragma("synchronous = NORMAL");
  db.pragma("foreign_keys = ON");
  db.pragma("busy_timeout = 5000");

  initializeSchema(db);
  return db;
}

/**
 * Initialize database schema.
 */
export function initializeSchema(database: SqliteDatabase): void {
  database.exec(`
    -- Mailbox mirror (written by the fetcher)
    CREATE TABLE IF NOT EXISTS users (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      email_address TEXT NOT NULL UNIQUE,
      created_at TEXT NOT NULL DEFAULT ${NOW_SQL},
      updated_at TEXT NOT NULL DEFAULT ${NOW_SQL}
    );

    CREATE TABLE IF NOT EXISTS folders (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT NOT NULL,
      type TEXT NOT NULL CHECK (type IN ('user', 'system')),
      provider_id TEXT,
      user_id INTEGER NOT NULL REFERENCES users(id),
      created_at TEXT NOT NULL DEFAULT ${NOW_SQL},
      updated_at TEXT NOT NULL DEFAULT ${NOW_SQL}
    );

    CREATE INDEX IF NOT EXISTS idx_folders_user_id_name ON folders(user_id, name);
    CREATE UNIQUE INDEX IF NOT EXISTS idx_folders_provider_user ON folders(provider_id, user_id);

    CREATE TABLE IF NOT EXISTS emails (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      subject TEXT,
      provider_id TEXT NOT NULL,
      user_id INTEGER NOT NULL REFERENCES users(id),
      body TEXT,
      body_plain_text TEXT,
      received_timestamp TEXT NOT NULL,
      sender_name TEXT,
      sender_email_address TEXT NOT NULL,
      is_read INTEGER NOT NULL DEFAULT 0,
      created_at TEXT NOT NULL DEFAULT ${NOW_SQL},
      updated_at TEXT NOT NULL DEFAULT ${NOW_SQL}
    );

    CREATE UNIQUE INDEX IF NOT EXISTS idx_emails_user_provider ON emails(user_id, provider_id);
    CREATE INDEX IF NOT EXISTS idx_emails_received ON emails(user_id, received_timestamp);
    CREATE INDEX IF NOT EXISTS idx_emails_subject ON emails(subject);

    CREATE TABLE IF NOT EXISTS email_recipients (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      email_id INTEGER NOT NULL REFERENCES emails(id),
      name TEXT,
      email_address TEXT,
      type TEXT NOT NULL CHECK (type IN ('to', 'cc')),
      created_at TEXT NOT NULL DEFAULT ${NOW_SQL}
    );

    CREATE INDEX IF NOT EXISTS idx_email_recipients_email ON email_recipients(email_id, type);

    CREATE TABLE IF NOT EXISTS email_folders (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      email_id INTEGER NOT NULL REFERENCES emails(id),
      folder_id INTEGER NOT NULL REFERENCES folders(id),
      created_at TEXT NOT NULL DEFAULT ${NOW_SQL}
    );

    CREATE UNIQUE INDEX IF NOT EXISTS idx_email_folders_pair ON email_folders(email_id, folder_id);

    CREATE TABLE IF NOT EXISTS email_attachments (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      email_id INTEGER NOT NULL REFERENCES emails(id),
      name TEXT NOT NULL,
      mime_type TEXT,
      created_at TEXT NOT NULL DEFAULT ${NOW_SQL}
    );

    -- Workflows and their audit trail
    CREATE TABLE IF NOT EXISTS workflow (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      hash TEXT NOT NULL UNIQUE,
      content TEXT NOT NULL,
      created_at TEXT NOT NULL DEFAULT ${NOW_SQL},
      updated_at TEXT NOT NULL DEFAULT ${NOW_SQL}
    );

    CREATE TABLE IF NOT EXISTS workflow_run (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      workflow_id INTEGER NOT NULL REFERENCES workflow(id),
      status TEXT NOT NULL CHECK (status IN ('yet_to_start', 'running', 'completed', 'failed')),
      started_at TEXT,
      completed_at TEXT,
      created_at TEXT NOT NULL DEFAULT ${NOW_SQL}
    );

    CREATE INDEX IF NOT EXISTS idx_workflow_run_workflow ON workflow_run(workflow_id);

    CREATE TABLE IF NOT EXISTS workflow_run_activity (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      run_id INTEGER NOT NULL REFERENCES workflow_run(id),
      email_id INTEGER NOT NULL REFERENCES emails(id),
      action_type TEXT NOT NULL CHECK (action_type IN ('move', 'mark_as_read')),
      created_at TEXT NOT NULL DEFAULT ${NOW_SQL}
    );

    CREATE UNIQUE INDEX IF NOT EXISTS idx_workflow_run_activity_pair ON workflow_run_activity(run_id, email_id);
  `);
}

/**
 * Run a storage call, turning driver errors into StorageError.
 */
export function withStorage<T>(operation: string, fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    if (err instanceof StorageError) throw err;
    throw new StorageError(`${operation} failed: ${errorMessage(err)}`, { cause: err });
  }
}

export function toRowId(value: number | bigint): number {
  return typeof value === "bigint" ? Number(value) : value;
}
