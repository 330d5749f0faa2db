import Database from "better-sqlite3"

import { StoreError } from "@/errors"

export type { Database } from "better-sqlite3"

export interface OpenOptions {
  /** Open without write access; the file must already exist. */
  readonly?: boolean
}

/**
 * Opens (or creates) the SQLite database at the given path, enables WAL mode
 * and ensures all required tables exist.
 * @param path - Path to the database file, or ":memory:".
 */
export function createDatabase(path: string): Database.Database {
  const db = connect(path, {})
  db.pragma("journal_mode = WAL")
  db.pragma("synchronous = NORMAL")
  db.pragma("temp_store = MEMORY")
  createSchema(db)
  return db
}

/**
 * Opens an existing database. Read-only handles skip schema creation, so the
 * dashboard never writes to the file it serves.
 */
export function openDatabase(
  path: string,
  options: OpenOptions = {},
): Database.Database {
  if (!options.readonly) return createDatabase(path)
  return connect(path, options)
}

/** Runs `fn` with a handle that is closed afterwards, even when `fn` throws. */
export function withDatabase<T>(
  path: string,
  options: OpenOptions,
  fn: (db: Database.Database) => T,
): T {
  const db = openDatabase(path, options)
  try {
    return fn(db)
  } finally {
    db.close()
  }
}

function connect(path: string, options: OpenOptions): Database.Database {
  let db: Database.Database
  try {
    db = new Database(path, {
      readonly: options.readonly ?? false,
      fileMustExist: options.readonly ?? false,
    })
  } catch (err) {
    throw new StoreError(path, err)
  }
  db.pragma("busy_timeout = 5000")
  return db
}

function createSchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS commits (
      hash TEXT PRIMARY KEY,
      author_name TEXT NOT NULL,
      author_email TEXT NOT NULL,
      authored_at TEXT NOT NULL,
      message TEXT NOT NULL,
      additions INTEGER NOT NULL DEFAULT 0,
      deletions INTEGER NOT NULL DEFAULT 0,
      files_changed INTEGER NOT NULL DEFAULT 0,
      is_fix INTEGER NOT NULL DEFAULT 0,
      error_tags TEXT
    );

    CREATE INDEX IF NOT EXISTS idx_commits_authored_at ON commits(authored_at);
    CREATE INDEX IF NOT EXISTS idx_commits_author ON commits(author_email);

    CREATE TABLE IF NOT EXISTS commit_files (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      commit_hash TEXT NOT NULL,
      file_path TEXT NOT NULL,
      additions INTEGER NOT NULL DEFAULT 0 CHECK (additions >= 0),
      deletions INTEGER NOT NULL DEFAULT 0 CHECK (deletions >= 0),
      UNIQUE (commit_hash, file_path)
    );

    CREATE INDEX IF NOT EXISTS idx_commit_files_file_path ON commit_files(file_path);
    CREATE INDEX IF NOT EXISTS idx_commit_files_commit_hash ON commit_files(commit_hash);

    CREATE TABLE IF NOT EXISTS metadata (
      key TEXT PRIMARY KEY,
      value TEXT NOT NULL
    );
  `)
}
