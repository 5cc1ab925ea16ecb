import Database from 'better-sqlite3';
import fs from 'node:fs';
import path from 'node:path';
import { config } from './config';

interface DatabaseUnavailableOptions extends ErrorOptions {
  dbPath?: string;
  troubleshooting?: string[];
}

export class DatabaseUnavailableError extends Error {
  readonly dbPath?: string;

  readonly troubleshooting: string[];

  constructor(message: string, { dbPath, troubleshooting = [], ...options }: DatabaseUnavailableOptions = {}) {
    super(message, options);
    this.name = 'DatabaseUnavailableError';
    this.dbPath = dbPath;
    this.troubleshooting = troubleshooting;
  }
}

export function isDatabaseUnavailableError(error: unknown): error is DatabaseUnavailableError {
  return error instanceof DatabaseUnavailableError;
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS teachers (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    username TEXT UNIQUE NOT NULL,
    password_hash TEXT NOT NULL
  );
  CREATE TABLE IF NOT EXISTS items (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    description TEXT,
    found_location TEXT,
    collect_location TEXT,
    image_path TEXT,
    uploaded_at TEXT,
    status TEXT,
    collected_at TEXT
  );
  CREATE INDEX IF NOT EXISTS items_status_uploaded_at ON items (status, uploaded_at);
`;

// SQLite result codes that mean the file itself cannot be used.
const UNAVAILABLE_CODES = /^SQLITE_(CANTOPEN|CORRUPT|NOTADB|IOERR|READONLY|FULL|PERM)/;

export function openDatabase(dbPath: string = config.dbPath) {
  try {
    if (dbPath !== ':memory:') {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    }
    const db = new Database(dbPath);
    if (dbPath !== ':memory:') {
      db.pragma('journal_mode = WAL');
    }
    ensureSchema(db);
    return db;
  } catch (error) {
    throw toStorageError(error, dbPath);
  }
}

export type Db = ReturnType<typeof openDatabase>;

export function ensureSchema(db: Db) {
  db.exec(SCHEMA);
}

export function toStorageError(error: unknown, dbPath: string = config.dbPath): unknown {
  if (isDatabaseUnavailableError(error)) {
    return error;
  }
  if (isMissingNativeBindingError(error)) {
    return new DatabaseUnavailableError(
      'The better-sqlite3 native bindings could not be loaded. Rebuild the dependency for this Node.js version.',
      {
        dbPath,
        troubleshooting: [
          'Run "npm rebuild better-sqlite3" to compile the native extension for the current Node.js.',
          'Reinstall dependencies with "npm install" if the rebuild fails.',
          'Check that LOSTFOUND_DB_PATH points at a writable location.'
        ],
        cause: error instanceof Error ? error : undefined
      }
    );
  }
  if (error instanceof Database.SqliteError && UNAVAILABLE_CODES.test(error.code)) {
    return new DatabaseUnavailableError(`The lost & found database could not be used (${error.code}).`, {
      dbPath,
      troubleshooting: [
        'Confirm the database file exists and the server process can read and write it.',
        'Restore the file from a backup if SQLite reports it as corrupt.'
      ],
      cause: error
    });
  }
  return error;
}

function isMissingNativeBindingError(error: unknown) {
  return error instanceof Error && /Could not locate the bindings file|NODE_MODULE_VERSION/.test(error.message);
}

let shared: Db | null = null;

export function getDb(): Db {
  if (!shared) {
    shared = openDatabase();
  }
  return shared;
}
