import fs from 'node:fs';
import { config } from './config';
import { ensureSchema, getDb, isDatabaseUnavailableError, toStorageError, type DatabaseUnavailableError, type Db } from './db';
import { runAutoArchiveSweep } from './lifecycle';

/**
 * Start of every page render and route handler: schema, image directory,
 * then the auto-archive sweep.
 */
export function beginCycle(): Db {
  try {
    const db = getDb();
    ensureSchema(db);
    fs.mkdirSync(config.imagesDir, { recursive: true });
    runAutoArchiveSweep(db);
    return db;
  } catch (error) {
    throw toStorageError(error);
  }
}

export type PageData<T> = { ok: true; data: T } | { ok: false; dbError: DatabaseUnavailableError };

/** Runs a page's reads after `beginCycle`, turning storage failures into a value the page can render. */
export function loadPageData<T>(load: (db: Db) => T, open: () => Db = beginCycle): PageData<T> {
  try {
    return { ok: true, data: load(open()) };
  } catch (error) {
    if (isDatabaseUnavailableError(error)) {
      return { ok: false, dbError: error };
    }
    throw error;
  }
}
