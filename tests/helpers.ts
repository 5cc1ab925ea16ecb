import { openDatabase, type Db } from '../lib/db';

export function createTestDb(): Db {
  return openDatabase(':memory:');
}

export const DAY_MS = 24 * 60 * 60 * 1000;

export function daysBefore(now: Date, days: number): Date {
  return new Date(now.getTime() - days * DAY_MS);
}

/** Inserts a row directly, bypassing the repository, for legacy or malformed data. */
export function insertRawItem(
  db: Db,
  row: { description?: string; uploadedAt: unknown; status?: string; collectedAt?: string | null }
): number {
  const result = db
    .prepare(
      `INSERT INTO items (description, found_location, collect_location, image_path, uploaded_at, status, collected_at)
       VALUES (?, 'Library', 'Office', NULL, ?, ?, ?)`
    )
    .run(row.description ?? 'umbrella', row.uploadedAt, row.status ?? 'lost', row.collectedAt ?? null);
  return Number(result.lastInsertRowid);
}
