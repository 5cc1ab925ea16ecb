import type { Db } from './db';
import { allowedSources, isItemStatus } from './lifecycle';
import { toStoredTimestamp } from './timestamps';
import type { ItemFilter, ItemRecord, ItemStatus, MonthlyCount, NewItem } from '../types/item';

export type { ItemRecord } from '../types/item';

export type TransitionResult =
  | { ok: true; item: ItemRecord }
  | { ok: false; error: 'NotFound' }
  | { ok: false; error: 'InvalidTransition'; from: ItemStatus; to: ItemStatus };

const ITEM_COLUMNS = `id, description, found_location AS foundLocation, collect_location AS collectLocation,
  image_path AS imagePath, uploaded_at AS uploadedAt, status, collected_at AS collectedAt`;

export function addItem(db: Db, item: NewItem, now: Date = new Date()): number {
  const result = db
    .prepare(
      `INSERT INTO items (description, found_location, collect_location, image_path, uploaded_at, status, collected_at)
       VALUES (@description, @foundLocation, @collectLocation, @imagePath, @uploadedAt, 'lost', NULL)`
    )
    .run({
      description: item.description,
      foundLocation: item.foundLocation,
      collectLocation: item.collectLocation,
      imagePath: item.imagePath ?? null,
      uploadedAt: toStoredTimestamp(now)
    });
  return Number(result.lastInsertRowid);
}

export function listItems(db: Db, filter: ItemFilter = {}): ItemRecord[] {
  const params: Record<string, unknown> = {};
  let where = '1=1';

  if (filter.status) {
    where += ' AND status = @status';
    params.status = filter.status;
  }
  if (filter.dateRange) {
    const [start, end] = filter.dateRange;
    if (start) {
      where += ' AND date(uploaded_at) >= date(@start)';
      params.start = start;
    }
    if (end) {
      where += ' AND date(uploaded_at) <= date(@end)';
      params.end = end;
    }
  }

  const stmt = db.prepare(`SELECT ${ITEM_COLUMNS} FROM items WHERE ${where} ORDER BY uploaded_at DESC, id DESC`);
  const rows = (Object.keys(params).length ? stmt.all(params) : stmt.all()) as Array<Record<string, unknown>>;
  return rows.map(hydrateItemRow);
}

export function getItemById(db: Db, id: number): ItemRecord | undefined {
  const row = db.prepare(`SELECT ${ITEM_COLUMNS} FROM items WHERE id = ?`).get(id) as
    | Record<string, unknown>
    | undefined;
  return row ? hydrateItemRow(row) : undefined;
}

export function countItems(db: Db, status?: ItemStatus): number {
  const row = status
    ? (db.prepare('SELECT COUNT(*) AS count FROM items WHERE status = ?').get(status) as { count: number })
    : (db.prepare('SELECT COUNT(*) AS count FROM items').get() as { count: number });
  return row.count;
}

export function markCollected(db: Db, id: number, now: Date = new Date()): TransitionResult {
  return applyTransition(db, id, 'collected', 'collected_at = @collectedAt', { collectedAt: toStoredTimestamp(now) });
}

export function archiveItem(db: Db, id: number): TransitionResult {
  return applyTransition(db, id, 'archived');
}

export function restoreItem(db: Db, id: number): TransitionResult {
  return applyTransition(db, id, 'lost', 'collected_at = NULL');
}

/** Removes the item permanently. Unknown ids are a no-op. */
export function deleteItem(db: Db, id: number): boolean {
  return db.prepare('DELETE FROM items WHERE id = ?').run(id).changes > 0;
}

/** Uploads per UTC month over the trailing window, oldest month first. */
export function getMonthlyItemCounts(db: Db, now: Date = new Date(), months = 12): MonthlyCount[] {
  const keys: string[] = [];
  for (let offset = months - 1; offset >= 0; offset -= 1) {
    const monthStart = new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth() - offset, 1));
    keys.push(toStoredTimestamp(monthStart).slice(0, 7));
  }
  if (!keys.length) return [];

  const rows = db
    .prepare(
      `SELECT strftime('%Y-%m', uploaded_at) AS month, COUNT(*) AS count
         FROM items
        WHERE date(uploaded_at) >= date(@since)
        GROUP BY month`
    )
    .all({ since: `${keys[0]}-01` }) as Array<{ month: string | null; count: number }>;

  const counts = new Map<string, number>();
  for (const row of rows) {
    if (row.month) counts.set(row.month, row.count);
  }
  return keys.map((month) => ({ month, count: counts.get(month) ?? 0 }));
}

function applyTransition(
  db: Db,
  id: number,
  target: ItemStatus,
  assignments?: string,
  params: Record<string, unknown> = {}
): TransitionResult {
  const sources = allowedSources(target)
    .map((status) => `'${status}'`)
    .join(', ');
  const set = assignments ? `status = @target, ${assignments}` : 'status = @target';
  const { changes } = db
    .prepare(`UPDATE items SET ${set} WHERE id = @id AND status IN (${sources})`)
    .run({ ...params, id, target });

  const item = getItemById(db, id);
  if (!item) {
    return { ok: false, error: 'NotFound' };
  }
  if (changes === 0) {
    return { ok: false, error: 'InvalidTransition', from: item.status, to: target };
  }
  return { ok: true, item };
}

function hydrateItemRow(row: Record<string, unknown>): ItemRecord {
  return {
    id: Number(row.id),
    description: String(row.description ?? ''),
    foundLocation: String(row.foundLocation ?? ''),
    collectLocation: String(row.collectLocation ?? ''),
    imagePath: toNullableString(row.imagePath),
    uploadedAt: String(row.uploadedAt ?? ''),
    status: isItemStatus(row.status) ? row.status : 'lost',
    collectedAt: toNullableString(row.collectedAt)
  };
}

function toNullableString(value: unknown): string | null {
  if (typeof value !== 'string') {
    return value === null || value === undefined ? null : String(value);
  }
  const trimmed = value.trim();
  return trimmed.length ? trimmed : null;
}
