import { differenceInMilliseconds } from 'date-fns';
import { config } from './config';
import type { Db } from './db';
import { MalformedTimestampError, parseStoredTimestamp } from './timestamps';
import type { ItemStatus } from '../types/item';

export const ITEM_STATUSES = ['lost', 'collected', 'archived'] as const satisfies readonly ItemStatus[];

export function isItemStatus(value: unknown): value is ItemStatus {
  return ITEM_STATUSES.some((status) => status === value);
}

/** Permitted source states for each target state. */
const TRANSITIONS: Record<ItemStatus, readonly ItemStatus[]> = {
  lost: ['archived'],
  collected: ['lost'],
  archived: ['lost']
};

export function allowedSources(target: ItemStatus): readonly ItemStatus[] {
  return TRANSITIONS[target];
}

export function canTransition(from: ItemStatus, to: ItemStatus): boolean {
  return TRANSITIONS[to].includes(from);
}

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * True once more than `thresholdDays` of elapsed time separates the upload
 * from `now`. Days are fixed 24-hour spans, so fractional thresholds are
 * durations too and local clock changes do not move the cutoff.
 */
export function isPastArchiveThreshold(uploadedAt: Date, now: Date, thresholdDays: number): boolean {
  return differenceInMilliseconds(now, uploadedAt) > thresholdDays * DAY_MS;
}

export interface SweepOptions {
  now?: Date;
  thresholdDays?: number;
}

export interface SweepReport {
  archived: number[];
  skipped: { id: number; uploadedAt: unknown }[];
}

/**
 * Archives every `lost` item older than the threshold. Records whose
 * `uploaded_at` cannot be parsed are reported and left alone.
 */
export function runAutoArchiveSweep(db: Db, options: SweepOptions = {}): SweepReport {
  const now = options.now ?? new Date();
  const thresholdDays = options.thresholdDays ?? config.autoArchiveDays;

  const rows = db.prepare("SELECT id, uploaded_at AS uploadedAt FROM items WHERE status = 'lost' ORDER BY id").all() as Array<{
    id: number;
    uploadedAt: unknown;
  }>;

  const report: SweepReport = { archived: [], skipped: [] };
  const stale: number[] = [];

  for (const row of rows) {
    let uploadedAt: Date;
    try {
      uploadedAt = parseStoredTimestamp(row.uploadedAt);
    } catch (error) {
      if (error instanceof MalformedTimestampError) {
        report.skipped.push({ id: row.id, uploadedAt: row.uploadedAt });
        continue;
      }
      throw error;
    }
    if (isPastArchiveThreshold(uploadedAt, now, thresholdDays)) {
      stale.push(row.id);
    }
  }

  if (stale.length) {
    const archive = db.prepare("UPDATE items SET status = 'archived' WHERE id = ? AND status = 'lost'");
    const run = db.transaction((ids: number[]) => {
      for (const id of ids) {
        if (archive.run(id).changes > 0) {
          report.archived.push(id);
        }
      }
    });
    run(stale);
    console.log(`Auto-archived ${report.archived.length} item${report.archived.length === 1 ? '' : 's'} older than ${thresholdDays} days.`);
  }

  for (const entry of report.skipped) {
    console.warn(`Skipping item ${entry.id} during auto-archive: unreadable uploaded_at`, entry.uploadedAt);
  }

  return report;
}
