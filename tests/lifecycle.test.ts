import { afterAll, afterEach, beforeAll, beforeEach, describe, expect, it, vi } from 'vitest';
import type { Db } from '../lib/db';
import { addItem, archiveItem, getItemById, listItems, markCollected } from '../lib/items';
import { canTransition, isItemStatus, isPastArchiveThreshold, runAutoArchiveSweep } from '../lib/lifecycle';
import { createTestDb, daysBefore, insertRawItem } from './helpers';

const NOW = new Date('2026-10-18T12:00:00.000Z');
const ITEM = { description: 'water bottle', foundLocation: 'Gym', collectLocation: 'Reception' };

describe('status state machine', () => {
  it('allows only the documented transitions', () => {
    expect(canTransition('lost', 'collected')).toBe(true);
    expect(canTransition('lost', 'archived')).toBe(true);
    expect(canTransition('archived', 'lost')).toBe(true);

    expect(canTransition('archived', 'collected')).toBe(false);
    expect(canTransition('collected', 'archived')).toBe(false);
    expect(canTransition('collected', 'lost')).toBe(false);
    expect(canTransition('lost', 'lost')).toBe(false);
  });

  it('recognises status values', () => {
    expect(isItemStatus('archived')).toBe(true);
    expect(isItemStatus('missing')).toBe(false);
    expect(isItemStatus(null)).toBe(false);
  });

  it('uses a strict age threshold', () => {
    expect(isPastArchiveThreshold(daysBefore(NOW, 31), NOW, 30)).toBe(true);
    expect(isPastArchiveThreshold(daysBefore(NOW, 30), NOW, 30)).toBe(false);
    expect(isPastArchiveThreshold(daysBefore(NOW, 29), NOW, 30)).toBe(false);
  });

  it('treats fractional thresholds as durations', () => {
    expect(isPastArchiveThreshold(new Date('2026-10-17T23:00:00.000Z'), NOW, 0.5)).toBe(true);
    expect(isPastArchiveThreshold(new Date('2026-10-18T01:00:00.000Z'), NOW, 0.5)).toBe(false);
  });
});

describe('archive threshold across daylight-saving changes', () => {
  const previousTz = process.env.TZ;

  beforeAll(() => {
    process.env.TZ = 'America/New_York';
  });

  afterAll(() => {
    if (previousTz === undefined) {
      delete process.env.TZ;
    } else {
      process.env.TZ = previousTz;
    }
  });

  it('archives an item thirty days and thirty minutes old after clocks fall back', () => {
    const now = new Date('2026-11-10T12:00:00.000Z');
    expect(isPastArchiveThreshold(new Date('2026-10-11T11:30:00.000Z'), now, 30)).toBe(true);
  });

  it('keeps an item thirty minutes short of thirty days after clocks spring forward', () => {
    const now = new Date('2026-03-20T12:00:00.000Z');
    expect(isPastArchiveThreshold(new Date('2026-02-18T12:30:00.000Z'), now, 30)).toBe(false);
  });

  it('sweeps by elapsed time rather than calendar days', () => {
    const db = createTestDb();
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const now = new Date('2026-11-10T12:00:00.000Z');
    const stale = addItem(db, ITEM, new Date('2026-10-11T11:30:00.000Z'));
    addItem(db, ITEM, new Date('2026-10-11T12:30:00.000Z'));

    expect(runAutoArchiveSweep(db, { now, thresholdDays: 30 }).archived).toEqual([stale]);
    vi.restoreAllMocks();
  });
});

describe('auto-archive sweep', () => {
  let db: Db;

  beforeEach(() => {
    db = createTestDb();
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('archives lost items older than the threshold and keeps recent ones', () => {
    const stale = addItem(db, ITEM, daysBefore(NOW, 31));
    const fresh = addItem(db, ITEM, daysBefore(NOW, 29));

    const report = runAutoArchiveSweep(db, { now: NOW, thresholdDays: 30 });

    expect(report).toEqual({ archived: [stale], skipped: [] });
    expect(getItemById(db, stale)?.status).toBe('archived');
    expect(getItemById(db, fresh)?.status).toBe('lost');
  });

  it('is idempotent', () => {
    addItem(db, ITEM, daysBefore(NOW, 45));
    addItem(db, ITEM, daysBefore(NOW, 2));

    runAutoArchiveSweep(db, { now: NOW, thresholdDays: 30 });
    const afterFirst = listItems(db).map((item) => [item.id, item.status]);
    const second = runAutoArchiveSweep(db, { now: NOW, thresholdDays: 30 });
    const afterSecond = listItems(db).map((item) => [item.id, item.status]);

    expect(second.archived).toEqual([]);
    expect(afterSecond).toEqual(afterFirst);
  });

  it('never revisits collected or archived items', () => {
    const collected = addItem(db, ITEM, daysBefore(NOW, 60));
    markCollected(db, collected, daysBefore(NOW, 59));
    const archived = addItem(db, ITEM, daysBefore(NOW, 5));
    archiveItem(db, archived);

    expect(runAutoArchiveSweep(db, { now: NOW, thresholdDays: 30 }).archived).toEqual([]);
    expect(getItemById(db, collected)).toMatchObject({ status: 'collected', collectedAt: daysBefore(NOW, 59).toISOString() });
    expect(getItemById(db, archived)?.status).toBe('archived');
  });

  it('skips malformed timestamps without failing the sweep', () => {
    const garbled = insertRawItem(db, { uploadedAt: 'last tuesday' });
    const empty = insertRawItem(db, { uploadedAt: null });
    const impossible = insertRawItem(db, { uploadedAt: '2025-13-45T00:00:00' });
    const stale = addItem(db, ITEM, daysBefore(NOW, 40));

    const report = runAutoArchiveSweep(db, { now: NOW, thresholdDays: 30 });

    expect(report.archived).toEqual([stale]);
    expect(report.skipped).toEqual([
      { id: garbled, uploadedAt: 'last tuesday' },
      { id: empty, uploadedAt: null },
      { id: impossible, uploadedAt: '2025-13-45T00:00:00' }
    ]);
    expect(getItemById(db, garbled)?.status).toBe('lost');
    expect(console.warn).toHaveBeenCalledTimes(3);
  });

  it('reads legacy timestamps without a zone designator as UTC', () => {
    const legacy = insertRawItem(db, { uploadedAt: daysBefore(NOW, 31).toISOString().replace('Z', '') });
    expect(runAutoArchiveSweep(db, { now: NOW, thresholdDays: 30 }).archived).toEqual([legacy]);
  });

  it('honours a custom threshold', () => {
    const week = addItem(db, ITEM, daysBefore(NOW, 8));
    expect(runAutoArchiveSweep(db, { now: NOW, thresholdDays: 7 }).archived).toEqual([week]);
  });

  it('falls back to the configured thirty days', () => {
    const stale = addItem(db, ITEM, daysBefore(NOW, 31));
    addItem(db, ITEM, daysBefore(NOW, 29));
    expect(runAutoArchiveSweep(db, { now: NOW }).archived).toEqual([stale]);
  });
});
