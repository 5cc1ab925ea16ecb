import { beforeEach, describe, expect, it } from 'vitest';
import type { Db } from '../lib/db';
import {
  addItem,
  archiveItem,
  countItems,
  deleteItem,
  getItemById,
  getMonthlyItemCounts,
  listItems,
  markCollected,
  restoreItem
} from '../lib/items';
import { createTestDb, insertRawItem } from './helpers';

const WALLET = { description: 'wallet', foundLocation: 'Library', collectLocation: 'Office' };

function expectCollectedInvariant(db: Db) {
  for (const item of listItems(db)) {
    if (item.status === 'collected') {
      expect(item.collectedAt).not.toBeNull();
    } else {
      expect(item.collectedAt).toBeNull();
    }
  }
}

describe('item repository', () => {
  let db: Db;

  beforeEach(() => {
    db = createTestDb();
  });

  it('round-trips a new item as lost with no collection time', () => {
    const id = addItem(db, WALLET, new Date('2026-10-18T09:30:00.000Z'));
    const lost = listItems(db, { status: 'lost' });
    expect(lost).toHaveLength(1);
    expect(lost[0]).toEqual({
      id,
      description: 'wallet',
      foundLocation: 'Library',
      collectLocation: 'Office',
      imagePath: null,
      uploadedAt: '2026-10-18T09:30:00.000Z',
      status: 'lost',
      collectedAt: null
    });
    expectCollectedInvariant(db);
  });

  it('stores the image path when one is given', () => {
    const id = addItem(db, { ...WALLET, imagePath: 'data/images/20261018093000123456_wallet.png' });
    expect(getItemById(db, id)?.imagePath).toBe('data/images/20261018093000123456_wallet.png');
  });

  it('returns every item newest first for an empty filter', () => {
    const first = addItem(db, { ...WALLET, description: 'scarf' }, new Date('2026-03-01T10:00:00.000Z'));
    const second = addItem(db, { ...WALLET, description: 'keys' }, new Date('2026-03-05T23:59:59.000Z'));
    const third = addItem(db, { ...WALLET, description: 'phone' }, new Date('2026-03-10T00:00:00.000Z'));
    expect(listItems(db).map((item) => item.id)).toEqual([third, second, first]);
  });

  it('filters on the calendar date of uploadedAt, inclusive on both ends', () => {
    addItem(db, { ...WALLET, description: 'scarf' }, new Date('2026-03-04T23:59:59.000Z'));
    const start = addItem(db, { ...WALLET, description: 'keys' }, new Date('2026-03-05T00:00:00.000Z'));
    const end = addItem(db, { ...WALLET, description: 'phone' }, new Date('2026-03-10T23:59:59.000Z'));
    addItem(db, { ...WALLET, description: 'hat' }, new Date('2026-03-11T00:00:00.000Z'));

    const inRange = listItems(db, { dateRange: ['2026-03-05', '2026-03-10'] });
    expect(inRange.map((item) => item.id)).toEqual([end, start]);
  });

  it('treats a missing date bound as open-ended', () => {
    const early = addItem(db, { ...WALLET, description: 'scarf' }, new Date('2026-03-04T23:59:59.000Z'));
    const middle = addItem(db, { ...WALLET, description: 'keys' }, new Date('2026-03-05T00:00:00.000Z'));
    const late = addItem(db, { ...WALLET, description: 'hat' }, new Date('2026-03-11T00:00:00.000Z'));

    expect(listItems(db, { dateRange: ['2026-03-05', null] }).map((item) => item.id)).toEqual([late, middle]);
    expect(listItems(db, { dateRange: [null, '2026-03-05'] }).map((item) => item.id)).toEqual([middle, early]);
    expect(listItems(db, { dateRange: [null, null] }).map((item) => item.id)).toEqual([late, middle, early]);
  });

  it('combines status and date filters', () => {
    const kept = addItem(db, WALLET, new Date('2026-03-05T08:00:00.000Z'));
    const collected = addItem(db, WALLET, new Date('2026-03-06T08:00:00.000Z'));
    markCollected(db, collected, new Date('2026-03-07T08:00:00.000Z'));

    expect(listItems(db, { status: 'lost', dateRange: ['2026-03-01', '2026-03-31'] }).map((item) => item.id)).toEqual([
      kept
    ]);
    expect(listItems(db, { status: 'collected', dateRange: ['2026-03-07', '2026-03-31'] })).toEqual([]);
  });

  it('reads legacy timestamps without a zone designator in date filters', () => {
    const id = insertRawItem(db, { uploadedAt: '2025-09-01T08:00:00.123456' });
    expect(listItems(db, { dateRange: ['2025-09-01', '2025-09-01'] }).map((item) => item.id)).toEqual([id]);
  });

  it('marks a lost item collected and records when', () => {
    const id = addItem(db, WALLET);
    const result = markCollected(db, id, new Date('2026-10-18T12:00:00.000Z'));
    expect(result.ok).toBe(true);
    expect(getItemById(db, id)).toMatchObject({ status: 'collected', collectedAt: '2026-10-18T12:00:00.000Z' });
    expectCollectedInvariant(db);
  });

  it('refuses to collect an archived item', () => {
    const id = addItem(db, WALLET);
    archiveItem(db, id);
    expect(markCollected(db, id)).toEqual({ ok: false, error: 'InvalidTransition', from: 'archived', to: 'collected' });
    expect(getItemById(db, id)).toMatchObject({ status: 'archived', collectedAt: null });
    expectCollectedInvariant(db);
  });

  it('refuses to archive a collected item', () => {
    const id = addItem(db, WALLET);
    markCollected(db, id);
    expect(archiveItem(db, id)).toEqual({ ok: false, error: 'InvalidTransition', from: 'collected', to: 'archived' });
    expectCollectedInvariant(db);
  });

  it('restores an archived item to lost', () => {
    const id = addItem(db, WALLET);
    archiveItem(db, id);
    const result = restoreItem(db, id);
    expect(result.ok && result.item).toMatchObject({ id, status: 'lost', collectedAt: null });
    expectCollectedInvariant(db);
  });

  it('clears a stray collection time when restoring legacy rows', () => {
    const id = insertRawItem(db, { uploadedAt: '2026-01-01T00:00:00', status: 'archived', collectedAt: '2026-01-02T00:00:00' });
    restoreItem(db, id);
    expect(getItemById(db, id)).toMatchObject({ status: 'lost', collectedAt: null });
  });

  it('only restores archived items', () => {
    const id = addItem(db, WALLET);
    expect(restoreItem(db, id)).toEqual({ ok: false, error: 'InvalidTransition', from: 'lost', to: 'lost' });
  });

  it('reports unknown ids as not found', () => {
    expect(markCollected(db, 999)).toEqual({ ok: false, error: 'NotFound' });
    expect(archiveItem(db, 999)).toEqual({ ok: false, error: 'NotFound' });
    expect(restoreItem(db, 999)).toEqual({ ok: false, error: 'NotFound' });
  });

  it('treats deleting an unknown id as a no-op', () => {
    addItem(db, WALLET);
    expect(deleteItem(db, 999)).toBe(false);
    expect(countItems(db)).toBe(1);
  });

  it('deletes items permanently', () => {
    const id = addItem(db, WALLET);
    markCollected(db, id);
    expect(deleteItem(db, id)).toBe(true);
    expect(getItemById(db, id)).toBeUndefined();
    expect(countItems(db, 'collected')).toBe(0);
  });

  it('counts uploads per month over the trailing twelve months', () => {
    const now = new Date('2026-10-18T12:00:00.000Z');
    addItem(db, WALLET, new Date('2026-10-01T00:00:00.000Z'));
    addItem(db, WALLET, new Date('2026-10-17T09:00:00.000Z'));
    addItem(db, WALLET, new Date('2026-08-31T23:59:59.000Z'));
    addItem(db, WALLET, new Date('2025-10-31T23:59:59.000Z'));

    const counts = getMonthlyItemCounts(db, now);
    expect(counts).toHaveLength(12);
    expect(counts[0]).toEqual({ month: '2025-11', count: 0 });
    expect(counts[9]).toEqual({ month: '2026-08', count: 1 });
    expect(counts[11]).toEqual({ month: '2026-10', count: 2 });
    expect(counts.reduce((sum, entry) => sum + entry.count, 0)).toBe(3);
  });
});
