export type ItemStatus = 'lost' | 'collected' | 'archived';

export interface ItemRecord {
  id: number;
  description: string;
  foundLocation: string;
  collectLocation: string;
  imagePath: string | null;
  uploadedAt: string;
  status: ItemStatus;
  collectedAt: string | null;
}

export interface NewItem {
  description: string;
  foundLocation: string;
  collectLocation: string;
  imagePath?: string | null;
}

export interface ItemFilter {
  status?: ItemStatus;
  /** Inclusive `YYYY-MM-DD` bounds on the calendar date of `uploadedAt`; a null bound is open. */
  dateRange?: readonly [start: string | null, end: string | null];
}

export interface MonthlyCount {
  month: string;
  count: number;
}
