import { format, parseISO } from 'date-fns';
import { MalformedTimestampError, parseStoredTimestamp, toStoredTimestamp } from './timestamps';

export function formatItemDate(value?: string | null): string {
  if (!value) return 'Date unknown';
  try {
    // The UTC calendar date, read back as a local date for display.
    const calendarDate = toStoredTimestamp(parseStoredTimestamp(value)).slice(0, 10);
    return format(parseISO(calendarDate), 'MMMM d, yyyy');
  } catch (error) {
    if (error instanceof MalformedTimestampError) return value;
    throw error;
  }
}

export function formatMonth(month: string): string {
  const [year, monthIndex] = month.split('-').map(Number);
  return format(new Date(year, monthIndex - 1, 1), 'MMM yyyy');
}

export function truncate(value: string, length = 160): string {
  if (value.length <= length) return value;
  return `${value.slice(0, length - 1)}…`;
}

export const STATUS_LABELS = {
  lost: 'Currently available',
  collected: 'Collected',
  archived: 'Archived'
} as const;

/** Public URL of a stored photo, served by the images route. */
export function imageUrl(imagePath: string | null): string | null {
  if (!imagePath) return null;
  const name = imagePath.split(/[\\/]/).pop();
  return name ? `/api/images/${encodeURIComponent(name)}` : null;
}
