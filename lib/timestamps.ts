import { isValid, parseISO } from 'date-fns';

export class MalformedTimestampError extends Error {
  readonly value: unknown;

  constructor(value: unknown) {
    super(`Malformed timestamp: ${JSON.stringify(value)}`);
    this.name = 'MalformedTimestampError';
    this.value = value;
  }
}

const ZONE_DESIGNATOR = /(Z|[+-]\d{2}(:?\d{2})?)$/i;

/** Stored timestamps are UTC ISO-8601 strings. */
export function toStoredTimestamp(date: Date): string {
  return date.toISOString();
}

/**
 * Parses a stored timestamp. Values without a zone designator (as written by
 * the legacy portal) are read as UTC.
 */
export function parseStoredTimestamp(value: unknown): Date {
  if (typeof value !== 'string' || !/^\d{4}-\d{2}-\d{2}/.test(value.trim())) {
    throw new MalformedTimestampError(value);
  }
  const trimmed = value.trim();
  const hasTime = trimmed.length > 10;
  const normalised = hasTime && !ZONE_DESIGNATOR.test(trimmed) ? `${trimmed}Z` : trimmed;
  const parsed = hasTime ? parseISO(normalised) : parseISO(`${trimmed}T00:00:00Z`);
  if (!isValid(parsed)) {
    throw new MalformedTimestampError(value);
  }
  return parsed;
}
