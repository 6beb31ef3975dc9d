import { format, isValid, parseISO } from 'date-fns';

const TIMESTAMP_FORMAT = "yyyy-MM-dd'T'HH:mm:ss.SSS";

/**
 * Serialize a date as an ISO-8601 local timestamp without offset
 */
export function formatTimestamp(date: Date): string {
  return format(date, TIMESTAMP_FORMAT);
}

/**
 * Parse an ISO-8601 timestamp from the ledger.
 * Strings without an offset are read as local wall-clock time.
 *
 * @returns the parsed date, or null when the text is not a valid timestamp
 */
export function parseTimestamp(text: string): Date | null {
  const date = parseISO(text);
  return isValid(date) ? date : null;
}

/**
 * Get the date key for grouping by day
 */
export function getDateKey(date: Date): string {
  return format(date, 'yyyy-MM-dd');
}

/**
 * Parse a month given as "yyyy-MM" into the first day of that month
 */
export function parseMonth(month: string, referenceDate: Date = new Date()): Date {
  const trimmed = month.trim();

  if (trimmed === 'current') {
    return new Date(referenceDate.getFullYear(), referenceDate.getMonth(), 1);
  }

  if (trimmed === 'last') {
    return new Date(referenceDate.getFullYear(), referenceDate.getMonth() - 1, 1);
  }

  const match = trimmed.match(/^(\d{4})-(\d{2})$/);
  if (match) {
    const year = parseInt(match[1], 10);
    const monthNumber = parseInt(match[2], 10);
    if (monthNumber >= 1 && monthNumber <= 12) {
      return new Date(year, monthNumber - 1, 1);
    }
  }

  throw new Error(`Invalid month specification: ${month}. Use "current", "last", or yyyy-MM (e.g., "2024-03")`);
}
