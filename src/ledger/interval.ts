import { Interval, IntervalRecord } from '../types/interval';
import { MalformedRecordError } from '../types/errors';
import { formatTimestamp, parseTimestamp } from '../utils/date';
import { formatClock } from '../utils/duration';

export const UNKNOWN_PROJECT = '(unknown)';

/**
 * Turn a stored record into an Interval
 *
 * @throws MalformedRecordError when `start` is missing or either timestamp is unparsable
 */
export function toIntervalOrThrow(record: IntervalRecord): Interval {
  if (!record.start) {
    throw new MalformedRecordError('Record has no start timestamp', 'start');
  }

  const start = parseTimestamp(record.start);
  if (!start) {
    throw new MalformedRecordError(`Unparsable start timestamp: ${record.start}`, 'start');
  }

  const interval: Interval = {
    project: record.project || UNKNOWN_PROJECT,
    start,
  };

  if (record.end) {
    const end = parseTimestamp(record.end);
    if (!end) {
      throw new MalformedRecordError(`Unparsable end timestamp: ${record.end}`, 'end');
    }
    interval.end = end;
  }

  if (record.manual) {
    interval.manual = true;
  }

  return interval;
}

/**
 * Like {@link toIntervalOrThrow}, but returns null for malformed records
 */
export function toInterval(record: IntervalRecord): Interval | null {
  try {
    return toIntervalOrThrow(record);
  } catch (error) {
    if (error instanceof MalformedRecordError) {
      return null;
    }
    throw error;
  }
}

/**
 * Whether the record is still running
 */
export function isOpen(record: IntervalRecord): boolean {
  return !record.end;
}

/**
 * Elapsed whole seconds between start and end (floor)
 */
export function elapsedSeconds(start: Date, end: Date): number {
  return Math.floor((end.getTime() - start.getTime()) / 1000);
}

/**
 * Create an open record that starts at the given instant
 */
export function openRecord(project: string, start: Date): IntervalRecord {
  return {
    project,
    start: formatTimestamp(start),
    end: null,
  };
}

/**
 * Close a record at `end`, filling in the derived duration fields.
 *
 * Closing an already-closed record returns it unchanged. When the start
 * timestamp cannot be read, `end` is still set but the duration fields
 * are left out.
 */
export function closeRecord(record: IntervalRecord, end: Date): IntervalRecord {
  if (!isOpen(record)) {
    return record;
  }

  const closed: IntervalRecord = { ...record, end: formatTimestamp(end) };
  const start = record.start ? parseTimestamp(record.start) : null;

  if (start) {
    const seconds = elapsedSeconds(start, end);
    closed.duration_seconds = seconds;
    closed.duration = formatClock(seconds);
  }

  return closed;
}
