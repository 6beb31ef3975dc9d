import { addDays, addMonths, startOfDay, startOfMonth } from 'date-fns';
import { ReportWindow } from '../types/interval';
import { getDateKey } from '../utils/date';

/**
 * A piece of an interval that lies within a single calendar day
 */
export interface DaySegmentSpan {
  /** Local calendar day, yyyy-MM-dd */
  day: string;
  start: Date;
  end: Date;
}

/**
 * The calendar month containing `referenceDate`, as [first instant, first instant of next month)
 */
export function monthWindow(referenceDate: Date): ReportWindow {
  const start = startOfMonth(referenceDate);
  return { start, end: addMonths(start, 1) };
}

/**
 * First local midnight strictly after `date`
 */
export function nextLocalMidnight(date: Date): Date {
  return startOfDay(addDays(date, 1));
}

/**
 * Overlap of an interval with a window.
 * An interval with no end runs until `now`.
 *
 * @returns the clamped range, or null when the overlap is empty
 */
export function clampInterval(
  start: Date,
  end: Date | undefined,
  window: ReportWindow,
  now: Date
): { start: Date; end: Date } | null {
  const effectiveEnd = end ?? now;
  const clampedStart = start.getTime() > window.start.getTime() ? start : window.start;
  const clampedEnd = effectiveEnd.getTime() < window.end.getTime() ? effectiveEnd : window.end;

  if (clampedEnd.getTime() <= clampedStart.getTime()) {
    return null;
  }

  return { start: clampedStart, end: clampedEnd };
}

/**
 * Split [start, end) at every local midnight.
 * Each iteration of the returned iterable walks the range again from the start.
 */
export function splitByDay(start: Date, end: Date): Iterable<DaySegmentSpan> {
  return {
    *[Symbol.iterator]() {
      let current = start;

      while (current.getTime() < end.getTime()) {
        const midnight = nextLocalMidnight(current);
        const segmentEnd = midnight.getTime() < end.getTime() ? midnight : end;

        yield { day: getDateKey(current), start: current, end: segmentEnd };
        current = segmentEnd;
      }
    },
  };
}

/**
 * Length of a window or segment in milliseconds
 */
export function spanMillis(span: { start: Date; end: Date }): number {
  return span.end.getTime() - span.start.getTime();
}
