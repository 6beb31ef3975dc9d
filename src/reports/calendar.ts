import { addDays, getISOWeek, getISOWeekYear, startOfDay } from 'date-fns';
import { ReportWindow } from '../types/interval';
import { WeekBucket, WeekKey } from './types';

/**
 * Local midnight of every calendar day the window touches, ascending
 */
export function enumerateDays(window: ReportWindow): Date[] {
  const days: Date[] = [];

  for (let day = startOfDay(window.start); day.getTime() < window.end.getTime(); day = addDays(day, 1)) {
    days.push(day);
  }

  return days;
}

/**
 * Format a week key as "2024-W09"
 */
export function formatWeekKey(key: WeekKey): string {
  return `${key.isoYear}-W${String(key.isoWeek).padStart(2, '0')}`;
}

/**
 * Group the window's days by ISO-8601 week (Monday start, week 1 holds the
 * year's first Thursday). Days outside the window are never pulled in, so
 * the first and last buckets of a month are usually partial weeks.
 */
export function groupByIsoWeek(window: ReportWindow): WeekBucket[] {
  const buckets: WeekBucket[] = [];
  const byLabel = new Map<string, WeekBucket>();

  for (const day of enumerateDays(window)) {
    const key: WeekKey = { isoYear: getISOWeekYear(day), isoWeek: getISOWeek(day) };
    const label = formatWeekKey(key);

    let bucket = byLabel.get(label);
    if (!bucket) {
      bucket = { key, days: [] };
      byLabel.set(label, bucket);
      buckets.push(bucket);
    }

    bucket.days.push(day);
  }

  return buckets;
}
