import { IntervalRecord, ReportWindow } from '../types/interval';
import { toInterval } from '../ledger/interval';
import { logger } from '../utils/logger';
import { Aggregates } from './types';
import { clampInterval, spanMillis, splitByDay } from './window';

/**
 * Fold ledger records into per-day and per-project totals for a window.
 *
 * Records whose timestamps cannot be read are counted in `skipped` and
 * otherwise ignored. Open records run until `now`.
 */
export function aggregate(
  records: readonly IntervalRecord[],
  window: ReportWindow,
  now: Date
): Aggregates {
  const perDay = new Map<string, Map<string, number>>();
  const byProject = new Map<string, number>();
  let skipped = 0;

  for (const record of records) {
    const interval = toInterval(record);

    if (!interval) {
      skipped++;
      logger.debug(`Skipping malformed record: ${JSON.stringify(record)}`);
      continue;
    }

    const clamped = clampInterval(interval.start, interval.end, window, now);
    if (!clamped) {
      continue;
    }

    for (const segment of splitByDay(clamped.start, clamped.end)) {
      const millis = spanMillis(segment);

      let dayTotals = perDay.get(segment.day);
      if (!dayTotals) {
        dayTotals = new Map<string, number>();
        perDay.set(segment.day, dayTotals);
      }

      dayTotals.set(interval.project, (dayTotals.get(interval.project) || 0) + millis);
      byProject.set(interval.project, (byProject.get(interval.project) || 0) + millis);
    }
  }

  return { perDay, byProject, skipped };
}
