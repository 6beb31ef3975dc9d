import { format, subDays } from 'date-fns';
import { IntervalRecord } from '../types/interval';
import { getDateKey } from '../utils/date';
import { formatHuman, toWholeSeconds } from '../utils/duration';
import { aggregate } from './aggregate';
import { formatWeekKey, groupByIsoWeek } from './calendar';
import { DurationValue, MonthlyReport, ProjectDuration, ReportDay, ReportWeek } from './types';
import { monthWindow } from './window';

export interface BuildReportOptions {
  /** Any instant inside the month to report on */
  referenceDate: Date;
  /** Evaluation instant for open intervals; sampled once by the caller */
  now: Date;
}

/**
 * Order project names case-insensitively, falling back to the raw name
 */
export function compareProjects(a: string, b: string): number {
  const la = a.toLowerCase();
  const lb = b.toLowerCase();

  if (la !== lb) {
    return la < lb ? -1 : 1;
  }
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}

function toDurationValue(milliseconds: number): DurationValue {
  const seconds = toWholeSeconds(milliseconds);
  return { seconds, formatted: formatHuman(seconds) };
}

function sortedProjects(totals: Map<string, number>): ProjectDuration[] {
  return Array.from(totals.entries())
    .sort((a, b) => compareProjects(a[0], b[0]))
    .map(([project, millis]) => ({ project, duration: toDurationValue(millis) }));
}

function sumValues(totals: Map<string, number>): number {
  let sum = 0;
  for (const millis of totals.values()) {
    sum += millis;
  }
  return sum;
}

/**
 * Build the report for the calendar month containing `referenceDate`
 */
export function buildReport(records: readonly IntervalRecord[], options: BuildReportOptions): MonthlyReport {
  const window = monthWindow(options.referenceDate);
  const { perDay, byProject, skipped } = aggregate(records, window, options.now);

  const weeks: ReportWeek[] = groupByIsoWeek(window).map((bucket) => {
    const days: ReportDay[] = [];

    for (const day of bucket.days) {
      const key = getDateKey(day);
      const projects = perDay.get(key);
      if (!projects) {
        continue;
      }

      days.push({
        date: key,
        weekday: format(day, 'EEE'),
        total: toDurationValue(sumValues(projects)),
        projects: sortedProjects(projects),
      });
    }

    return {
      key: bucket.key,
      label: formatWeekKey(bucket.key),
      firstDay: getDateKey(bucket.days[0]),
      lastDay: getDateKey(bucket.days[bucket.days.length - 1]),
      noTime: days.length === 0,
      days,
    };
  });

  return {
    monthLabel: format(window.start, 'MMMM yyyy'),
    window,
    firstDay: getDateKey(window.start),
    lastDay: getDateKey(subDays(window.end, 1)),
    generatedAt: options.now,
    weeks,
    monthlyTotals: sortedProjects(byProject),
    overallTotal: toDurationValue(sumValues(byProject)),
    skippedRecords: skipped,
  };
}
