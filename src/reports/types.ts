import { ReportWindow } from '../types/interval';

/**
 * Local calendar day key, yyyy-MM-dd
 */
export type DayKey = string;

/**
 * Per-day, per-project totals in milliseconds
 */
export type PerDayTotals = Map<DayKey, Map<string, number>>;

/**
 * Per-project totals in milliseconds
 */
export type ProjectTotals = Map<string, number>;

/**
 * Output of folding intervals into a window
 */
export interface Aggregates {
  perDay: PerDayTotals;
  byProject: ProjectTotals;
  /** Records dropped because a timestamp was missing or unreadable */
  skipped: number;
}

/**
 * ISO-8601 week identifier
 */
export interface WeekKey {
  isoYear: number;
  isoWeek: number;
}

/**
 * Days of a window that fall into one ISO week, in ascending order
 */
export interface WeekBucket {
  key: WeekKey;
  days: Date[];
}

/**
 * A duration carried both raw and formatted
 */
export interface DurationValue {
  seconds: number;
  formatted: string;
}

export interface ProjectDuration {
  project: string;
  duration: DurationValue;
}

export interface ReportDay {
  date: DayKey;
  /** Short weekday name, e.g. "Fri" */
  weekday: string;
  total: DurationValue;
  projects: ProjectDuration[];
}

export interface ReportWeek {
  key: WeekKey;
  /** e.g. "2024-W09" */
  label: string;
  firstDay: DayKey;
  lastDay: DayKey;
  /** Set when no day of the week has tracked time */
  noTime: boolean;
  days: ReportDay[];
}

/**
 * Complete monthly report
 */
export interface MonthlyReport {
  /** e.g. "March 2024" */
  monthLabel: string;
  window: ReportWindow;
  firstDay: DayKey;
  lastDay: DayKey;
  generatedAt: Date;
  weeks: ReportWeek[];
  monthlyTotals: ProjectDuration[];
  overallTotal: DurationValue;
  skippedRecords: number;
}
