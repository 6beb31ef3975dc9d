/**
 * A ledger record as stored on disk.
 *
 * Timestamps are ISO-8601 local wall-clock strings without an offset.
 * `end` is null while the interval is still running. Keys the ledger does
 * not know about are carried through load/save untouched.
 */
export interface IntervalRecord {
  project: string;
  start: string | null;
  end: string | null;
  duration_seconds?: number;
  duration?: string;
  manual?: boolean;
  [extra: string]: unknown;
}

/**
 * A tracked work session with parsed timestamps
 */
export interface Interval {
  project: string;
  start: Date;
  /** Absent while the interval is ongoing */
  end?: Date;
  manual?: boolean;
}

/**
 * Half-open time range [start, end) used to scope a report
 */
export interface ReportWindow {
  start: Date;
  end: Date;
}
