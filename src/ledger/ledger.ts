import { IntervalRecord } from '../types/interval';
import { ValidationError } from '../types/errors';
import { formatTimestamp, parseTimestamp } from '../utils/date';
import { formatClock } from '../utils/duration';
import { closeRecord, elapsedSeconds, isOpen, openRecord } from './interval';

/**
 * In-memory view of the ledger with the running interval held apart.
 * Only the newest record may be open; it lives in `active`, never in `history`.
 */
export interface LedgerState {
  history: IntervalRecord[];
  active: IntervalRecord | null;
}

/**
 * Result of finalizing the active interval
 */
export interface FinalizeResult {
  state: LedgerState;
  /** The record that was closed, or null when nothing was running */
  closed: IntervalRecord | null;
}

/**
 * Summary of the running interval
 */
export interface ActiveSummary {
  project: string;
  start: Date;
  elapsedSeconds: number;
}

/**
 * Split stored records into history and the active interval
 */
export function fromRecords(records: IntervalRecord[]): LedgerState {
  if (records.length > 0 && isOpen(records[records.length - 1])) {
    return {
      history: records.slice(0, -1),
      active: records[records.length - 1],
    };
  }

  return { history: [...records], active: null };
}

/**
 * Flatten the ledger back into the stored record order
 */
export function toRecords(state: LedgerState): IntervalRecord[] {
  return state.active ? [...state.history, state.active] : [...state.history];
}

/**
 * Whether the ledger holds no records at all
 */
export function isEmpty(state: LedgerState): boolean {
  return state.history.length === 0 && state.active === null;
}

/**
 * Open a new interval for `project` at `now`
 *
 * @throws ValidationError when a timer is already running or the project is blank
 */
export function startTracking(state: LedgerState, project: string, now: Date): LedgerState {
  const name = project.trim();

  if (name === '') {
    throw new ValidationError('Project name cannot be empty');
  }

  if (state.active) {
    throw new ValidationError(`Already tracking '${state.active.project}'`);
  }

  return {
    history: [...state.history],
    active: openRecord(name, now),
  };
}

/**
 * Close the running interval at `now`.
 * With nothing running this is a no-op, so every exit path may call it.
 */
export function finalizeActive(state: LedgerState, now: Date): FinalizeResult {
  if (!state.active) {
    return { state, closed: null };
  }

  const closed = closeRecord(state.active, now);

  return {
    state: { history: [...state.history, closed], active: null },
    closed,
  };
}

/**
 * Append a closed, manually entered interval of `seconds` ending at `now`.
 * A running interval stays the newest record.
 *
 * @throws ValidationError when the project is blank or the duration is not positive
 */
export function logManual(state: LedgerState, project: string, seconds: number, now: Date): LedgerState {
  const name = project.trim();

  if (name === '') {
    throw new ValidationError('Project name cannot be empty');
  }

  if (!(seconds > 0)) {
    throw new ValidationError('Duration must be > 0');
  }

  const start = new Date(now.getTime() - seconds * 1000);
  const record: IntervalRecord = {
    project: name,
    start: formatTimestamp(start),
    end: formatTimestamp(now),
    duration_seconds: Math.floor(seconds),
    duration: formatClock(seconds),
    manual: true,
  };

  return {
    history: [...state.history, record],
    active: state.active,
  };
}

/**
 * Describe the running interval, if any
 */
export function describeActive(state: LedgerState, now: Date): ActiveSummary | null {
  if (!state.active || !state.active.start) {
    return null;
  }

  const start = parseTimestamp(state.active.start);
  if (!start) {
    return null;
  }

  return {
    project: state.active.project,
    start,
    elapsedSeconds: elapsedSeconds(start, now),
  };
}
