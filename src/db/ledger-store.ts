import { existsSync, mkdirSync, readFileSync, renameSync, unlinkSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import { IntervalRecord } from '../types/interval';
import { StorageError } from '../types/errors';
import { UNKNOWN_PROJECT } from '../ledger/interval';
import { logger } from '../utils/logger';

/**
 * Storage for the flat list of ledger records
 */
export interface LedgerStore {
  readonly path: string;
  load(): IntervalRecord[];
  save(records: IntervalRecord[]): void;
  /** Delete the ledger; returns whether there was one */
  clear(): boolean;
}

function isPlainObject(value: unknown): value is object {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Coerce one parsed JSON entry into a record, keeping unknown keys
 */
export function normalizeRecord(raw: object): IntervalRecord {
  const extra: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(raw)) {
    extra[key] = value;
  }

  const { project, start, end, duration_seconds, duration, manual, ...rest } = extra;

  const record: IntervalRecord = {
    project: typeof project === 'string' && project !== '' ? project : UNKNOWN_PROJECT,
    start: typeof start === 'string' ? start : null,
    end: typeof end === 'string' ? end : null,
    ...rest,
  };

  if (typeof duration_seconds === 'number') {
    record.duration_seconds = duration_seconds;
  }
  if (typeof duration === 'string') {
    record.duration = duration;
  }
  if (typeof manual === 'boolean') {
    record.manual = manual;
  }

  return record;
}

/**
 * Order keys the way the ledger file has always had them:
 * project, start, end, then everything else
 */
function orderKeys(record: IntervalRecord): IntervalRecord {
  const { project, start, end, ...rest } = record;
  return { project, start, end, ...rest };
}

/**
 * Ledger kept as a single JSON array on disk.
 * Writes go to a temporary file that is renamed over the ledger.
 */
export class JsonLedgerStore implements LedgerStore {
  constructor(public readonly path: string) {}

  load(): IntervalRecord[] {
    if (!existsSync(this.path)) {
      return [];
    }

    let contents: string;
    try {
      contents = readFileSync(this.path, 'utf-8');
    } catch (error) {
      throw new StorageError(`Failed to read ledger ${this.path}: ${error}`);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(contents);
    } catch (error) {
      this.quarantine(`invalid JSON (${error instanceof Error ? error.message : error})`);
      return [];
    }

    if (!Array.isArray(parsed)) {
      this.quarantine('expected a JSON array');
      return [];
    }

    const records: IntervalRecord[] = [];
    parsed.forEach((entry: unknown, index: number) => {
      if (isPlainObject(entry)) {
        records.push(normalizeRecord(entry));
      } else {
        logger.debug(`Dropping ledger entry ${index}: not an object`);
      }
    });

    logger.debug(`Loaded ${records.length} record(s) from ${this.path}`);
    return records;
  }

  save(records: IntervalRecord[]): void {
    const tmpPath = `${this.path}.tmp`;

    try {
      mkdirSync(dirname(this.path), { recursive: true });
      writeFileSync(tmpPath, JSON.stringify(records.map(orderKeys), null, 2), 'utf-8');
      renameSync(tmpPath, this.path);
    } catch (error) {
      throw new StorageError(`Failed to write ledger ${this.path}: ${error}`);
    }

    logger.debug(`Saved ${records.length} record(s) to ${this.path}`);
  }

  clear(): boolean {
    if (!existsSync(this.path)) {
      return false;
    }

    try {
      unlinkSync(this.path);
    } catch (error) {
      throw new StorageError(`Failed to delete ledger ${this.path}: ${error}`);
    }
    return true;
  }

  /**
   * Move an unreadable ledger aside so the next save starts fresh
   */
  private quarantine(reason: string): void {
    const backupPath = `${this.path}.bak`;

    try {
      renameSync(this.path, backupPath);
      logger.warning(`Ledger ${this.path} is corrupt (${reason}); moved it to ${backupPath}`);
    } catch (error) {
      logger.warning(`Ledger ${this.path} is corrupt (${reason}) and could not be moved aside: ${error}`);
    }
  }
}
