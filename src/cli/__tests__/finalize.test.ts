// Mock logger
jest.mock('../../utils/logger', () => ({
  logger: {
    debug: jest.fn(),
    error: jest.fn(),
  },
}));

import { finalizeActiveInterval, installFinalizeHandlers } from '../finalize';
import { LedgerStore } from '../../db/ledger-store';
import { IntervalRecord } from '../../types/interval';

/**
 * In-memory ledger for exercising the finalize paths
 */
class MemoryLedgerStore implements LedgerStore {
  readonly path = 'memory';
  saves = 0;

  constructor(public records: IntervalRecord[]) {}

  load(): IntervalRecord[] {
    return this.records.map((record) => ({ ...record }));
  }

  save(records: IntervalRecord[]): void {
    this.saves++;
    this.records = records;
  }

  clear(): boolean {
    const had = this.records.length > 0;
    this.records = [];
    return had;
  }
}

const closed: IntervalRecord = { project: 'alpha', start: '2024-03-01T08:00:00.000', end: '2024-03-01T08:30:00.000' };
const running: IntervalRecord = { project: 'beta', start: '2024-03-01T09:00:00.000', end: null };

describe('finalize', () => {
  describe('finalizeActiveInterval', () => {
    it('should close and save the running interval', () => {
      const store = new MemoryLedgerStore([closed, running]);

      const result = finalizeActiveInterval(store, new Date(2024, 2, 1, 10, 0, 0));

      expect(result?.end).toBe('2024-03-01T10:00:00.000');
      expect(result?.duration_seconds).toBe(3600);
      expect(store.saves).toBe(1);
      expect(store.records[1].end).toBe('2024-03-01T10:00:00.000');
    });

    it('should not write when nothing runs', () => {
      const store = new MemoryLedgerStore([closed]);

      expect(finalizeActiveInterval(store, new Date(2024, 2, 1, 10, 0, 0))).toBeNull();
      expect(store.saves).toBe(0);
    });

    it('should leave a finalized ledger alone the second time', () => {
      const store = new MemoryLedgerStore([running]);

      finalizeActiveInterval(store, new Date(2024, 2, 1, 10, 0, 0));
      expect(finalizeActiveInterval(store, new Date(2024, 2, 1, 11, 0, 0))).toBeNull();
      expect(store.records[0].end).toBe('2024-03-01T10:00:00.000');
      expect(store.saves).toBe(1);
    });
  });

  describe('installFinalizeHandlers', () => {
    const lastListener = (signal: NodeJS.Signals) => {
      const listeners = process.listeners(signal);
      return listeners[listeners.length - 1];
    };

    it('should register for interrupt, hangup and terminate', () => {
      const before = ['SIGINT', 'SIGHUP', 'SIGTERM'].map((s) => process.listenerCount(s));
      const uninstall = installFinalizeHandlers(new MemoryLedgerStore([]), { onFinalized: jest.fn(), exit: jest.fn() });

      expect(['SIGINT', 'SIGHUP', 'SIGTERM'].map((s) => process.listenerCount(s))).toEqual(before.map((n) => n + 1));

      uninstall();
      expect(['SIGINT', 'SIGHUP', 'SIGTERM'].map((s) => process.listenerCount(s))).toEqual(before);
    });

    it('should finalize, report and exit cleanly on a signal', () => {
      const store = new MemoryLedgerStore([running]);
      const onFinalized = jest.fn();
      const exit = jest.fn();
      const uninstall = installFinalizeHandlers(store, { onFinalized, exit });

      try {
        lastListener('SIGTERM')('SIGTERM');
      } finally {
        uninstall();
      }

      expect(store.records[0].end).not.toBeNull();
      expect(onFinalized).toHaveBeenCalledWith(expect.objectContaining({ project: 'beta' }), 'SIGTERM');
      expect(exit).toHaveBeenCalledWith(0);
    });

    it('should still exit when finalizing fails', () => {
      const store = new MemoryLedgerStore([running]);
      jest.spyOn(store, 'save').mockImplementation(() => {
        throw new Error('disk full');
      });
      const exit = jest.fn();
      const uninstall = installFinalizeHandlers(store, { onFinalized: jest.fn(), exit });

      try {
        lastListener('SIGHUP')('SIGHUP');
      } finally {
        uninstall();
      }

      expect(exit).toHaveBeenCalledWith(1);
    });
  });
});
