import * as fs from 'fs';

const testDataDir = '/tmp/tt-test-log-cmd';
const testLedgerPath = '/tmp/tt-test-log-cmd/timelog.json';

// Mock process.exit to prevent actual exits
const mockExit = jest.fn();
jest.spyOn(process, 'exit').mockImplementation(mockExit as any);

// Mock chalk to avoid color codes in assertions
jest.mock('chalk', () => {
  const mockFn = (s: string) => s;
  const mockChalk = {
    green: Object.assign((s: string) => s, { bold: mockFn }),
    gray: mockFn,
    red: mockFn,
    yellow: mockFn,
    cyan: mockFn,
    bold: Object.assign((s: string) => s, { cyan: mockFn, yellow: mockFn }),
    dim: mockFn,
  };
  return {
    __esModule: true,
    default: mockChalk,
  };
});

// Mock logger
jest.mock('../../../utils/logger', () => ({
  logger: {
    debug: jest.fn(),
  },
}));

// Mock config to use test paths
jest.mock('../../../utils/config', () => ({
  getLedgerPath: jest.fn(() => '/tmp/tt-test-log-cmd/timelog.json'),
}));

import { logCommand } from '../log';
import { JsonLedgerStore } from '../../../db/ledger-store';
import { parseTimestamp } from '../../../utils/date';

describe('log command', () => {
  const store = new JsonLedgerStore(testLedgerPath);
  const originalLog = console.log;
  const originalError = console.error;

  beforeEach(() => {
    if (!fs.existsSync(testDataDir)) {
      fs.mkdirSync(testDataDir, { recursive: true });
    }
    if (fs.existsSync(testLedgerPath)) {
      fs.unlinkSync(testLedgerPath);
    }

    jest.clearAllMocks();
    console.log = jest.fn();
    console.error = jest.fn();
  });

  afterEach(() => {
    console.log = originalLog;
    console.error = originalError;
  });

  afterAll(() => {
    fs.rmSync(testDataDir, { recursive: true, force: true });
  });

  describe('durations', () => {
    it('should log a token duration', () => {
      logCommand('alpha', '1h30m');

      const [record] = store.load();
      expect(record).toMatchObject({
        project: 'alpha',
        duration_seconds: 5400,
        duration: '01:30:00',
        manual: true,
      });
      expect(console.log).toHaveBeenCalledWith('✓ Logged 90m to: alpha');
    });

    it('should read plain numbers as hours', () => {
      logCommand('alpha', '3.5');

      expect(store.load()[0].duration_seconds).toBe(12600);
      expect(console.log).toHaveBeenCalledWith('✓ Logged 210m to: alpha');
    });

    it('should end the interval now', () => {
      const before = Date.now();
      logCommand('alpha', '45m');
      const after = Date.now();

      const [record] = store.load();
      const start = parseTimestamp(record.start ?? '');
      const end = parseTimestamp(record.end ?? '');

      expect(end?.getTime()).toBeGreaterThanOrEqual(before);
      expect(end?.getTime()).toBeLessThanOrEqual(after);
      expect((end?.getTime() ?? 0) - (start?.getTime() ?? 0)).toBe(2700 * 1000);
    });
  });

  describe('validation', () => {
    it('should reject an invalid duration', () => {
      logCommand('alpha', 'abc');

      expect(console.error).toHaveBeenCalledWith('Invalid duration: Unsupported character in duration: a');
      expect(mockExit).toHaveBeenCalledWith(1);
      expect(fs.existsSync(testLedgerPath)).toBe(false);
    });

    it('should reject a zero duration', () => {
      logCommand('alpha', '0');

      expect(console.error).toHaveBeenCalledWith('Invalid duration: Duration must be > 0');
      expect(mockExit).toHaveBeenCalledWith(1);
    });
  });

  it('should keep a running timer as the newest record', () => {
    store.save([{ project: 'beta', start: '2024-03-01T09:00:00.000', end: null }]);

    logCommand('alpha', '30m');

    const records = store.load();
    expect(records.map((r) => r.project)).toEqual(['alpha', 'beta']);
    expect(records[1].end).toBeNull();
  });
});
