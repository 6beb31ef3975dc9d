import * as fs from 'fs';

const testDataDir = '/tmp/tt-test-start-cmd';
const testLedgerPath = '/tmp/tt-test-start-cmd/timelog.json';

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
    warning: jest.fn(),
    error: jest.fn(),
  },
}));

// Mock config to use test paths
jest.mock('../../../utils/config', () => ({
  getLedgerPath: jest.fn(() => '/tmp/tt-test-start-cmd/timelog.json'),
  loadConfig: jest.fn(() => ({
    reportFormat: 'terminal',
    exportDir: '/tmp/tt-test-start-cmd/exports',
    exportReports: false,
    showClock: true,
    ledgerFile: '/tmp/tt-test-start-cmd/timelog.json',
  })),
}));

// The clock and signal handlers would keep the test process alive
jest.mock('../../clock', () => ({
  startClock: jest.fn(() => ({ stop: jest.fn() })),
}));
jest.mock('../../finalize', () => ({
  installFinalizeHandlers: jest.fn(() => jest.fn()),
}));

import { startCommand } from '../start';
import { startClock } from '../../clock';
import { installFinalizeHandlers } from '../../finalize';
import { loadConfig } from '../../../utils/config';
import { JsonLedgerStore } from '../../../db/ledger-store';

describe('start command', () => {
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

  describe('basic functionality', () => {
    it('should open an interval for the project', () => {
      startCommand(['alpha'], { clock: false });

      const records = store.load();
      expect(records).toHaveLength(1);
      expect(records[0].project).toBe('alpha');
      expect(records[0].end).toBeNull();
      expect(console.log).toHaveBeenCalledWith('✓ Started tracking: alpha');
      expect(mockExit).not.toHaveBeenCalled();
    });

    it('should join multi-word project names', () => {
      startCommand(['client', 'call'], { clock: false });

      expect(store.load()[0].project).toBe('client call');
    });

    it('should append after earlier intervals', () => {
      store.save([{ project: 'beta', start: '2024-03-01T09:00:00.000', end: '2024-03-01T10:00:00.000' }]);

      startCommand(['alpha'], { clock: false });

      expect(store.load().map((r) => r.project)).toEqual(['beta', 'alpha']);
    });
  });

  describe('validation', () => {
    it('should refuse to start while a timer runs', () => {
      store.save([{ project: 'beta', start: '2024-03-01T09:00:00.000', end: null }]);

      startCommand(['alpha'], { clock: false });

      expect(console.error).toHaveBeenCalledWith(
        "Already tracking 'beta' since 2024-03-01 09:00. Use 'tt time stop' first."
      );
      expect(mockExit).toHaveBeenCalledWith(1);
      expect(store.load()).toHaveLength(1);
    });

    it('should refuse an empty project name', () => {
      startCommand(['  '], { clock: false });

      expect(console.error).toHaveBeenCalledWith('Error: Project name cannot be empty');
      expect(mockExit).toHaveBeenCalledWith(1);
      expect(fs.existsSync(testLedgerPath)).toBe(false);
    });
  });

  describe('clock', () => {
    it('should show the clock and finalize on signals by default', () => {
      startCommand(['alpha'], {});

      expect(installFinalizeHandlers).toHaveBeenCalledTimes(1);
      expect(startClock).toHaveBeenCalledWith(expect.any(Date), 'alpha');
    });

    it('should skip the clock with --no-clock', () => {
      startCommand(['alpha'], { clock: false });

      expect(installFinalizeHandlers).not.toHaveBeenCalled();
      expect(startClock).not.toHaveBeenCalled();
    });

    it('should skip the clock when disabled in config', () => {
      (loadConfig as jest.Mock).mockReturnValueOnce({
        reportFormat: 'terminal',
        exportDir: '/tmp/tt-test-start-cmd/exports',
        exportReports: false,
        showClock: false,
        ledgerFile: testLedgerPath,
      });

      startCommand(['alpha'], {});

      expect(startClock).not.toHaveBeenCalled();
      expect(store.load()).toHaveLength(1);
    });
  });
});
