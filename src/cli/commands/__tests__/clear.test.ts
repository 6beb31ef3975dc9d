import * as fs from 'fs';
import * as readline from 'readline';

const testDataDir = '/tmp/tt-test-clear-cmd';
const testLedgerPath = '/tmp/tt-test-clear-cmd/home/timelog.json';
const testWorkDir = '/tmp/tt-test-clear-cmd/work';
const testLocalPath = '/tmp/tt-test-clear-cmd/work/timelog.json';

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
  getLedgerPath: jest.fn(() => '/tmp/tt-test-clear-cmd/home/timelog.json'),
}));

// Mock readline for confirmation prompts
jest.mock('readline', () => ({
  createInterface: jest.fn(),
}));

import { clearCommand, getClearTargets } from '../clear';

describe('clear command', () => {
  const originalLog = console.log;

  const answerPrompt = (answer: string) => {
    const mockReadline = {
      question: jest.fn((_message: string, callback: (answer: string) => void) => callback(answer)),
      close: jest.fn(),
    };
    (readline.createInterface as jest.Mock).mockReturnValue(mockReadline);
    return mockReadline;
  };

  beforeEach(() => {
    fs.rmSync(testDataDir, { recursive: true, force: true });
    fs.mkdirSync('/tmp/tt-test-clear-cmd/home', { recursive: true });
    fs.mkdirSync(testWorkDir, { recursive: true });
    fs.writeFileSync(testLedgerPath, '[]');
    fs.writeFileSync(testLocalPath, '[]');

    jest.clearAllMocks();
    jest.spyOn(process, 'cwd').mockReturnValue(testWorkDir);
    console.log = jest.fn();
  });

  afterEach(() => {
    console.log = originalLog;
  });

  afterAll(() => {
    jest.restoreAllMocks();
    fs.rmSync(testDataDir, { recursive: true, force: true });
  });

  describe('getClearTargets', () => {
    it('should include the ledger and the local timelog.json', () => {
      expect(getClearTargets()).toEqual([testLedgerPath, testLocalPath]);
    });

    it('should list a shared path once', () => {
      expect(getClearTargets('/tmp/tt-test-clear-cmd/home')).toEqual([testLedgerPath]);
    });
  });

  it('should delete both files when forced', async () => {
    await clearCommand({ force: true });

    expect(fs.existsSync(testLedgerPath)).toBe(false);
    expect(fs.existsSync(testLocalPath)).toBe(false);
    expect(console.log).toHaveBeenCalledWith(`✓ Deleted log file: ${testLedgerPath}`);
    expect(console.log).toHaveBeenCalledWith(`✓ Deleted log file: ${testLocalPath}`);
    expect(readline.createInterface).not.toHaveBeenCalled();
  });

  it('should report files that do not exist', async () => {
    fs.unlinkSync(testLocalPath);

    await clearCommand({ force: true });

    expect(console.log).toHaveBeenCalledWith(`No log file to delete: ${testLocalPath}`);
  });

  it('should delete after confirmation', async () => {
    const mockReadline = answerPrompt('y');

    await clearCommand({});

    expect(mockReadline.question).toHaveBeenCalledTimes(1);
    expect(mockReadline.close).toHaveBeenCalled();
    expect(fs.existsSync(testLedgerPath)).toBe(false);
  });

  it('should keep everything when not confirmed', async () => {
    answerPrompt('n');

    await clearCommand({});

    expect(console.log).toHaveBeenCalledWith('Clear cancelled.');
    expect(fs.existsSync(testLedgerPath)).toBe(true);
    expect(fs.existsSync(testLocalPath)).toBe(true);
  });
});
