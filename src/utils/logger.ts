import chalk from 'chalk';

type LogLevel = 'error' | 'warning' | 'info' | 'debug';

const PREFIXES: Record<LogLevel, (text: string) => string> = {
  error: (text) => chalk.red(text),
  warning: (text) => chalk.yellow(text),
  info: (text) => chalk.cyan(text),
  debug: (text) => chalk.gray(text),
};

/**
 * Global logger for the tt ledger
 * Everything goes to stderr so report output on stdout stays clean.
 * Debug messages only shown when verbose mode is enabled (-v or TT_VERBOSE=1)
 */
class Logger {
  private verbose: boolean = process.env.TT_VERBOSE === '1';

  /**
   * Enable or disable verbose mode
   */
  setVerbose(enabled: boolean): void {
    this.verbose = enabled;
  }

  isVerbose(): boolean {
    return this.verbose;
  }

  error(message: string, ...args: unknown[]): void {
    this.write('error', message, args);
  }

  warning(message: string, ...args: unknown[]): void {
    this.write('warning', message, args);
  }

  info(message: string, ...args: unknown[]): void {
    this.write('info', message, args);
  }

  /**
   * Log a debug message (verbose mode only)
   */
  debug(message: string, ...args: unknown[]): void {
    if (this.verbose) {
      this.write('debug', message, args);
    }
  }

  private write(level: LogLevel, message: string, args: unknown[]): void {
    console.error(PREFIXES[level](`${level.toUpperCase()}:`), message, ...args);
  }
}

// Export singleton instance
export const logger = new Logger();
