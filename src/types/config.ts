/**
 * User configuration schema
 * Stored in ~/.config/tt/config.json
 */

export type ReportFormat = 'terminal' | 'json' | 'csv';

export interface UserConfig {
  /**
   * Default output format for report command
   * @default "terminal"
   */
  reportFormat?: ReportFormat;

  /**
   * Directory the monthly CSV time sheets are written under
   * @default "~/Documents/Time Sheet Reports"
   */
  exportDir?: string;

  /**
   * Write the CSV time sheet every time a report is shown
   * @default true
   */
  exportReports?: boolean;

  /**
   * Show the ASCII clock after `tt time start`
   * @default true
   */
  showClock?: boolean;

  /**
   * Ledger file location (TT_TIME_FILE takes precedence)
   * @default "~/.timelog.json"
   */
  ledgerFile?: string;
}

export const DEFAULT_CONFIG: Required<UserConfig> = {
  reportFormat: 'terminal',
  exportDir: '~/Documents/Time Sheet Reports',
  exportReports: true,
  showClock: true,
  ledgerFile: '~/.timelog.json',
};

export const VALID_CONFIG_KEYS = [
  'reportFormat',
  'exportDir',
  'exportReports',
  'showClock',
  'ledgerFile',
] as const;

export type ConfigKey = typeof VALID_CONFIG_KEYS[number];
