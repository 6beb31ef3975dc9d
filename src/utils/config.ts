import { homedir } from 'os';
import { join } from 'path';
import { mkdirSync, existsSync, readFileSync, writeFileSync } from 'fs';
import { UserConfig, DEFAULT_CONFIG, VALID_CONFIG_KEYS, ConfigKey, ReportFormat } from '../types/config';

/**
 * Environment variable that overrides the ledger file location
 */
export const LEDGER_FILE_ENV = 'TT_TIME_FILE';

/**
 * Expand a leading "~" to the user's home directory
 */
export function expandHome(path: string): string {
  if (path === '~') {
    return homedir();
  }
  if (path.startsWith('~/')) {
    return join(homedir(), path.slice(2));
  }
  return path;
}

/**
 * Get the config directory
 */
export function getConfigDir(): string {
  const home = homedir();
  return join(home, '.config', 'tt');
}

/**
 * Get the config file path
 */
export function getConfigPath(): string {
  return join(getConfigDir(), 'config.json');
}

/**
 * Get the ledger file path: TT_TIME_FILE, then the configured
 * ledgerFile, then ~/.timelog.json
 */
export function getLedgerPath(config: Required<UserConfig> = loadConfig()): string {
  const envPath = process.env[LEDGER_FILE_ENV];

  if (envPath) {
    return expandHome(envPath);
  }

  return expandHome(config.ledgerFile || DEFAULT_CONFIG.ledgerFile);
}

/**
 * Get the directory monthly CSV time sheets are written under
 */
export function getExportDir(config: Required<UserConfig> = loadConfig()): string {
  return expandHome(config.exportDir || DEFAULT_CONFIG.exportDir);
}

/**
 * Ensure config directory exists
 */
export function ensureConfigDir(): void {
  const configDir = getConfigDir();

  if (!existsSync(configDir)) {
    mkdirSync(configDir, { recursive: true });
  }
}

function isReportFormat(value: unknown): value is ReportFormat {
  return value === 'terminal' || value === 'json' || value === 'csv';
}

function readField(source: object, key: string): unknown {
  return key in source ? Reflect.get(source, key) : undefined;
}

function pickString(value: unknown, fallback: string): string {
  return typeof value === 'string' && value.length > 0 ? value : fallback;
}

function pickBoolean(value: unknown, fallback: boolean): boolean {
  return typeof value === 'boolean' ? value : fallback;
}

/**
 * Load user configuration
 * Returns default config if file doesn't exist or is invalid
 */
export function loadConfig(): Required<UserConfig> {
  const configPath = getConfigPath();

  if (!existsSync(configPath)) {
    return { ...DEFAULT_CONFIG };
  }

  try {
    const contents = readFileSync(configPath, 'utf-8');
    const parsed: unknown = JSON.parse(contents);

    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      throw new Error('config must be a JSON object');
    }

    const reportFormat = readField(parsed, 'reportFormat');

    // Merge with defaults
    const config: Required<UserConfig> = {
      reportFormat: isReportFormat(reportFormat) ? reportFormat : DEFAULT_CONFIG.reportFormat,
      exportDir: pickString(readField(parsed, 'exportDir'), DEFAULT_CONFIG.exportDir),
      exportReports: pickBoolean(readField(parsed, 'exportReports'), DEFAULT_CONFIG.exportReports),
      showClock: pickBoolean(readField(parsed, 'showClock'), DEFAULT_CONFIG.showClock),
      ledgerFile: pickString(readField(parsed, 'ledgerFile'), DEFAULT_CONFIG.ledgerFile),
    };

    return config;
  } catch (error) {
    // If config is malformed, return defaults
    console.warn(`Warning: Could not parse config file, using defaults: ${error}`);
    return { ...DEFAULT_CONFIG };
  }
}

/**
 * Save user configuration
 */
export function saveConfig(config: UserConfig): void {
  ensureConfigDir();
  const configPath = getConfigPath();

  // Only save non-default values
  const toSave: Partial<UserConfig> = {};

  if (config.reportFormat && config.reportFormat !== DEFAULT_CONFIG.reportFormat) {
    toSave.reportFormat = config.reportFormat;
  }
  if (config.exportDir && config.exportDir !== DEFAULT_CONFIG.exportDir) {
    toSave.exportDir = config.exportDir;
  }
  if (config.exportReports !== undefined && config.exportReports !== DEFAULT_CONFIG.exportReports) {
    toSave.exportReports = config.exportReports;
  }
  if (config.showClock !== undefined && config.showClock !== DEFAULT_CONFIG.showClock) {
    toSave.showClock = config.showClock;
  }
  if (config.ledgerFile && config.ledgerFile !== DEFAULT_CONFIG.ledgerFile) {
    toSave.ledgerFile = config.ledgerFile;
  }

  writeFileSync(configPath, JSON.stringify(toSave, null, 2) + '\n', 'utf-8');
}

/**
 * Validate a config key
 */
export function isValidConfigKey(key: string): key is ConfigKey {
  return VALID_CONFIG_KEYS.some((valid) => valid === key);
}

/**
 * Validate a config value for a given key
 */
export function isValidConfigValue(key: ConfigKey, value: string): boolean {
  switch (key) {
    case 'reportFormat':
      return isReportFormat(value);
    case 'exportReports':
    case 'showClock':
      return value === 'true' || value === 'false';
    case 'exportDir':
    case 'ledgerFile':
      return value.length > 0;
    default:
      return false;
  }
}

/**
 * Apply a validated string value to a config object
 */
export function applyConfigValue(config: Required<UserConfig>, key: ConfigKey, value: string): Required<UserConfig> {
  switch (key) {
    case 'reportFormat':
      return isReportFormat(value) ? { ...config, reportFormat: value } : config;
    case 'exportReports':
      return { ...config, exportReports: value === 'true' };
    case 'showClock':
      return { ...config, showClock: value === 'true' };
    case 'exportDir':
      return { ...config, exportDir: value };
    case 'ledgerFile':
      return { ...config, ledgerFile: value };
  }
}
