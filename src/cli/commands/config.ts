import chalk from 'chalk';
import {
  applyConfigValue,
  getConfigPath,
  getLedgerPath,
  isValidConfigKey,
  isValidConfigValue,
  loadConfig,
  saveConfig,
} from '../../utils/config';
import { ConfigKey, DEFAULT_CONFIG, VALID_CONFIG_KEYS } from '../../types/config';

/**
 * tt config command implementation
 * Manages user configuration
 */
export function configCommand(subcommand?: string, args?: string[]): void {
  try {
    // No subcommand: show current config
    if (!subcommand) {
      showConfig();
      return;
    }

    switch (subcommand) {
      case 'get':
        if (!args || args.length === 0) {
          console.error(chalk.red('Error: Missing config key'));
          console.error('Usage: tt config get <key>');
          process.exit(1);
          return;
        }
        getConfigValue(args[0]);
        break;

      case 'set':
        if (!args || args.length < 2) {
          console.error(chalk.red('Error: Missing config key or value'));
          console.error('Usage: tt config set <key> <value>');
          process.exit(1);
          return;
        }
        setConfigValue(args[0], args[1]);
        break;

      case 'path':
        console.log(getConfigPath());
        break;

      default:
        console.error(chalk.red(`Error: Unknown subcommand '${subcommand}'`));
        console.error('Available subcommands: get, set, path');
        process.exit(1);
    }
  } catch (error) {
    console.error(chalk.red(`Error: ${error}`));
    process.exit(1);
  }
}

/**
 * Show current configuration
 */
function showConfig(): void {
  const config = loadConfig();

  console.log(chalk.bold('\nCurrent Configuration:\n'));
  console.log(`${chalk.gray('Config file:')} ${getConfigPath()}`);
  console.log(`${chalk.gray('Ledger file:')} ${getLedgerPath(config)}\n`);

  for (const key of VALID_CONFIG_KEYS) {
    const isDefault = config[key] === DEFAULT_CONFIG[key];
    console.log(`${chalk.cyan(`${key}:`.padEnd(16))} ${String(config[key])}${isDefault ? chalk.gray(' (default)') : ''}`);
  }

  console.log(chalk.gray('\nCommands:'));
  console.log(chalk.gray('  tt config get <key>         Get a config value'));
  console.log(chalk.gray('  tt config set <key> <value> Set a config value'));
  console.log(chalk.gray('  tt config path              Show config file path'));
}

/**
 * Get a single config value
 */
function getConfigValue(key: string): void {
  if (!isValidConfigKey(key)) {
    console.error(chalk.red(`Error: Invalid config key '${key}'`));
    console.error(chalk.gray(`Valid keys: ${VALID_CONFIG_KEYS.join(', ')}`));
    process.exit(1);
    return;
  }

  const config = loadConfig();
  console.log(String(config[key]));
}

/**
 * Set a config value
 */
function setConfigValue(key: string, value: string): void {
  if (!isValidConfigKey(key)) {
    console.error(chalk.red(`Error: Invalid config key '${key}'`));
    console.error(chalk.gray(`Valid keys: ${VALID_CONFIG_KEYS.join(', ')}`));
    process.exit(1);
    return;
  }

  if (!isValidConfigValue(key, value)) {
    console.error(chalk.red(`Error: Invalid value '${value}' for ${key}`));
    console.error(chalk.gray(getValidValuesHint(key)));
    process.exit(1);
    return;
  }

  saveConfig(applyConfigValue(loadConfig(), key, value));

  console.log(chalk.green(`✓ Set ${chalk.cyan(key)} = ${chalk.bold(value)}`));
}

/**
 * Get hint for valid values for a config key
 */
function getValidValuesHint(key: ConfigKey): string {
  switch (key) {
    case 'reportFormat':
      return 'Valid values: terminal, json, csv';
    case 'exportReports':
    case 'showClock':
      return 'Valid values: true, false';
    case 'exportDir':
    case 'ledgerFile':
      return 'Valid value: any path ("~" is expanded)';
    default:
      return '';
  }
}
