#!/usr/bin/env node

import { Command } from 'commander';
import { startCommand } from './cli/commands/start';
import { stopCommand } from './cli/commands/stop';
import { logCommand } from './cli/commands/log';
import { reportCommand } from './cli/commands/report';
import { statusCommand } from './cli/commands/status';
import { clearCommand } from './cli/commands/clear';
import { configCommand } from './cli/commands/config';
import { logger } from './utils/logger';

const program = new Command();

program
  .name('tt')
  .description('Tiny terminal time tracker')
  .option('-v, --verbose', 'Output debug messages.')
  .version('1.0.0');

// Hook to enable verbose logging before any command runs
program.hook('preAction', (thisCommand) => {
  const opts = thisCommand.optsWithGlobals();
  if (opts.verbose) {
    logger.setVerbose(true);
    logger.debug('Verbose mode enabled');
  }
});

const time = program
  .command('time', { isDefault: true })
  .description('Time tracking commands');

// Status command (default)
time
  .command('status', { isDefault: true })
  .description('Show the running timer')
  .action(() => statusCommand());

time
  .command('start')
  .description('Start tracking a project')
  .argument('<project...>', 'Project name (can be multiple words)')
  .option('--no-clock', 'Do not show the ASCII clock after starting')
  .action(startCommand);

time
  .command('stop')
  .description('Stop the active timer')
  .action(() => stopCommand());

time
  .command('log')
  .description('Log time: plain hours or duration (e.g., 3, 3.5, 1h30m, 45m)')
  .argument('<project>', 'Project name')
  .argument('<duration>', 'Hours (e.g., 3 or 3.5) or duration like 1h30m/45m')
  .action(logCommand);

time
  .command('report')
  .description('Show the monthly report and export it as CSV')
  .option('--month <month>', 'Month to report: "current" (default), "last", or yyyy-MM (2024-03)')
  .option('--format <format>', 'Output format: "terminal", "json", "csv" (default from config)')
  .option('--no-export', 'Do not write the CSV time sheet')
  .action(reportCommand);

time
  .command('clear')
  .description('Delete the ledger file and ./timelog.json')
  .option('-f, --force', 'Skip confirmation prompt')
  .action(clearCommand);

program
  .command('config')
  .description('Show or change user configuration')
  .argument('[subcommand]', 'get, set, or path')
  .argument('[args...]', 'Key and value')
  .action(configCommand);

program.parseAsync().catch((error: unknown) => {
  logger.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
