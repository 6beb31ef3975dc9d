import chalk from 'chalk';
import { resolve as resolvePath } from 'path';
import { createInterface } from 'readline';
import { JsonLedgerStore } from '../../db/ledger-store';
import { getLedgerPath } from '../../utils/config';
import { success } from '../../utils/theme';

interface ClearOptions {
  force?: boolean;
}

/**
 * Ledger file name looked for in the working directory as well
 */
export const LOCAL_LEDGER_FILE = 'timelog.json';

/**
 * Prompt user for confirmation
 */
function promptConfirmation(message: string): Promise<boolean> {
  const rl = createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  return new Promise((resolve) => {
    rl.question(message, (answer) => {
      rl.close();
      resolve(answer.toLowerCase() === 'y' || answer.toLowerCase() === 'yes');
    });
  });
}

/**
 * Ledger files the clear command removes: the active ledger and ./timelog.json
 */
export function getClearTargets(cwd: string = process.cwd()): string[] {
  const targets = [getLedgerPath(), resolvePath(cwd, LOCAL_LEDGER_FILE)];
  return Array.from(new Set(targets));
}

/**
 * tt time clear command implementation
 */
export async function clearCommand(options: ClearOptions): Promise<void> {
  try {
    const targets = getClearTargets();

    if (!options.force) {
      console.log(chalk.yellow('This deletes every tracked interval in:'));
      for (const target of targets) {
        console.log(chalk.gray(`  ${target}`));
      }

      const confirmed = await promptConfirmation(chalk.yellow('Are you sure? (y/N): '));
      if (!confirmed) {
        console.log(chalk.gray('Clear cancelled.'));
        return;
      }
    }

    for (const target of targets) {
      if (new JsonLedgerStore(target).clear()) {
        console.log(success(`Deleted log file: ${target}`));
      } else {
        console.log(chalk.gray(`No log file to delete: ${target}`));
      }
    }
  } catch (error) {
    console.error(chalk.red(`Error: ${error}`));
    process.exit(1);
  }
}
