import chalk from 'chalk';
import { JsonLedgerStore } from '../../db/ledger-store';
import { fromRecords, logManual, toRecords } from '../../ledger/ledger';
import { parseLogDuration } from '../../parser/duration';
import { InvalidDurationError } from '../../types/errors';
import { getLedgerPath } from '../../utils/config';
import { logger } from '../../utils/logger';
import { success } from '../../utils/theme';

/**
 * tt time log command implementation
 *
 * Records a closed interval of the given length that ends now. The duration
 * is plain hours ("3", "3.5") or a token string ("1h30m", "45m", "90").
 */
export function logCommand(project: string, duration: string): void {
  try {
    let seconds: number;
    try {
      seconds = parseLogDuration(duration);
    } catch (error) {
      if (error instanceof InvalidDurationError) {
        console.error(chalk.red(`Invalid duration: ${error.message}`));
        process.exit(1);
        return;
      }
      throw error;
    }

    logger.debug(`Parsed duration "${duration}" as ${seconds}s`);

    const store = new JsonLedgerStore(getLedgerPath());
    const state = fromRecords(store.load());
    store.save(toRecords(logManual(state, project, seconds, new Date())));

    console.log(success(`Logged ${Math.floor(seconds / 60)}m to: ${project.trim()}`));
  } catch (error) {
    console.error(chalk.red(`Error: ${error}`));
    process.exit(1);
  }
}
