import chalk from 'chalk';
import { JsonLedgerStore } from '../../db/ledger-store';
import { getLedgerPath } from '../../utils/config';
import { formatHuman } from '../../utils/duration';
import { success } from '../../utils/theme';
import { finalizeActiveInterval } from '../finalize';

/**
 * tt time stop command implementation
 */
export function stopCommand(): void {
  try {
    const store = new JsonLedgerStore(getLedgerPath());
    const closed = finalizeActiveInterval(store, new Date());

    if (!closed) {
      console.log(chalk.yellow('No active timer.'));
      return;
    }

    const duration = closed.duration_seconds !== undefined ? ` (${formatHuman(closed.duration_seconds)})` : '';
    console.log(success(`Stopped: ${closed.project}${duration}`));
  } catch (error) {
    console.error(chalk.red(`Error: ${error}`));
    process.exit(1);
  }
}
