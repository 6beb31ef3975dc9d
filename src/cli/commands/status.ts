import chalk from 'chalk';
import { format } from 'date-fns';
import { JsonLedgerStore } from '../../db/ledger-store';
import { describeActive, fromRecords } from '../../ledger/ledger';
import { getLedgerPath } from '../../utils/config';
import { formatHuman } from '../../utils/duration';
import { formatDurationText, formatProject } from '../../utils/theme';

/**
 * tt time status command implementation
 */
export function statusCommand(): void {
  try {
    const store = new JsonLedgerStore(getLedgerPath());
    const state = fromRecords(store.load());
    const active = describeActive(state, new Date());

    if (active) {
      console.log(
        `${chalk.yellow('▶')} Tracking ${formatProject(active.project)} since ` +
        `${format(active.start, 'yyyy-MM-dd HH:mm')} (${formatDurationText(formatHuman(active.elapsedSeconds))})`
      );
      return;
    }

    if (state.active) {
      console.log(chalk.yellow(`Tracking '${state.active.project}', but its start time is unreadable.`));
      return;
    }

    console.log(chalk.gray('No active timer.'));
  } catch (error) {
    console.error(chalk.red(`Error: ${error}`));
    process.exit(1);
  }
}
