import chalk from 'chalk';
import { format } from 'date-fns';
import { JsonLedgerStore } from '../../db/ledger-store';
import { fromRecords, startTracking, toRecords } from '../../ledger/ledger';
import { getLedgerPath, loadConfig } from '../../utils/config';
import { parseTimestamp } from '../../utils/date';
import { logger } from '../../utils/logger';
import { success } from '../../utils/theme';
import { startClock } from '../clock';
import { installFinalizeHandlers } from '../finalize';

interface StartOptions {
  /** false when --no-clock is given */
  clock?: boolean;
}

/**
 * tt time start command implementation
 */
export function startCommand(projectArgs: string | string[], options: StartOptions): void {
  try {
    // Multi-word project names arrive as separate arguments
    const project = (Array.isArray(projectArgs) ? projectArgs.join(' ') : projectArgs).trim();

    if (project === '') {
      console.error(chalk.red('Error: Project name cannot be empty'));
      process.exit(1);
      return;
    }

    const config = loadConfig();
    const store = new JsonLedgerStore(getLedgerPath(config));
    const state = fromRecords(store.load());

    if (state.active) {
      const since = state.active.start ? parseTimestamp(state.active.start) : null;
      const sinceText = since ? format(since, 'yyyy-MM-dd HH:mm') : 'an unknown time';
      console.error(
        chalk.red(`Already tracking '${state.active.project}' since ${sinceText}. Use 'tt time stop' first.`)
      );
      process.exit(1);
      return;
    }

    const now = new Date();
    store.save(toRecords(startTracking(state, project, now)));

    console.log(success(`Started tracking: ${project}`));

    if (options.clock === false || !config.showClock) {
      logger.debug('Clock display disabled');
      return;
    }

    installFinalizeHandlers(store, {
      onFinalized: (closed, signal) => {
        if (closed) {
          console.log(`\nStopped (via ${signal}): ${closed.project}`);
        }
      },
    });
    startClock(now, project);
  } catch (error) {
    console.error(chalk.red(`Error: ${error}`));
    process.exit(1);
  }
}
