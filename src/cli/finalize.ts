import { LedgerStore } from '../db/ledger-store';
import { finalizeActive, fromRecords, toRecords } from '../ledger/ledger';
import { IntervalRecord } from '../types/interval';
import { logger } from '../utils/logger';

export const FINALIZE_SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGHUP', 'SIGTERM'];

/**
 * Close the running interval in the stored ledger, if there is one.
 * Safe to call from any exit path; with nothing running it writes nothing.
 *
 * @returns the closed record, or null when no timer was running
 */
export function finalizeActiveInterval(store: LedgerStore, now: Date): IntervalRecord | null {
  const { state, closed } = finalizeActive(fromRecords(store.load()), now);

  if (closed) {
    store.save(toRecords(state));
    logger.debug(`Finalized interval for '${closed.project}' at ${closed.end}`);
  }

  return closed;
}

export interface FinalizeHooks {
  /** Called after the ledger has been finalized for a signal */
  onFinalized: (closed: IntervalRecord | null, signal: NodeJS.Signals) => void;
  /** Called last; defaults to exiting the process */
  exit?: (code: number) => void;
}

/**
 * Finalize the running interval when the process is interrupted or its
 * terminal goes away.
 *
 * @returns a function that removes the handlers again
 */
export function installFinalizeHandlers(store: LedgerStore, hooks: FinalizeHooks): () => void {
  const exit = hooks.exit ?? ((code: number) => process.exit(code));

  const handler = (signal: NodeJS.Signals): void => {
    let code = 0;

    try {
      const closed = finalizeActiveInterval(store, new Date());
      hooks.onFinalized(closed, signal);
    } catch (error) {
      logger.error(`Could not finalize the active interval: ${error}`);
      code = 1;
    } finally {
      exit(code);
    }
  };

  for (const signal of FINALIZE_SIGNALS) {
    process.on(signal, handler);
  }

  return () => {
    for (const signal of FINALIZE_SIGNALS) {
      process.off(signal, handler);
    }
  };
}
