import chalk from 'chalk';
import { pathToFileURL } from 'url';
import { JsonLedgerStore } from '../../db/ledger-store';
import { buildReport } from '../../reports/monthly';
import { writeCsvExport } from '../../reports/export';
import { formatTerminalReport } from '../../reports/formatters/terminal';
import { formatJsonReport } from '../../reports/formatters/json';
import { formatCsvReport } from '../../reports/formatters/csv';
import { ReportFormat } from '../../types/config';
import { getExportDir, getLedgerPath, loadConfig } from '../../utils/config';
import { parseMonth } from '../../utils/date';
import { logger } from '../../utils/logger';
import { hyperlink } from '../../utils/theme';

interface ReportOptions {
  month?: string;
  format?: string;
  /** false when --no-export is given */
  export?: boolean;
}

function isReportFormat(value: string): value is ReportFormat {
  return value === 'terminal' || value === 'json' || value === 'csv';
}

/**
 * tt time report command implementation
 */
export function reportCommand(options: ReportOptions): void {
  try {
    const config = loadConfig();
    const store = new JsonLedgerStore(getLedgerPath(config));
    const records = store.load();

    if (records.length === 0) {
      console.log(chalk.yellow('No entries yet. Start with: tt time start <project>'));
      return;
    }

    const format = options.format || config.reportFormat;
    if (!isReportFormat(format)) {
      console.error(chalk.red(`Error: Invalid format "${format}". Use terminal, json, or csv`));
      process.exit(1);
      return;
    }

    // One clock reading for the whole report
    const now = new Date();

    let referenceDate = now;
    if (options.month) {
      try {
        referenceDate = parseMonth(options.month, now);
      } catch (error) {
        console.error(chalk.red(`Error parsing --month: ${error instanceof Error ? error.message : error}`));
        process.exit(1);
        return;
      }
    }

    const report = buildReport(records, { referenceDate, now });
    logger.debug(`Generating ${format} report for ${report.monthLabel} (${records.length} records)`);

    if (report.skippedRecords > 0) {
      logger.warning(`Skipped ${report.skippedRecords} record(s) with missing or unreadable timestamps`);
    }

    let output: string;

    switch (format) {
      case 'json':
        output = formatJsonReport(report);
        break;

      case 'csv':
        output = formatCsvReport(report);
        break;

      case 'terminal':
      default:
        output = formatTerminalReport(report);
        break;
    }

    console.log(output);

    if (options.export === false || !config.exportReports) {
      return;
    }

    const exportPath = writeCsvExport(report, getExportDir(config));
    const link = hyperlink(exportPath, pathToFileURL(exportPath).href);

    if (format === 'terminal') {
      console.log('');
      console.log(`Exported report to: ${link}`);
    } else {
      // Keep stdout machine-readable
      logger.info(`Exported report to: ${exportPath}`);
    }
  } catch (error) {
    console.error(chalk.red(`Error: ${error}`));
    process.exit(1);
  }
}
