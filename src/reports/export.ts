import { mkdirSync, writeFileSync } from 'fs';
import { dirname, join } from 'path';
import { format } from 'date-fns';
import { StorageError } from '../types/errors';
import { formatCsvReport } from './formatters/csv';
import { MonthlyReport } from './types';

/**
 * Where the CSV time sheet for a report lives:
 * <exportDir>/<Month-yyyy>/Time Sheet - <Month yyyy>.csv
 */
export function getExportPath(exportDir: string, report: MonthlyReport): string {
  const monthFolder = format(report.window.start, 'MMMM-yyyy');
  return join(exportDir, monthFolder, `Time Sheet - ${report.monthLabel}.csv`);
}

/**
 * Write the CSV time sheet, replacing any earlier export for the month
 *
 * @returns the path written
 */
export function writeCsvExport(report: MonthlyReport, exportDir: string): string {
  const exportPath = getExportPath(exportDir, report);

  try {
    mkdirSync(dirname(exportPath), { recursive: true });
    writeFileSync(exportPath, formatCsvReport(report), 'utf-8');
  } catch (error) {
    throw new StorageError(`Failed to export report to ${exportPath}: ${error}`);
  }

  return exportPath;
}
