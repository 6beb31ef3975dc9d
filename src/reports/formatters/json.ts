import { formatTimestamp } from '../../utils/date';
import { MonthlyReport } from '../types';

/**
 * Format monthly report as JSON.
 * Timestamps are local ISO-8601 strings, matching the ledger file.
 */
export function formatJsonReport(report: MonthlyReport): string {
  const jsonData = {
    month: report.monthLabel,
    window: {
      start: formatTimestamp(report.window.start),
      end: formatTimestamp(report.window.end),
    },
    firstDay: report.firstDay,
    lastDay: report.lastDay,
    generatedAt: formatTimestamp(report.generatedAt),
    weeks: report.weeks.map((week) => ({
      week: week.label,
      isoYear: week.key.isoYear,
      isoWeek: week.key.isoWeek,
      firstDay: week.firstDay,
      lastDay: week.lastDay,
      noTime: week.noTime,
      days: week.days,
    })),
    monthlyTotals: report.monthlyTotals,
    overallTotal: report.overallTotal,
    skippedRecords: report.skippedRecords,
  };

  return JSON.stringify(jsonData, null, 2);
}
