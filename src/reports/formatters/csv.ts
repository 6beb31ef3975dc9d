import { formatHoursMinutes } from '../../utils/duration';
import { MonthlyReport } from '../types';

/**
 * Escape CSV field
 */
function escapeCSV(value: string | number): string {
  const str = String(value);

  // If field contains comma, quote, or newline, wrap in quotes and escape quotes
  if (str.includes(',') || str.includes('"') || str.includes('\n')) {
    return `"${str.replace(/"/g, '""')}"`;
  }

  return str;
}

function row(...fields: Array<string | number>): string {
  return fields.map(escapeCSV).join(',');
}

/**
 * Format monthly report as a CSV time sheet: one row per day and project,
 * followed by the monthly totals. Durations are HH:MM.
 */
export function formatCsvReport(report: MonthlyReport): string {
  const lines: string[] = [];

  lines.push(row(`Report for ${report.monthLabel}`));
  lines.push(row(`From ${report.firstDay} to ${report.lastDay}`));
  lines.push('');
  lines.push(row('Date', 'Weekday', 'Project', 'Duration (HH:MM)'));

  for (const week of report.weeks) {
    for (const day of week.days) {
      for (const entry of day.projects) {
        lines.push(row(day.date, day.weekday, entry.project, formatHoursMinutes(entry.duration.seconds)));
      }
    }
  }

  lines.push('');
  lines.push(row('Monthly totals'));
  if (report.monthlyTotals.length > 0) {
    for (const entry of report.monthlyTotals) {
      lines.push(row(entry.project, formatHoursMinutes(entry.duration.seconds)));
    }
    lines.push(row('Overall', formatHoursMinutes(report.overallTotal.seconds)));
  } else {
    lines.push(row('(no time this month)'));
  }

  return lines.join('\n') + '\n';
}
