import chalk from 'chalk';
import { format, parseISO } from 'date-fns';
import { MonthlyReport, ReportWeek } from '../types';

/**
 * Format a yyyy-MM-dd key as "Mar 04"
 */
function formatShortDay(dayKey: string): string {
  return format(parseISO(dayKey), 'MMM dd');
}

function formatWeek(week: ReportWeek): string[] {
  const lines: string[] = [];

  lines.push(chalk.bold(`Week ${week.label} (${formatShortDay(week.firstDay)} - ${formatShortDay(week.lastDay)})`));

  if (week.noTime) {
    lines.push(chalk.gray('  (no time)'));
    return lines;
  }

  for (const day of week.days) {
    lines.push(`  ${day.date} (${day.weekday}): ${chalk.bold(day.total.formatted)}`);
    for (const entry of day.projects) {
      lines.push(`    - ${chalk.cyan(entry.project)}: ${entry.duration.formatted}`);
    }
  }

  return lines;
}

/**
 * Format monthly report for terminal display
 */
export function formatTerminalReport(report: MonthlyReport): string {
  const lines: string[] = [];

  lines.push(chalk.bold.cyan(`Report for ${report.monthLabel} (from ${report.firstDay} to ${report.lastDay})`));
  lines.push('');

  for (const week of report.weeks) {
    lines.push(...formatWeek(week));
    lines.push('');
  }

  lines.push(chalk.bold.yellow('Monthly totals:'));
  if (report.monthlyTotals.length > 0) {
    for (const entry of report.monthlyTotals) {
      lines.push(`- ${chalk.cyan(entry.project)}: ${entry.duration.formatted}`);
    }
    lines.push(`- Overall: ${chalk.bold(report.overallTotal.formatted)}`);
  } else {
    lines.push(chalk.gray('(no time this month)'));
  }

  return lines.join('\n');
}
