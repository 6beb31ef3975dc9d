import chalk from 'chalk';

/**
 * Central color theme for the tt ledger
 *
 * - Projects are always cyan
 * - Durations are bold
 * - Confirmations lead with a green check
 */

// ============================================================================
// FORMATTING HELPER FUNCTIONS
// ============================================================================

export function formatProject(project: string): string {
  return chalk.cyan(project);
}

export function formatDurationText(text: string): string {
  return chalk.bold(text);
}

/**
 * Prefix a confirmation message with a green check
 */
export function success(message: string): string {
  return chalk.green.bold('✓') + chalk.green(` ${message}`);
}

/**
 * Wrap text in an OSC 8 terminal hyperlink
 */
export function hyperlink(text: string, url: string): string {
  return `\x1b]8;;${url}\x1b\\${text}\x1b]8;;\x1b\\`;
}
