import { InvalidDurationError } from '../types/errors';

const PLAIN_HOURS = /^(?=.*\d)\d*\.?\d*$/;

/**
 * Parse a duration token string into seconds
 *
 * Supported formats:
 * - "2h" -> 2 hours
 * - "45m" -> 45 minutes
 * - "1h30m", "30m1h", "1h1h" -> units add up in any order
 * - "90" -> 90 minutes (bare digits count as minutes only when no unit appears)
 * - "1:30" -> the colon is skipped, so this reads as "130" minutes
 *
 * Input is lower-cased first, so "1H30M" is accepted too.
 *
 * @param duration - Duration string to parse
 * @returns Duration in seconds
 * @throws InvalidDurationError if format is invalid or the total is not positive
 */
export function parseDuration(duration: string): number {
  const text = duration.trim().toLowerCase();
  let totalMinutes = 0;
  let digits = '';
  let hadUnit = false;

  for (const ch of text) {
    if (ch >= '0' && ch <= '9') {
      digits += ch;
    } else if (ch === 'h' || ch === 'm') {
      if (digits === '') {
        throw new InvalidDurationError('Missing number before unit', duration);
      }
      const value = parseInt(digits, 10);
      totalMinutes += ch === 'h' ? value * 60 : value;
      digits = '';
      hadUnit = true;
    } else if (ch === ':') {
      continue;
    } else {
      throw new InvalidDurationError(`Unsupported character in duration: ${ch}`, duration);
    }
  }

  // Trailing digits after a unit (e.g. "1h90") are not counted
  if (digits !== '' && !hadUnit) {
    totalMinutes += parseInt(digits, 10);
  }

  if (totalMinutes <= 0) {
    throw new InvalidDurationError('Duration must be > 0', duration);
  }

  return totalMinutes * 60;
}

/**
 * Parse the duration given to `tt time log`
 *
 * A plain decimal number is hours ("3", "3.5", ".25"); anything else is
 * handed to {@link parseDuration}.
 *
 * @returns Duration in seconds
 * @throws InvalidDurationError
 */
export function parseLogDuration(duration: string): number {
  const text = duration.trim();

  if (PLAIN_HOURS.test(text)) {
    const hours = parseFloat(text);
    if (!(hours > 0)) {
      throw new InvalidDurationError('Duration must be > 0', duration);
    }

    const seconds = Math.round(hours * 3600);
    if (seconds <= 0) {
      throw new InvalidDurationError('Duration is shorter than one second', duration);
    }
    return seconds;
  }

  return parseDuration(text);
}
