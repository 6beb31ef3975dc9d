/**
 * Whole seconds in a millisecond span, truncated toward zero
 */
export function toWholeSeconds(milliseconds: number): number {
  return Math.trunc(milliseconds / 1000);
}

/**
 * Format a duration in seconds for people: "2h05m", "45m", "-1h00m".
 * Hours carry no leading zero, minutes are always two digits once hours
 * are shown, and leftover seconds are dropped.
 */
export function formatHuman(seconds: number): string {
  const whole = Math.trunc(seconds);
  const sign = whole < 0 ? '-' : '';
  const abs = Math.abs(whole);
  const hours = Math.floor(abs / 3600);
  const mins = Math.floor((abs % 3600) / 60);

  if (hours > 0) {
    return `${sign}${hours}h${String(mins).padStart(2, '0')}m`;
  }
  return `${sign}${mins}m`;
}

/**
 * Format seconds as zero-padded HH:MM:SS (negative values clamp to zero)
 */
export function formatClock(seconds: number): string {
  const total = Math.max(0, Math.trunc(seconds));
  const hours = Math.floor(total / 3600);
  const mins = Math.floor((total % 3600) / 60);
  const secs = total % 60;

  return [hours, mins, secs].map((n) => String(n).padStart(2, '0')).join(':');
}

/**
 * Format seconds as zero-padded HH:MM, as used in the CSV time sheet
 */
export function formatHoursMinutes(seconds: number): string {
  const total = Math.trunc(seconds);
  const hours = Math.floor(total / 3600);
  const mins = Math.floor((total % 3600) / 60);

  return `${String(hours).padStart(2, '0')}:${String(mins).padStart(2, '0')}`;
}

/**
 * Format elapsed seconds for the live clock: "1h05m09s"
 */
export function formatElapsed(seconds: number): string {
  const total = Math.max(0, Math.trunc(seconds));
  const hours = Math.floor(total / 3600);
  const mins = Math.floor((total % 3600) / 60);
  const secs = total % 60;

  return `${hours}h${String(mins).padStart(2, '0')}m${String(secs).padStart(2, '0')}s`;
}
