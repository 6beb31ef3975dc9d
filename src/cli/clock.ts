import { format } from 'date-fns';
import glyphTable from './clock-glyphs.json';
import { elapsedSeconds } from '../ledger/interval';
import { formatElapsed } from '../utils/duration';

const GLYPH_ROWS = 5;
const CLEAR_SCREEN = '\x1b[2J\x1b[H';

const glyphs: Record<string, string[]> = glyphTable;

/**
 * Render the big HH:MM:SS clock plus the status lines underneath
 */
export function renderClock(now: Date, start: Date, project: string): string {
  const rows: string[] = new Array<string>(GLYPH_ROWS).fill('');

  for (const ch of format(now, 'HH:mm:ss')) {
    const glyph = glyphs[ch] ?? glyphs['0'];
    for (let i = 0; i < GLYPH_ROWS; i++) {
      rows[i] += glyph[i] + '  ';
    }
  }

  return [
    ...rows,
    '',
    `currently working on: ${project.toLowerCase()}`,
    `time: ${format(now, 'yyyy-MM-dd HH:mm:ss')}`,
    `elapsed: ${formatElapsed(elapsedSeconds(start, now))}`,
  ].join('\n');
}

export interface ClockHandle {
  stop(): void;
}

/**
 * Redraw the clock once a second until stopped
 */
export function startClock(
  start: Date,
  project: string,
  write: (text: string) => void = (text) => process.stdout.write(text)
): ClockHandle {
  const draw = (): void => {
    write(`${CLEAR_SCREEN}${renderClock(new Date(), start, project)}\n`);
  };

  draw();
  const timer = setInterval(draw, 1000);

  return {
    stop: () => clearInterval(timer),
  };
}
