/**
 * Terminal checks run before the dashboard takes over the screen
 */

import { MIN_HEIGHT, MIN_WIDTH } from '../dashboard/controller.js';

export interface TerminalInfo {
  width: number;
  height: number;
  isTTY: boolean;
  term: string;
}

export function getTerminalInfo(stdout: NodeJS.WriteStream = process.stdout, env: NodeJS.ProcessEnv = process.env): TerminalInfo {
  return {
    width: stdout.columns || 80,
    height: stdout.rows || 24,
    isTTY: stdout.isTTY || false,
    term: env.TERM || '',
  };
}

/**
 * Returns null if the dashboard can draw, or a warning if it probably cannot
 */
export function validateTerminal(info: TerminalInfo): string | null {
  if (!info.isTTY) {
    return 'Standard output is not a terminal; the dashboard will not display correctly.';
  }

  if (info.term === 'dumb') {
    return 'TERM=dumb does not support cursor movement; the dashboard will not display correctly.';
  }

  if (info.width < MIN_WIDTH || info.height < MIN_HEIGHT) {
    return `Terminal too small (${info.width}x${info.height}, need ${MIN_WIDTH}x${MIN_HEIGHT}). Resize your terminal.`;
  }

  return null;
}
