/**
 * Centralized command definitions for tapdash
 * Used by --help and the in-app key overlay
 */

export const KEYBOARD_SHORTCUTS = [
  { key: 'q', description: 'Quit' },
  { key: 'Ctrl+C', description: 'Quit' },
  { key: 'p', description: 'Pause / resume drawing' },
  { key: 'f', description: 'Toggle FPS counter' },
  { key: 'Ctrl+L', description: 'Redraw screen' },
  { key: '?', description: 'Toggle this help' },
];

export const CLI_COMMANDS = [
  { command: 'tapdash [options]', description: 'Chart numbers read from standard input' },
  { command: 'tapdash add -n <name> -r <regex>', description: 'Save a named pattern' },
  { command: 'tapdash remove -n <name>', description: 'Delete a named pattern' },
  { command: 'tapdash list', description: 'List saved patterns' },
];

export const CLI_FLAGS = [
  { flag: '-t, --title <text>', description: 'Chart title (repeat for each chart)' },
  { flag: '-u, --unit <unit>', description: 'Pick "<number> <unit>" from each line (repeatable)' },
  { flag: '-i, --index <n>', description: 'Pick the n-th number of each line, 1-based (repeatable)' },
  { flag: '-p, --pattern <name>', description: 'Pick values with a saved pattern (repeatable)' },
  { flag: '-g, --group', description: 'Draw all series in one grouped chart' },
  { flag: '-l, --layout <mode>', description: 'horizontal, vertical or auto (default: auto)' },
  { flag: '-m, --max <n>', description: 'Value that fills a bar completely' },
  { flag: '--update-frequency <ms>', description: 'Milliseconds between lines (default: 1000)' },
  { flag: '--capacity <n>', description: 'Samples kept per series (default: 200)' },
  { flag: '--bar-width <n>', description: 'Cells per bar (default: 1)' },
  { flag: '--bar-gap <n>', description: 'Cells between bars (default: 0)' },
  { flag: '--group-gap <n>', description: 'Cells between groups (default: 0)' },
  { flag: '--glyphs <set>', description: 'braille or blocks (default: braille)' },
  { flag: '-f, --frame-rate <fps>', description: 'Frames per second (default: 10)' },
  { flag: '--tick-rate <n>', description: 'Ticks per second (default: 4)' },
  { flag: '-h, --help', description: 'Show this help message' },
  { flag: '-v, --version', description: 'Show version' },
];
