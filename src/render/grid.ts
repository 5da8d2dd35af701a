/**
 * Grid layout - splits an area into one cell per pane
 *
 * - horizontal: one row, n equal columns
 * - vertical:   one column, n equal rows
 * - auto:       rows x columns from a descending divisor scan; a prime n > 2
 *               gets one full-width row on top for the extra pane, with the
 *               other n - 1 panes in a grid below it
 *
 * Sizes are integer percentages of the area. The last row/column of each
 * split takes whatever the percentages leave over, so cells tile the area
 * exactly and never overlap.
 */

import type { LayoutMode, Rect } from '../types.js';

export interface GridShape {
  rows: number;
  columns: number;
  /** True when the first row holds a single full-width pane */
  remainderRow: boolean;
}

export function isPrime(n: number): boolean {
  if (!Number.isInteger(n) || n < 2) return false;
  for (let i = 2; i * i <= n; i++) {
    if (n % i === 0) return false;
  }
  return true;
}

/**
 * First divisor of `n` scanning down from `from` to 2, or 1 if there is none.
 * The scan order is fixed: it decides the grid's aspect ratio.
 */
export function descendingDivisor(n: number, from: number): number {
  for (let i = from; i >= 2; i--) {
    if (n % i === 0) return i;
  }
  return 1;
}

/**
 * Rows and columns for `n` panes in auto mode
 */
export function autoShape(n: number): GridShape {
  if (n <= 1) {
    return { rows: 1, columns: Math.max(n, 0), remainderRow: false };
  }

  if (isPrime(n) && n > 2) {
    const rest = n - 1;
    if (rest === 1) return { rows: 1, columns: 1, remainderRow: true };
    if (rest === 2) return { rows: 1, columns: 2, remainderRow: true };
    const rows = descendingDivisor(rest, n - 2);
    return { rows, columns: rest / rows, remainderRow: true };
  }

  const rows = descendingDivisor(n, n - 1);
  return { rows, columns: n / rows, remainderRow: false };
}

export function shapeFor(n: number, mode: LayoutMode): GridShape {
  switch (mode) {
    case 'horizontal':
      return { rows: 1, columns: n, remainderRow: false };
    case 'vertical':
      return { rows: n, columns: 1, remainderRow: false };
    case 'auto':
      return autoShape(n);
  }
}

/**
 * Split `length` cells starting at `start` into `count` segments of
 * floor(100 / count) percent each; the last segment absorbs the remainder.
 */
export function splitPercent(start: number, length: number, count: number): Array<{ start: number; size: number }> {
  if (count <= 0) return [];
  const percent = Math.floor(100 / count);
  const size = Math.floor((length * percent) / 100);
  const segments: Array<{ start: number; size: number }> = [];
  for (let i = 0; i < count; i++) {
    const segStart = start + i * size;
    const segSize = i === count - 1 ? start + length - segStart : size;
    segments.push({ start: segStart, size: Math.max(0, segSize) });
  }
  return segments;
}

/**
 * One cell per pane, in pane order: the remainder pane first (when there
 * is one), then the grid row by row.
 */
export function computeGrid(n: number, mode: LayoutMode, area: Rect): Rect[] {
  if (n <= 0) return [];
  if (n === 1) return [{ ...area }];

  const shape = shapeFor(n, mode);
  const totalRows = shape.rows + (shape.remainderRow ? 1 : 0);
  const rowSegments = splitPercent(area.y, area.height, totalRows);
  const columnSegments = splitPercent(area.x, area.width, shape.columns);
  const cells: Rect[] = [];

  rowSegments.forEach((row, r) => {
    if (shape.remainderRow && r === 0) {
      cells.push({ x: area.x, y: row.start, width: area.width, height: row.size });
      return;
    }
    for (const column of columnSegments) {
      cells.push({ x: column.start, y: row.start, width: column.size, height: row.size });
    }
  });

  return cells;
}
