/**
 * CellBuffer - a width x height grid of styled terminal cells
 *
 * All chart rendering writes here; the Ink layer only turns finished rows
 * into <Text> runs. Writes outside the buffer are clipped.
 */

import type { CellStyle, Rect } from '../types.js';

export interface Cell {
  symbol: string;
  style: CellStyle;
}

export interface StyledRun {
  text: string;
  style: CellStyle;
}

const EMPTY_STYLE: CellStyle = Object.freeze({});

export function sameStyle(a: CellStyle, b: CellStyle): boolean {
  return a.color === b.color && !!a.dim === !!b.dim && !!a.bold === !!b.bold;
}

/**
 * Overlay `patch` onto `base`; fields set in the patch win
 */
export function patchStyle(base: CellStyle, patch: CellStyle | undefined): CellStyle {
  if (!patch) return base;
  return {
    color: patch.color ?? base.color,
    dim: patch.dim ?? base.dim,
    bold: patch.bold ?? base.bold,
  };
}

export class CellBuffer {
  readonly width: number;
  readonly height: number;
  private readonly cells: Cell[];

  constructor(width: number, height: number) {
    this.width = Math.max(0, Math.floor(width));
    this.height = Math.max(0, Math.floor(height));
    this.cells = Array.from({ length: this.width * this.height }, () => ({ symbol: ' ', style: EMPTY_STYLE }));
  }

  get area(): Rect {
    return { x: 0, y: 0, width: this.width, height: this.height };
  }

  inBounds(x: number, y: number): boolean {
    return x >= 0 && y >= 0 && x < this.width && y < this.height;
  }

  get(x: number, y: number): Cell | undefined {
    if (!this.inBounds(x, y)) return undefined;
    return this.cells[y * this.width + x];
  }

  set(x: number, y: number, symbol: string, style?: CellStyle): void {
    if (!this.inBounds(x, y)) return;
    const cell = this.cells[y * this.width + x];
    cell.symbol = symbol;
    cell.style = patchStyle(cell.style, style);
  }

  /**
   * Write a string left to right, one character per cell, stopping after
   * `maxWidth` cells. Returns the x just past the last cell written.
   */
  setString(x: number, y: number, text: string, style?: CellStyle, maxWidth = Infinity): number {
    let cursor = x;
    for (const ch of text) {
      if (cursor - x >= maxWidth) break;
      this.set(cursor, y, ch, style);
      cursor++;
    }
    return cursor;
  }

  /**
   * Reset every cell of `rect` to a blank, unstyled cell
   */
  clear(rect: Rect): void {
    for (let y = rect.y; y < rect.y + rect.height; y++) {
      for (let x = rect.x; x < rect.x + rect.width; x++) {
        const cell = this.get(x, y);
        if (cell) {
          cell.symbol = ' ';
          cell.style = EMPTY_STYLE;
        }
      }
    }
  }

  toLines(): string[] {
    const lines: string[] = [];
    for (let y = 0; y < this.height; y++) {
      let line = '';
      for (let x = 0; x < this.width; x++) {
        line += this.cells[y * this.width + x].symbol;
      }
      lines.push(line);
    }
    return lines;
  }

  /**
   * Rows split into runs of equal style
   */
  toRuns(): StyledRun[][] {
    const rows: StyledRun[][] = [];
    for (let y = 0; y < this.height; y++) {
      const runs: StyledRun[] = [];
      for (let x = 0; x < this.width; x++) {
        const cell = this.cells[y * this.width + x];
        const last = runs[runs.length - 1];
        if (last && sameStyle(last.style, cell.style)) {
          last.text += cell.symbol;
        } else {
          runs.push({ text: cell.symbol, style: cell.style });
        }
      }
      rows.push(runs);
    }
    return rows;
  }
}

// =============================================================================
// Rect helpers
// =============================================================================

export function isEmptyRect(rect: Rect): boolean {
  return rect.width <= 0 || rect.height <= 0;
}

/**
 * Shrink a rect by `margin` cells on every side
 */
export function innerRect(rect: Rect, margin = 1): Rect {
  return {
    x: rect.x + margin,
    y: rect.y + margin,
    width: Math.max(0, rect.width - margin * 2),
    height: Math.max(0, rect.height - margin * 2),
  };
}
