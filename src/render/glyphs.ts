import type { GlyphSetName } from '../types.js';

/**
 * Nine fill levels for one cell: index 0 is empty, index 8 is full,
 * index n is n/8 of the cell.
 */
export type GlyphSet = readonly [string, string, string, string, string, string, string, string, string];

export const BRAILLE: GlyphSet = [' ', '⢀', '⣀', '⣠', '⣤', '⣴', '⣶', '⣾', '⣿'];

export const BLOCKS: GlyphSet = [' ', '▁', '▂', '▃', '▄', '▅', '▆', '▇', '█'];

export const GLYPH_SETS: Record<GlyphSetName, GlyphSet> = {
  braille: BRAILLE,
  blocks: BLOCKS,
};

export const TICKS_PER_CELL = 8;

/**
 * Glyph for the cell that still has `ticks` left to fill
 */
export function glyphForTicks(set: GlyphSet, ticks: number): string {
  if (ticks <= 0) return set[0];
  if (ticks >= TICKS_PER_CELL) return set[8];
  return set[ticks];
}

// Border pieces
export const BORDER = {
  topLeft: '╭',
  topRight: '╮',
  bottomLeft: '╰',
  bottomRight: '╯',
  horizontal: '─',
  vertical: '│',
  branch: '├',
} as const;
