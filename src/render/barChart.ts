/**
 * Bar chart renderer
 *
 * Bars are quantized to eighths of a cell ("ticks"). Groups are packed along
 * the primary axis as `barWidth` cells per bar, `barGap` after each bar and
 * `groupGap` after each group; whatever does not fit is left out.
 *
 * ```plain
 *                              ⣿⣿⣿
 *                         ⣤⣤⣤ ⣿⣿⣿
 *             ⣶⣶⣶         ⣿⣿⣿ ⣿⣿⣿
 *      ⣀⣀⣀    ⣿⣿⣿ ⣿⣿⣿    ⣿⣿⣿ ⣿⣿⣿
 *  B1   B2     B1   B2     B1   B2
 *  Group1      Group2      Group3
 * ```
 */

import type { CellStyle, Direction, Rect } from '../types.js';
import { CellBuffer, isEmptyRect, patchStyle } from './buffer.js';
import { BRAILLE, TICKS_PER_CELL, glyphForTicks, type GlyphSet } from './glyphs.js';

// =============================================================================
// Types
// =============================================================================

export interface Bar {
  value: number;
  label?: string;
  /** Text drawn instead of the value; an empty string draws nothing */
  textValue?: string;
  style?: CellStyle;
  valueStyle?: CellStyle;
}

export type Alignment = 'left' | 'center' | 'right';

export interface BarGroup {
  label?: string;
  labelAlignment?: Alignment;
  bars: readonly Bar[];
}

export interface BarChartOptions {
  groups: readonly BarGroup[];
  direction?: Direction;
  barWidth?: number;
  barGap?: number;
  groupGap?: number;
  glyphs?: GlyphSet;
  /** Value that maps to a full-length bar; defaults to the largest bar value */
  max?: number;
  barStyle?: CellStyle;
  valueStyle?: CellStyle;
  labelStyle?: CellStyle;
}

export interface LabelInfo {
  groupLabelVisible: boolean;
  barLabelVisible: boolean;
  height: number;
}

// =============================================================================
// Quantization
// =============================================================================

/**
 * Length of a bar in ticks (eighths of a cell), saturating at the available
 * length. Only a value at or above the reference maximum fills it completely.
 */
export function quantize(value: number, availableCells: number, referenceMax: number): number {
  const full = Math.max(0, Math.floor(availableCells)) * TICKS_PER_CELL;
  if (!(value > 0) || full === 0) return 0;
  if (value >= referenceMax) return full;
  const ticks = Math.floor((value * full) / referenceMax);
  return Math.min(ticks, full - 1);
}

function displayValue(bar: Bar): string {
  if (bar.textValue !== undefined) return bar.textValue;
  return Number.isInteger(bar.value) ? String(bar.value) : bar.value.toFixed(1);
}

function textWidth(text: string): number {
  return Array.from(text).length;
}

// =============================================================================
// BarChart
// =============================================================================

export class BarChart {
  readonly groups: readonly BarGroup[];
  readonly direction: Direction;
  readonly barWidth: number;
  readonly barGap: number;
  readonly groupGap: number;
  readonly glyphs: GlyphSet;
  readonly max?: number;
  readonly barStyle: CellStyle;
  readonly valueStyle: CellStyle;
  readonly labelStyle: CellStyle;

  constructor(options: BarChartOptions) {
    // Groups without bars are never materialized
    this.groups = options.groups.filter(group => group.bars.length > 0);
    this.direction = options.direction ?? 'vertical';
    this.barWidth = Math.max(0, Math.floor(options.barWidth ?? 1));
    this.barGap = Math.max(0, Math.floor(options.barGap ?? 1));
    this.groupGap = Math.max(0, Math.floor(options.groupGap ?? 0));
    this.glyphs = options.glyphs ?? BRAILLE;
    this.max = options.max;
    this.barStyle = options.barStyle ?? {};
    this.valueStyle = options.valueStyle ?? {};
    this.labelStyle = options.labelStyle ?? {};
  }

  /**
   * The value mapped to a full-length bar; never below 1
   */
  referenceMax(): number {
    const dataMax = this.groups.reduce(
      (best, group) => group.bars.reduce((m, bar) => Math.max(m, bar.value), best),
      0
    );
    return Math.max(this.max ?? dataMax, 1);
  }

  /**
   * Visible bar lengths in ticks, per group. `availableSpace` is the primary
   * axis (how many bars fit), `barMaxLength` the cross axis (how long a bar
   * can be). Groups that do not fit are omitted; the last one that partly
   * fits is truncated.
   */
  groupTicks(availableSpace: number, barMaxLength: number): number[][] {
    const referenceMax = this.referenceMax();
    const result: number[][] = [];
    let space = availableSpace;

    for (const group of this.groups) {
      if (space <= 0) break;

      const nBars = group.bars.length;
      const groupWidth = nBars * this.barWidth + Math.max(0, nBars - 1) * this.barGap;

      let take: number;
      if (space > groupWidth) {
        take = nBars;
        space = Math.max(0, space - (groupWidth + this.groupGap + this.barGap));
      } else {
        take = Math.floor((space + this.barGap) / (this.barWidth + this.barGap));
        if (take <= 0) break;
        space = 0;
      }

      result.push(group.bars.slice(0, take).map(bar => quantize(bar.value, barMaxLength, referenceMax)));
    }

    return result;
  }

  /**
   * How many rows below the bars go to bar labels and group labels
   */
  labelInfo(availableHeight: number): LabelInfo {
    if (availableHeight <= 0) {
      return { groupLabelVisible: false, barLabelVisible: false, height: 0 };
    }

    const barLabelVisible = this.groups.some(group => group.bars.some(bar => bar.label !== undefined));

    // With one row, bar labels win over the group label
    if (availableHeight === 1 && barLabelVisible) {
      return { groupLabelVisible: false, barLabelVisible: true, height: 1 };
    }

    const groupLabelVisible = this.groups.some(group => group.label !== undefined);
    return {
      groupLabelVisible,
      barLabelVisible,
      height: Number(groupLabelVisible) + Number(barLabelVisible),
    };
  }

  render(buf: CellBuffer, area: Rect): void {
    if (isEmptyRect(area) || this.groups.length === 0 || this.barWidth === 0) {
      return;
    }

    if (this.direction === 'horizontal') {
      this.renderHorizontal(buf, area);
    } else {
      this.renderVertical(buf, area);
    }
  }

  // ---------------------------------------------------------------------------
  // Vertical
  // ---------------------------------------------------------------------------

  private renderVertical(buf: CellBuffer, area: Rect): void {
    const labelInfo = this.labelInfo(area.height - 1);
    const barsArea: Rect = { ...area, height: area.height - labelInfo.height };

    const groupTicks = this.groupTicks(barsArea.width, barsArea.height);
    this.renderVerticalBars(buf, barsArea, groupTicks);
    this.renderLabelsAndValues(buf, area, labelInfo, groupTicks);
  }

  private renderVerticalBars(buf: CellBuffer, area: Rect, groupTicks: number[][]): void {
    let barX = area.x;

    groupTicks.forEach((ticksVec, g) => {
      const group = this.groups[g];
      ticksVec.forEach((barTicks, b) => {
        const style = patchStyle(this.barStyle, group.bars[b].style);
        let ticks = barTicks;
        // Fill from the baseline up; the partial glyph ends up on top
        for (let j = area.height - 1; j >= 0; j--) {
          const symbol = glyphForTicks(this.glyphs, ticks);
          for (let x = 0; x < this.barWidth; x++) {
            buf.set(barX + x, area.y + j, symbol, style);
          }
          ticks = Math.max(0, ticks - TICKS_PER_CELL);
        }
        barX += this.barGap + this.barWidth;
      });
      barX += this.groupGap;
    });
  }

  private renderLabelsAndValues(buf: CellBuffer, area: Rect, labelInfo: LabelInfo, groupTicks: number[][]): void {
    const bottom = area.y + area.height;
    const valueY = bottom - labelInfo.height - 1;
    let barX = area.x;

    groupTicks.forEach((ticksVec, g) => {
      const group = this.groups[g];

      if (labelInfo.groupLabelVisible) {
        const labelWidth = ticksVec.length * (this.barWidth + this.barGap) - this.barGap;
        this.renderGroupLabel(buf, group, { x: barX, y: bottom - 1, width: labelWidth, height: 1 });
      }

      ticksVec.forEach((ticks, b) => {
        const bar = group.bars[b];
        if (labelInfo.barLabelVisible) {
          this.renderBarLabel(buf, bar, barX, valueY + 1);
        }
        this.renderBarValue(buf, bar, barX, valueY, ticks);
        barX += this.barGap + this.barWidth;
      });
      barX += this.groupGap;
    });
  }

  private renderBarLabel(buf: CellBuffer, bar: Bar, x: number, y: number): void {
    if (bar.label === undefined) return;
    const width = Math.min(textWidth(bar.label), this.barWidth);
    const start = x + Math.floor(Math.max(0, this.barWidth - width) / 2);
    buf.setString(start, y, bar.label, this.labelStyle, width);
  }

  /**
   * Value text centred on the bar's bottom row, when it fits inside the bar
   */
  private renderBarValue(buf: CellBuffer, bar: Bar, x: number, y: number, ticks: number): void {
    if (bar.value === 0) return;
    const text = displayValue(bar);
    const width = textWidth(text);
    if (width < this.barWidth || (width === this.barWidth && ticks >= TICKS_PER_CELL)) {
      const start = x + (Math.max(0, this.barWidth - width) >> 1);
      buf.setString(start, y, text, patchStyle(this.valueStyle, bar.valueStyle));
    }
  }

  private renderGroupLabel(buf: CellBuffer, group: BarGroup, area: Rect): void {
    if (group.label === undefined) return;
    const width = Math.min(textWidth(group.label), Math.max(0, area.width));
    let x = area.x;
    if (group.labelAlignment === 'center') {
      x += Math.floor(Math.max(0, area.width - width) / 2);
    } else if (group.labelAlignment === 'right') {
      x += Math.max(0, area.width - width);
    }
    buf.setString(x, area.y, group.label, this.labelStyle, width);
  }

  // ---------------------------------------------------------------------------
  // Horizontal
  // ---------------------------------------------------------------------------

  private renderHorizontal(buf: CellBuffer, area: Rect): void {
    // Left column as wide as the longest bar label, plus one cell of margin
    const labelSize = this.groups.reduce(
      (widest, group) => group.bars.reduce((w, bar) => Math.max(w, bar.label ? textWidth(bar.label) : 0), widest),
      0
    );
    const margin = labelSize !== 0 ? 1 : 0;
    const barsArea: Rect = {
      ...area,
      x: area.x + labelSize + margin,
      width: area.width - labelSize - margin,
    };
    if (isEmptyRect(barsArea)) return;

    const bottom = barsArea.y + barsArea.height;
    const groupTicks = this.groupTicks(barsArea.height, barsArea.width);
    let barY = barsArea.y;

    groupTicks.forEach((ticksVec, g) => {
      const group = this.groups[g];

      ticksVec.forEach((ticks, b) => {
        const bar = group.bars[b];
        const barLength = Math.floor(ticks / TICKS_PER_CELL);
        const style = patchStyle(this.barStyle, bar.style);

        for (let y = 0; y < this.barWidth; y++) {
          for (let x = 0; x < barsArea.width; x++) {
            buf.set(barsArea.x + x, barY + y, x < barLength ? this.glyphs[8] : this.glyphs[0], style);
          }
        }

        const textY = barY + (this.barWidth >> 1);
        if (bar.label !== undefined) {
          buf.setString(area.x, textY, bar.label, this.labelStyle, labelSize);
        }
        this.renderHorizontalValue(buf, bar, barsArea, textY, barLength);

        barY += this.barGap + this.barWidth;
      });

      // Without a group gap there is no row for the group label
      const labelY = barY - this.barGap;
      if (this.groupGap > 0 && labelY < bottom) {
        this.renderGroupLabel(buf, group, { ...barsArea, y: labelY, height: 1 });
      }
      barY += this.groupGap;
    });
  }

  /**
   * Value text at the start of the bar: the part over the bar in the value
   * style, the overflow in the bar style
   */
  private renderHorizontalValue(buf: CellBuffer, bar: Bar, barsArea: Rect, y: number, barLength: number): void {
    const text = displayValue(bar);
    if (text === '') return;
    const chars = Array.from(text);
    const inside = chars.slice(0, barLength).join('');
    const outside = chars.slice(barLength).join('');

    buf.setString(barsArea.x, y, inside, patchStyle(this.valueStyle, bar.valueStyle));
    if (outside !== '') {
      const offset = textWidth(inside);
      buf.setString(barsArea.x + offset, y, outside, patchStyle(this.barStyle, bar.style), barsArea.width - offset);
    }
  }
}
