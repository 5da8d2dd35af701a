/**
 * Drawing for one chart pane: border, title, time markers, summary row, bars
 */

import type { CellStyle, Rect } from '../types.js';
import type { SeriesSnapshot } from '../stores/series.js';
import { windowStats } from '../stores/series.js';
import { CellBuffer, isEmptyRect } from '../render/buffer.js';
import { BarChart, type Bar, type BarGroup } from '../render/barChart.js';
import { drawBlock } from '../render/block.js';
import { buildTimeMarkers, elapsedLabel } from '../render/timeAxis.js';
import type { GlyphSet } from '../render/glyphs.js';
import { formatSummary, truncate } from '../utils/format.js';

export interface ChartStyle {
  barWidth: number;
  barGap: number;
  groupGap: number;
  glyphs: GlyphSet;
  max?: number;
  markerInterval: number;
  updateInterval: number;
}

export const BAR_STYLE: CellStyle = { color: 'green' };
export const SUMMARY_STYLE: CellStyle = { dim: true };
export const BORDER_STYLE: CellStyle = { color: 'gray' };

// Colors cycled through for series sharing one grouped chart
export const SERIES_COLORS = ['green', 'cyan', 'yellow', 'magenta', 'blue', 'red'] as const;

const SUMMARY_PADDING = 2;

export function defaultTitle(index: number): string {
  return `Chart ${index + 1}`;
}

/**
 * Samples render as non-negative bars; negative and non-finite values
 * draw as empty bars (the statistics still see them)
 */
export function barValue(sample: number): number {
  return Number.isFinite(sample) && sample > 0 ? sample : 0;
}

/**
 * How many bars of `barWidth` plus `barGap` fit in `width` cells
 */
export function visibleBarCount(width: number, barWidth: number, barGap: number): number {
  if (width <= 0 || barWidth <= 0) return 0;
  return Math.floor((width + barGap) / (barWidth + barGap));
}

function drawSummary(buf: CellBuffer, inner: Rect, text: string): void {
  const width = inner.width - SUMMARY_PADDING;
  if (width <= 0) return;
  buf.setString(inner.x + SUMMARY_PADDING, inner.y, truncate(text, width), SUMMARY_STYLE);
}

function drawFrame(buf: CellBuffer, cell: Rect, title: string, style: ChartStyle, stride: number): Rect {
  const innerWidth = Math.max(0, cell.width - 2);
  const markers = buildTimeMarkers(innerWidth, style.markerInterval * stride, cells =>
    elapsedLabel(cells / stride, style.updateInterval)
  );
  return drawBlock(buf, cell, {
    title: ` ${title} `,
    titleStyle: { bold: true },
    bottom: markers,
    borderStyle: BORDER_STYLE,
  });
}

/**
 * Bars area below the summary row, narrowed so the newest bar sits at the
 * right edge where the time markers count from
 */
function barsArea(inner: Rect, usedWidth: number): Rect {
  const area: Rect = { x: inner.x, y: inner.y + 1, width: inner.width, height: inner.height - 1 };
  const offset = Math.max(0, area.width - usedWidth);
  return { ...area, x: area.x + offset, width: area.width - offset };
}

/**
 * One series in one cell. The window is clipped to the most recent samples
 * that fit, and the summary covers that visible window only.
 */
export function drawChartPane(
  buf: CellBuffer,
  cell: Rect,
  series: SeriesSnapshot,
  title: string,
  style: ChartStyle
): void {
  if (cell.width < 3 || cell.height < 3 || style.barWidth <= 0) return;

  const inner = drawFrame(buf, cell, title, style, style.barWidth + style.barGap);
  if (isEmptyRect(inner)) return;

  const count = visibleBarCount(inner.width, style.barWidth, style.barGap);
  const visible = count > 0 ? series.values.slice(-count) : [];

  if (visible.length === 0) {
    drawSummary(buf, inner, 'Waiting for data');
    return;
  }
  drawSummary(buf, inner, formatSummary(windowStats(visible), series.unit));

  const bars: Bar[] = visible.map(sample => ({ value: barValue(sample), textValue: '' }));
  const used = bars.length * (style.barWidth + style.barGap) - style.barGap;
  const area = barsArea(inner, used);
  if (isEmptyRect(area)) return;

  new BarChart({
    groups: [{ bars }],
    barWidth: style.barWidth,
    barGap: style.barGap,
    groupGap: style.groupGap,
    glyphs: style.glyphs,
    max: style.max,
    barStyle: BAR_STYLE,
  }).render(buf, area);
}

/**
 * All series in one cell: one group per point in time, one colored bar per
 * series inside each group
 */
export function drawGroupedPane(
  buf: CellBuffer,
  cell: Rect,
  series: readonly SeriesSnapshot[],
  title: string,
  style: ChartStyle
): void {
  if (cell.width < 3 || cell.height < 3 || style.barWidth <= 0 || series.length === 0) return;

  const perGroup = series.length;
  const groupWidth = perGroup * style.barWidth + (perGroup - 1) * style.barGap;
  // Every group is followed by groupGap, and by barGap before the next one
  const groupStride = groupWidth + style.groupGap + style.barGap;

  const inner = drawFrame(buf, cell, title, style, groupStride);
  if (isEmptyRect(inner)) return;

  const longest = Math.max(...series.map(s => s.values.length));
  const fit = Math.floor((inner.width + style.groupGap + style.barGap) / groupStride);
  const steps = Math.min(longest, fit);

  if (steps === 0) {
    drawSummary(buf, inner, 'Waiting for data');
    return;
  }

  const summary = series
    .map((s, i) => `${i + 1}: ${formatSummary(windowStats(s.values.slice(-steps)), s.unit)}`)
    .join(' | ');
  drawSummary(buf, inner, summary);

  // Series are right-aligned in time: the newest sample of each is the last group
  const groups: BarGroup[] = [];
  for (let step = 0; step < steps; step++) {
    const back = steps - step;
    groups.push({
      bars: series.map((s, i) => ({
        value: barValue(s.values[s.values.length - back] ?? 0),
        textValue: '',
        style: { color: SERIES_COLORS[i % SERIES_COLORS.length] },
      })),
    });
  }

  const used = steps * groupStride - style.groupGap - style.barGap;
  const area = barsArea(inner, used);
  if (isEmptyRect(area)) return;

  new BarChart({
    groups,
    barWidth: style.barWidth,
    barGap: style.barGap,
    groupGap: style.groupGap,
    glyphs: style.glyphs,
    max: style.max,
    barStyle: BAR_STYLE,
  }).render(buf, area);
}
