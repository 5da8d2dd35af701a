import { describe, it, expect } from 'vitest';
import { barValue, defaultTitle, drawChartPane, drawGroupedPane, visibleBarCount, type ChartStyle } from '../chartPane.js';
import { Series, type SeriesSnapshot } from '../../stores/series.js';
import { CellBuffer } from '../../render/buffer.js';
import { BRAILLE } from '../../render/glyphs.js';

const STYLE: ChartStyle = {
  barWidth: 1,
  barGap: 0,
  groupGap: 0,
  glyphs: BRAILLE,
  markerInterval: 30,
  updateInterval: 1000,
};

function snapshotOf(values: number[], unit = ''): SeriesSnapshot {
  const series = new Series(16);
  series.unit = unit;
  values.forEach(v => series.push(v));
  return series.snapshot();
}

describe('helpers', () => {
  it('numbers default titles from one', () => {
    expect(defaultTitle(0)).toBe('Chart 1');
  });

  it('draws negative and non-finite samples as empty bars', () => {
    expect(barValue(3)).toBe(3);
    expect(barValue(-1)).toBe(0);
    expect(barValue(NaN)).toBe(0);
    expect(barValue(Infinity)).toBe(0);
  });

  it('counts how many bars fit', () => {
    expect(visibleBarCount(10, 2, 1)).toBe(3);
    expect(visibleBarCount(10, 1, 0)).toBe(10);
    expect(visibleBarCount(0, 1, 0)).toBe(0);
  });
});

describe('drawChartPane', () => {
  it('draws the frame, summary and right-aligned bars', () => {
    const buf = new CellBuffer(44, 6);
    drawChartPane(buf, buf.area, snapshotOf([5, 3, 8, 1], 'ms'), 'CPU', STYLE);
    const lines = buf.toLines();

    expect(lines[0].endsWith(' CPU ╮')).toBe(true);
    expect(lines[1].slice(3, 41)).toBe('Avg: 4.25 ms Min: 1.00 ms Max: 8.00 ms');
    expect(lines[2].slice(39, 43)).toBe('  ⣿ ');
    expect(lines[3].slice(39, 43)).toBe('⣾⢀⣿ ');
    expect(lines[4].slice(39, 43)).toBe('⣿⣿⣿⣠');
    expect(lines[5]).toBe('╰' + '─'.repeat(8) + '30s├' + '─'.repeat(30) + '╯');
  });

  it('summarizes only the visible window', () => {
    const buf = new CellBuffer(34, 4);
    // Four bars of width 8 fit in the 32 inner columns, so 100 is left out
    drawChartPane(buf, buf.area, snapshotOf([100, 1, 2, 3, 4]), 'x', { ...STYLE, barWidth: 8 });
    expect(buf.toLines()[1].slice(3, 32)).toBe('Avg: 2.50 Min: 1.00 Max: 4.00');
  });

  it('waits for the first sample', () => {
    const buf = new CellBuffer(30, 4);
    drawChartPane(buf, buf.area, snapshotOf([]), 'Idle', STYLE);
    expect(buf.toLines()[1]).toBe('│  Waiting for data          │');
  });

  it('skips cells too small for a border', () => {
    const buf = new CellBuffer(2, 5);
    drawChartPane(buf, buf.area, snapshotOf([1]), 'x', STYLE);
    expect(buf.toLines()).toEqual(['  ', '  ', '  ', '  ', '  ']);
  });
});

describe('drawGroupedPane', () => {
  it('draws one colored bar per series at each time step', () => {
    const buf = new CellBuffer(12, 4);
    drawGroupedPane(buf, buf.area, [snapshotOf([8, 8]), snapshotOf([8, 8])], 'All', { ...STYLE, barGap: 0 });

    // Two steps of two bars each, right-aligned against the border
    expect(buf.toLines()[2]).toBe('│      ⣿⣿⣿⣿│');
    expect(buf.get(7, 2)?.style.color).toBe('green');
    expect(buf.get(8, 2)?.style.color).toBe('cyan');
  });
});
