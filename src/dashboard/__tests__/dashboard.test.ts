import { describe, it, expect, vi } from 'vitest';
import { DashboardPane, renderDashboard, type DashboardLayout } from '../dashboard.js';
import { SeriesStore } from '../../stores/seriesStore.js';
import { CellBuffer } from '../../render/buffer.js';
import { BRAILLE } from '../../render/glyphs.js';

const LAYOUT: DashboardLayout = {
  layout: 'horizontal',
  titles: ['Left'],
  group: false,
  chart: {
    barWidth: 1,
    barGap: 0,
    groupGap: 0,
    glyphs: BRAILLE,
    markerInterval: 30,
    updateInterval: 1000,
  },
};

describe('renderDashboard', () => {
  it('gives each series a cell and a title', () => {
    const store = new SeriesStore(10, 2);
    const buf = new CellBuffer(40, 5);
    const cells = renderDashboard(buf, buf.area, store.getSnapshot(), LAYOUT);

    expect(cells).toEqual([
      { x: 0, y: 0, width: 20, height: 5 },
      { x: 20, y: 0, width: 20, height: 5 },
    ]);
    expect(buf.toLines()[0]).toBe('╭──────────── Left ╮╭───────── Chart 2 ╮');
  });

  it('draws every series into one cell when grouped', () => {
    const store = new SeriesStore(10, 3);
    const buf = new CellBuffer(40, 5);
    const cells = renderDashboard(buf, buf.area, store.getSnapshot(), { ...LAYOUT, group: true, titles: [] });

    expect(cells).toEqual([buf.area]);
    expect(buf.toLines()[0].endsWith(' All series ╮')).toBe(true);
  });
});

describe('DashboardPane', () => {
  it('asks for a render on resize', () => {
    const pane = new DashboardPane(new SeriesStore(10), LAYOUT);
    expect(pane.update({ type: 'resize', width: 10, height: 10 })).toEqual({ type: 'render' });
    expect(pane.update({ type: 'tick' })).toBeUndefined();
  });

  it('freezes and releases its snapshot on pause', () => {
    const pane = new DashboardPane(new SeriesStore(10), LAYOUT);
    pane.update({ type: 'pause' });
    expect(pane.isFrozen).toBe(true);
    pane.update({ type: 'pause' });
    expect(pane.isFrozen).toBe(false);
  });

  it('reports a poisoned pool as an error action', () => {
    const store = new SeriesStore(10);
    expect(() =>
      store.write(() => {
        throw new Error('bad');
      })
    ).toThrow();

    const pane = new DashboardPane(store, LAYOUT);
    const dispatch = vi.fn();
    pane.registerActionHandler(dispatch);
    pane.draw(new CellBuffer(20, 5), { x: 0, y: 0, width: 20, height: 5 });

    expect(dispatch).toHaveBeenCalledWith({ type: 'error', message: 'Failed to draw: Series pool is poisoned: bad' });
    expect(pane.cells).toEqual([]);
  });

  it('rethrows without a dispatcher', () => {
    const store = new SeriesStore(10);
    expect(() =>
      store.write(() => {
        throw new Error('bad');
      })
    ).toThrow();

    const pane = new DashboardPane(store, LAYOUT);
    expect(() => pane.draw(new CellBuffer(20, 5), { x: 0, y: 0, width: 20, height: 5 })).toThrow(
      'Series pool is poisoned: bad'
    );
  });
});
