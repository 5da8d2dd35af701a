/**
 * Dashboard orchestration - one frame of every series
 *
 * Per frame: take one snapshot of the pool, lay out one cell per series
 * (in series order) and draw a chart pane into each.
 */

import type { LayoutMode, Rect } from '../types.js';
import type { PoolSnapshot, SeriesStore } from '../stores/seriesStore.js';
import { CellBuffer } from '../render/buffer.js';
import { computeGrid } from '../render/grid.js';
import { describeError } from '../utils/errors.js';
import { log } from '../utils/logger.js';
import type { Action, Dispatch } from './actions.js';
import { drawChartPane, drawGroupedPane, defaultTitle, type ChartStyle } from './chartPane.js';
import type { Pane } from './pane.js';

export interface DashboardLayout {
  layout: LayoutMode;
  titles: readonly string[];
  /** Draw every series in a single grouped chart */
  group: boolean;
  chart: ChartStyle;
}

/**
 * Draw a snapshot into `area`; returns the cells used, in series order
 */
export function renderDashboard(buf: CellBuffer, area: Rect, snapshot: PoolSnapshot, options: DashboardLayout): Rect[] {
  if (options.group) {
    const title = options.titles[0] ?? 'All series';
    drawGroupedPane(buf, area, snapshot.series, title, options.chart);
    return [{ ...area }];
  }

  const cells = computeGrid(snapshot.series.length, options.layout, area);
  cells.forEach((cell, i) => {
    const title = options.titles[i] ?? defaultTitle(i);
    drawChartPane(buf, cell, snapshot.series[i], title, options.chart);
  });
  return cells;
}

/**
 * The charts pane. Reads the shared pool once per draw; a failed read
 * (a poisoned pool) is reported as an error action.
 */
export class DashboardPane implements Pane {
  private dispatch: Dispatch | null = null;
  private lastCells: Rect[] = [];
  // Set while paused: frames keep showing this instead of the live pool
  private frozen: PoolSnapshot | null = null;

  constructor(
    private readonly store: SeriesStore,
    private readonly options: DashboardLayout
  ) {}

  get cells(): readonly Rect[] {
    return this.lastCells;
  }

  get isFrozen(): boolean {
    return this.frozen !== null;
  }

  registerActionHandler(dispatch: Dispatch): void {
    this.dispatch = dispatch;
  }

  update(action: Action): Action | undefined {
    switch (action.type) {
      case 'resize':
        // Cells are recomputed on the next draw
        this.lastCells = [];
        return { type: 'render' };
      case 'pause':
        if (this.frozen) {
          this.frozen = null;
        } else {
          this.frozen = this.readSnapshot();
        }
        return undefined;
      default:
        return undefined;
    }
  }

  draw(buf: CellBuffer, area: Rect): void {
    const snapshot = this.frozen ?? this.readSnapshot();
    if (!snapshot) return;
    this.lastCells = renderDashboard(buf, area, snapshot, this.options);
  }

  private readSnapshot(): PoolSnapshot | null {
    try {
      return this.store.getSnapshot();
    } catch (error) {
      log.error('Failed to read series pool', { error: describeError(error) });
      if (!this.dispatch) throw error;
      this.dispatch({ type: 'error', message: `Failed to draw: ${describeError(error)}` });
      return null;
    }
  }
}
