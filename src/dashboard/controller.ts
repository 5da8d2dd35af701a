/**
 * Dashboard controller - the action loop behind the Ink app
 *
 * Actions are queued and processed one at a time: the controller applies
 * its own state change, then hands the action to every pane, queueing any
 * follow-up a pane returns or dispatches. State is exposed through
 * subscribe/getState so React reads it with useSyncExternalStore.
 */

import type { Rect } from '../types.js';
import type { SeriesStore } from '../stores/seriesStore.js';
import { CellBuffer, type StyledRun } from '../render/buffer.js';
import { drawBlock } from '../render/block.js';
import { log } from '../utils/logger.js';
import { isFrequent, type Action } from './actions.js';
import { DashboardPane, type DashboardLayout } from './dashboard.js';
import { FpsPane, type Pane } from './pane.js';
import { KeyBindings, defaultKeyBindings } from './keybindings.js';
import { KEYBOARD_SHORTCUTS } from '../help/commands.js';
import { padRight } from '../utils/format.js';

export const MIN_WIDTH = 10;
export const MIN_HEIGHT = 4;

export interface ControllerState {
  width: number;
  height: number;
  paused: boolean;
  showHelp: boolean;
  quitting: boolean;
  error: string | null;
  /** Styled rows of the last rendered frame */
  frame: StyledRun[][];
  /** Incremented on every rendered frame and on clear-screen */
  frameCount: number;
}

export interface ControllerOptions {
  store: SeriesStore;
  layout: DashboardLayout;
  width: number;
  height: number;
  keyBindings?: KeyBindings;
  now?: () => number;
}

export class DashboardController {
  readonly keyBindings: KeyBindings;
  readonly panes: readonly Pane[];
  readonly fps: FpsPane;

  private state: ControllerState;
  private queue: Action[] = [];
  private processing = false;
  private listeners: Set<() => void> = new Set();

  constructor(options: ControllerOptions) {
    this.keyBindings = options.keyBindings ?? defaultKeyBindings();
    this.fps = new FpsPane(options.now);
    this.panes = [new DashboardPane(options.store, options.layout), this.fps];

    this.state = {
      width: options.width,
      height: options.height,
      paused: false,
      showHelp: false,
      quitting: false,
      error: null,
      frame: [],
      frameCount: 0,
    };

    const dispatch = (action: Action) => this.dispatch(action);
    for (const pane of this.panes) {
      pane.registerActionHandler(dispatch);
    }
  }

  // ---------------------------------------------------------------------------
  // State Access
  // ---------------------------------------------------------------------------

  getState(): ControllerState {
    return this.state;
  }

  subscribe(listener: () => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // ---------------------------------------------------------------------------
  // Actions
  // ---------------------------------------------------------------------------

  /**
   * Feed a key name through the bindings
   */
  handleKey(key: string): void {
    const action = this.keyBindings.press(key);
    if (action) {
      log.info('Key bound action', { key, action: action.type });
      this.dispatch(action);
    }
  }

  dispatch(action: Action): void {
    this.queue.push(action);
    if (this.processing) return;

    this.processing = true;
    const before = this.state;
    try {
      let next = this.queue.shift();
      while (next) {
        this.process(next);
        next = this.queue.shift();
      }
    } finally {
      this.processing = false;
    }

    if (this.state !== before) {
      this.listeners.forEach((listener) => listener());
    }
  }

  private process(action: Action): void {
    if (!isFrequent(action)) {
      log.debug('Action', action);
    }

    switch (action.type) {
      case 'tick':
        this.keyBindings.clearPending();
        break;
      case 'render':
        this.render();
        break;
      case 'resize':
        this.setState({ width: action.width, height: action.height });
        break;
      case 'quit':
        this.setState({ quitting: true });
        break;
      case 'pause':
        this.setState({ paused: !this.state.paused });
        this.queue.push({ type: 'render' });
        break;
      case 'toggle-help':
        this.setState({ showHelp: !this.state.showHelp });
        this.queue.push({ type: 'render' });
        break;
      case 'clear-screen':
        this.setState({ frame: [], frameCount: this.state.frameCount + 1 });
        this.queue.push({ type: 'render' });
        break;
      case 'error':
        log.error(action.message);
        this.setState({ error: action.message, quitting: true });
        break;
    }

    for (const pane of this.panes) {
      const followUp = pane.update(action);
      if (followUp) {
        this.queue.push(followUp);
      }
    }
  }

  private setState(patch: Partial<ControllerState>): void {
    this.state = { ...this.state, ...patch };
  }

  // ---------------------------------------------------------------------------
  // Drawing
  // ---------------------------------------------------------------------------

  /**
   * Compose one frame. While paused the chart pane draws its frozen
   * snapshot, so only the overlays change.
   */
  private render(): void {
    if (this.state.quitting) return;

    const buf = new CellBuffer(this.state.width, this.state.height);
    const area = buf.area;

    if (area.width < MIN_WIDTH || area.height < MIN_HEIGHT) {
      buf.setString(0, 0, 'Terminal too small', { color: 'yellow' });
    } else {
      for (const pane of this.panes) {
        pane.draw(buf, area);
      }
      if (this.state.paused) {
        buf.setString(area.x + 1, area.y, ' PAUSED ', { color: 'yellow', bold: true });
      }
      if (this.state.showHelp) {
        this.drawHelp(buf, area);
      }
    }

    this.setState({ frame: buf.toRuns(), frameCount: this.state.frameCount + 1 });
  }

  private drawHelp(buf: CellBuffer, area: Rect): void {
    const lines = KEYBOARD_SHORTCUTS.map(s => `${padRight(s.key, 8)} ${s.description}`);
    const width = Math.min(area.width, Math.max(...lines.map(l => l.length)) + 4);
    const height = Math.min(area.height, lines.length + 2);
    const box: Rect = {
      x: area.x + Math.floor((area.width - width) / 2),
      y: area.y + Math.floor((area.height - height) / 2),
      width,
      height,
    };

    buf.clear(box);
    const inner = drawBlock(buf, box, { title: ' Keys ', borderStyle: { color: 'cyan' } });
    lines.slice(0, inner.height).forEach((line, i) => {
      buf.setString(inner.x + 1, inner.y + i, line, {}, inner.width - 1);
    });
  }
}
