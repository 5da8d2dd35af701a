import type { Rect } from '../types.js';
import type { CellBuffer } from '../render/buffer.js';
import { drawRightAligned } from '../render/block.js';
import { formatRate } from '../utils/format.js';
import type { Action, Dispatch } from './actions.js';

/**
 * Everything drawn on screen is a pane: it gets a way to emit actions,
 * sees every action the app processes, and draws into its area each frame.
 */
export interface Pane {
  registerActionHandler(dispatch: Dispatch): void;
  /** React to an action; may answer with a follow-up action */
  update(action: Action): Action | undefined;
  draw(buf: CellBuffer, area: Rect): void;
}

// =============================================================================
// FPS counter
// =============================================================================

const RATE_WINDOW_MS = 1000;

/**
 * Ticks and frames per second, drawn over the top-right corner.
 * Hidden until toggled on.
 */
export class FpsPane implements Pane {
  private dispatch: Dispatch | null = null;
  private visible = false;

  private tickWindowStart: number;
  private ticks = 0;
  private tickRate = 0;

  private frameWindowStart: number;
  private frames = 0;
  private frameRate = 0;

  constructor(private readonly now: () => number = Date.now) {
    this.tickWindowStart = now();
    this.frameWindowStart = now();
  }

  get isVisible(): boolean {
    return this.visible;
  }

  get rates(): { ticks: number; frames: number } {
    return { ticks: this.tickRate, frames: this.frameRate };
  }

  registerActionHandler(dispatch: Dispatch): void {
    this.dispatch = dispatch;
  }

  update(action: Action): Action | undefined {
    switch (action.type) {
      case 'tick':
        this.countTick();
        return undefined;
      case 'render':
        this.countFrame();
        return undefined;
      case 'toggle-fps':
        this.visible = !this.visible;
        // Redraw right away so the toggle shows even while paused
        this.dispatch?.({ type: 'render' });
        return undefined;
      default:
        return undefined;
    }
  }

  draw(buf: CellBuffer, area: Rect): void {
    if (!this.visible || area.height < 1) return;
    const text = ` ${formatRate(this.tickRate)} ticks/s ${formatRate(this.frameRate)} fps `;
    drawRightAligned(buf, area.x, area.x + area.width - 1, area.y, [{ text, style: { color: 'yellow', bold: true } }]);
  }

  private countTick(): void {
    this.ticks++;
    const now = this.now();
    const elapsed = now - this.tickWindowStart;
    if (elapsed >= RATE_WINDOW_MS) {
      this.tickRate = (this.ticks * 1000) / elapsed;
      this.ticks = 0;
      this.tickWindowStart = now;
    }
  }

  private countFrame(): void {
    this.frames++;
    const now = this.now();
    const elapsed = now - this.frameWindowStart;
    if (elapsed >= RATE_WINDOW_MS) {
      this.frameRate = (this.frames * 1000) / elapsed;
      this.frames = 0;
      this.frameWindowStart = now;
    }
  }
}
