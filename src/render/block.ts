import type { CellStyle, Rect } from '../types.js';
import { CellBuffer, innerRect, isEmptyRect } from './buffer.js';
import { BORDER } from './glyphs.js';
import type { Span } from './timeAxis.js';

export interface BlockOptions {
  /** Right-aligned on the top border */
  title?: string;
  titleStyle?: CellStyle;
  /** Right-aligned on the bottom border */
  bottom?: readonly Span[];
  borderStyle?: CellStyle;
}

/**
 * Draw spans ending at `right` (exclusive), dropping whatever would
 * start left of `left`
 */
export function drawRightAligned(buf: CellBuffer, left: number, right: number, y: number, spans: readonly Span[]): void {
  const chars: Array<{ ch: string; style?: CellStyle }> = [];
  for (const span of spans) {
    for (const ch of span.text) {
      chars.push({ ch, style: span.style });
    }
  }

  let x = right - chars.length;
  for (const { ch, style } of chars) {
    if (x >= left) {
      buf.set(x, y, ch, style);
    }
    x++;
  }
}

/**
 * Rounded border with optional titles; returns the inner area
 */
export function drawBlock(buf: CellBuffer, area: Rect, options: BlockOptions = {}): Rect {
  if (area.width < 2 || area.height < 2) {
    return innerRect(area);
  }

  const style = options.borderStyle;
  const right = area.x + area.width - 1;
  const bottom = area.y + area.height - 1;

  for (let x = area.x + 1; x < right; x++) {
    buf.set(x, area.y, BORDER.horizontal, style);
    buf.set(x, bottom, BORDER.horizontal, style);
  }
  for (let y = area.y + 1; y < bottom; y++) {
    buf.set(area.x, y, BORDER.vertical, style);
    buf.set(right, y, BORDER.vertical, style);
  }
  buf.set(area.x, area.y, BORDER.topLeft, style);
  buf.set(right, area.y, BORDER.topRight, style);
  buf.set(area.x, bottom, BORDER.bottomLeft, style);
  buf.set(right, bottom, BORDER.bottomRight, style);

  if (options.title) {
    drawRightAligned(buf, area.x + 1, right, area.y, [{ text: options.title, style: options.titleStyle }]);
  }
  if (options.bottom && options.bottom.length > 0) {
    drawRightAligned(buf, area.x + 1, right, bottom, options.bottom);
  }

  const inner = innerRect(area);
  return isEmptyRect(inner) ? { ...inner, width: 0, height: 0 } : inner;
}
