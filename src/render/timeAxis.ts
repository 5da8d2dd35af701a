import type { CellStyle } from '../types.js';
import { BORDER } from './glyphs.js';

export interface Span {
  text: string;
  style?: CellStyle;
}

export const MARKER_STYLE: CellStyle = { color: 'gray' };

// Markers closer than this to the left edge are dropped
const LEFT_CLEARANCE = 5;

/**
 * Label for a marker `samples` bars back from the newest one
 */
export function elapsedLabel(samples: number, updateInterval: number): string {
  const seconds = (samples * updateInterval) / 1000;
  if (seconds >= 60 && seconds % 60 === 0) return `${seconds / 60}m`;
  return Number.isInteger(seconds) ? `${seconds}s` : `${seconds.toFixed(1)}s`;
}

/**
 * Bottom-border decoration for a chart `width` bars wide, read right to left
 * from the newest bar: every `interval` bars a rule, a branch and a label.
 * Spans come back in left-to-right order, ready to be right-aligned.
 */
export function buildTimeMarkers(
  width: number,
  interval: number,
  label: (samples: number) => string = samples => `${samples}s`
): Span[] {
  if (interval <= 0) return [];

  const spans: Span[] = [];
  let lastLabelWidth = 0;

  for (let t = interval; t <= width - LEFT_CLEARANCE; t += interval) {
    const text = label(t);
    spans.push({ text: BORDER.horizontal.repeat(Math.max(0, interval - lastLabelWidth)) });
    spans.push({ text: BORDER.branch });
    spans.push({ text, style: MARKER_STYLE });
    lastLabelWidth = text.length + 1;
  }

  return spans.reverse();
}
