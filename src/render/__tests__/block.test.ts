import { describe, it, expect } from 'vitest';
import { drawBlock, drawRightAligned } from '../block.js';
import { CellBuffer } from '../buffer.js';

describe('drawBlock', () => {
  it('draws a rounded border with a right-aligned title', () => {
    const buf = new CellBuffer(6, 3);
    const inner = drawBlock(buf, buf.area, { title: 'ab' });

    expect(buf.toLines()).toEqual(['╭──ab╮', '│    │', '╰────╯']);
    expect(inner).toEqual({ x: 1, y: 1, width: 4, height: 1 });
  });

  it('draws bottom spans on the bottom border', () => {
    const buf = new CellBuffer(6, 2);
    const inner = drawBlock(buf, buf.area, { bottom: [{ text: 'x' }] });

    expect(buf.toLines()).toEqual(['╭────╮', '╰───x╯']);
    expect(inner).toEqual({ x: 1, y: 1, width: 0, height: 0 });
  });
});

describe('drawRightAligned', () => {
  it('clips spans that would start left of the bound', () => {
    const buf = new CellBuffer(5, 1);
    drawRightAligned(buf, 2, 5, 0, [{ text: 'abcd' }]);
    expect(buf.toLines()).toEqual(['  bcd']);
  });
});
