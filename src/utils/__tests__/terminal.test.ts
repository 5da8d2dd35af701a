import { describe, it, expect } from 'vitest';
import { validateTerminal } from '../terminal.js';

describe('validateTerminal', () => {
  const ok = { width: 80, height: 24, isTTY: true, term: 'xterm-256color' };

  it('accepts a regular terminal', () => {
    expect(validateTerminal(ok)).toBeNull();
  });

  it('warns when output is not a terminal', () => {
    expect(validateTerminal({ ...ok, isTTY: false })).toBe(
      'Standard output is not a terminal; the dashboard will not display correctly.'
    );
  });

  it('warns on a dumb terminal', () => {
    expect(validateTerminal({ ...ok, term: 'dumb' })).toContain('TERM=dumb');
  });

  it('warns below the minimum size', () => {
    expect(validateTerminal({ ...ok, width: 8 })).toBe('Terminal too small (8x24, need 10x4). Resize your terminal.');
  });
});
