import { describe, it, expect } from 'vitest';
import { formatEntry, parseLogLevel } from '../logger.js';

describe('logger', () => {
  it('formats entries on one line', () => {
    expect(formatEntry({ timestamp: 'T', level: 'warn', message: 'slow', data: { ms: 5 } })).toBe(
      '[T] [WARN] slow {"ms":5}'
    );
    expect(formatEntry({ timestamp: 'T', level: 'info', message: 'ready' })).toBe('[T] [INFO] ready');
  });

  it('parses levels case-insensitively with info as the fallback', () => {
    expect(parseLogLevel('DEBUG')).toBe('debug');
    expect(parseLogLevel('loud')).toBe('info');
    expect(parseLogLevel(undefined)).toBe('info');
  });
});
