import { describe, it, expect } from 'vitest';
import { createRouter, parseNumberToken } from '../router.js';
import { SeriesStore } from '../../stores/seriesStore.js';
import { ConfigError } from '../../utils/errors.js';

describe('parseNumberToken', () => {
  it('accepts decimal numbers', () => {
    expect(parseNumberToken('42')).toBe(42);
    expect(parseNumberToken('-3.5')).toBe(-3.5);
    expect(parseNumberToken('.25')).toBe(0.25);
    expect(parseNumberToken('1e3')).toBe(1000);
  });

  it('accepts infinity and NaN spellings in any case', () => {
    expect(parseNumberToken('inf')).toBe(Infinity);
    expect(parseNumberToken('-INF')).toBe(-Infinity);
    expect(parseNumberToken('+Infinity')).toBe(Infinity);
    expect(parseNumberToken('-infinity')).toBe(-Infinity);
    expect(parseNumberToken('NaN')).toBeNaN();
    expect(parseNumberToken('-nan')).toBeNaN();
    expect(parseNumberToken('infin')).toBeUndefined();
  });

  it('rejects anything else', () => {
    expect(parseNumberToken('')).toBeUndefined();
    expect(parseNumberToken('0x10')).toBeUndefined();
    expect(parseNumberToken('12ms')).toBeUndefined();
    expect(parseNumberToken('10%')).toBeUndefined();
  });
});

describe('createRouter', () => {
  describe('units', () => {
    it('picks the number tagged with the unit only', () => {
      const router = createRouter({ kind: 'units', units: ['ms'] });
      const store = new SeriesStore(10, router.initialSlots);

      const recorded = store.write(writer => router.route('Response: 42.5 ms, cpu 10%', writer));

      expect(recorded).toBe(1);
      const [series] = store.getSnapshot().series;
      expect(series.values).toEqual([42.5]);
      expect(series.unit).toBe('ms');
    });

    it('gives each unit its own slot', () => {
      const router = createRouter({ kind: 'units', units: ['ms', 'kb'] });
      expect(router.initialSlots).toBe(2);
      expect(router.extract('size 12kb took 3 ms')).toEqual([
        { slot: 0, value: 3, unit: 'ms' },
        { slot: 1, value: 12, unit: 'kb' },
      ]);
    });

    it('requires the unit to end at a word boundary', () => {
      const router = createRouter({ kind: 'units', units: ['m'] });
      expect(router.extract('5 ms')).toEqual([]);
      expect(router.extract('5 m')).toEqual([{ slot: 0, value: 5, unit: 'm' }]);
    });

    it('fails on an empty unit list or label', () => {
      expect(() => createRouter({ kind: 'units', units: [] })).toThrow(ConfigError);
      expect(() => createRouter({ kind: 'units', units: [' '] })).toThrow(ConfigError);
    });

    it('fails on a unit that is not a valid regex fragment', () => {
      expect(() => createRouter({ kind: 'units', units: ['ms('] })).toThrow(ConfigError);
    });
  });

  describe('patterns', () => {
    it('records the first capture group of each pattern', () => {
      const router = createRouter({
        kind: 'patterns',
        patterns: [
          { name: 'rps', regex: '([0-9.]+) req/s' },
          { name: 'err', regex: 'errors=(\\d+)' },
        ],
      });
      expect(router.extract('120.5 req/s errors=3')).toEqual([
        { slot: 0, value: 120.5, unit: undefined },
        { slot: 1, value: 3, unit: undefined },
      ]);
      expect(router.extract('errors=7')).toEqual([{ slot: 1, value: 7, unit: undefined }]);
    });

    it('skips a capture that is not a number', () => {
      const router = createRouter({ kind: 'patterns', patterns: [{ name: 'v', regex: 'v=(\\S+)' }] });
      expect(router.extract('v=abc')).toEqual([]);
    });

    it('fails on a pattern without a capture group', () => {
      expect(() => createRouter({ kind: 'patterns', patterns: [{ name: 'bad', regex: '\\d+' }] })).toThrow(
        'Pattern "bad" needs a capture group for the value'
      );
    });

    it('fails on an invalid regex', () => {
      expect(() => createRouter({ kind: 'patterns', patterns: [{ name: 'bad', regex: '([0-9]' }] })).toThrow(
        ConfigError
      );
    });
  });

  describe('positional', () => {
    it('maps every number on the line to successive slots', () => {
      const router = createRouter({ kind: 'positional' });
      expect(router.initialSlots).toBe(1);
      expect(router.extract('  1 foo 2.5\t-3 ')).toEqual([
        { slot: 0, value: 1 },
        { slot: 1, value: 2.5 },
        { slot: 2, value: -3 },
      ]);
    });

    it('keeps non-finite tokens in their own slots', () => {
      const router = createRouter({ kind: 'positional' });
      expect(router.extract('inf 3 NaN')).toEqual([
        { slot: 0, value: Infinity },
        { slot: 1, value: 3 },
        { slot: 2, value: NaN },
      ]);
    });

    it('picks numbers by 1-based index', () => {
      const router = createRouter({ kind: 'positional', indices: [3, 1] });
      expect(router.initialSlots).toBe(2);
      expect(router.extract('10 20 30')).toEqual([
        { slot: 0, value: 30 },
        { slot: 1, value: 10 },
      ]);
    });

    it('skips out-of-range indices and fills the next slot with the rest', () => {
      const router = createRouter({ kind: 'positional', indices: [5, 2] });
      expect(router.extract('10 20 30')).toEqual([{ slot: 0, value: 20 }]);
    });

    it('rejects indices below one', () => {
      expect(() => createRouter({ kind: 'positional', indices: [0] })).toThrow(ConfigError);
    });

    it('grows the pool for lines with more numbers', () => {
      const router = createRouter({ kind: 'positional' });
      const store = new SeriesStore(10, router.initialSlots);
      store.write(writer => router.route('1 2 3', writer));
      expect(store.getSnapshot().series.map(s => s.values)).toEqual([[1], [2], [3]]);
    });
  });
});
