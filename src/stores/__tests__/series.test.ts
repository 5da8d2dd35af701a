import { describe, it, expect } from 'vitest';
import { Series, windowStats } from '../series.js';

describe('Series', () => {
  it('computes statistics over a full window', () => {
    const series = new Series(4);
    for (const v of [5, 3, 8, 1]) series.push(v);

    expect(series.average).toBe(4.25);
    expect(series.min).toBe(1);
    expect(series.max).toBe(8);
    expect(series.length).toBe(4);
  });

  it('reports the empty-window statistics before any push', () => {
    const series = new Series(3);
    expect(series.length).toBe(0);
    expect(series.average).toBe(0);
    expect(series.min).toBe(Infinity);
    expect(series.max).toBe(-Infinity);
    expect(series.values()).toEqual([]);
  });

  it('evicts the oldest sample once full', () => {
    const series = new Series(3);
    for (const v of [1, 2, 3, 4, 5]) series.push(v);

    expect(series.length).toBe(3);
    expect(series.values()).toEqual([3, 4, 5]);
    expect(series.min).toBe(3);
    expect(series.max).toBe(5);
    expect(series.average).toBe(4);
  });

  it('returns the most recent samples oldest first', () => {
    const series = new Series(5);
    for (const v of [10, 20, 30, 40]) series.push(v);

    expect(series.latest(2)).toEqual([30, 40]);
    expect(series.latest(10)).toEqual([10, 20, 30, 40]);
    expect(series.latest(0)).toEqual([]);
  });

  it('lets non-finite samples flow into the statistics', () => {
    const series = new Series(2);
    series.push(1);
    series.push(NaN);
    expect(Number.isNaN(series.average)).toBe(true);
  });

  it('rejects a capacity below one', () => {
    expect(() => new Series(0)).toThrow(RangeError);
    expect(() => new Series(1.5)).toThrow(RangeError);
  });

  it('produces frozen snapshots that do not follow later pushes', () => {
    const series = new Series(4);
    series.push(2);
    series.unit = 'ms';
    const snapshot = series.snapshot();
    series.push(6);

    expect(snapshot.values).toEqual([2]);
    expect(snapshot.unit).toBe('ms');
    expect(snapshot.average).toBe(2);
    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(Object.isFrozen(snapshot.values)).toBe(true);
  });
});

describe('windowStats', () => {
  it('matches the series definition', () => {
    expect(windowStats([5, 3, 8, 1])).toEqual({ average: 4.25, min: 1, max: 8 });
    expect(windowStats([])).toEqual({ average: 0, min: Infinity, max: -Infinity });
  });
});
