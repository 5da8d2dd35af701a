/**
 * Series - fixed-capacity rolling window of samples with cached statistics
 */

export const DEFAULT_CAPACITY = 200;

/**
 * Read-only view of a series, safe to hand to the renderer
 */
export interface SeriesSnapshot {
  /** Valid samples, oldest first */
  readonly values: readonly number[];
  readonly capacity: number;
  readonly unit: string;
  readonly min: number;
  readonly max: number;
  readonly average: number;
}

export class Series {
  readonly capacity: number;
  unit = '';

  private readonly ring: Float64Array;
  // Index the next sample is written to
  private head = 0;
  private count = 0;

  private minValue = Infinity;
  private maxValue = -Infinity;
  private averageValue = 0;

  constructor(capacity: number = DEFAULT_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Series capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
    this.ring = new Float64Array(capacity);
  }

  get length(): number {
    return this.count;
  }

  get min(): number {
    return this.minValue;
  }

  get max(): number {
    return this.maxValue;
  }

  get average(): number {
    return this.averageValue;
  }

  /**
   * Append the newest sample, evicting the oldest once full.
   * Non-finite values are stored as given and flow into the statistics.
   */
  push(value: number): void {
    this.ring[this.head] = value;
    this.head = (this.head + 1) % this.capacity;
    this.count = Math.min(this.count + 1, this.capacity);
    this.recompute();
  }

  /**
   * Valid samples in arrival order, oldest first
   */
  values(): number[] {
    return this.latest(this.count);
  }

  /**
   * The `n` most recent samples, oldest of them first
   */
  latest(n: number): number[] {
    const take = Math.max(0, Math.min(Math.floor(n), this.count));
    const out: number[] = new Array(take);
    let index = (this.head - take + this.capacity) % this.capacity;
    for (let i = 0; i < take; i++) {
      out[i] = this.ring[index];
      index = (index + 1) % this.capacity;
    }
    return out;
  }

  snapshot(): SeriesSnapshot {
    return Object.freeze({
      values: Object.freeze(this.values()),
      capacity: this.capacity,
      unit: this.unit,
      min: this.minValue,
      max: this.maxValue,
      average: this.averageValue,
    });
  }

  // Full rescan over the window, oldest to newest
  private recompute(): void {
    const stats = windowStats(this.values());
    this.averageValue = stats.average;
    this.minValue = stats.min;
    this.maxValue = stats.max;
  }
}

export interface WindowStats {
  average: number;
  min: number;
  max: number;
}

/**
 * Statistics over an arbitrary window, with the same definition Series uses
 */
export function windowStats(values: readonly number[]): WindowStats {
  if (values.length === 0) {
    return { average: 0, min: Infinity, max: -Infinity };
  }
  let sum = 0;
  let min = Infinity;
  let max = -Infinity;
  for (const v of values) {
    sum += v;
    min = Math.min(min, v);
    max = Math.max(max, v);
  }
  return { average: sum / values.length, min, max };
}
