/**
 * Series Store - the shared series pool
 *
 * Ingestion writes through `write()`, which holds exclusive access for the
 * duration of one synchronous update. Rendering reads through `getSnapshot()`,
 * which returns an immutable view taken in one go, so a frame never sees
 * half of an update. If a writer throws, the pool is poisoned and every later
 * read or write throws `PoolPoisonedError`.
 */

import { Series, DEFAULT_CAPACITY, type SeriesSnapshot } from './series.js';
import { PoolPoisonedError } from '../utils/errors.js';

// =============================================================================
// Types
// =============================================================================

export interface PoolSnapshot {
  readonly series: readonly SeriesSnapshot[];
}

/**
 * Mutable handle passed to writers. Only valid inside `write()`.
 */
export interface PoolWriter {
  readonly size: number;
  /** Grow the pool to at least `size` series */
  ensure(size: number): void;
  /** Push into the series at `slot`, growing the pool if needed */
  push(slot: number, value: number, unit?: string): void;
}

// =============================================================================
// Series Store Class
// =============================================================================

export class SeriesStore {
  private readonly series: Series[] = [];
  private readonly capacity: number;

  private writing = false;
  private poisonCause: { error: unknown } | null = null;

  private listeners: Set<() => void> = new Set();

  // Cached snapshot for useSyncExternalStore - must be stable between writes
  private cachedSnapshot: PoolSnapshot | null = null;

  constructor(capacity: number = DEFAULT_CAPACITY, initialSize = 1) {
    this.capacity = capacity;
    for (let i = 0; i < initialSize; i++) {
      this.series.push(new Series(capacity));
    }
  }

  // ---------------------------------------------------------------------------
  // Access
  // ---------------------------------------------------------------------------

  get size(): number {
    this.assertHealthy();
    return this.series.length;
  }

  get isPoisoned(): boolean {
    return this.poisonCause !== null;
  }

  getSnapshot(): PoolSnapshot {
    this.assertHealthy();
    if (this.writing) {
      throw new Error('Series pool read while a write is in progress');
    }
    if (!this.cachedSnapshot) {
      this.cachedSnapshot = Object.freeze({
        series: Object.freeze(this.series.map(s => s.snapshot())),
      });
    }
    return this.cachedSnapshot;
  }

  /**
   * Run one exclusive update. Returns whatever the updater returns.
   */
  write<T>(update: (writer: PoolWriter) => T): T {
    this.assertHealthy();
    if (this.writing) {
      throw new Error('Series pool writes cannot be nested');
    }

    this.writing = true;
    let result: T;
    try {
      result = update(this.createWriter());
    } catch (error) {
      this.poisonCause = { error };
      throw new PoolPoisonedError(error);
    } finally {
      this.writing = false;
    }

    this.notify();
    return result;
  }

  // ---------------------------------------------------------------------------
  // Subscriptions
  // ---------------------------------------------------------------------------

  subscribe(listener: () => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private notify(): void {
    // Invalidate cached snapshot so getSnapshot() creates a new one
    this.cachedSnapshot = null;
    this.listeners.forEach((listener) => listener());
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private assertHealthy(): void {
    if (this.poisonCause) {
      throw new PoolPoisonedError(this.poisonCause.error);
    }
  }

  private createWriter(): PoolWriter {
    const series = this.series;
    const capacity = this.capacity;

    const ensure = (size: number) => {
      while (series.length < size) {
        series.push(new Series(capacity));
      }
    };

    return {
      get size() {
        return series.length;
      },
      ensure,
      push(slot: number, value: number, unit?: string) {
        if (!Number.isInteger(slot) || slot < 0) {
          throw new RangeError(`Invalid series slot ${slot}`);
        }
        ensure(slot + 1);
        const target = series[slot];
        target.push(value);
        if (unit !== undefined) {
          target.unit = unit;
        }
      },
    };
  }
}
