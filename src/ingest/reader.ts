/**
 * Ingestion loop - reads newline-delimited input into the series pool
 *
 * Before each line it waits `interval` ms, so bursts are consumed at most
 * one line per interval. Shutdown is cooperative: the abort signal is checked
 * between the wait and the read. A read that is already pending on an input
 * that never produces another line (and never closes) keeps the loop alive
 * until the input does one or the other.
 */

import { createInterface } from 'readline';
import type { Readable } from 'stream';
import type { Router } from './router.js';
import type { SeriesStore } from '../stores/seriesStore.js';
import { log } from '../utils/logger.js';

export interface IngestOptions {
  input: Readable;
  router: Router;
  store: SeriesStore;
  /** Milliseconds to wait before consuming each line */
  interval: number;
  signal: AbortSignal;
}

export interface IngestResult {
  lines: number;
  samples: number;
  reason: 'aborted' | 'end-of-input';
}

/**
 * Resolve after `ms`, or as soon as the signal aborts
 */
export function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const done = () => {
      clearTimeout(timer);
      signal.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal.addEventListener('abort', done, { once: true });
  });
}

export async function runIngestion({ input, router, store, interval, signal }: IngestOptions): Promise<IngestResult> {
  const rl = createInterface({ input, crlfDelay: Infinity });
  const lines = rl[Symbol.asyncIterator]();
  const result: IngestResult = { lines: 0, samples: 0, reason: 'aborted' };

  log.info('Ingestion started', { mode: router.mode, interval });

  try {
    while (!signal.aborted) {
      await sleep(interval, signal);
      if (signal.aborted) break;

      const next = await lines.next();
      if (next.done) {
        result.reason = 'end-of-input';
        break;
      }

      const line: string = next.value;
      // Errors here poison the pool and end ingestion
      const recorded = store.write(writer => router.route(line, writer));
      result.lines++;
      result.samples += recorded;

      if (recorded === 0) {
        log.warn('Line produced no samples', { line: line.slice(0, 120) });
      } else {
        log.debug('Routed samples', { count: recorded });
      }
    }
  } finally {
    rl.close();
  }

  log.info('Ingestion stopped', { ...result });
  return result;
}
