import { useState, useEffect, useCallback, useSyncExternalStore } from 'react';
import type { Readable } from 'stream';
import { useApp, useInput, useStdin } from 'ink';
import { BufferView } from './components/BufferView.js';
import { useTerminalSize } from './hooks/useTerminalSize.js';
import { DashboardController } from './dashboard/controller.js';
import type { DashboardLayout } from './dashboard/dashboard.js';
import { keyName } from './dashboard/keybindings.js';
import type { Router } from './ingest/router.js';
import { runIngestion } from './ingest/reader.js';
import type { SeriesStore } from './stores/seriesStore.js';
import { describeError } from './utils/errors.js';
import { log } from './utils/logger.js';

interface AppProps {
  store: SeriesStore;
  router: Router;
  layout: DashboardLayout;
  /** Line-oriented sample source */
  input: Readable;
  updateInterval: number;
  frameRate: number;
  tickRate: number;
}

// Ink repaints the whole screen once output reaches the last row
const RESERVED_ROWS = 1;

export function App({ store, router, layout, input, updateInterval, frameRate, tickRate }: AppProps) {
  const { exit } = useApp();
  const { isRawModeSupported } = useStdin();
  const { width, height } = useTerminalSize();

  const [controller] = useState(() => new DashboardController({
    store,
    layout,
    width,
    height: Math.max(0, height - RESERVED_ROWS),
  }));

  const subscribe = useCallback((callback: () => void) => controller.subscribe(callback), [controller]);
  const getSnapshot = useCallback(() => controller.getState(), [controller]);
  const state = useSyncExternalStore(subscribe, getSnapshot);

  // Ingestion runs until input ends or the dashboard quits
  useEffect(() => {
    const abort = new AbortController();
    runIngestion({ input, router, store, interval: updateInterval, signal: abort.signal })
      .then((result) => {
        if (result.reason === 'end-of-input') {
          log.info('Input closed, showing the last samples');
        }
      })
      .catch((error: unknown) => {
        controller.dispatch({ type: 'error', message: `Ingestion failed: ${describeError(error)}` });
      });
    return () => {
      abort.abort();
    };
  }, [controller, input, router, store, updateInterval]);

  useEffect(() => {
    const ticks = setInterval(() => controller.dispatch({ type: 'tick' }), 1000 / tickRate);
    const frames = setInterval(() => controller.dispatch({ type: 'render' }), 1000 / frameRate);
    controller.dispatch({ type: 'render' });
    return () => {
      clearInterval(ticks);
      clearInterval(frames);
    };
  }, [controller, tickRate, frameRate]);

  useEffect(() => {
    controller.dispatch({ type: 'resize', width, height: Math.max(0, height - RESERVED_ROWS) });
  }, [controller, width, height]);

  useEffect(() => {
    if (!state.quitting) return;
    if (state.error) {
      process.exitCode = 1;
      exit(new Error(state.error));
    } else {
      exit();
    }
  }, [state.quitting, state.error, exit]);

  useInput((inputKey, key) => {
    controller.handleKey(keyName(inputKey, key));
  }, { isActive: isRawModeSupported });

  return <BufferView rows={state.frame} />;
}
