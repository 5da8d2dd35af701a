#!/usr/bin/env node

import chalk from 'chalk';
import { openSync } from 'fs';
import { ReadStream } from 'tty';
import { render } from 'ink';
import { App } from './App.js';
import { ErrorBoundary } from './components/ErrorBoundary.js';
import { runPatternCommand } from './commands/patterns.js';
import { getConfig } from './config.js';
import { createRouter } from './ingest/router.js';
import { buildDashboardOptions, layoutFor, routerModeFor } from './lib/dashboard-options.js';
import { PatternStore, defaultPatternFile } from './stores/patternStore.js';
import { SeriesStore } from './stores/seriesStore.js';
import { parseArgs, printHelp, printVersion } from './utils/args.js';
import { describeError, isConfigError } from './utils/errors.js';
import { getLogFileError, getLogFilePath, log } from './utils/logger.js';
import { getTerminalInfo, validateTerminal } from './utils/terminal.js';

function fail(error: unknown): never {
  console.error(chalk.red(`✗ ${describeError(error)}`));
  if (!isConfigError(error)) {
    log.error('Fatal error', { error: describeError(error), stack: error instanceof Error ? error.stack : undefined });
    console.error(chalk.dim(`  Details: ${getLogFilePath()}`));
  }
  process.exit(1);
}

/**
 * Samples arrive on stdin, so keys are read from the controlling terminal
 */
function openKeyboard(): ReadStream | undefined {
  try {
    return new ReadStream(openSync('/dev/tty', 'r'));
  } catch (error) {
    log.warn('No terminal for key input', { error: describeError(error) });
    return undefined;
  }
}

function main(): void {
  const config = getConfig();
  const args = parseArgs(process.argv.slice(2), config.defaults);

  if (args.flags.help) {
    printHelp(config.version);
    process.exit(0);
  }

  if (args.flags.version) {
    printVersion(config.version);
    process.exit(0);
  }

  const patternStore = new PatternStore(defaultPatternFile(config.storageDir));

  if (args.subcommand) {
    process.exit(runPatternCommand(patternStore, args.subcommand));
  }

  // Everything below fails before the terminal is taken over
  const options = buildDashboardOptions(args.options, patternStore.resolve(args.options.patternNames));
  const router = createRouter(routerModeFor(options));
  const store = new SeriesStore(options.capacity, router.initialSlots);
  const terminalWarning = validateTerminal(getTerminalInfo());
  if (terminalWarning) {
    // Warn only; the dashboard may still be usable
    console.error(chalk.yellow(`⚠ ${terminalWarning}`));
  }

  const keyboard = openKeyboard();

  log.info('Dashboard starting', { mode: router.mode, slots: router.initialSlots, layout: options.layout });

  const { waitUntilExit } = render(
    <ErrorBoundary>
      <App
        store={store}
        router={router}
        layout={layoutFor(options)}
        input={process.stdin}
        updateInterval={options.updateInterval}
        frameRate={options.frameRate}
        tickRate={options.tickRate}
      />
    </ErrorBoundary>,
    { stdin: keyboard ?? process.stdin, exitOnCtrlC: false }
  );

  waitUntilExit()
    .then(() => {
      keyboard?.destroy();
      const logError = getLogFileError();
      if (logError) {
        console.error(chalk.dim(`Logging was disabled: ${logError}`));
      }
      process.exit();
    })
    .catch((error: unknown) => fail(error));
}

try {
  main();
} catch (error) {
  fail(error);
}
