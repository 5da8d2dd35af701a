import { appendFileSync, existsSync, mkdirSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';

// =============================================================================
// Centralized Logger
// =============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  data?: unknown;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

export function parseLogLevel(value: string | undefined): LogLevel {
  const normalized = (value || '').toLowerCase();
  return isLogLevel(normalized) ? normalized : 'info';
}

// Configuration
// The dashboard owns stdout, so nothing is ever written to the console from here.
const LOG_DIR = join(process.env.TAPDASH_HOME || join(homedir(), '.tapdash'), 'logs');
const LOG_FILE = join(LOG_DIR, 'tapdash.log');
const MIN_LEVEL: LogLevel = parseLogLevel(process.env.TAPDASH_LOG_LEVEL);

let fileEnabled = process.env.TAPDASH_LOG_FILE !== 'false';
let fileError: string | null = null;

// Format log entry
export function formatEntry(entry: LogEntry): string {
  const dataStr = entry.data !== undefined ? ` ${JSON.stringify(entry.data)}` : '';
  return `[${entry.timestamp}] [${entry.level.toUpperCase()}] ${entry.message}${dataStr}`;
}

// Write to file; the first failure turns file logging off for the process
function writeToFile(entry: LogEntry) {
  if (!fileEnabled) return;
  try {
    if (!existsSync(LOG_DIR)) {
      mkdirSync(LOG_DIR, { recursive: true });
    }
    appendFileSync(LOG_FILE, formatEntry(entry) + '\n');
  } catch (error) {
    fileEnabled = false;
    fileError = error instanceof Error ? error.message : String(error);
  }
}

function logMessage(level: LogLevel, message: string, data?: unknown) {
  if (LOG_LEVELS[level] < LOG_LEVELS[MIN_LEVEL]) return;

  writeToFile({
    timestamp: new Date().toISOString(),
    level,
    message,
    data,
  });
}

export const log = {
  debug: (message: string, data?: unknown) => logMessage('debug', message, data),
  info: (message: string, data?: unknown) => logMessage('info', message, data),
  warn: (message: string, data?: unknown) => logMessage('warn', message, data),
  error: (message: string, data?: unknown) => logMessage('error', message, data),
};

/**
 * Why file logging stopped, if it did
 */
export function getLogFileError(): string | null {
  return fileError;
}

export function getLogFilePath(): string {
  return LOG_FILE;
}
