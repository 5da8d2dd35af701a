/**
 * Error types and message helpers for tapdash
 */

/**
 * Invalid configuration detected before the dashboard starts.
 * Always fatal: the process prints the message and exits 1.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Raised on any access to the series pool after a writer failed mid-update.
 * The pool's invariants can no longer be trusted, so this is never recovered.
 */
export class PoolPoisonedError extends Error {
  constructor(cause: unknown) {
    super(`Series pool is poisoned: ${describeError(cause)}`, { cause });
    this.name = 'PoolPoisonedError';
  }
}

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError;
}

/**
 * Extract a display message from any thrown value
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (error && typeof error === 'object' && 'message' in error) {
    return String(error.message);
  }
  return 'An unexpected error occurred';
}

/**
 * Truncate long error messages for display
 */
export function truncateMessage(message: string, maxLength = 150): string {
  if (message.length <= maxLength) {
    return message;
  }
  return message.slice(0, maxLength - 3) + '...';
}
