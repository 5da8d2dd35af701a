// =============================================================================
// Formatting Utilities
// =============================================================================

/**
 * Statistic with two decimals and an optional unit suffix
 */
export function formatStat(value: number, unit: string): string {
  const text = Number.isFinite(value) ? value.toFixed(2) : String(value);
  return unit ? `${text} ${unit}` : text;
}

/**
 * "Avg: 4.25 ms Min: 1.00 ms Max: 8.00 ms"
 */
export function formatSummary(stats: { average: number; min: number; max: number }, unit: string): string {
  return `Avg: ${formatStat(stats.average, unit)} Min: ${formatStat(stats.min, unit)} Max: ${formatStat(stats.max, unit)}`;
}

/**
 * Truncate a string with ellipsis
 */
export function truncate(str: string, maxLength: number): string {
  if (maxLength <= 0) return '';
  if (str.length <= maxLength) return str;
  if (maxLength <= 3) return str.slice(0, maxLength);
  return str.slice(0, maxLength - 3) + '...';
}

/**
 * Pad a string to a fixed width
 */
export function padRight(str: string, width: number): string {
  if (str.length >= width) return str.slice(0, width);
  return str + ' '.repeat(width - str.length);
}

/**
 * Frames or ticks per second, one decimal
 */
export function formatRate(perSecond: number): string {
  return perSecond.toFixed(1);
}
