/**
 * Display formatting helpers.
 */

const UNITS = ['B', 'KB', 'MB', 'GB'] as const;

/**
 * Format a byte count with binary units, e.g. `1536` → `1.50 KB`.
 */
export function formatBytes(bytes: number): string {
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < UNITS.length - 1) {
    value /= 1024;
    unit += 1;
  }
  return unit === 0 ? `${bytes} B` : `${value.toFixed(2)} ${UNITS[unit]}`;
}

/**
 * Format milliseconds as seconds with one decimal.
 */
export function formatDuration(ms: number): string {
  return `${(ms / 1000).toFixed(1)}s`;
}
