/**
 * Log levels, ordered by severity
 */

export const LOG_LEVELS = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
} as const;

export type LogLevel = keyof typeof LOG_LEVELS;

/**
 * True when a message at `messageLevel` passes the `minLevel` filter
 */
export function shouldLog(messageLevel: LogLevel, minLevel: LogLevel): boolean {
  return LOG_LEVELS[messageLevel] >= LOG_LEVELS[minLevel];
}

export function formatLogLevel(level: LogLevel): string {
  return level.toUpperCase().padEnd(5);
}

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

/**
 * Parses a level name (case-insensitive), returning `fallback` when unknown.
 * Used for the ROUTEWISE_LOG_LEVEL environment override.
 */
export function parseLogLevel(level: string | undefined, fallback: LogLevel = 'info'): LogLevel {
  if (!level) return fallback;
  const normalized = level.trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : fallback;
}
