/**
 * Log entry formatting: JSON lines for production, single-line text for humans
 */

import type { LogLevel } from './levels.js';
import { formatLogLevel } from './levels.js';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  correlationId?: string;
  component?: string;
  organization?: string;
  user?: string;
  metadata?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

export interface FormatterOptions {
  format: 'json' | 'human';
  includeStackTrace: boolean;
  colors?: boolean;
}

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[36m',
  info: '\x1b[32m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
};

const RESET = '\x1b[0m';

export class LogFormatter {
  constructor(private options: FormatterOptions) {}

  format(entry: LogEntry): string {
    return this.options.format === 'json'
      ? this.formatJson(entry)
      : this.formatHuman(entry);
  }

  private formatJson(entry: LogEntry): string {
    const error = entry.error && !this.options.includeStackTrace
      ? { name: entry.error.name, message: entry.error.message }
      : entry.error;

    return JSON.stringify({
      timestamp: entry.timestamp,
      level: entry.level,
      message: entry.message,
      ...(entry.correlationId && { correlationId: entry.correlationId }),
      ...(entry.component && { component: entry.component }),
      ...(entry.organization && { organization: entry.organization }),
      ...(entry.user && { user: entry.user }),
      ...(entry.metadata && Object.keys(entry.metadata).length > 0 && { metadata: entry.metadata }),
      ...(error && { error }),
    });
  }

  /**
   * `<iso timestamp> LEVEL [correlation] [component] message (org=…, user=…) | k=v …`
   */
  private formatHuman(entry: LogEntry): string {
    const label = formatLogLevel(entry.level);
    const parts = [
      entry.timestamp,
      this.options.colors ? `${LEVEL_COLORS[entry.level]}${label}${RESET}` : label,
    ];

    if (entry.correlationId) parts.push(`[${entry.correlationId}]`);
    if (entry.component) parts.push(`[${entry.component}]`);
    parts.push(entry.message);

    let line = parts.join(' ');

    const scope: string[] = [];
    if (entry.organization) scope.push(`org=${entry.organization}`);
    if (entry.user) scope.push(`user=${entry.user}`);
    if (scope.length > 0) line += ` (${scope.join(', ')})`;

    if (entry.metadata && Object.keys(entry.metadata).length > 0) {
      line += ' | ' + Object.entries(entry.metadata)
        .map(([key, value]) => `${key}=${formatValue(value)}`)
        .join(' ');
    }

    if (entry.error) {
      line += `\n  ${entry.error.name}: ${entry.error.message}`;
      if (this.options.includeStackTrace && entry.error.stack) {
        line += '\n' + entry.error.stack.split('\n').map(l => `    ${l}`).join('\n');
      }
    }

    return line;
  }
}

export function formatValue(value: unknown): string {
  if (value === null || value === undefined) return String(value);
  if (typeof value === 'string') return value.includes(' ') ? `"${value}"` : value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  if (Array.isArray(value)) return `[${value.map(formatValue).join(',')}]`;
  return JSON.stringify(value);
}

export function createLogEntry(
  level: LogLevel,
  message: string,
  options: Omit<LogEntry, 'timestamp' | 'level' | 'message' | 'error'> & { error?: Error } = {}
): LogEntry {
  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    message,
  };

  if (options.correlationId) entry.correlationId = options.correlationId;
  if (options.component) entry.component = options.component;
  if (options.organization) entry.organization = options.organization;
  if (options.user) entry.user = options.user;
  if (options.metadata) entry.metadata = options.metadata;

  if (options.error) {
    entry.error = {
      name: options.error.name,
      message: options.error.message,
      ...(options.error.stack && { stack: options.error.stack }),
    };
  }

  return entry;
}
