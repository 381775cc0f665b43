/**
 * Structured logger with per-request context and optional daily log files
 */

import { appendFile, mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import { homedir } from 'node:os';
import type { LogLevel } from './levels.js';
import { parseLogLevel, shouldLog } from './levels.js';
import { correlationContext } from './correlation.js';
import { LogFormatter, createLogEntry } from './formatter.js';

export interface LoggerConfig {
  level: LogLevel;
  format: 'json' | 'human';
  fileOutput: boolean;
  /** Log directory, relative to ~/.routewise/ unless absolute */
  logPath: string;
  consoleOutput: boolean;
  includeStackTrace: boolean;
  colors: boolean;
}

export interface LogContext {
  correlationId?: string;
  component?: string;
  organization?: string;
  user?: string;
  metadata?: Record<string, unknown>;
}

export class RouterLogger {
  private formatter: LogFormatter;
  private pendingWrites = new Set<Promise<void>>();
  private logDir: string;

  constructor(private config: LoggerConfig, private context: LogContext = {}) {
    this.formatter = new LogFormatter({
      format: config.format,
      includeStackTrace: config.includeStackTrace,
      colors: config.colors,
    });
    this.logDir = config.logPath.startsWith('/')
      ? config.logPath
      : join(homedir(), '.routewise', config.logPath);
  }

  /**
   * Logger sharing this one's config with extra context merged in
   */
  child(context: Partial<LogContext>): RouterLogger {
    return new RouterLogger(this.config, {
      ...this.context,
      ...context,
      metadata: { ...this.context.metadata, ...context.metadata },
    });
  }

  debug(message: string, metadata?: Record<string, unknown>): void {
    this.log('debug', message, metadata);
  }

  info(message: string, metadata?: Record<string, unknown>): void {
    this.log('info', message, metadata);
  }

  warn(message: string, metadata?: Record<string, unknown>): void {
    this.log('warn', message, metadata);
  }

  error(message: string, error?: unknown, metadata?: Record<string, unknown>): void {
    if (error instanceof Error) {
      this.log('error', message, metadata, error);
    } else if (error !== undefined) {
      this.log('error', message, { ...metadata, error: String(error) });
    } else {
      this.log('error', message, metadata);
    }
  }

  private log(
    level: LogLevel,
    message: string,
    metadata?: Record<string, unknown>,
    error?: Error
  ): void {
    if (!shouldLog(level, this.config.level)) {
      return;
    }

    const correlationId = this.context.correlationId ?? correlationContext.getId();
    const entry = createLogEntry(level, message, {
      ...(correlationId && { correlationId }),
      ...(this.context.component && { component: this.context.component }),
      ...(this.context.organization && { organization: this.context.organization }),
      ...(this.context.user && { user: this.context.user }),
      metadata: { ...this.context.metadata, ...metadata },
      ...(error && { error }),
    });

    const line = this.formatter.format(entry);

    if (this.config.consoleOutput) {
      this.writeToConsole(level, line);
    }
    if (this.config.fileOutput) {
      this.writeToFile(entry.timestamp, line);
    }
  }

  private writeToConsole(level: LogLevel, line: string): void {
    switch (level) {
      case 'debug':
        console.debug(line);
        break;
      case 'info':
        console.info(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      case 'error':
        console.error(line);
        break;
    }
  }

  /**
   * Appends to `<logDir>/YYYY-MM-DD.log`; failures go to stderr
   */
  private writeToFile(timestamp: string, line: string): void {
    const filepath = join(this.logDir, `${timestamp.slice(0, 10)}.log`);

    const write = mkdir(this.logDir, { recursive: true })
      .then(() => appendFile(filepath, line + '\n'))
      .catch((error: unknown) => {
        console.error('Failed to write log file:', error);
      })
      .finally(() => {
        this.pendingWrites.delete(write);
      });

    this.pendingWrites.add(write);
  }

  /**
   * Resolves once every queued file write has settled
   */
  async flush(): Promise<void> {
    await Promise.all([...this.pendingWrites]);
  }
}

export const LoggerConfigs = {
  development: (): LoggerConfig => ({
    level: 'debug',
    format: 'human',
    fileOutput: false,
    logPath: 'logs',
    consoleOutput: true,
    includeStackTrace: true,
    colors: true,
  }),

  production: (): LoggerConfig => ({
    level: 'info',
    format: 'json',
    fileOutput: true,
    logPath: 'logs',
    consoleOutput: true,
    includeStackTrace: false,
    colors: false,
  }),

  /** Errors only, nowhere */
  testing: (): LoggerConfig => ({
    level: 'error',
    format: 'human',
    fileOutput: false,
    logPath: 'logs',
    consoleOutput: false,
    includeStackTrace: false,
    colors: false,
  }),
};

export function createLogger(
  config: Partial<LoggerConfig> = {},
  context: LogContext = {}
): RouterLogger {
  return new RouterLogger({ ...LoggerConfigs.development(), ...config }, context);
}

/**
 * Picks a base config from NODE_ENV; ROUTEWISE_LOG_LEVEL overrides the level.
 */
export function createLoggerFromEnv(
  context: LogContext = {},
  overrides: Partial<LoggerConfig> = {}
): RouterLogger {
  const env = process.env.NODE_ENV || 'development';

  let base: LoggerConfig;
  switch (env) {
    case 'production':
      base = LoggerConfigs.production();
      break;
    case 'test':
      base = LoggerConfigs.testing();
      break;
    default:
      base = LoggerConfigs.development();
      break;
  }

  const config = { ...base, ...overrides };
  config.level = parseLogLevel(process.env.ROUTEWISE_LOG_LEVEL, config.level);
  return new RouterLogger(config, context);
}
