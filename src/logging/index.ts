/**
 * Logging - main exports
 */

import type { RouterConfig } from '../config.js';
import type { LogContext, RouterLogger } from './logger.js';
import { createLoggerFromEnv } from './logger.js';

export {
  RouterLogger,
  createLogger,
  createLoggerFromEnv,
  LoggerConfigs,
  type LoggerConfig,
  type LogContext,
} from './logger.js';

export {
  LOG_LEVELS,
  shouldLog,
  formatLogLevel,
  parseLogLevel,
  type LogLevel,
} from './levels.js';

export {
  generateCorrelationId,
  isValidCorrelationId,
  correlationContext,
  extractOrGenerateCorrelationId,
} from './correlation.js';

export {
  LogFormatter,
  createLogEntry,
  formatValue,
  type LogEntry,
  type FormatterOptions,
} from './formatter.js';

/**
 * Component logger built from the `logging` section of the router config
 */
export function createComponentLogger(
  component: string,
  logging?: RouterConfig['logging'],
  context: LogContext = {}
): RouterLogger {
  return createLoggerFromEnv({ ...context, component }, logging ?? {});
}
