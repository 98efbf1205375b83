/**
 * Observability: structured logging
 */

export {
  ConsoleLogger,
  NoopLogger,
  createLogger,
  isLogLevel,
  logRequest,
  logSuccess,
  logFailure,
  LOG_LEVELS,
  type Logger,
  type LogLevel,
  type LogContext,
} from './logging.js';
