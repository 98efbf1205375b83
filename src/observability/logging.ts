/**
 * Structured logging for requester API calls
 */

export const LOG_LEVELS = ['error', 'warn', 'info', 'debug', 'trace'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogContext = Record<string, unknown>;

export interface Logger {
  error(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
  trace(message: string, context?: LogContext): void;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

type ConsoleMethod = 'error' | 'warn' | 'log' | 'debug';

const CONSOLE_METHOD: Record<LogLevel, ConsoleMethod> = {
  error: 'error',
  warn: 'warn',
  info: 'log',
  debug: 'debug',
  trace: 'debug',
};

/**
 * Context keys whose values never reach the console
 */
export const REDACTED_KEYS: ReadonlySet<string> = new Set([
  'AWSAccessKeyId',
  'Signature',
  'accessKeyId',
  'secretAccessKey',
  'url',
]);

function redact(context: LogContext): LogContext {
  const safe: LogContext = {};
  for (const [key, value] of Object.entries(context)) {
    safe[key] = REDACTED_KEYS.has(key) ? '[redacted]' : value;
  }
  return safe;
}

/**
 * Writes one line per entry to the console:
 * `[<ISO time>] [<LEVEL>] <message> <context JSON>`
 */
export class ConsoleLogger implements Logger {
  readonly error = (message: string, context?: LogContext): void => this.write('error', message, context);
  readonly warn = (message: string, context?: LogContext): void => this.write('warn', message, context);
  readonly info = (message: string, context?: LogContext): void => this.write('info', message, context);
  readonly debug = (message: string, context?: LogContext): void => this.write('debug', message, context);
  readonly trace = (message: string, context?: LogContext): void => this.write('trace', message, context);

  constructor(private readonly minLevel: LogLevel = 'info') {}

  private write(level: LogLevel, message: string, context?: LogContext): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[this.minLevel]) {
      return;
    }

    const suffix = context ? ` ${JSON.stringify(redact(context))}` : '';
    console[CONSOLE_METHOD[level]](`[${new Date().toISOString()}] [${level.toUpperCase()}] ${message}${suffix}`);
  }
}

const discard = (): void => undefined;

/**
 * Logger that discards everything; the client default
 */
export class NoopLogger implements Logger {
  readonly error: Logger['error'] = discard;
  readonly warn: Logger['warn'] = discard;
  readonly info: Logger['info'] = discard;
  readonly debug: Logger['debug'] = discard;
  readonly trace: Logger['trace'] = discard;
}

/**
 * ConsoleLogger at the given level, or NoopLogger when no level is set
 */
export function createLogger(level?: LogLevel): Logger {
  return level ? new ConsoleLogger(level) : new NoopLogger();
}

/**
 * Log a request about to be sent. The URL is not logged: it carries the
 * access key and signature.
 */
export function logRequest(logger: Logger, operation: string, mode: string, endpoint: string): void {
  logger.debug('Sending requester API request', { operation, mode, endpoint });
}

/**
 * Log a successful operation
 */
export function logSuccess(logger: Logger, operation: string, status: number, duration: number): void {
  logger.info('Requester API operation completed', {
    operation,
    status,
    durationMs: duration,
  });
}

/**
 * Log a failed operation
 */
export function logFailure(
  logger: Logger,
  operation: string,
  error: { type: string; code?: string; status?: number }
): void {
  logger.warn('Requester API operation failed', {
    operation,
    type: error.type,
    code: error.code,
    status: error.status,
  });
}
