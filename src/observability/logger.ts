/**
 * Logger Module
 *
 * Pino-based structured logging for hostctl.
 * Provides a Logger class with support for:
 * - Log levels (trace, debug, info, warn, error, fatal, silent)
 * - Structured logging with context
 * - Child loggers with bound context
 * - Pretty printing in development mode
 *
 * Logs go to stderr so they never interleave with command output.
 */

import pino, { type Logger as PinoLogger, type LoggerOptions as PinoOptions } from 'pino';

// ============================================================================
// Types
// ============================================================================

/**
 * Log context that can be bound to a logger or passed per-call.
 */
export interface LogContext {
  /** Config file involved in the operation */
  path?: string;
  /** CLI command being run */
  command?: string;
  /** Duration in milliseconds */
  durationMs?: number;
  /** Additional arbitrary context */
  [key: string]: unknown;
}

/**
 * Options for creating a Logger instance.
 */
export interface LoggerOptions {
  /** Logger name (appears in logs) */
  name?: string;
  /** Log level (default: info, or debug in development) */
  level?: LogLevel;
  /** Context to bind to all log entries */
  context?: LogContext;
  /** Whether to enable pretty printing (default: auto-detect from NODE_ENV) */
  pretty?: boolean;
}

/**
 * Supported log levels.
 */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = [
  'trace',
  'debug',
  'info',
  'warn',
  'error',
  'fatal',
  'silent',
];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

const STDERR = 2;

// ============================================================================
// Logger Class
// ============================================================================

/**
 * Logger class wrapping pino with structured logging support.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ name: 'hostctl' });
 * logger.debug('Loaded config', { path: '/srv/app/cloud.yml' });
 *
 * const commandLogger = logger.child({ command: 'scale' });
 * commandLogger.warn('CLI arguments override cloud.yml');
 * ```
 */
export class Logger {
  private readonly pino: PinoLogger;

  constructor(options: LoggerOptions = {}, instance?: PinoLogger) {
    if (instance) {
      this.pino = instance;
      return;
    }

    const isDevelopment = process.env['NODE_ENV'] === 'development';
    const usePretty = options.pretty ?? isDevelopment;
    const defaultLevel: LogLevel = isDevelopment ? 'debug' : 'info';
    const envLevel = process.env['LOG_LEVEL'];

    const pinoOptions: PinoOptions = {
      level: options.level ?? (envLevel && isLogLevel(envLevel) ? envLevel : defaultLevel),
      timestamp: pino.stdTimeFunctions.isoTime,
      formatters: {
        level: (label) => ({ level: label }),
      },
    };

    if (options.context) {
      pinoOptions.base = { ...options.context };
    }

    if (options.name) {
      pinoOptions.name = options.name;
    }

    this.pino = usePretty ? createPrettyLogger(pinoOptions) : pino(pinoOptions, pino.destination(STDERR));
  }

  /**
   * Create a child logger with additional bound context.
   * The child logger inherits all parent context plus new bindings.
   */
  child(context: LogContext): Logger {
    return new Logger({}, this.pino.child(context));
  }

  /**
   * Log at debug level.
   */
  debug(message: string, context?: LogContext): void {
    if (context) {
      this.pino.debug(context, message);
    } else {
      this.pino.debug(message);
    }
  }

  /**
   * Log at warn level.
   */
  warn(message: string, context?: LogContext): void {
    if (context) {
      this.pino.warn(context, message);
    } else {
      this.pino.warn(message);
    }
  }

  /**
   * Log at error level.
   */
  error(message: string, context?: LogContext & { error?: Error }): void {
    if (context) {
      // Extract error if present for proper serialization
      const { error, ...rest } = context;
      if (error) {
        this.pino.error({ ...rest, err: error }, message);
      } else {
        this.pino.error(rest, message);
      }
    } else {
      this.pino.error(message);
    }
  }

  /**
   * Get the current log level.
   */
  get level(): LogLevel {
    const level = this.pino.level;
    return isLogLevel(level) ? level : 'info';
  }

  /**
   * Set the log level dynamically.
   */
  set level(level: LogLevel) {
    this.pino.level = level;
  }
}

/**
 * Pretty output through pino-pretty, when it is installed.
 */
function createPrettyLogger(options: PinoOptions): PinoLogger {
  try {
    return pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
          destination: STDERR,
        },
      },
    });
  } catch {
    // pino-pretty not installed, fall back to standard JSON logging
    const fallback = pino(options, pino.destination(STDERR));
    fallback.warn(
      'pino-pretty not installed, falling back to JSON logging. ' +
        'Install with: npm install -D pino-pretty'
    );
    return fallback;
  }
}

// ============================================================================
// Default Logger Instance
// ============================================================================

/**
 * Default logger instance for hostctl.
 */
export const logger = new Logger({ name: 'hostctl' });

export default logger;
