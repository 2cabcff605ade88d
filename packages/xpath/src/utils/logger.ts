/**
 * Minimal leveled logger.
 *
 * @module utils/logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext, error?: Error): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function format(level: LogLevel, message: string, context?: LogContext): string {
  const prefix = `[treequery] ${level.toUpperCase()}`;
  if (!context || Object.keys(context).length === 0) {
    return `${prefix} ${message}`;
  }
  return `${prefix} ${message} ${JSON.stringify(context)}`;
}

/**
 * Create a console logger that drops messages below `level`.
 * Debug and info go to stdout, warnings and errors to stderr.
 */
export function createLogger(level: LogLevel = 'info'): Logger {
  const threshold = LEVEL_ORDER[level];
  const enabled = (messageLevel: LogLevel): boolean => LEVEL_ORDER[messageLevel] >= threshold;

  return {
    debug(message, context) {
      if (enabled('debug')) console.debug(format('debug', message, context));
    },
    info(message, context) {
      if (enabled('info')) console.info(format('info', message, context));
    },
    warn(message, context) {
      if (enabled('warn')) console.warn(format('warn', message, context));
    },
    error(message, context, error) {
      if (!enabled('error')) return;
      console.error(format('error', message, context));
      if (error?.stack) console.error(error.stack);
    },
  };
}

export const silentLogger: Logger = createLogger('silent');
