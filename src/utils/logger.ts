/**
 * Minimal leveled logger.
 *
 * @module utils/logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>, error?: Error): void;
}

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

const PREFIX = '[rules-vm]';

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LOG_LEVELS.some((level) => level === value);
}

function format(message: string, context?: Record<string, unknown>): string {
  if (!context || Object.keys(context).length === 0) {
    return `${PREFIX} ${message}`;
  }
  return `${PREFIX} ${message} ${JSON.stringify(context)}`;
}

export function createLogger(level: LogLevel = 'info'): Logger {
  const threshold = LEVEL_PRIORITY[level];
  const enabled = (l: LogLevel): boolean => LEVEL_PRIORITY[l] >= threshold && threshold < LEVEL_PRIORITY.silent;

  return {
    debug(message, context) {
      if (enabled('debug')) console.debug(format(message, context));
    },
    info(message, context) {
      if (enabled('info')) console.info(format(message, context));
    },
    warn(message, context) {
      if (enabled('warn')) console.warn(format(message, context));
    },
    error(message, context, error) {
      if (!enabled('error')) return;
      if (error) {
        console.error(format(message, context), error);
      } else {
        console.error(format(message, context));
      }
    },
  };
}
