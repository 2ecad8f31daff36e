/**
 * Logger Interface
 * Structured logging abstraction used by every settlement component
 */

/**
 * Log levels supported by the logger
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Structured log context - additional metadata for log entries
 */
export interface LogContext {
  [key: string]: unknown;
}

/**
 * Logger interface that consumers can implement
 */
export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

/**
 * No-op logger that silently discards all log messages
 */
/* eslint-disable @typescript-eslint/no-empty-function */
export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
/* eslint-enable @typescript-eslint/no-empty-function */

/**
 * Render bigint values as decimal strings so context stays printable
 * by sinks that serialize to JSON
 */
export function serializeContext(context: LogContext): LogContext {
  const out: LogContext = {};
  for (const [key, value] of Object.entries(context)) {
    out[key] = typeof value === 'bigint' ? value.toString() : value;
  }
  return out;
}

function writeConsole(level: LogLevel, message: string, context?: LogContext): void {
  const line = `[${level.toUpperCase()}] ${message}`;
  const args: unknown[] = context ? [line, serializeContext(context)] : [line];
  switch (level) {
    case 'debug':
      console.debug(...args);
      break;
    case 'info':
      console.info(...args);
      break;
    case 'warn':
      console.warn(...args);
      break;
    case 'error':
      console.error(...args);
      break;
  }
}

/**
 * Console logger that outputs to console with structured context
 */
export const consoleLogger: Logger = {
  debug: (message, context) => { writeConsole('debug', message, context); },
  info: (message, context) => { writeConsole('info', message, context); },
  warn: (message, context) => { writeConsole('warn', message, context); },
  error: (message, context) => { writeConsole('error', message, context); },
};

/**
 * Create a prefixed logger that adds a component prefix to all messages
 */
export function createPrefixedLogger(logger: Logger, prefix: string): Logger {
  return {
    debug(message: string, context?: LogContext): void {
      logger.debug(`[${prefix}] ${message}`, context);
    },
    info(message: string, context?: LogContext): void {
      logger.info(`[${prefix}] ${message}`, context);
    },
    warn(message: string, context?: LogContext): void {
      logger.warn(`[${prefix}] ${message}`, context);
    },
    error(message: string, context?: LogContext): void {
      logger.error(`[${prefix}] ${message}`, context);
    },
  };
}

/**
 * Drop entries below the given level
 */
export function withMinLevel(logger: Logger, minLevel: LogLevel): Logger {
  const passes = (level: LogLevel): boolean => LEVEL_ORDER[level] >= LEVEL_ORDER[minLevel];
  return {
    debug(message, context) {
      if (passes('debug')) logger.debug(message, context);
    },
    info(message, context) {
      if (passes('info')) logger.info(message, context);
    },
    warn(message, context) {
      if (passes('warn')) logger.warn(message, context);
    },
    error(message, context) {
      if (passes('error')) logger.error(message, context);
    },
  };
}

/**
 * A log entry captured by a memory logger
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  context?: LogContext;
}

/**
 * Logger that keeps entries in memory, for hosts that forward logs in batches
 */
export interface MemoryLogger extends Logger {
  readonly entries: readonly LogEntry[];
  clear(): void;
}

export function createMemoryLogger(): MemoryLogger {
  const entries: LogEntry[] = [];
  const push = (level: LogLevel, message: string, context?: LogContext): void => {
    entries.push(context ? { level, message, context } : { level, message });
  };
  return {
    entries,
    clear: () => { entries.length = 0; },
    debug: (message, context) => { push('debug', message, context); },
    info: (message, context) => { push('info', message, context); },
    warn: (message, context) => { push('warn', message, context); },
    error: (message, context) => { push('error', message, context); },
  };
}
