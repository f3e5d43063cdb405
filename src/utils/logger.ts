/**
 * Console logging utility
 * Verbosity is controlled by LOG_LEVEL (DEBUG, INFO, WARN, ERROR)
 */

export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
};

interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  metadata?: Record<string, unknown>;
}

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

export function currentLogLevel(): LogLevel {
  const configured = (process.env.LOG_LEVEL || '').toUpperCase();
  return isLogLevel(configured) ? configured : LogLevel.INFO;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLogLevel()];
}

export function formatLog(entry: LogEntry): string {
  const metadataStr = entry.metadata
    ? ` ${JSON.stringify(entry.metadata)}`
    : '';
  return `[${entry.timestamp}] ${entry.level}: ${entry.message}${metadataStr}`;
}

function entry(level: LogLevel, message: string, metadata?: Record<string, unknown>): LogEntry {
  return {
    level,
    message,
    timestamp: new Date().toISOString(),
    metadata,
  };
}

export const logger = {
  debug(message: string, metadata?: Record<string, unknown>): void {
    if (!enabled(LogLevel.DEBUG)) return;
    console.log(formatLog(entry(LogLevel.DEBUG, message, metadata)));
  },

  info(message: string, metadata?: Record<string, unknown>): void {
    if (!enabled(LogLevel.INFO)) return;
    console.log(formatLog(entry(LogLevel.INFO, message, metadata)));
  },

  warn(message: string, metadata?: Record<string, unknown>): void {
    if (!enabled(LogLevel.WARN)) return;
    console.warn(formatLog(entry(LogLevel.WARN, message, metadata)));
  },

  error(message: string, error?: Error | unknown, metadata?: Record<string, unknown>): void {
    if (!enabled(LogLevel.ERROR)) return;
    console.error(formatLog(entry(LogLevel.ERROR, message, {
      ...metadata,
      error: error instanceof Error ? {
        name: error.name,
        message: error.message,
        stack: error.stack,
      } : error,
    })));
  },
};
