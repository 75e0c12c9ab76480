/**
 * Structured logging for gridscan
 *
 * A small Logger abstraction that every component accepts by injection.
 * Nothing logs through a global: a scan receives its logger from whoever
 * built it, and tests hand in a `createTestLogger()` to assert on entries.
 *
 * @example
 * ```typescript
 * import { createConsoleLogger, withContext } from '@gridscan/core';
 *
 * const logger = createConsoleLogger({ format: 'json', minLevel: 'info' });
 * const scanLogger = withContext(logger, { service: 'gfs-scan', runDate: '20260120' });
 *
 * scanLogger.info('resource opened', { forecastHour: 6, durationMs: 812 });
 * ```
 */

// =============================================================================
// Types
// =============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Allowed value types in log context (JSON-serializable)
 */
export type LogContextValue =
  | string
  | number
  | boolean
  | null
  | LogContextValue[]
  | { [key: string]: LogContextValue };

/**
 * Structured context data attached to log entries.
 */
export interface LogContext {
  /** Service or component name */
  service?: string;
  /** Operation being performed */
  operation?: string;
  /** Model run date of the scan (YYYYMMDD) */
  runDate?: string;
  /** Forecast hour of the resource being processed */
  forecastHour?: number;
  /** Rendered URL of the resource being processed */
  url?: string;
  /** Scan state at the time of the entry */
  state?: string;
  /** Duration in milliseconds */
  durationMs?: number;
  /** Number of rows processed/returned */
  rowsProcessed?: number;
  /** Number of bytes processed */
  bytesProcessed?: number;
  /** Error code for error logs */
  errorCode?: string;
  [key: string]: LogContextValue | undefined;
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  /** Unix timestamp in milliseconds */
  timestamp: number;
  context?: LogContext;
  error?: Error;
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, error?: Error, context?: LogContext): void;
}

export interface LoggerConfig {
  /** Minimum log level to emit (default: 'debug') */
  minLevel?: LogLevel;
  /** Sink for log entries */
  output?: (entry: LogEntry) => void;
}

export interface ConsoleLoggerConfig extends LoggerConfig {
  /** 'json' for structured lines, 'pretty' for humans (default: 'json') */
  format?: 'json' | 'pretty';
}

/**
 * Logger that keeps every entry in memory, for assertions
 */
export interface TestLogger extends Logger {
  getLogs(): LogEntry[];
  getLogsByLevel(level: LogLevel): LogEntry[];
  clear(): void;
}

// =============================================================================
// Log Level Utilities
// =============================================================================

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export const LogLevels = {
  DEBUG: 'debug' as const,
  INFO: 'info' as const,
  WARN: 'warn' as const,
  ERROR: 'error' as const,

  order(level: LogLevel): number {
    return LOG_LEVEL_ORDER[level];
  },

  isAtLeast(level: LogLevel, minLevel: LogLevel): boolean {
    return LOG_LEVEL_ORDER[level] >= LOG_LEVEL_ORDER[minLevel];
  },
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVEL_ORDER, value);
}

// =============================================================================
// Logger Factory Functions
// =============================================================================

/**
 * Build a Logger that filters by level and hands entries to `output`.
 */
function buildLogger(minLevel: LogLevel, output: (entry: LogEntry) => void): Logger {
  const log = (level: LogLevel, message: string, context?: LogContext, error?: Error): void => {
    if (!LogLevels.isAtLeast(level, minLevel)) return;

    const entry: LogEntry = {
      level,
      message,
      timestamp: Date.now(),
    };

    if (context !== undefined) {
      entry.context = context;
    }

    if (error !== undefined) {
      entry.error = error;
    }

    output(entry);
  };

  return {
    debug(message: string, context?: LogContext): void {
      log('debug', message, context);
    },
    info(message: string, context?: LogContext): void {
      log('info', message, context);
    },
    warn(message: string, context?: LogContext): void {
      log('warn', message, context);
    },
    error(message: string, error?: Error, context?: LogContext): void {
      log('error', message, context, error);
    },
  };
}

/**
 * Create a logger with a custom sink
 *
 * @example
 * ```typescript
 * const logger = createLogger({
 *   minLevel: 'info',
 *   output: (entry) => shipToCollector(entry),
 * });
 * ```
 */
export function createLogger(config: LoggerConfig = {}): Logger {
  return buildLogger(config.minLevel ?? 'debug', config.output ?? (() => {}));
}

/**
 * Render one entry the way the console logger prints it.
 */
export function formatLogEntry(entry: LogEntry, format: 'json' | 'pretty'): string {
  if (format === 'json') {
    return JSON.stringify({
      level: entry.level,
      message: entry.message,
      timestamp: entry.timestamp,
      ...(entry.context && { context: entry.context }),
      ...(entry.error && {
        error: {
          name: entry.error.name,
          message: entry.error.message,
          stack: entry.error.stack,
        },
      }),
    });
  }

  const time = new Date(entry.timestamp).toISOString();
  const levelUpper = entry.level.toUpperCase().padEnd(5);
  let output = `[${time}] ${levelUpper} ${entry.message}`;

  if (entry.context) {
    output += ` ${JSON.stringify(entry.context)}`;
  }

  if (entry.error) {
    output += `\n  Error: ${entry.error.message}`;
    if (entry.error.stack) {
      output += `\n  ${entry.error.stack}`;
    }
  }

  return output;
}

/**
 * Create a logger that writes to the console.
 *
 * Entries go to stderr so row output on stdout stays clean.
 */
export function createConsoleLogger(config: ConsoleLoggerConfig = {}): Logger {
  const format = config.format ?? 'json';
  return createLogger({
    ...config,
    output: (entry) => {
      console.error(formatLogEntry(entry, format));
    },
  });
}

export function createNoopLogger(): Logger {
  return {
    debug(): void {},
    info(): void {},
    warn(): void {},
    error(): void {},
  };
}

/**
 * Create a logger that captures entries for assertions
 *
 * @example
 * ```typescript
 * const logger = createTestLogger();
 * await drain(scan);
 * expect(logger.getLogsByLevel('warn')).toHaveLength(0);
 * ```
 */
export function createTestLogger(config: LoggerConfig = {}): TestLogger {
  const logs: LogEntry[] = [];
  const logger = buildLogger(config.minLevel ?? 'debug', entry => {
    logs.push(entry);
  });

  return {
    ...logger,
    getLogs(): LogEntry[] {
      return [...logs];
    },
    getLogsByLevel(level: LogLevel): LogEntry[] {
      return logs.filter(entry => entry.level === level);
    },
    clear(): void {
      logs.length = 0;
    },
  };
}

// =============================================================================
// Child Logger / Context
// =============================================================================

/**
 * Create a child logger whose entries always carry `context`, merged under
 * any context given at the call site.
 */
export function withContext(logger: Logger, context: LogContext): Logger {
  const mergeContext = (localContext?: LogContext): LogContext => {
    if (localContext === undefined) {
      return context;
    }
    return { ...context, ...localContext };
  };

  return {
    debug(message: string, localContext?: LogContext): void {
      logger.debug(message, mergeContext(localContext));
    },
    info(message: string, localContext?: LogContext): void {
      logger.info(message, mergeContext(localContext));
    },
    warn(message: string, localContext?: LogContext): void {
      logger.warn(message, mergeContext(localContext));
    },
    error(message: string, error?: Error, localContext?: LogContext): void {
      logger.error(message, error, mergeContext(localContext));
    },
  };
}
