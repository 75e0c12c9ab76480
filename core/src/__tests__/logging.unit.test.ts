/**
 * @gridscan/core - Logging tests
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  createLogger,
  createConsoleLogger,
  createNoopLogger,
  createTestLogger,
  formatLogEntry,
  withContext,
  isLogLevel,
  LogLevels,
  type LogEntry,
} from '../logging.js';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('createTestLogger', () => {
  it('should capture entries with context', () => {
    const logger = createTestLogger();

    logger.info('resource opened', { forecastHour: 6 });

    const logs = logger.getLogs();
    expect(logs).toHaveLength(1);
    expect(logs[0]?.level).toBe('info');
    expect(logs[0]?.message).toBe('resource opened');
    expect(logs[0]?.context).toEqual({ forecastHour: 6 });
  });

  it('should drop entries below the minimum level', () => {
    const logger = createTestLogger({ minLevel: 'warn' });

    logger.debug('noise');
    logger.info('noise');
    logger.warn('limit reached');
    logger.error('fetch failed', new Error('404'));

    expect(logger.getLogs().map(l => l.level)).toEqual(['warn', 'error']);
    expect(logger.getLogsByLevel('error')[0]?.error?.message).toBe('404');
  });

  it('should clear captured entries', () => {
    const logger = createTestLogger();
    logger.info('one');
    logger.clear();
    expect(logger.getLogs()).toEqual([]);
  });
});

describe('createLogger', () => {
  it('should hand every entry to the output sink', () => {
    const entries: LogEntry[] = [];
    const logger = createLogger({ output: entry => entries.push(entry) });

    logger.debug('a');
    logger.error('b');

    expect(entries.map(e => e.message)).toEqual(['a', 'b']);
    expect(entries[1]).not.toHaveProperty('error');
  });

  it('should do nothing without a sink', () => {
    expect(() => createLogger().info('dropped')).not.toThrow();
    expect(() => createNoopLogger().error('dropped')).not.toThrow();
  });
});

describe('withContext', () => {
  it('should merge base context under call-site context', () => {
    const base = createTestLogger();
    const logger = withContext(base, { service: 'gfs-scan', forecastHour: 0 });

    logger.warn('empty resource', { forecastHour: 6 });
    logger.info('plain');

    expect(base.getLogs()[0]?.context).toEqual({ service: 'gfs-scan', forecastHour: 6 });
    expect(base.getLogs()[1]?.context).toEqual({ service: 'gfs-scan', forecastHour: 0 });
  });
});

describe('formatLogEntry', () => {
  const entry: LogEntry = {
    level: 'info',
    message: 'scan finished',
    timestamp: Date.UTC(2026, 0, 20, 6, 0, 0),
    context: { rowsProcessed: 5 },
  };

  it('should render JSON lines', () => {
    expect(formatLogEntry(entry, 'json')).toBe(
      `{"level":"info","message":"scan finished","timestamp":${entry.timestamp},"context":{"rowsProcessed":5}}`
    );
  });

  it('should render pretty lines', () => {
    expect(formatLogEntry(entry, 'pretty')).toBe(
      '[2026-01-20T06:00:00.000Z] INFO  scan finished {"rowsProcessed":5}'
    );
  });
});

describe('createConsoleLogger', () => {
  it('should write formatted entries to stderr', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const logger = createConsoleLogger({ format: 'pretty', minLevel: 'info' });

    logger.debug('hidden');
    logger.info('shown');

    expect(spy).toHaveBeenCalledTimes(1);
    expect(String(spy.mock.calls[0]?.[0])).toContain('INFO  shown');
  });
});

describe('log levels', () => {
  it('should order levels', () => {
    expect(LogLevels.isAtLeast('error', 'warn')).toBe(true);
    expect(LogLevels.isAtLeast('debug', 'info')).toBe(false);
    expect(LogLevels.order('warn')).toBe(2);
  });

  it('should validate level names', () => {
    expect(isLogLevel('warn')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
  });
});
