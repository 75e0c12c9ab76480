import { createConsoleLogger, type Logger } from '@gridscan/core';
import type { ObservabilityConfig } from './types.js';

/**
 * Console logger honouring the observability section.
 */
export function createLoggerFromConfig(observability: ObservabilityConfig): Logger {
  return createConsoleLogger({
    minLevel: observability.logLevel,
    format: observability.logFormat,
  });
}
