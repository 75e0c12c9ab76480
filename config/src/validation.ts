/**
 * @gridscan/config - Configuration Validation
 *
 * @packageDocumentation
 */

import { ConfigurationError, isLogLevel } from '@gridscan/core';
import type {
  GridScanConfig,
  ValidationResult,
  ConfigValidationError,
  ConfigValidationWarning,
} from './types.js';

/** Model cycles the remote API publishes runs for */
const SYNOPTIC_RUN_HOURS = [0, 6, 12, 18];

/** Longest forecast horizon of the 0.25 degree product */
const MAX_FORECAST_HOUR = 384;

/**
 * Validate a complete GridScanConfig.
 *
 * @example
 * ```typescript
 * const result = validateConfig(config);
 * if (!result.valid) {
 *   logger.error('invalid config', undefined, { issues: result.errors.map(e => e.path) });
 * }
 * ```
 */
export function validateConfig(config: GridScanConfig): ValidationResult {
  const errors: ConfigValidationError[] = [];
  const warnings: ConfigValidationWarning[] = [];

  validateApiConfig(config.api, errors, warnings);
  validateScanConfig(config.scan, errors, warnings);
  validateObservabilityConfig(config.observability, errors, warnings);

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}

/**
 * Throw a ConfigurationError listing every validation error.
 */
export function assertValidConfig(config: GridScanConfig): GridScanConfig {
  const result = validateConfig(config);
  if (!result.valid) {
    throw new ConfigurationError(
      `Invalid configuration: ${result.errors.map(e => `${e.path} ${e.message}`).join('; ')}`,
      result.errors.map(e => ({ path: e.path, message: e.message }))
    );
  }
  return config;
}

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

function validateApiConfig(
  api: GridScanConfig['api'],
  errors: ConfigValidationError[],
  warnings: ConfigValidationWarning[]
): void {
  if (!isHttpUrl(api.baseUrl)) {
    errors.push({
      path: 'api.baseUrl',
      message: 'Base URL must be an absolute http(s) URL',
      value: api.baseUrl,
      suggestion: 'Use the filter endpoint, e.g. https://nomads.ncep.noaa.gov/cgi-bin/filter_gfs_0p25.pl',
    });
  } else if (api.baseUrl.includes('?')) {
    errors.push({
      path: 'api.baseUrl',
      message: 'Base URL must not carry a query string',
      value: api.baseUrl,
    });
  }

  if (!(api.requestTimeoutMs > 0)) {
    errors.push({
      path: 'api.requestTimeoutMs',
      message: 'Request timeout must be a positive number in milliseconds',
      value: api.requestTimeoutMs,
    });
  } else if (api.requestTimeoutMs < 5000) {
    warnings.push({
      path: 'api.requestTimeoutMs',
      message: 'Grid downloads routinely take several seconds',
      value: api.requestTimeoutMs,
      recommendation: 'Use at least 30000 ms',
    });
  }

  if (api.userAgent.trim() === '') {
    errors.push({
      path: 'api.userAgent',
      message: 'User agent must not be empty',
      value: api.userAgent,
    });
  }
}

function validateScanConfig(
  scan: GridScanConfig['scan'],
  errors: ConfigValidationError[],
  warnings: ConfigValidationWarning[]
): void {
  if (!Number.isInteger(scan.batchSize) || scan.batchSize <= 0) {
    errors.push({
      path: 'scan.batchSize',
      message: 'Batch size must be a positive integer',
      value: scan.batchSize,
    });
  }

  if (!Number.isInteger(scan.defaultRunHour) || scan.defaultRunHour < 0 || scan.defaultRunHour > 23) {
    errors.push({
      path: 'scan.defaultRunHour',
      message: 'Default run hour must be an integer between 0 and 23',
      value: scan.defaultRunHour,
    });
  } else if (!SYNOPTIC_RUN_HOURS.includes(scan.defaultRunHour)) {
    warnings.push({
      path: 'scan.defaultRunHour',
      message: 'Runs are only published at 00, 06, 12 and 18 UTC',
      value: scan.defaultRunHour,
      recommendation: `Use one of ${SYNOPTIC_RUN_HOURS.join(', ')}`,
    });
  }

  if (scan.defaultForecastHours.length === 0) {
    errors.push({
      path: 'scan.defaultForecastHours',
      message: 'At least one default forecast hour is required',
      value: scan.defaultForecastHours,
    });
  }

  scan.defaultForecastHours.forEach((hour, index) => {
    if (!Number.isInteger(hour) || hour < 0 || hour > MAX_FORECAST_HOUR) {
      errors.push({
        path: `scan.defaultForecastHours.${index}`,
        message: `Forecast hour must be an integer between 0 and ${MAX_FORECAST_HOUR}`,
        value: hour,
      });
    }
  });

  if (!Number.isInteger(scan.reportedCardinality) || scan.reportedCardinality <= 0) {
    errors.push({
      path: 'scan.reportedCardinality',
      message: 'Reported cardinality must be a positive integer',
      value: scan.reportedCardinality,
    });
  }
}

function validateObservabilityConfig(
  observability: GridScanConfig['observability'],
  errors: ConfigValidationError[],
  warnings: ConfigValidationWarning[]
): void {
  if (!isLogLevel(observability.logLevel)) {
    errors.push({
      path: 'observability.logLevel',
      message: 'Log level must be one of: debug, info, warn, error',
      value: observability.logLevel,
    });
  }

  const validLogFormats = ['json', 'pretty'];
  if (!validLogFormats.includes(observability.logFormat)) {
    errors.push({
      path: 'observability.logFormat',
      message: `Log format must be one of: ${validLogFormats.join(', ')}`,
      value: observability.logFormat,
    });
  }

  if (observability.logLevel === 'debug') {
    warnings.push({
      path: 'observability.logLevel',
      message: 'Debug logging records every rendered URL and batch',
      value: observability.logLevel,
      recommendation: 'Use "info" or higher outside development',
    });
  }
}
