/**
 * @gridscan/config - Type Definitions
 *
 * Naming conventions:
 * - *TimeoutMs: milliseconds
 * - *Size / *Count: numeric limits
 *
 * @packageDocumentation
 */

import type { LogLevel } from '@gridscan/core';

// =============================================================================
// Utility Types
// =============================================================================

/**
 * Recursive partial. Arrays are replaced wholesale, never merged.
 */
export type DeepPartial<T> = T extends readonly unknown[]
  ? T
  : T extends object
    ? { [P in keyof T]?: DeepPartial<T[P]> }
    : T;

// =============================================================================
// Sections
// =============================================================================

/**
 * Remote grid-forecast API settings.
 */
export interface ApiConfig {
  /** Filter endpoint of the remote API, without query string */
  baseUrl: string;
  /** Per-request transport timeout */
  requestTimeoutMs: number;
  /** Value sent in the User-Agent header */
  userAgent: string;
}

/**
 * Scan execution settings.
 */
export interface ScanConfig {
  /** Maximum number of samples pulled from the decoder per batch */
  batchSize: number;
  /** Run hour bound when no `run_hour` filter is pushed down */
  defaultRunHour: number;
  /** Forecast hours bound when no `forecast_hour` filter is pushed down */
  defaultForecastHours: readonly number[];
  /** Row count reported to planners as the scan's cardinality estimate */
  reportedCardinality: number;
}

export type LogFormat = 'json' | 'pretty';

export interface ObservabilityConfig {
  logLevel: LogLevel;
  logFormat: LogFormat;
}

/**
 * Complete gridscan configuration.
 */
export interface GridScanConfig {
  api: ApiConfig;
  scan: ScanConfig;
  observability: ObservabilityConfig;
}

// =============================================================================
// Validation Types
// =============================================================================

export interface ConfigValidationError {
  /** Dotted path of the offending field, e.g. `scan.batchSize` */
  path: string;
  message: string;
  value?: unknown;
  suggestion?: string;
}

export interface ConfigValidationWarning {
  path: string;
  message: string;
  value?: unknown;
  recommendation?: string;
}

export interface ValidationResult {
  valid: boolean;
  errors: ConfigValidationError[];
  warnings: ConfigValidationWarning[];
}

// =============================================================================
// Environment Options
// =============================================================================

export interface EnvConfigOptions {
  /** Variable prefix (default: 'GRIDSCAN') */
  prefix?: string;
  /** Environment to read (default: process.env) */
  env?: Record<string, string | undefined>;
  /** Configuration the environment overrides (default: DEFAULT_CONFIG) */
  base?: GridScanConfig;
}
