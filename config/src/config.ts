/**
 * @gridscan/config - Configuration Factory Functions
 *
 * Provides functions to create, merge, and load configurations.
 *
 * @packageDocumentation
 */

import { isLogLevel, type LogLevel } from '@gridscan/core';
import type { GridScanConfig, DeepPartial, EnvConfigOptions, LogFormat } from './types.js';
import { DEFAULT_CONFIG } from './defaults.js';

/**
 * Copy of `value` without its undefined properties, so that an absent
 * override never clobbers a base value.
 */
function compact<T extends object>(value: T | undefined): Partial<T> {
  const result: Partial<T> = {};
  if (!value) {
    return result;
  }
  for (const key in value) {
    const field = value[key];
    if (field !== undefined) {
      result[key] = field;
    }
  }
  return result;
}

/**
 * Deep freeze an object to prevent mutation.
 */
function deepFreeze<T>(obj: T): Readonly<T> {
  if (obj === null || typeof obj !== 'object') {
    return obj;
  }

  Object.freeze(obj);

  for (const value of Object.values(obj)) {
    if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }

  return obj;
}

/**
 * Create a complete GridScanConfig with optional overrides.
 *
 * @param overrides - Partial configuration to merge over `base`
 * @param base - Configuration to start from (defaults to DEFAULT_CONFIG)
 * @returns Frozen GridScanConfig with all values filled in
 *
 * @example
 * ```typescript
 * // Use all defaults
 * const config1 = createConfig();
 *
 * // Override specific values
 * const config2 = createConfig({
 *   api: { requestTimeoutMs: 30_000 },
 *   scan: { defaultForecastHours: [0, 6, 12] },
 * });
 *
 * // Build on another config
 * const config3 = createConfig({ observability: { logFormat: 'pretty' } }, config2);
 * ```
 */
export function createConfig(
  overrides?: DeepPartial<GridScanConfig>,
  base: GridScanConfig = DEFAULT_CONFIG
): GridScanConfig {
  const scan = { ...base.scan, ...compact(overrides?.scan) };

  return deepFreeze({
    api: { ...base.api, ...compact(overrides?.api) },
    scan: { ...scan, defaultForecastHours: [...scan.defaultForecastHours] },
    observability: { ...base.observability, ...compact(overrides?.observability) },
  });
}

/**
 * Merge multiple partial configurations.
 *
 * Later configurations take precedence over earlier ones.
 *
 * @example
 * ```typescript
 * const fromFile = { api: { requestTimeoutMs: 60_000 } };
 * const fromCaller = { api: { userAgent: 'nightly-ingest' } };
 * const merged = mergeConfigs(fromFile, fromCaller);
 * // merged.api => { requestTimeoutMs: 60_000, userAgent: 'nightly-ingest' }
 * ```
 */
export function mergeConfigs(
  ...configs: Array<DeepPartial<GridScanConfig> | null | undefined>
): DeepPartial<GridScanConfig> {
  let result: DeepPartial<GridScanConfig> = {};

  for (const config of configs) {
    if (config) {
      result = {
        api: { ...result.api, ...compact(config.api) },
        scan: { ...result.scan, ...compact(config.scan) },
        observability: { ...result.observability, ...compact(config.observability) },
      };
    }
  }

  return result;
}

// =============================================================================
// Environment
// =============================================================================

function parseNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  const num = Number(value);
  return Number.isNaN(num) ? undefined : num;
}

/**
 * Comma-separated list of numbers. Ignored as a whole if any entry is not a number.
 */
function parseNumberList(value: string | undefined): number[] | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  const numbers = value.split(',').map(part => parseNumber(part));
  const parsed: number[] = [];
  for (const num of numbers) {
    if (num === undefined) {
      return undefined;
    }
    parsed.push(num);
  }
  return parsed;
}

function parseLogLevel(value: string | undefined): LogLevel | undefined {
  const level = value?.toLowerCase();
  return level !== undefined && isLogLevel(level) ? level : undefined;
}

function parseLogFormat(value: string | undefined): LogFormat | undefined {
  const format = value?.toLowerCase();
  return format === 'json' || format === 'pretty' ? format : undefined;
}

/**
 * Get environment variable with prefix.
 */
function getEnvVar(
  env: Record<string, string | undefined>,
  prefix: string,
  ...parts: string[]
): string | undefined {
  const key = [prefix, ...parts].join('_').toUpperCase();
  return env[key];
}

/**
 * Read configuration overrides from environment variables.
 *
 * Variables follow the pattern `<PREFIX>_<SECTION>_<FIELD>`; values that do
 * not parse are ignored.
 */
export function getEnvOverrides(
  env: Record<string, string | undefined>,
  prefix = 'GRIDSCAN'
): DeepPartial<GridScanConfig> {
  return {
    api: {
      baseUrl: getEnvVar(env, prefix, 'API', 'BASE', 'URL'),
      requestTimeoutMs: parseNumber(getEnvVar(env, prefix, 'API', 'REQUEST', 'TIMEOUT', 'MS')),
      userAgent: getEnvVar(env, prefix, 'API', 'USER', 'AGENT'),
    },
    scan: {
      batchSize: parseNumber(getEnvVar(env, prefix, 'SCAN', 'BATCH', 'SIZE')),
      defaultRunHour: parseNumber(getEnvVar(env, prefix, 'SCAN', 'DEFAULT', 'RUN', 'HOUR')),
      defaultForecastHours: parseNumberList(getEnvVar(env, prefix, 'SCAN', 'DEFAULT', 'FORECAST', 'HOURS')),
      reportedCardinality: parseNumber(getEnvVar(env, prefix, 'SCAN', 'REPORTED', 'CARDINALITY')),
    },
    observability: {
      logLevel: parseLogLevel(getEnvVar(env, prefix, 'OBSERVABILITY', 'LOG', 'LEVEL')),
      logFormat: parseLogFormat(getEnvVar(env, prefix, 'OBSERVABILITY', 'LOG', 'FORMAT')),
    },
  };
}

/**
 * Create configuration from environment variables.
 *
 * Environment variables follow the pattern: GRIDSCAN_<SECTION>_<FIELD>
 * For example:
 * - GRIDSCAN_API_BASE_URL=http://localhost:8080/filter
 * - GRIDSCAN_API_REQUEST_TIMEOUT_MS=30000
 * - GRIDSCAN_SCAN_DEFAULT_FORECAST_HOURS=0,6,12
 * - GRIDSCAN_OBSERVABILITY_LOG_LEVEL=debug
 *
 * @example
 * ```typescript
 * const config = getConfigFromEnv();
 * const custom = getConfigFromEnv({ prefix: 'WEATHER', env: myEnvObject });
 * ```
 */
export function getConfigFromEnv(options: EnvConfigOptions = {}): GridScanConfig {
  const prefix = options.prefix ?? 'GRIDSCAN';
  const env = options.env ?? process.env;

  return createConfig(getEnvOverrides(env, prefix), options.base ?? DEFAULT_CONFIG);
}
