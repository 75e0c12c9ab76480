/**
 * @gridscan/config - Default Configuration Values
 *
 * @packageDocumentation
 */

import type { GridScanConfig, ApiConfig, ScanConfig, ObservabilityConfig } from './types.js';

/**
 * GFS 0.25 degree filter endpoint on NOMADS.
 */
export const DEFAULT_API_BASE_URL = 'https://nomads.ncep.noaa.gov/cgi-bin/filter_gfs_0p25.pl';

const DEFAULT_API_CONFIG: ApiConfig = {
  baseUrl: DEFAULT_API_BASE_URL,
  requestTimeoutMs: 120_000,
  userAgent: 'gridscan/0.1',
};

const DEFAULT_SCAN_CONFIG: ScanConfig = {
  batchSize: 2048,
  defaultRunHour: 0,
  defaultForecastHours: [0],
  reportedCardinality: 10_000_000,
};

const DEFAULT_OBSERVABILITY_CONFIG: ObservabilityConfig = {
  logLevel: 'info',
  logFormat: 'json',
};

/**
 * Default configuration for every gridscan package.
 *
 * @example
 * ```typescript
 * import { DEFAULT_CONFIG, createConfig } from '@gridscan/config';
 *
 * DEFAULT_CONFIG.scan.batchSize; // 2048
 *
 * const config = createConfig({ scan: { batchSize: 512 } });
 * ```
 */
export const DEFAULT_CONFIG: GridScanConfig = Object.freeze({
  api: Object.freeze(DEFAULT_API_CONFIG),
  scan: Object.freeze({
    ...DEFAULT_SCAN_CONFIG,
    defaultForecastHours: Object.freeze([...DEFAULT_SCAN_CONFIG.defaultForecastHours]),
  }),
  observability: Object.freeze(DEFAULT_OBSERVABILITY_CONFIG),
});
