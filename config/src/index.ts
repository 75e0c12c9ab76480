/**
 * @gridscan/config - Centralized Configuration
 *
 * Defaults, layering (file, environment, explicit overrides) and
 * validation for every gridscan package.
 *
 * @example
 * ```typescript
 * import { loadConfig, createLoggerFromConfig } from '@gridscan/config';
 *
 * const config = await loadConfig({ file: './gridscan.json' });
 * const logger = createLoggerFromConfig(config.observability);
 * ```
 *
 * @packageDocumentation
 */

export type {
  DeepPartial,
  ApiConfig,
  ScanConfig,
  LogFormat,
  ObservabilityConfig,
  GridScanConfig,
  ConfigValidationError,
  ConfigValidationWarning,
  ValidationResult,
  EnvConfigOptions,
} from './types.js';

export { DEFAULT_CONFIG, DEFAULT_API_BASE_URL } from './defaults.js';

export { createConfig, mergeConfigs, getEnvOverrides, getConfigFromEnv } from './config.js';

export { validateConfig, assertValidConfig } from './validation.js';

export {
  ConfigOverridesSchema,
  parseConfigOverrides,
  loadConfigFile,
  loadConfig,
  type ConfigOverrides,
  type LoadConfigOptions,
} from './schema.js';

export { createLoggerFromConfig } from './logger.js';
