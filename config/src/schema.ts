/**
 * @gridscan/config - Config file schema and layered loading
 *
 * @packageDocumentation
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { ConfigurationError, parseJSON } from '@gridscan/core';
import type { DeepPartial, GridScanConfig } from './types.js';
import { DEFAULT_CONFIG } from './defaults.js';
import { createConfig, getEnvOverrides, mergeConfigs } from './config.js';
import { assertValidConfig } from './validation.js';

/**
 * Shape of a JSON config file. Every section and field is optional;
 * unknown keys are rejected.
 */
export const ConfigOverridesSchema = z
  .object({
    api: z
      .object({
        baseUrl: z.string().url(),
        requestTimeoutMs: z.number().int().positive(),
        userAgent: z.string().min(1),
      })
      .partial()
      .strict(),
    scan: z
      .object({
        batchSize: z.number().int().positive(),
        defaultRunHour: z.number().int().min(0).max(23),
        defaultForecastHours: z.array(z.number().int().min(0)).min(1),
        reportedCardinality: z.number().int().positive(),
      })
      .partial()
      .strict(),
    observability: z
      .object({
        logLevel: z.enum(['debug', 'info', 'warn', 'error']),
        logFormat: z.enum(['json', 'pretty']),
      })
      .partial()
      .strict(),
  })
  .partial()
  .strict();

export type ConfigOverrides = z.infer<typeof ConfigOverridesSchema>;

/**
 * Parse the text of a config file into overrides.
 *
 * @throws {JSONParseError} If the text is not JSON
 * @throws {JSONValidationError} If the document does not match the schema
 */
export function parseConfigOverrides(text: string): DeepPartial<GridScanConfig> {
  return parseJSON(text, ConfigOverridesSchema);
}

/**
 * Read a JSON config file and merge it over `base`.
 *
 * @example
 * ```typescript
 * const config = await loadConfigFile('./gridscan.json');
 * ```
 */
export async function loadConfigFile(
  path: string,
  base: GridScanConfig = DEFAULT_CONFIG
): Promise<GridScanConfig> {
  return createConfig(await readConfigOverrides(path), base);
}

async function readConfigOverrides(path: string): Promise<DeepPartial<GridScanConfig>> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Cannot read config file ${path}: ${reason}`, [
      { path, message: reason },
    ]);
  }
  return parseConfigOverrides(text);
}

export interface LoadConfigOptions {
  /** JSON config file applied over the defaults */
  file?: string;
  /** Environment applied over the file (default: process.env) */
  env?: Record<string, string | undefined>;
  /** Environment variable prefix (default: 'GRIDSCAN') */
  envPrefix?: string;
  /** Explicit overrides applied last */
  overrides?: DeepPartial<GridScanConfig>;
}

/**
 * Resolve the effective configuration: defaults, then the config file, then
 * the environment, then explicit overrides. The result is validated.
 *
 * @throws {ConfigurationError} If the resolved configuration is invalid
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<GridScanConfig> {
  const fromFile = options.file !== undefined ? await readConfigOverrides(options.file) : undefined;
  const fromEnv = getEnvOverrides(options.env ?? process.env, options.envPrefix);

  return assertValidConfig(createConfig(mergeConfigs(fromFile, fromEnv, options.overrides)));
}
