/**
 * The grid-forecast table function: the entry points a planner calls, in
 * the order it calls them.
 *
 * 1. `bind` - default draft (today's UTC run date, default run hour and
 *    forecast hours)
 * 2. `pushdownComplexFilter` - fold WHERE filters into the draft
 * 3. `cardinality` - size estimate for the optimizer
 * 4. `createScan` - freeze the binding and start a scan
 * 5. `progress` - poll a running scan
 *
 * `gridFileFunction` is the file reader's counterpart: it takes its sources
 * as arguments and pushes nothing down.
 */

import { DEFAULT_CONFIG, type GridScanConfig } from '@gridscan/config';
import type { Logger } from '@gridscan/core';
import { createBindingDraft, formatRunDate } from './binding.js';
import type { GridDecoder } from './decoder.js';
import type { FilterExpression } from './filters.js';
import { readGrid, type GridFileScan, type GridReaderDependencies } from './grid-reader.js';
import type { FetchFunction } from './pipeline.js';
import { GridForecastScan } from './scan.js';
import { pushdownFilters, type PushdownResult } from './translator.js';
import {
  GRID_FILE_FUNCTION_NAME,
  GRID_FILE_SCHEMA,
  GRID_FORECAST_FUNCTION_NAME,
  OUTPUT_SCHEMA,
  type BindingDraft,
  type ColumnDefinition,
  type FilterBinding,
  type GridFileColumn,
} from './types.js';

export interface BindOptions {
  /** Clock used for the default run date (default: now) */
  now?: Date;
  config?: GridScanConfig;
}

export interface ScanDependencies {
  decoder: GridDecoder;
  fetch?: FetchFunction;
  config?: GridScanConfig;
  logger?: Logger;
}

export interface CardinalityEstimate {
  estimatedRows: number;
  maxRows: number;
}

export interface TableFunctionDefinition {
  readonly name: string;
  readonly schema: readonly ColumnDefinition[];
  /** Scans keep one cursor and fetch strictly in order */
  readonly maxWorkers: number;
  bind(options?: BindOptions): BindingDraft;
  pushdownComplexFilter(draft: BindingDraft, filters: readonly FilterExpression[]): PushdownResult;
  cardinality(config?: GridScanConfig): CardinalityEstimate;
  createScan(binding: FilterBinding, deps: ScanDependencies): GridForecastScan;
  progress(scan: GridForecastScan | undefined): number;
}

export const gridForecastFunction: TableFunctionDefinition = {
  name: GRID_FORECAST_FUNCTION_NAME,
  schema: OUTPUT_SCHEMA,
  maxWorkers: 1,

  bind(options: BindOptions = {}): BindingDraft {
    const config = options.config ?? DEFAULT_CONFIG;
    return createBindingDraft({
      runDate: formatRunDate(options.now ?? new Date()),
      runHour: config.scan.defaultRunHour,
      forecastHours: config.scan.defaultForecastHours,
    });
  },

  pushdownComplexFilter(draft, filters) {
    return pushdownFilters(draft, filters);
  },

  /**
   * A fixed figure; the real row count is unknown until payloads are decoded.
   */
  cardinality(config: GridScanConfig = DEFAULT_CONFIG): CardinalityEstimate {
    const rows = config.scan.reportedCardinality;
    return { estimatedRows: rows, maxRows: rows };
  },

  createScan(binding, deps) {
    return new GridForecastScan({ binding, ...deps });
  },

  progress(scan) {
    return scan === undefined ? -1 : scan.progress();
  },
};

export interface GridFileFunctionDefinition {
  readonly name: string;
  readonly schema: readonly ColumnDefinition<GridFileColumn>[];
  readonly maxWorkers: number;
  cardinality(config?: GridScanConfig): CardinalityEstimate;
  createScan(sources: string | readonly string[], deps: GridReaderDependencies): GridFileScan;
  progress(scan: GridFileScan | undefined): number;
}

export const gridFileFunction: GridFileFunctionDefinition = {
  name: GRID_FILE_FUNCTION_NAME,
  schema: GRID_FILE_SCHEMA,
  maxWorkers: 1,

  cardinality(config: GridScanConfig = DEFAULT_CONFIG): CardinalityEstimate {
    const rows = config.scan.reportedCardinality;
    return { estimatedRows: rows, maxRows: rows };
  },

  createScan(sources, deps) {
    return readGrid(sources, deps);
  },

  progress(scan) {
    return scan === undefined ? -1 : scan.progress();
  },
};
