/**
 * @gridscan/scan - Type Definitions
 *
 * Row, sample, binding and resource types shared by the scan pipeline.
 *
 * @packageDocumentation
 */

// =============================================================================
// Output Schema
// =============================================================================

/**
 * Name under which the scan is registered as a table function.
 */
export const GRID_FORECAST_FUNCTION_NAME = 'noaa_gfs_forecast_api';

/**
 * Output columns, in schema order. The order is part of the row contract.
 */
export const OUTPUT_COLUMNS = [
  'latitude',
  'longitude',
  'value',
  'unit',
  'variable',
  'level',
  'forecast_hour',
  'run_date',
  'run_hour',
] as const;

export type OutputColumn = (typeof OUTPUT_COLUMNS)[number];

export type ColumnType = 'DOUBLE' | 'VARCHAR' | 'INTEGER' | 'BIGINT';

export interface ColumnDefinition<Name extends string = OutputColumn> {
  name: Name;
  type: ColumnType;
  nullable: boolean;
}

export const OUTPUT_SCHEMA: readonly ColumnDefinition[] = Object.freeze([
  { name: 'latitude', type: 'DOUBLE', nullable: false },
  { name: 'longitude', type: 'DOUBLE', nullable: false },
  { name: 'value', type: 'DOUBLE', nullable: false },
  { name: 'unit', type: 'VARCHAR', nullable: true },
  { name: 'variable', type: 'VARCHAR', nullable: false },
  { name: 'level', type: 'VARCHAR', nullable: false },
  { name: 'forecast_hour', type: 'INTEGER', nullable: false },
  { name: 'run_date', type: 'VARCHAR', nullable: false },
  { name: 'run_hour', type: 'INTEGER', nullable: false },
]);

/**
 * One schema-conformant row, produced from exactly one decoded sample.
 */
export interface OutputRow {
  /** Degrees north */
  latitude: number;
  /** Degrees east, in (-180, 180] */
  longitude: number;
  /** Raw value in the variable's physical unit */
  value: number;
  unit: string | null;
  /** Canonical variable name, e.g. `temperature`, or `unknown` */
  variable: string;
  /** Level label, e.g. `2m`, `surface`, `850hPa` */
  level: string;
  forecast_hour: number;
  /** YYYYMMDD */
  run_date: string;
  run_hour: number;
}

export type RowValue = OutputRow[OutputColumn];

/**
 * Row shape after projection; columns outside the projection are absent.
 */
export type ResultRow = Partial<OutputRow>;

// =============================================================================
// Grid File Schema
// =============================================================================

/**
 * Name under which the grid file reader is registered as a table function.
 */
export const GRID_FILE_FUNCTION_NAME = 'read_grib';

export const GRID_FILE_COLUMNS = [
  'latitude',
  'longitude',
  'value',
  'discipline',
  'surface',
  'parameter',
  'forecast_time',
  'surface_value',
  'message_index',
  'file_index',
] as const;

export type GridFileColumn = (typeof GRID_FILE_COLUMNS)[number];

export const GRID_FILE_SCHEMA: readonly ColumnDefinition<GridFileColumn>[] = Object.freeze([
  { name: 'latitude', type: 'DOUBLE', nullable: false },
  { name: 'longitude', type: 'DOUBLE', nullable: false },
  { name: 'value', type: 'DOUBLE', nullable: false },
  { name: 'discipline', type: 'VARCHAR', nullable: false },
  { name: 'surface', type: 'VARCHAR', nullable: false },
  { name: 'parameter', type: 'VARCHAR', nullable: false },
  { name: 'forecast_time', type: 'BIGINT', nullable: false },
  { name: 'surface_value', type: 'DOUBLE', nullable: false },
  { name: 'message_index', type: 'INTEGER', nullable: false },
  { name: 'file_index', type: 'INTEGER', nullable: false },
]);

/**
 * One decoded sample of a grid file, with its codes resolved to names.
 * Coordinates are reported as stored in the file.
 */
export interface GridFileRow {
  latitude: number;
  longitude: number;
  value: number;
  /** e.g. `Meteorological` */
  discipline: string;
  /** e.g. `Height_Above_Ground` */
  surface: string;
  /** e.g. `Temperature` */
  parameter: string;
  forecast_time: number;
  surface_value: number;
  message_index: number;
  /** Position of the source in the reader's source list */
  file_index: number;
}

// =============================================================================
// Decoded Samples
// =============================================================================

/**
 * One raw grid point as reported by the decoder.
 */
export interface DecodedSample {
  latitude: number;
  /** Degrees east in the remote convention, [0, 360) */
  longitude: number;
  value: number;
  discipline: number;
  parameterCategory: number;
  parameterNumber: number;
  /** Forecast offset recorded in the message */
  forecastTime: number;
  surfaceType: number;
  surfaceValue: number;
  /** Index of the message within the payload */
  messageIndex: number;
}

// =============================================================================
// Binding
// =============================================================================

/**
 * Bounding box in the remote API's convention (longitudes in [0, 360]).
 */
export interface BoundingBox {
  latMin: number;
  latMax: number;
  lonMin: number;
  lonMax: number;
}

/**
 * Scan configuration while it is being planned. Mutated by filter and limit
 * pushdown, then frozen into a {@link FilterBinding}.
 */
export interface BindingDraft {
  /** YYYYMMDD */
  runDate: string;
  runHour: number;
  /** Forecast hours in fetch order; duplicates are fetched twice */
  forecastHours: number[];
  /** API variable codes (`TMP`, `RH`); empty means the default set */
  variables: string[];
  /** Level names or ids (`2_m_above_ground`, `2m`); empty means the default set */
  levels: string[];
  bbox: BoundingBox;
  hasBoundingBox: boolean;
  /** Row limit; absent means unlimited */
  limit?: number;
}

/**
 * Frozen scan configuration. Never mutated once execution starts.
 */
export interface FilterBinding {
  readonly runDate: string;
  readonly runHour: number;
  readonly forecastHours: readonly number[];
  readonly variables: readonly string[];
  readonly levels: readonly string[];
  readonly bbox: Readonly<BoundingBox>;
  readonly hasBoundingBox: boolean;
  readonly limit?: number;
}

// =============================================================================
// Resources
// =============================================================================

/**
 * One remote fetch target. Renders to exactly one URL.
 */
export interface ResourceDescriptor {
  /** Position in the scan's resource list */
  readonly index: number;
  readonly forecastHour: number;
  readonly runDate: string;
  readonly runHour: number;
  readonly url: string;
}

// =============================================================================
// Scan State
// =============================================================================

export type ScanState = 'idle' | 'fetching' | 'streaming' | 'exhausted' | 'finished' | 'failed';

/**
 * Mutable execution state, owned by one scan.
 */
export interface ScanCursor {
  state: ScanState;
  /** Index of the resource being (or about to be) read */
  resourceIndex: number;
  /** Rows handed to the consumer so far */
  rowsEmitted: number;
  /** Samples read from the current resource */
  samplesRead: number;
}
