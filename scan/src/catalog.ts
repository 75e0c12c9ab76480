/**
 * Static lookup tables: filter-value aliases, parameter codes, surface codes
 * and units. Built once at module load and never mutated.
 */

function lookupTable<V>(entries: ReadonlyArray<readonly [string, V]>): ReadonlyMap<string, V> {
  return new Map(entries);
}

// =============================================================================
// Filter Aliases
// =============================================================================

const VARIABLE_ALIASES = lookupTable<string>([
  ['temperature', 'TMP'],
  ['temp', 'TMP'],
  ['t', 'TMP'],
  ['humidity', 'RH'],
  ['relative_humidity', 'RH'],
  ['rh', 'RH'],
  ['wind_u', 'UGRD'],
  ['u_wind', 'UGRD'],
  ['ugrd', 'UGRD'],
  ['wind_v', 'VGRD'],
  ['v_wind', 'VGRD'],
  ['vgrd', 'VGRD'],
  ['precipitation', 'APCP'],
  ['precip', 'APCP'],
  ['rain', 'APCP'],
  ['apcp', 'APCP'],
  ['gust', 'GUST'],
  ['wind_gust', 'GUST'],
  ['clouds', 'TCDC'],
  ['cloud_cover', 'TCDC'],
  ['tcdc', 'TCDC'],
  ['pressure', 'PRMSL'],
  ['msl_pressure', 'PRMSL'],
  ['prmsl', 'PRMSL'],
]);

const LEVEL_ALIASES = lookupTable<string>([
  ['2m', '2_m_above_ground'],
  ['2_m', '2_m_above_ground'],
  ['2m_above_ground', '2_m_above_ground'],
  ['10m', '10_m_above_ground'],
  ['10_m', '10_m_above_ground'],
  ['10m_above_ground', '10_m_above_ground'],
  ['surface', 'surface'],
  ['sfc', 'surface'],
  ['atmosphere', 'entire_atmosphere'],
  ['entire_atmosphere', 'entire_atmosphere'],
  ['msl', 'mean_sea_level'],
  ['mean_sea_level', 'mean_sea_level'],
]);

const VARIABLE_PREFIX = 'var_';
const LEVEL_PREFIX = 'lev_';

/** Variables requested when a binding names none */
export const DEFAULT_VARIABLES: readonly string[] = Object.freeze(['TMP', 'RH', 'UGRD', 'VGRD']);

/** Levels requested when a binding names none */
export const DEFAULT_LEVELS: readonly string[] = Object.freeze([
  '2_m_above_ground',
  '10_m_above_ground',
  'surface',
]);

function hasPrefix(lower: string, prefix: string): boolean {
  return lower.startsWith(prefix) && lower.length > prefix.length;
}

/**
 * Normalize a filter value on `variable` to an API variable code.
 *
 * Aliases match case-insensitively and resolve to a bare code. A prefixed
 * code (`var_TMP`) stays prefixed, with the code upper-cased, so its suffix
 * is never read as an alias. Anything else is unrecognized.
 *
 * @example
 * ```typescript
 * normalizeVariable('Temperature'); // 'TMP'
 * normalizeVariable('var_t');       // 'var_T'
 * normalizeVariable('ozone');       // undefined
 * ```
 */
export function normalizeVariable(name: string): string | undefined {
  const lower = name.toLowerCase();
  const code = VARIABLE_ALIASES.get(lower);
  if (code !== undefined) {
    return code;
  }
  if (hasPrefix(lower, VARIABLE_PREFIX)) {
    return `${VARIABLE_PREFIX}${lower.slice(VARIABLE_PREFIX.length).toUpperCase()}`;
  }
  return undefined;
}

/**
 * Normalize a filter value on `level` to an API level id.
 *
 * @example
 * ```typescript
 * normalizeLevel('2m');           // '2_m_above_ground'
 * normalizeLevel('LEV_850_mb');   // 'lev_850_mb'
 * normalizeLevel('stratosphere'); // undefined
 * ```
 */
export function normalizeLevel(name: string): string | undefined {
  const lower = name.toLowerCase();
  const id = LEVEL_ALIASES.get(lower);
  if (id !== undefined) {
    return id;
  }
  if (hasPrefix(lower, LEVEL_PREFIX)) {
    return lower;
  }
  return undefined;
}

/**
 * Query-string key for a variable held by a binding. A prefixed name is the
 * key already; a bare alias resolves once.
 */
export function variableKey(variable: string): string {
  const lower = variable.toLowerCase();
  if (hasPrefix(lower, VARIABLE_PREFIX)) {
    return variable;
  }
  return `${VARIABLE_PREFIX}${VARIABLE_ALIASES.get(lower) ?? variable}`;
}

/**
 * Query-string key for a level held by a binding. Aliases such as `2m` are
 * resolved here, so a binding may carry either form.
 */
export function levelKey(level: string): string {
  const lower = level.toLowerCase();
  if (hasPrefix(lower, LEVEL_PREFIX)) {
    return level;
  }
  return `${LEVEL_PREFIX}${LEVEL_ALIASES.get(lower) ?? level}`;
}

// =============================================================================
// Decoded Codes
// =============================================================================

export const UNKNOWN = 'unknown';

const PARAMETER_NAMES = lookupTable<string>([
  ['0/0/0', 'temperature'],
  ['0/1/1', 'humidity'],
  ['0/1/8', 'precipitation'],
  ['0/2/2', 'wind_u'],
  ['0/2/3', 'wind_v'],
  ['0/2/22', 'gust'],
  ['0/3/1', 'pressure'],
  ['0/6/1', 'clouds'],
]);

const UNITS = lookupTable<string>([
  ['temperature', 'K'],
  ['humidity', '%'],
  ['wind_u', 'm/s'],
  ['wind_v', 'm/s'],
  ['gust', 'm/s'],
  ['pressure', 'Pa'],
  ['clouds', '%'],
  ['precipitation', 'kg/m^2'],
]);

/**
 * Canonical variable name for a (discipline, category, number) triple.
 */
export function parameterName(discipline: number, category: number, number: number): string {
  return PARAMETER_NAMES.get(`${discipline}/${category}/${number}`) ?? UNKNOWN;
}

const SURFACE_GROUND = 1;
const SURFACE_ATMOSPHERE = 10;
const SURFACE_ISOBARIC = 100;
const SURFACE_MEAN_SEA_LEVEL = 101;
const SURFACE_HEIGHT_ABOVE_GROUND = 103;

/**
 * Level label for a (surface type, surface value) pair.
 *
 * Isobaric surfaces carry pascals and render in hPa; heights above ground
 * render in metres.
 */
export function surfaceLabel(surfaceType: number, surfaceValue: number): string {
  switch (surfaceType) {
    case SURFACE_GROUND:
      return 'surface';
    case SURFACE_ATMOSPHERE:
      return 'atmosphere';
    case SURFACE_ISOBARIC:
      return `${Math.trunc(surfaceValue / 100)}hPa`;
    case SURFACE_MEAN_SEA_LEVEL:
      return 'msl';
    case SURFACE_HEIGHT_ABOVE_GROUND:
      return `${Math.trunc(surfaceValue)}m`;
    default:
      return UNKNOWN;
  }
}

/**
 * Physical unit of a canonical variable, or null when it has none on record.
 */
export function unitOf(variable: string): string | null {
  return UNITS.get(variable) ?? null;
}
