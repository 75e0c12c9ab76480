/**
 * Resource enumeration: one remote request per forecast hour.
 *
 * URLs follow the filter endpoint's fixed template:
 *
 * ```
 * <base>?dir=%2Fgfs.YYYYMMDD%2FHH%2Fatmos
 *       &file=gfs.tHHz.pgrb2.0p25.fFFF
 *       &var_TMP=on&...&lev_2_m_above_ground=on&...
 *       &subregion=&toplat=N&bottomlat=S&leftlon=W&rightlon=E
 * ```
 */

import { ValidationError } from '@gridscan/core';
import { DEFAULT_API_BASE_URL } from '@gridscan/config';
import { DEFAULT_LEVELS, DEFAULT_VARIABLES, levelKey, variableKey } from './catalog.js';
import type { BoundingBox, FilterBinding, ResourceDescriptor } from './types.js';

export interface EnumerateOptions {
  /** Filter endpoint, without query string (default: the GFS 0.25 degree filter) */
  baseUrl?: string;
}

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

/**
 * Integer corners that contain the requested box. The endpoint only takes
 * whole degrees; rows outside the exact box are removed by the residual
 * range filters.
 */
export function integerBoundingBox(bbox: Readonly<BoundingBox>): BoundingBox {
  return {
    latMin: Math.floor(bbox.latMin),
    latMax: Math.ceil(bbox.latMax),
    lonMin: Math.floor(bbox.lonMin),
    lonMax: Math.ceil(bbox.lonMax),
  };
}

/**
 * Render the request URL for one forecast hour of a binding.
 */
export function buildResourceUrl(
  binding: FilterBinding,
  forecastHour: number,
  baseUrl: string = DEFAULT_API_BASE_URL
): string {
  const runHour = pad(binding.runHour, 2);
  const variables = binding.variables.length > 0 ? binding.variables : DEFAULT_VARIABLES;
  const levels = binding.levels.length > 0 ? binding.levels : DEFAULT_LEVELS;
  const box = integerBoundingBox(binding.bbox);

  let url = `${baseUrl}?dir=%2Fgfs.${binding.runDate}%2F${runHour}%2Fatmos`;
  url += `&file=gfs.t${runHour}z.pgrb2.0p25.f${pad(forecastHour, 3)}`;
  for (const variable of variables) {
    url += `&${variableKey(variable)}=on`;
  }
  for (const level of levels) {
    url += `&${levelKey(level)}=on`;
  }
  url += '&subregion=';
  url += `&toplat=${box.latMax}&bottomlat=${box.latMin}`;
  url += `&leftlon=${box.lonMin}&rightlon=${box.lonMax}`;
  return url;
}

/**
 * Expand a frozen binding into its resource list: one descriptor per
 * forecast-hour entry, in order, duplicates kept.
 */
export function enumerateResources(
  binding: FilterBinding,
  options: EnumerateOptions = {}
): readonly ResourceDescriptor[] {
  const descriptors = binding.forecastHours.map((forecastHour, index) =>
    Object.freeze({
      index,
      forecastHour,
      runDate: binding.runDate,
      runHour: binding.runHour,
      url: buildResourceUrl(binding, forecastHour, options.baseUrl),
    })
  );
  return Object.freeze(descriptors);
}

// =============================================================================
// Parsing
// =============================================================================

export interface ParsedResourceUrl {
  baseUrl: string;
  runDate: string;
  runHour: number;
  forecastHour: number;
  variables: string[];
  levels: string[];
  bbox: BoundingBox;
}

const DIR_PATTERN = /^\/gfs\.(\d{8})\/(\d{2})\/atmos$/;
const FILE_PATTERN = /^gfs\.t(\d{2})z\.pgrb2\.0p25\.f(\d{3,})$/;

function numberParam(params: URLSearchParams, name: string, url: string): number {
  const raw = params.get(name);
  const value = raw === null || raw.trim() === '' ? Number.NaN : Number(raw);
  if (!Number.isFinite(value)) {
    throw ValidationError.invalidFormat(name, 'a number', url);
  }
  return value;
}

/**
 * Recover a request's run, forecast hour and selections from its URL.
 *
 * @throws {ValidationError} If the URL does not follow the filter template
 */
export function parseResourceUrl(url: string): ParsedResourceUrl {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw ValidationError.invalidFormat('url', 'an absolute URL', url);
  }

  const params = parsed.searchParams;
  const dir = DIR_PATTERN.exec(params.get('dir') ?? '');
  const file = FILE_PATTERN.exec(params.get('file') ?? '');
  if (!dir || !file || dir[2] !== file[1]) {
    throw ValidationError.invalidFormat('url', 'dir=/gfs.YYYYMMDD/HH/atmos with file=gfs.tHHz.pgrb2.0p25.fFFF', url);
  }

  const variables: string[] = [];
  const levels: string[] = [];
  for (const [key, value] of params) {
    if (value !== 'on') continue;
    if (key.startsWith('var_')) variables.push(key.slice(4));
    else if (key.startsWith('lev_')) levels.push(key.slice(4));
  }

  return {
    baseUrl: `${parsed.origin}${parsed.pathname}`,
    runDate: dir[1] ?? '',
    runHour: Number(dir[2]),
    forecastHour: Number(file[2]),
    variables,
    levels,
    bbox: {
      latMin: numberParam(params, 'bottomlat', url),
      latMax: numberParam(params, 'toplat', url),
      lonMin: numberParam(params, 'leftlon', url),
      lonMax: numberParam(params, 'rightlon', url),
    },
  };
}
