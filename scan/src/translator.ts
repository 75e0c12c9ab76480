/**
 * Predicate translator: pushes supported filters into a binding draft.
 *
 * Each filter is translated independently into a patch for the draft. A
 * filter that cannot be translated is rejected (a `Result` error, never an
 * exception) and stays in the residual list with the draft untouched.
 * Patches are applied in filter order, so a later equality on the same
 * column wins.
 *
 * Bounding-box comparisons on latitude/longitude are captured into the draft
 * but always stay in the residual list: rows are re-checked locally against
 * the exact bounds.
 *
 * @example
 * ```typescript
 * const draft = gridForecastFunction.bind();
 * const { residual } = pushdownFilters(draft, [
 *   isIn('variable', ['temperature', 'humidity']),
 *   gte('longitude', -10),
 * ]);
 * // draft.variables => ['TMP', 'RH'], draft.bbox.lonMin => 350
 * // residual        => [gte('longitude', -10)]
 * ```
 */

import { err, isErr, ok, type Result } from '@gridscan/core';
import { normalizeLevel, normalizeVariable } from './catalog.js';
import { normalizeRunDate } from './binding.js';
import type { ComparisonFilter, FilterExpression, FilterValue, MembershipFilter } from './filters.js';
import type { BindingDraft, BoundingBox } from './types.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Why a filter was left for local evaluation.
 */
export interface FilterRejection {
  filter: FilterExpression;
  reason: string;
}

/**
 * Changes a filter makes to a draft.
 */
export interface BindingPatch {
  runDate?: string;
  runHour?: number;
  forecastHours?: number[];
  variables?: string[];
  levels?: string[];
  bbox?: Partial<BoundingBox>;
}

export interface FilterTranslation {
  patch: BindingPatch;
  /** Whether the binding fully captures the filter, so it can be dropped */
  consumed: boolean;
}

export interface PushdownResult {
  /** The draft passed in, updated in place */
  draft: BindingDraft;
  /** Filters that must still be evaluated on each row, in input order */
  residual: FilterExpression[];
  /** Filters that changed the draft (bounding-box filters appear here and in `residual`) */
  pushed: FilterExpression[];
  rejections: FilterRejection[];
}

type Translation = Result<FilterTranslation, FilterRejection>;

// =============================================================================
// Value Parsing
// =============================================================================

function asHour(value: FilterValue): number | undefined {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0 ? value : undefined;
}

function asFinite(value: FilterValue): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

function asName(value: FilterValue, normalize: (name: string) => string | undefined): string | undefined {
  return typeof value === 'string' ? normalize(value) : undefined;
}

/**
 * Longitudes are stored in the remote [0, 360] convention.
 */
export function toRemoteLongitude(longitude: number): number {
  return longitude < 0 ? longitude + 360 : longitude;
}

/**
 * Parse every value or none.
 */
function parseAll<T>(values: readonly FilterValue[], parse: (value: FilterValue) => T | undefined): T[] | undefined {
  const parsed: T[] = [];
  for (const value of values) {
    const result = parse(value);
    if (result === undefined) {
      return undefined;
    }
    parsed.push(result);
  }
  return parsed;
}

// =============================================================================
// Translation
// =============================================================================

function consumed(patch: BindingPatch): Translation {
  return ok({ patch, consumed: true });
}

function reject(filter: FilterExpression, reason: string): Translation {
  return err({ filter, reason });
}

function translateEquality(filter: ComparisonFilter): Translation {
  const { column, value } = filter;

  switch (column) {
    case 'run_date': {
      const runDate = typeof value === 'string' || value instanceof Date ? normalizeRunDate(value) : undefined;
      return runDate !== undefined ? consumed({ runDate }) : reject(filter, 'run_date is not a YYYYMMDD date');
    }
    case 'run_hour': {
      const runHour = asHour(value);
      return runHour !== undefined && runHour <= 23
        ? consumed({ runHour })
        : reject(filter, 'run_hour must be an integer in [0, 23]');
    }
    case 'forecast_hour': {
      const hour = asHour(value);
      return hour !== undefined
        ? consumed({ forecastHours: [hour] })
        : reject(filter, 'forecast_hour must be a non-negative integer');
    }
    case 'variable': {
      const code = asName(value, normalizeVariable);
      return code !== undefined ? consumed({ variables: [code] }) : reject(filter, 'unrecognized variable');
    }
    case 'level': {
      const level = asName(value, normalizeLevel);
      return level !== undefined ? consumed({ levels: [level] }) : reject(filter, 'unrecognized level');
    }
    default:
      return reject(filter, `equality on ${column} is not pushed down`);
  }
}

function translateRange(filter: ComparisonFilter): Translation {
  const bound = asFinite(filter.value);
  if (bound === undefined) {
    return reject(filter, 'bounding-box bound must be a finite number');
  }

  const lower = filter.operator === 'gt' || filter.operator === 'gte';

  switch (filter.column) {
    case 'latitude':
      return ok({ patch: { bbox: lower ? { latMin: bound } : { latMax: bound } }, consumed: false });
    case 'longitude': {
      const remote = toRemoteLongitude(bound);
      return ok({ patch: { bbox: lower ? { lonMin: remote } : { lonMax: remote } }, consumed: false });
    }
    default:
      return reject(filter, `range on ${filter.column} is not pushed down`);
  }
}

function translateMembership(filter: MembershipFilter): Translation {
  if (filter.values.length === 0) {
    return reject(filter, 'empty IN list');
  }

  switch (filter.column) {
    case 'variable': {
      const variables = parseAll(filter.values, value => asName(value, normalizeVariable));
      return variables ? consumed({ variables }) : reject(filter, 'IN list holds an unrecognized variable');
    }
    case 'level': {
      const levels = parseAll(filter.values, value => asName(value, normalizeLevel));
      return levels ? consumed({ levels }) : reject(filter, 'IN list holds an unrecognized level');
    }
    case 'forecast_hour': {
      const forecastHours = parseAll(filter.values, asHour);
      return forecastHours
        ? consumed({ forecastHours })
        : reject(filter, 'IN list holds a value that is not a forecast hour');
    }
    default:
      return reject(filter, `IN on ${filter.column} is not pushed down`);
  }
}

/**
 * Translate one filter without touching any draft.
 */
export function translateFilter(filter: FilterExpression): Translation {
  switch (filter.kind) {
    case 'comparison':
      return filter.operator === 'eq' ? translateEquality(filter) : translateRange(filter);
    case 'membership':
      return translateMembership(filter);
    case 'opaque':
      return reject(filter, 'expression shape is not supported');
  }
}

/**
 * Apply a patch to a draft in place.
 */
export function applyPatch(draft: BindingDraft, patch: BindingPatch): void {
  if (patch.runDate !== undefined) draft.runDate = patch.runDate;
  if (patch.runHour !== undefined) draft.runHour = patch.runHour;
  if (patch.forecastHours !== undefined) draft.forecastHours = [...patch.forecastHours];
  if (patch.variables !== undefined) draft.variables = [...patch.variables];
  if (patch.levels !== undefined) draft.levels = [...patch.levels];
  if (patch.bbox !== undefined) {
    draft.bbox = { ...draft.bbox, ...patch.bbox };
    draft.hasBoundingBox = true;
  }
}

/**
 * Push every supported filter into `draft` (mutated in place).
 */
export function pushdownFilters(draft: BindingDraft, filters: readonly FilterExpression[]): PushdownResult {
  const residual: FilterExpression[] = [];
  const pushed: FilterExpression[] = [];
  const rejections: FilterRejection[] = [];

  for (const filter of filters) {
    const translation = translateFilter(filter);

    if (isErr(translation)) {
      rejections.push(translation.error);
      residual.push(filter);
      continue;
    }

    applyPatch(draft, translation.value.patch);
    pushed.push(filter);
    if (!translation.value.consumed) {
      residual.push(filter);
    }
  }

  return { draft, residual, pushed, rejections };
}
