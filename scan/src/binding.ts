/**
 * Binding lifecycle: a mutable draft during planning, frozen before execution.
 */

import { ValidationError } from '@gridscan/core';
import type { BindingDraft, BoundingBox, FilterBinding } from './types.js';

/** The whole globe in the remote API's longitude convention */
export const GLOBAL_BBOX: Readonly<BoundingBox> = Object.freeze({
  latMin: -90,
  latMax: 90,
  lonMin: 0,
  lonMax: 360,
});

const RUN_DATE_PATTERN = /^\d{8}$/;

/**
 * Render a date as the UTC calendar day, YYYYMMDD.
 */
export function formatRunDate(date: Date): string {
  const year = String(date.getUTCFullYear()).padStart(4, '0');
  const month = String(date.getUTCMonth() + 1).padStart(2, '0');
  const day = String(date.getUTCDate()).padStart(2, '0');
  return `${year}${month}${day}`;
}

/**
 * Accept `YYYYMMDD`, `YYYY-MM-DD` or a Date; undefined for anything else.
 */
export function normalizeRunDate(value: string | Date): string | undefined {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? undefined : formatRunDate(value);
  }
  const compact = value.replace(/-/g, '');
  return RUN_DATE_PATTERN.test(compact) ? compact : undefined;
}

export interface BindingDraftInit {
  runDate: string;
  runHour: number;
  forecastHours: readonly number[];
}

/**
 * A draft with the given run and every other field at its default: default
 * variables and levels, the whole globe, no limit.
 */
export function createBindingDraft(init: BindingDraftInit): BindingDraft {
  return {
    runDate: init.runDate,
    runHour: init.runHour,
    forecastHours: [...init.forecastHours],
    variables: [],
    levels: [],
    bbox: { ...GLOBAL_BBOX },
    hasBoundingBox: false,
  };
}

function isNonNegativeInteger(value: number): boolean {
  return Number.isInteger(value) && value >= 0;
}

/**
 * Validate a draft and freeze a deep copy of it.
 *
 * @throws {ValidationError} If the draft cannot render a valid request
 */
export function freezeBinding(draft: BindingDraft): FilterBinding {
  if (!RUN_DATE_PATTERN.test(draft.runDate)) {
    throw ValidationError.invalidFormat('runDate', 'YYYYMMDD', draft.runDate);
  }
  if (!Number.isInteger(draft.runHour) || draft.runHour < 0 || draft.runHour > 23) {
    throw ValidationError.typeMismatch('runHour', 'integer in [0, 23]', typeof draft.runHour, draft.runHour);
  }
  const badHour = draft.forecastHours.find(hour => !isNonNegativeInteger(hour));
  if (badHour !== undefined) {
    throw ValidationError.typeMismatch('forecastHours', 'non-negative integer', typeof badHour, badHour);
  }
  if (draft.limit !== undefined && !isNonNegativeInteger(draft.limit)) {
    throw ValidationError.typeMismatch('limit', 'non-negative integer', typeof draft.limit, draft.limit);
  }

  const binding: FilterBinding = {
    runDate: draft.runDate,
    runHour: draft.runHour,
    forecastHours: Object.freeze([...draft.forecastHours]),
    variables: Object.freeze([...draft.variables]),
    levels: Object.freeze([...draft.levels]),
    bbox: Object.freeze({ ...draft.bbox }),
    hasBoundingBox: draft.hasBoundingBox,
    ...(draft.limit !== undefined && { limit: draft.limit }),
  };
  return Object.freeze(binding);
}
