/**
 * Filter expressions over the scan's columns.
 *
 * A closed union of the shapes the translator understands. Anything a caller
 * cannot express this way travels as an `opaque` filter: it is never pushed
 * down and is only evaluated locally.
 *
 * @example
 * ```typescript
 * const filters: FilterExpression[] = [
 *   eq('run_date', '2026-01-20'),
 *   isIn('variable', ['temperature', 'humidity']),
 *   gte('longitude', -10),
 * ];
 * ```
 */

import type { OutputColumn, ResultRow, RowValue } from './types.js';
import { formatRunDate } from './binding.js';

// =============================================================================
// Types
// =============================================================================

export type FilterValue = string | number | boolean | Date | null;

export type ComparisonOperator = 'eq' | 'gt' | 'gte' | 'lt' | 'lte';

export interface ComparisonFilter {
  kind: 'comparison';
  column: OutputColumn;
  operator: ComparisonOperator;
  value: FilterValue;
}

export interface MembershipFilter {
  kind: 'membership';
  column: OutputColumn;
  values: readonly FilterValue[];
}

export interface OpaqueFilter {
  kind: 'opaque';
  /** Human-readable form, for logs and plan output */
  description: string;
  test: (row: ResultRow) => boolean;
}

export type FilterExpression = ComparisonFilter | MembershipFilter | OpaqueFilter;

// =============================================================================
// Constructors
// =============================================================================

function comparison(column: OutputColumn, operator: ComparisonOperator, value: FilterValue): ComparisonFilter {
  return { kind: 'comparison', column, operator, value };
}

export const eq = (column: OutputColumn, value: FilterValue): ComparisonFilter =>
  comparison(column, 'eq', value);
export const gt = (column: OutputColumn, value: FilterValue): ComparisonFilter =>
  comparison(column, 'gt', value);
export const gte = (column: OutputColumn, value: FilterValue): ComparisonFilter =>
  comparison(column, 'gte', value);
export const lt = (column: OutputColumn, value: FilterValue): ComparisonFilter =>
  comparison(column, 'lt', value);
export const lte = (column: OutputColumn, value: FilterValue): ComparisonFilter =>
  comparison(column, 'lte', value);

export function isIn(column: OutputColumn, values: readonly FilterValue[]): MembershipFilter {
  return { kind: 'membership', column, values };
}

export function opaque(description: string, test: (row: ResultRow) => boolean): OpaqueFilter {
  return { kind: 'opaque', description, test };
}

// =============================================================================
// Local Evaluation
// =============================================================================

const OPERATOR_SYMBOLS: Record<ComparisonOperator, string> = {
  eq: '=',
  gt: '>',
  gte: '>=',
  lt: '<',
  lte: '<=',
};

function renderValue(value: FilterValue): string {
  if (value instanceof Date) {
    return `DATE '${value.toISOString().slice(0, 10)}'`;
  }
  return typeof value === 'string' ? `'${value}'` : String(value);
}

/**
 * SQL-like rendering of a filter.
 */
export function describeFilter(filter: FilterExpression): string {
  switch (filter.kind) {
    case 'comparison':
      return `${filter.column} ${OPERATOR_SYMBOLS[filter.operator]} ${renderValue(filter.value)}`;
    case 'membership':
      return `${filter.column} IN (${filter.values.map(renderValue).join(', ')})`;
    case 'opaque':
      return filter.description;
  }
}

/**
 * Coerce a filter constant to the representation rows carry for `column`.
 * `run_date` rows hold YYYYMMDD, so dates and dashed strings are rewritten.
 */
function coerce(column: OutputColumn, value: FilterValue): RowValue | undefined {
  if (value instanceof Date) {
    return column === 'run_date' ? formatRunDate(value) : value.getTime();
  }
  if (typeof value === 'boolean') {
    return undefined;
  }
  if (column === 'run_date' && typeof value === 'string') {
    return value.replace(/-/g, '');
  }
  return value;
}

/**
 * Three-way compare of two non-null values of the same primitive type;
 * undefined when they are not comparable (SQL NULL semantics).
 */
function compare(actual: RowValue | undefined, expected: RowValue | undefined): number | undefined {
  if (typeof actual === 'number' && typeof expected === 'number') {
    return actual - expected;
  }
  if (typeof actual === 'string' && typeof expected === 'string') {
    return actual < expected ? -1 : actual > expected ? 1 : 0;
  }
  return undefined;
}

function holds(operator: ComparisonOperator, order: number): boolean {
  switch (operator) {
    case 'eq':
      return order === 0;
    case 'gt':
      return order > 0;
    case 'gte':
      return order >= 0;
    case 'lt':
      return order < 0;
    case 'lte':
      return order <= 0;
  }
}

/**
 * Evaluate a filter against a row. Missing columns and NULLs never match.
 */
export function evaluateFilter(row: ResultRow, filter: FilterExpression): boolean {
  switch (filter.kind) {
    case 'comparison': {
      const order = compare(row[filter.column], coerce(filter.column, filter.value));
      return order !== undefined && holds(filter.operator, order);
    }
    case 'membership':
      return filter.values.some(value => compare(row[filter.column], coerce(filter.column, value)) === 0);
    case 'opaque':
      return filter.test(row);
  }
}

/**
 * True when the row passes every filter (AND semantics).
 */
export function matchesAll(row: ResultRow, filters: readonly FilterExpression[]): boolean {
  return filters.every(filter => evaluateFilter(row, filter));
}
