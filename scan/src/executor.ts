/**
 * Plan executor: pulls rows through a plan tree as an async stream.
 *
 * Residual filters are evaluated here and limits are enforced here whether
 * or not they were pushed into a scan, so results never depend on the
 * rewrites having fired.
 */

import { QueryError, createNoopLogger, type Logger } from '@gridscan/core';
import { DEFAULT_CONFIG, type GridScanConfig } from '@gridscan/config';
import { freezeBinding } from './binding.js';
import type { GridDecoder } from './decoder.js';
import { matchesAll, type FilterExpression } from './filters.js';
import type { FetchFunction } from './pipeline.js';
import {
  constant,
  explainPlan,
  filterNode,
  limitNode,
  projectionNode,
  pushdownLimit,
  tableScan,
  type LimitBound,
  type LimitPushdown,
  type PlanNode,
} from './plan.js';
import { gridForecastFunction } from './table-function.js';
import type { PushdownResult } from './translator.js';
import { GRID_FORECAST_FUNCTION_NAME, type OutputColumn, type ResultRow } from './types.js';

export interface ExecutionContext {
  decoder: GridDecoder;
  fetch?: FetchFunction;
  config?: GridScanConfig;
  logger?: Logger;
  /** Values for parameter limit/offset bounds */
  parameters?: Readonly<Record<string, number>>;
}

function resolveBound(bound: LimitBound, context: ExecutionContext): number {
  if (bound.kind === 'constant') {
    return bound.value;
  }
  const value = context.parameters?.[bound.name];
  if (value === undefined || !Number.isInteger(value) || value < 0) {
    throw QueryError.invalidPlan(`parameter $${bound.name} must be bound to a non-negative integer`, {
      parameter: bound.name,
    });
  }
  return value;
}

function copyColumn<K extends OutputColumn>(target: ResultRow, source: ResultRow, column: K): void {
  target[column] = source[column];
}

function project(row: ResultRow, columns: readonly OutputColumn[]): ResultRow {
  const projected: ResultRow = {};
  for (const column of columns) {
    copyColumn(projected, row, column);
  }
  return projected;
}

/**
 * Execute a plan. Abandoning the returned iterator closes every scan in it.
 *
 * @throws {QueryError} If the plan references another table function or an unbound parameter
 */
export async function* executePlan(
  node: PlanNode,
  context: ExecutionContext
): AsyncGenerator<ResultRow, void, undefined> {
  switch (node.kind) {
    case 'table_scan': {
      if (node.functionName !== GRID_FORECAST_FUNCTION_NAME) {
        throw QueryError.invalidPlan(`unknown table function "${node.functionName}"`);
      }
      const scan = gridForecastFunction.createScan(freezeBinding(node.draft), context);
      yield* scan.rows();
      return;
    }

    case 'filter':
      for await (const row of executePlan(node.children[0], context)) {
        if (matchesAll(row, node.filters)) {
          yield row;
        }
      }
      return;

    case 'projection':
      for await (const row of executePlan(node.children[0], context)) {
        yield project(row, node.columns);
      }
      return;

    case 'limit': {
      const limit = resolveBound(node.limit, context);
      const offset = node.offset !== undefined ? resolveBound(node.offset, context) : 0;
      if (limit <= 0) {
        return;
      }
      let skipped = 0;
      let emitted = 0;
      for await (const row of executePlan(node.children[0], context)) {
        if (skipped < offset) {
          skipped += 1;
          continue;
        }
        yield row;
        emitted += 1;
        if (emitted >= limit) {
          return;
        }
      }
      return;
    }
  }
}

// =============================================================================
// Query Entry Points
// =============================================================================

export interface QueryRequest {
  filters?: readonly FilterExpression[];
  /** Output columns; all of them when absent */
  columns?: readonly OutputColumn[];
  limit?: number;
  offset?: number;
  /** Clock for the default run date */
  now?: Date;
}

export interface PlannedQuery {
  plan: PlanNode;
  pushdown: PushdownResult;
  limitPushdowns: LimitPushdown[];
}

/**
 * Bind the table function, push filters and the limit down, and build the
 * plan that runs what is left.
 */
export function planQuery(request: QueryRequest, config: GridScanConfig = DEFAULT_CONFIG): PlannedQuery {
  const draft = gridForecastFunction.bind({ now: request.now, config });
  const pushdown = gridForecastFunction.pushdownComplexFilter(draft, request.filters ?? []);

  let plan: PlanNode = tableScan(draft);
  if (pushdown.residual.length > 0) {
    plan = filterNode(pushdown.residual, plan);
  }
  if (request.columns !== undefined) {
    plan = projectionNode(request.columns, plan);
  }
  if (request.limit !== undefined) {
    plan = limitNode(
      constant(request.limit),
      plan,
      request.offset !== undefined ? constant(request.offset) : undefined
    );
  }

  return { plan, pushdown, limitPushdowns: pushdownLimit(plan) };
}

export interface QueryResult extends PlannedQuery {
  rows: ResultRow[];
  durationMs: number;
}

/**
 * Plan and run a query, collecting every row.
 *
 * @example
 * ```typescript
 * const { rows } = await runQuery(
 *   {
 *     filters: [eq('run_date', '2026-01-20'), eq('variable', 'temperature'), eq('level', '2m')],
 *     columns: ['latitude', 'longitude', 'value'],
 *     limit: 100,
 *   },
 *   { decoder }
 * );
 * ```
 */
export async function runQuery(request: QueryRequest, context: ExecutionContext): Promise<QueryResult> {
  const logger = context.logger ?? createNoopLogger();
  const started = Date.now();
  const planned = planQuery(request, context.config ?? DEFAULT_CONFIG);

  logger.debug('query planned', {
    operation: 'plan',
    plan: explainPlan(planned.plan),
    pushed: planned.pushdown.pushed.length,
    residual: planned.pushdown.residual.length,
    limitPushed: planned.limitPushdowns.length > 0,
  });

  const rows: ResultRow[] = [];
  for await (const row of executePlan(planned.plan, context)) {
    rows.push(row);
  }

  const durationMs = Date.now() - started;
  logger.info('query completed', { operation: 'query', rowsProcessed: rows.length, durationMs });
  return { ...planned, rows, durationMs };
}
