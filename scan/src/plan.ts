/**
 * Logical plan nodes and the limit-pushdown rewrite.
 *
 * Plans are trees of `{ kind, children }` nodes, pulled from the root
 * (volcano-style). The rewrite looks for
 *
 * ```
 * limit (constant) -> projection* -> table_scan(noaa_gfs_forecast_api)
 * ```
 *
 * and writes the bound into the scan's binding draft so the scan stops
 * fetching once the bound is met. The limit node stays in the plan.
 */

import { describeFilter, type FilterExpression } from './filters.js';
import { GRID_FORECAST_FUNCTION_NAME, type BindingDraft, type OutputColumn } from './types.js';

// =============================================================================
// Plan Nodes
// =============================================================================

/**
 * A limit or offset bound: a constant known at plan time, or a named
 * parameter supplied at execution.
 */
export type LimitBound = { kind: 'constant'; value: number } | { kind: 'parameter'; name: string };

export interface TableScanNode {
  kind: 'table_scan';
  functionName: string;
  draft: BindingDraft;
  children: readonly [];
}

export interface FilterNode {
  kind: 'filter';
  filters: readonly FilterExpression[];
  children: readonly [PlanNode];
}

export interface ProjectionNode {
  kind: 'projection';
  columns: readonly OutputColumn[];
  children: readonly [PlanNode];
}

export interface LimitNode {
  kind: 'limit';
  limit: LimitBound;
  offset?: LimitBound;
  children: readonly [PlanNode];
}

export type PlanNode = TableScanNode | FilterNode | ProjectionNode | LimitNode;

// =============================================================================
// Builders
// =============================================================================

export function constant(value: number): LimitBound {
  return { kind: 'constant', value };
}

export function parameter(name: string): LimitBound {
  return { kind: 'parameter', name };
}

export function tableScan(draft: BindingDraft, functionName: string = GRID_FORECAST_FUNCTION_NAME): TableScanNode {
  return { kind: 'table_scan', functionName, draft, children: [] };
}

export function filterNode(filters: readonly FilterExpression[], child: PlanNode): FilterNode {
  return { kind: 'filter', filters, children: [child] };
}

export function projectionNode(columns: readonly OutputColumn[], child: PlanNode): ProjectionNode {
  return { kind: 'projection', columns, children: [child] };
}

export function limitNode(limit: LimitBound, child: PlanNode, offset?: LimitBound): LimitNode {
  return { kind: 'limit', limit, ...(offset !== undefined && { offset }), children: [child] };
}

// =============================================================================
// Limit Pushdown
// =============================================================================

export interface LimitPushdown {
  scan: TableScanNode;
  /** Rows the scan must produce: the limit plus any constant offset */
  limit: number;
}

function skipProjections(node: PlanNode): PlanNode {
  let current = node;
  while (current.kind === 'projection') {
    current = current.children[0];
  }
  return current;
}

/**
 * Rows a constant limit (and offset) needs from its input, or undefined when
 * either bound is only known at execution.
 */
function constantRowBound(node: LimitNode): number | undefined {
  if (node.limit.kind !== 'constant') {
    return undefined;
  }
  const offset = node.offset ?? constant(0);
  if (offset.kind !== 'constant') {
    return undefined;
  }
  return Math.max(0, node.limit.value) + Math.max(0, offset.value);
}

function isGridForecastScan(node: PlanNode): node is TableScanNode {
  return node.kind === 'table_scan' && node.functionName === GRID_FORECAST_FUNCTION_NAME;
}

/**
 * Push constant limits into grid-forecast scans, bottom-up. Mutates the
 * drafts of matching scans and reports each rewrite.
 */
export function pushdownLimit(plan: PlanNode): LimitPushdown[] {
  const rewrites: LimitPushdown[] = [];

  const visit = (node: PlanNode): void => {
    for (const child of node.children) {
      visit(child);
    }

    if (node.kind !== 'limit') {
      return;
    }
    const target = skipProjections(node.children[0]);
    const bound = constantRowBound(node);
    if (bound === undefined || !isGridForecastScan(target)) {
      return;
    }
    target.draft.limit = bound;
    rewrites.push({ scan: target, limit: bound });
  };

  visit(plan);
  return rewrites;
}

function describeNode(node: PlanNode): string {
  switch (node.kind) {
    case 'table_scan': {
      const limit = node.draft.limit !== undefined ? ` limit=${node.draft.limit}` : '';
      return `TABLE_SCAN ${node.functionName}${limit}`;
    }
    case 'filter':
      return `FILTER ${node.filters.map(describeFilter).join(' AND ')}`;
    case 'projection':
      return `PROJECTION ${node.columns.join(', ')}`;
    case 'limit':
      return `LIMIT ${node.limit.kind === 'constant' ? node.limit.value : `$${node.limit.name}`}`;
  }
}

/**
 * Indented one-node-per-line rendering, for logs and tests.
 */
export function explainPlan(plan: PlanNode, depth = 0): string {
  const lines = [`${'  '.repeat(depth)}${describeNode(plan)}`];
  for (const child of plan.children) {
    lines.push(explainPlan(child, depth + 1));
  }
  return lines.join('\n');
}
