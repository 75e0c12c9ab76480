// @gridscan/scan
// Filter and limit pushdown into the GFS grid filter API, with a streaming scan over its responses

// =============================================================================
// Types
// =============================================================================

export {
  GRID_FORECAST_FUNCTION_NAME,
  OUTPUT_COLUMNS,
  OUTPUT_SCHEMA,
  type OutputColumn,
  type ColumnType,
  type ColumnDefinition,
  type OutputRow,
  type RowValue,
  type ResultRow,
  type DecodedSample,
  type BoundingBox,
  type BindingDraft,
  type FilterBinding,
  type ResourceDescriptor,
  type ScanState,
  type ScanCursor,
  GRID_FILE_FUNCTION_NAME,
  GRID_FILE_COLUMNS,
  GRID_FILE_SCHEMA,
  type GridFileColumn,
  type GridFileRow,
} from './types.js';

// =============================================================================
// Catalog
// =============================================================================

export {
  DEFAULT_VARIABLES,
  DEFAULT_LEVELS,
  UNKNOWN,
  normalizeVariable,
  normalizeLevel,
  variableKey,
  levelKey,
  parameterName,
  surfaceLabel,
  unitOf,
} from './catalog.js';

export { disciplineName, surfaceName, gridParameterName } from './grid-names.js';

// =============================================================================
// Filters and Pushdown
// =============================================================================

export {
  eq,
  gt,
  gte,
  lt,
  lte,
  isIn,
  opaque,
  describeFilter,
  evaluateFilter,
  matchesAll,
  type FilterValue,
  type ComparisonOperator,
  type ComparisonFilter,
  type MembershipFilter,
  type OpaqueFilter,
  type FilterExpression,
} from './filters.js';

export {
  GLOBAL_BBOX,
  formatRunDate,
  normalizeRunDate,
  createBindingDraft,
  freezeBinding,
  type BindingDraftInit,
} from './binding.js';

export {
  toRemoteLongitude,
  translateFilter,
  applyPatch,
  pushdownFilters,
  type FilterRejection,
  type BindingPatch,
  type FilterTranslation,
  type PushdownResult,
} from './translator.js';

// =============================================================================
// Resources and Scanning
// =============================================================================

export {
  integerBoundingBox,
  buildResourceUrl,
  enumerateResources,
  parseResourceUrl,
  type EnumerateOptions,
  type ParsedResourceUrl,
} from './resources.js';

export type { DecoderFailure, SampleBatch, GridHandle, GridDecoder } from './decoder.js';

export {
  ResourcePipeline,
  type FetchFunction,
  type ResourcePhase,
  type ResourcePipelineOptions,
} from './pipeline.js';

export { projectLongitude, projectSample, projectBatch, projectGridSample } from './projector.js';
export { ProgressTracker } from './progress.js';
export { GridForecastScan, type GridForecastScanOptions } from './scan.js';
export {
  GridFileScan,
  readGrid,
  isHttpSource,
  type GridFileState,
  type GridReaderDependencies,
  type ReadFileFunction,
} from './grid-reader.js';

// =============================================================================
// Planning and Execution
// =============================================================================

export {
  constant,
  parameter,
  tableScan,
  filterNode,
  projectionNode,
  limitNode,
  pushdownLimit,
  explainPlan,
  type LimitBound,
  type TableScanNode,
  type FilterNode,
  type ProjectionNode,
  type LimitNode,
  type PlanNode,
  type LimitPushdown,
} from './plan.js';

export {
  gridForecastFunction,
  gridFileFunction,
  type GridFileFunctionDefinition,
  type BindOptions,
  type ScanDependencies,
  type CardinalityEstimate,
  type TableFunctionDefinition,
} from './table-function.js';

export {
  executePlan,
  planQuery,
  runQuery,
  type ExecutionContext,
  type QueryRequest,
  type PlannedQuery,
  type QueryResult,
} from './executor.js';
