// @gridscan/core
// Errors, Result values, structured logging and JSON validation shared by every package

// =============================================================================
// Errors
// =============================================================================

export {
  ErrorCode,
  isErrorCode,
  GridScanError,
  QueryError,
  ScanStateError,
  ValidationError,
  ConfigurationError,
  NetworkError,
  RemoteFetchError,
  DecodeError,
  GridSourceError,
  isGridScanError,
  isFatalScanError,
} from './errors.js';

export { captureStackTrace } from './stack-trace.js';

// =============================================================================
// Result
// =============================================================================

export {
  ok,
  err,
  isOk,
  isErr,
  all,
  type Ok,
  type Err,
  type Result,
} from './result.js';

// =============================================================================
// Logging
// =============================================================================

export {
  LogLevels,
  isLogLevel,
  createLogger,
  createConsoleLogger,
  createNoopLogger,
  createTestLogger,
  formatLogEntry,
  withContext,
  type LogLevel,
  type LogContext,
  type LogContextValue,
  type LogEntry,
  type Logger,
  type LoggerConfig,
  type ConsoleLoggerConfig,
  type TestLogger,
} from './logging.js';

// =============================================================================
// Validation
// =============================================================================

export {
  parseJSON,
  safeParseJSON,
  JSONParseError,
  JSONValidationError,
  type ZodErrorLike,
  type ZodSchemaLike,
  type SafeParseJSONResult,
} from './validation.js';
