/**
 * Typed exception classes for gridscan
 *
 * Error hierarchy:
 * - GridScanError: Base error class for all gridscan errors
 *   - QueryError: Plan and query-shape issues
 *     - ScanStateError: A scan was pulled after it failed
 *   - ValidationError: Input/config validation failures
 *     - ConfigurationError: Invalid configuration values
 *   - NetworkError: Transport-level failures
 *     - RemoteFetchError: A remote resource could not be fetched
 *   - DecodeError: The grid decoder rejected a payload
 *   - GridSourceError: A file or URL given to the grid file reader failed
 *
 * Filters the planner cannot push down are NOT errors: the translator reports
 * them as `FilterRejection` values and leaves the filter in place.
 *
 * @example
 * ```typescript
 * import { RemoteFetchError, DecodeError } from '@gridscan/core';
 *
 * try {
 *   for await (const row of scan.rows()) consume(row);
 * } catch (error) {
 *   if (error instanceof RemoteFetchError) {
 *     logger.error('fetch failed', error, { url: error.url, forecastHour: error.forecastHour });
 *   } else if (error instanceof DecodeError) {
 *     logger.error('decode failed', error, { forecastHour: error.forecastHour });
 *   }
 * }
 * ```
 */

import { captureStackTrace } from './stack-trace.js';

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Standard error codes for programmatic error handling.
 */
export enum ErrorCode {
  // General errors
  UNKNOWN = 'UNKNOWN',
  INTERNAL_ERROR = 'INTERNAL_ERROR',

  // Query errors
  QUERY_ERROR = 'QUERY_ERROR',
  INVALID_PLAN = 'INVALID_PLAN',
  SCAN_FAILED = 'SCAN_FAILED',

  // Validation errors
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  TYPE_MISMATCH = 'TYPE_MISMATCH',
  INVALID_FORMAT = 'INVALID_FORMAT',
  SCHEMA_VALIDATION_ERROR = 'SCHEMA_VALIDATION_ERROR',
  JSON_PARSE_ERROR = 'JSON_PARSE_ERROR',
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',

  // Network errors
  NETWORK_ERROR = 'NETWORK_ERROR',
  REMOTE_STATUS = 'REMOTE_STATUS',
  REMOTE_UNREACHABLE = 'REMOTE_UNREACHABLE',
  REQUEST_TIMEOUT = 'REQUEST_TIMEOUT',

  // Decode errors
  DECODE_ERROR = 'DECODE_ERROR',
  DECODE_OPEN_FAILED = 'DECODE_OPEN_FAILED',
  DECODE_READ_FAILED = 'DECODE_READ_FAILED',

  // Grid file sources
  SOURCE_UNREADABLE = 'SOURCE_UNREADABLE',
}

/**
 * Type guard to check if a string is a valid ErrorCode.
 */
export function isErrorCode(code: string): code is ErrorCode {
  return Object.values(ErrorCode).some(value => value === code);
}

// =============================================================================
// Base Error Class
// =============================================================================

/**
 * Base error class for all gridscan errors
 *
 * All gridscan-specific errors extend this class, allowing for:
 * - Catching all gridscan errors with a single catch block
 * - Programmatic error identification via the `code` property
 * - Optional details object for structured debugging info
 */
export class GridScanError extends Error {
  /**
   * Error code for programmatic identification.
   * Use ErrorCode enum values for consistency.
   */
  public readonly code: string;

  /**
   * Structured details for debugging (operation, target, forecast hour, etc.)
   */
  public readonly details?: Record<string, unknown>;

  /**
   * Suggestion for resolving the error (when applicable)
   */
  public readonly suggestion?: string;

  /**
   * Timestamp when the error was created (milliseconds since epoch)
   */
  public readonly timestamp: number;

  constructor(
    message: string,
    code: string = ErrorCode.UNKNOWN,
    details?: Record<string, unknown>,
    suggestion?: string
  ) {
    super(message);
    this.name = 'GridScanError';
    this.code = code;
    this.details = details;
    this.suggestion = suggestion;
    this.timestamp = Date.now();

    captureStackTrace(this, GridScanError);
  }

  /**
   * Format error for logging with all context.
   * Returns a structured object suitable for JSON logging.
   */
  toLogContext(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      ...(this.details && { details: this.details }),
      ...(this.suggestion && { suggestion: this.suggestion }),
      timestamp: this.timestamp,
    };
  }

  /**
   * Format error as a detailed string for debugging.
   */
  toDetailedString(): string {
    const parts = [`[${this.code}] ${this.message}`];
    if (this.details) {
      const ctx = Object.entries(this.details)
        .map(([k, v]) => `${k}=${JSON.stringify(v)}`)
        .join(', ');
      parts.push(`Details: ${ctx}`);
    }
    if (this.suggestion) {
      parts.push(`Suggestion: ${this.suggestion}`);
    }
    return parts.join('\n  ');
  }
}

// =============================================================================
// Query Errors
// =============================================================================

export class QueryError extends GridScanError {
  constructor(
    message: string,
    code: string = ErrorCode.QUERY_ERROR,
    details?: Record<string, unknown>,
    suggestion?: string
  ) {
    super(message, code, details, suggestion);
    this.name = 'QueryError';
    captureStackTrace(this, QueryError);
  }

  /**
   * Create an "invalid plan" error for malformed plan trees
   */
  static invalidPlan(reason: string, details?: Record<string, unknown>): QueryError {
    return new QueryError(
      `Invalid query plan: ${reason}`,
      ErrorCode.INVALID_PLAN,
      { operation: 'plan', ...details }
    );
  }
}

/**
 * Raised when a scan is pulled after reaching the `failed` state.
 */
export class ScanStateError extends QueryError {
  constructor(message: string, code: string = ErrorCode.SCAN_FAILED, details?: Record<string, unknown>) {
    super(
      message,
      code,
      details,
      'Re-issue the whole query; a failed scan cannot be resumed.'
    );
    this.name = 'ScanStateError';
    captureStackTrace(this, ScanStateError);
  }
}

// =============================================================================
// Validation Errors
// =============================================================================

export class ValidationError extends GridScanError {
  constructor(
    message: string,
    code: string = ErrorCode.VALIDATION_ERROR,
    details?: Record<string, unknown>,
    suggestion?: string
  ) {
    super(message, code, details, suggestion);
    this.name = 'ValidationError';
    captureStackTrace(this, ValidationError);
  }

  /**
   * Create a type mismatch error
   */
  static typeMismatch(
    path: string,
    expectedType: string,
    actualType: string,
    actualValue?: unknown
  ): ValidationError {
    return new ValidationError(
      `Type mismatch at "${path}": expected ${expectedType}, got ${actualType}`,
      ErrorCode.TYPE_MISMATCH,
      { path, expectedType, actualType, actualValue },
      `Ensure the value at "${path}" is of type ${expectedType}`
    );
  }

  /**
   * Create an invalid format error
   */
  static invalidFormat(field: string, expectedFormat: string, actualValue?: string): ValidationError {
    return new ValidationError(
      `Invalid format for "${field}": expected ${expectedFormat}`,
      ErrorCode.INVALID_FORMAT,
      { field, expectedFormat, actualValue },
      `Provide a value in ${expectedFormat} format`
    );
  }
}

/**
 * Configuration failed validation. `issues` lists every offending path.
 */
export class ConfigurationError extends ValidationError {
  public readonly issues: ReadonlyArray<{ path: string; message: string }>;

  constructor(message: string, issues: ReadonlyArray<{ path: string; message: string }> = []) {
    super(
      message,
      ErrorCode.CONFIGURATION_ERROR,
      { issues: issues.map(i => `${i.path}: ${i.message}`) },
      'Check GRIDSCAN_* environment variables and the config file.'
    );
    this.name = 'ConfigurationError';
    this.issues = issues;
    captureStackTrace(this, ConfigurationError);
  }
}

// =============================================================================
// Network Errors
// =============================================================================

export class NetworkError extends GridScanError {
  constructor(
    message: string,
    code: string = ErrorCode.NETWORK_ERROR,
    details?: Record<string, unknown>,
    suggestion?: string
  ) {
    super(message, code, details, suggestion);
    this.name = 'NetworkError';
    captureStackTrace(this, NetworkError);
  }
}

/**
 * A remote resource could not be fetched. Always fatal for the scan that
 * issued the request; gridscan never retries.
 */
export class RemoteFetchError extends NetworkError {
  /** HTTP status, absent when the request never got a response */
  public readonly status?: number;
  /** Fully rendered URL of the failing request */
  public readonly url: string;
  /** Forecast hour of the resource being fetched */
  public readonly forecastHour: number;

  constructor(
    message: string,
    code: string,
    context: { url: string; forecastHour: number; status?: number; cause?: string }
  ) {
    super(
      message,
      code,
      { operation: 'fetch', ...context },
      'Retry the query once the remote service is reachable, or open the URL to reproduce.'
    );
    this.name = 'RemoteFetchError';
    this.status = context.status;
    this.url = context.url;
    this.forecastHour = context.forecastHour;
    captureStackTrace(this, RemoteFetchError);
  }

  /**
   * The remote answered with a non-success status
   */
  static badStatus(status: number, url: string, forecastHour: number): RemoteFetchError {
    return new RemoteFetchError(
      `Remote API returned status ${status} for forecast hour ${forecastHour}: ${url}`,
      ErrorCode.REMOTE_STATUS,
      { url, forecastHour, status }
    );
  }

  /**
   * The request failed before a response arrived
   */
  static unreachable(url: string, forecastHour: number, cause: unknown): RemoteFetchError {
    const reason = cause instanceof Error ? cause.message : String(cause);
    const timedOut = cause instanceof Error && cause.name === 'TimeoutError';
    return new RemoteFetchError(
      `Failed to fetch forecast hour ${forecastHour} (${reason}): ${url}`,
      timedOut ? ErrorCode.REQUEST_TIMEOUT : ErrorCode.REMOTE_UNREACHABLE,
      { url, forecastHour, cause: reason }
    );
  }
}

// =============================================================================
// Decode Errors
// =============================================================================

/**
 * The grid decoder reported a malformed payload.
 */
export class DecodeError extends GridScanError {
  public readonly forecastHour: number;
  public readonly url: string;

  constructor(
    message: string,
    code: string,
    context: { url: string; forecastHour: number; decoderMessage: string }
  ) {
    super(message, code, { operation: 'decode', ...context });
    this.name = 'DecodeError';
    this.forecastHour = context.forecastHour;
    this.url = context.url;
    captureStackTrace(this, DecodeError);
  }

  static openFailed(decoderMessage: string, url: string, forecastHour: number): DecodeError {
    return new DecodeError(
      `Failed to parse grid data for forecast hour ${forecastHour}: ${decoderMessage}: ${url}`,
      ErrorCode.DECODE_OPEN_FAILED,
      { url, forecastHour, decoderMessage }
    );
  }

  static readFailed(decoderMessage: string, url: string, forecastHour: number): DecodeError {
    return new DecodeError(
      `Grid read error for forecast hour ${forecastHour}: ${decoderMessage}: ${url}`,
      ErrorCode.DECODE_READ_FAILED,
      { url, forecastHour, decoderMessage }
    );
  }
}

// =============================================================================
// Grid Source Errors
// =============================================================================

/**
 * A file path or URL handed to the grid file reader could not be loaded or
 * decoded. Sources are identified by their position in the source list.
 */
export class GridSourceError extends GridScanError {
  public readonly source: string;
  public readonly fileIndex: number;
  public readonly status?: number;

  constructor(
    message: string,
    code: string,
    context: { source: string; fileIndex: number; status?: number; cause?: string }
  ) {
    super(message, code, { operation: 'read', ...context });
    this.name = 'GridSourceError';
    this.source = context.source;
    this.fileIndex = context.fileIndex;
    this.status = context.status;
    captureStackTrace(this, GridSourceError);
  }

  static unreadable(source: string, fileIndex: number, cause: unknown): GridSourceError {
    const reason = cause instanceof Error ? cause.message : String(cause);
    const timedOut = cause instanceof Error && cause.name === 'TimeoutError';
    return new GridSourceError(
      `Failed to load grid source ${fileIndex} (${reason}): ${source}`,
      timedOut ? ErrorCode.REQUEST_TIMEOUT : ErrorCode.SOURCE_UNREADABLE,
      { source, fileIndex, cause: reason }
    );
  }

  static badStatus(status: number, source: string, fileIndex: number): GridSourceError {
    return new GridSourceError(
      `HTTP request failed with status ${status} for grid source ${fileIndex}: ${source}`,
      ErrorCode.REMOTE_STATUS,
      { source, fileIndex, status }
    );
  }

  static openFailed(decoderMessage: string, source: string, fileIndex: number): GridSourceError {
    return new GridSourceError(
      `Failed to open grid source ${fileIndex}: ${decoderMessage}: ${source}`,
      ErrorCode.DECODE_OPEN_FAILED,
      { source, fileIndex, cause: decoderMessage }
    );
  }

  static readFailed(decoderMessage: string, source: string, fileIndex: number): GridSourceError {
    return new GridSourceError(
      `Grid read error in source ${fileIndex}: ${decoderMessage}: ${source}`,
      ErrorCode.DECODE_READ_FAILED,
      { source, fileIndex, cause: decoderMessage }
    );
  }
}

// =============================================================================
// Type Guards
// =============================================================================

export function isGridScanError(error: unknown): error is GridScanError {
  return error instanceof GridScanError;
}

/**
 * Errors that terminate a scan: remote fetch, decode and grid source failures.
 */
export function isFatalScanError(error: unknown): error is RemoteFetchError | DecodeError | GridSourceError {
  return error instanceof RemoteFetchError || error instanceof DecodeError || error instanceof GridSourceError;
}
