/**
 * @gridscan/core - Type-safe JSON parsing
 *
 * `parseJSON` and `safeParseJSON` accept any schema with zod's
 * `safeParse`/`parse` shape, so callers pass a zod schema directly while
 * core itself stays free of a zod runtime dependency.
 *
 * @module validation
 */

import { ValidationError, ErrorCode } from './errors.js';
import { captureStackTrace } from './stack-trace.js';

// =============================================================================
// Schema Contracts
// =============================================================================

/**
 * ZodError-compatible description of a validation failure
 */
export interface ZodErrorLike {
  issues: Array<{
    code: string;
    path: (string | number)[];
    message: string;
  }>;
  message: string;
}

/**
 * Any schema exposing zod's `safeParse` and `parse`
 */
export interface ZodSchemaLike<T> {
  safeParse(data: unknown): { success: true; data: T } | { success: false; error: ZodErrorLike };
  parse(data: unknown): T;
}

export type SafeParseJSONResult<T> =
  | { success: true; data: T; error?: never }
  | { success: false; data?: never; error: ZodErrorLike };

// =============================================================================
// Errors
// =============================================================================

/**
 * The input was not valid JSON.
 */
export class JSONParseError extends ValidationError {
  constructor(message: string, cause?: unknown) {
    super(
      message,
      ErrorCode.JSON_PARSE_ERROR,
      { cause: cause instanceof Error ? cause.message : String(cause) },
      'Ensure the JSON document is well formed.'
    );
    this.name = 'JSONParseError';
    this.cause = cause;
    captureStackTrace(this, JSONParseError);
  }
}

/**
 * The JSON parsed but did not match the schema.
 */
export class JSONValidationError extends ValidationError {
  public readonly zodError: ZodErrorLike;

  constructor(message: string, zodError: ZodErrorLike) {
    super(
      message,
      ErrorCode.SCHEMA_VALIDATION_ERROR,
      { issues: zodError.issues.map(i => ({ path: i.path, message: i.message })) },
      'Ensure the JSON document matches the expected schema.'
    );
    this.name = 'JSONValidationError';
    this.zodError = zodError;
    captureStackTrace(this, JSONValidationError);
  }
}

function formatIssues(error: ZodErrorLike): string {
  return error.issues
    .map(i => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message))
    .join(', ');
}

// =============================================================================
// Parsing
// =============================================================================

/**
 * Parse a JSON string and validate it against a schema.
 *
 * @throws {JSONParseError} If the string is not JSON
 * @throws {JSONValidationError} If the value does not match the schema
 *
 * @example
 * ```typescript
 * import { z } from 'zod';
 *
 * const Overrides = z.object({ scan: z.object({ batchSize: z.number() }).partial() }).partial();
 * const overrides = parseJSON(text, Overrides);
 * ```
 */
export function parseJSON<T>(json: string, schema: ZodSchemaLike<T>): T {
  let parsed: unknown;

  try {
    parsed = JSON.parse(json);
  } catch (cause) {
    throw new JSONParseError(
      `Failed to parse JSON: ${cause instanceof Error ? cause.message : String(cause)}`,
      cause
    );
  }

  const result = schema.safeParse(parsed);

  if (!result.success) {
    throw new JSONValidationError(`JSON validation failed: ${formatIssues(result.error)}`, result.error);
  }

  return result.data;
}

/**
 * Like `parseJSON`, but reports failure as a value instead of throwing.
 */
export function safeParseJSON<T>(json: string, schema: ZodSchemaLike<T>): SafeParseJSONResult<T> {
  let parsed: unknown;

  try {
    parsed = JSON.parse(json);
  } catch {
    return {
      success: false,
      error: {
        issues: [{ code: 'custom', path: [], message: 'Invalid JSON syntax' }],
        message: 'Invalid JSON syntax',
      },
    };
  }

  const result = schema.safeParse(parsed);

  if (!result.success) {
    return { success: false, error: result.error };
  }

  return { success: true, data: result.data };
}
