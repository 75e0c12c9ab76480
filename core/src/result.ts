/**
 * Result<T, E> - explicit success/failure values
 *
 * Used where a failure is an expected outcome the caller must branch on
 * rather than an exceptional condition: a filter the planner cannot push
 * down, a config file that does not match its schema. Fatal scan failures
 * (remote fetch, decode) are thrown as errors instead.
 *
 * @example
 * ```typescript
 * import { ok, err, isOk, type Result } from '@gridscan/core';
 *
 * function parseHour(input: string): Result<number, string> {
 *   const hour = Number(input);
 *   return Number.isInteger(hour) ? ok(hour) : err(`not an hour: ${input}`);
 * }
 *
 * const parsed = parseHour('06');
 * const minutes = isOk(parsed) ? parsed.value * 60 : 0; // 360
 * ```
 *
 * @module result
 */

// =============================================================================
// Core Types
// =============================================================================

/**
 * A successful result carrying a value of type T.
 */
export interface Ok<T> {
  readonly _tag: 'Ok';
  readonly value: T;
  readonly error?: never;

  map<U>(fn: (value: T) => U): Result<U, never>;
  flatMap<U, F>(fn: (value: T) => Result<U, F>): Result<U, F>;
  mapErr<F>(fn: (error: never) => F): Result<T, F>;
  unwrap(): T;
  unwrapOr(defaultValue: T): T;
  match<U>(handlers: { ok: (value: T) => U; err: (error: never) => U }): U;
}

/**
 * A failed result carrying an error of type E.
 */
export interface Err<E> {
  readonly _tag: 'Err';
  readonly error: E;
  readonly value?: never;

  map<U>(fn: (value: never) => U): Result<U, E>;
  flatMap<U, F>(fn: (value: never) => Result<U, F>): Result<U, E | F>;
  mapErr<F>(fn: (error: E) => F): Result<never, F>;
  /** Throws the error (wrapped in an Error when it is not one) */
  unwrap(): never;
  unwrapOr<T>(defaultValue: T): T;
  match<U>(handlers: { ok: (value: never) => U; err: (error: E) => U }): U;
}

export type Result<T, E> = Ok<T> | Err<E>;

// =============================================================================
// Implementation Classes
// =============================================================================

class OkImpl<T> implements Ok<T> {
  readonly _tag = 'Ok' as const;

  constructor(readonly value: T) {}

  map<U>(fn: (value: T) => U): Result<U, never> {
    return new OkImpl(fn(this.value));
  }

  flatMap<U, F>(fn: (value: T) => Result<U, F>): Result<U, F> {
    return fn(this.value);
  }

  mapErr<F>(_fn: (error: never) => F): Result<T, F> {
    return new OkImpl(this.value);
  }

  unwrap(): T {
    return this.value;
  }

  unwrapOr(_defaultValue: T): T {
    return this.value;
  }

  match<U>(handlers: { ok: (value: T) => U; err: (error: never) => U }): U {
    return handlers.ok(this.value);
  }
}

class ErrImpl<E> implements Err<E> {
  readonly _tag = 'Err' as const;

  constructor(readonly error: E) {}

  map<U>(_fn: (value: never) => U): Result<U, E> {
    return new ErrImpl(this.error);
  }

  flatMap<U, F>(_fn: (value: never) => Result<U, F>): Result<U, E | F> {
    return new ErrImpl(this.error);
  }

  mapErr<F>(fn: (error: E) => F): Result<never, F> {
    return new ErrImpl(fn(this.error));
  }

  unwrap(): never {
    if (this.error instanceof Error) {
      throw this.error;
    }
    throw new Error(String(this.error));
  }

  unwrapOr<T>(defaultValue: T): T {
    return defaultValue;
  }

  match<U>(handlers: { ok: (value: never) => U; err: (error: E) => U }): U {
    return handlers.err(this.error);
  }
}

// =============================================================================
// Constructors and Guards
// =============================================================================

export function ok<T>(value: T): Ok<T> {
  return new OkImpl(value);
}

export function err<E>(error: E): Err<E> {
  return new ErrImpl(error);
}

export function isOk<T, E>(result: Result<T, E>): result is Ok<T> {
  return result._tag === 'Ok';
}

export function isErr<T, E>(result: Result<T, E>): result is Err<E> {
  return result._tag === 'Err';
}

/**
 * Collect a list of results: Ok with every value, or the first Err.
 *
 * @example
 * ```typescript
 * all([ok(1), ok(2)]);         // Ok([1, 2])
 * all([ok(1), err('x'), ok(3)]); // Err('x')
 * ```
 */
export function all<T, E>(results: readonly Result<T, E>[]): Result<T[], E> {
  const values: T[] = [];
  for (const result of results) {
    if (isErr(result)) {
      return err(result.error);
    }
    values.push(result.value);
  }
  return ok(values);
}
