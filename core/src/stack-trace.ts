/**
 * Stack trace capture for gridscan error classes.
 *
 * V8 (Node.js) exposes `Error.captureStackTrace`, which drops the error
 * constructor frames from `stack`. Elsewhere this is a no-op and the stack
 * from the `Error` constructor is kept as is.
 */

type ErrorConstructorLike = abstract new (...args: never[]) => Error;

interface V8ErrorStatics {
  captureStackTrace(targetObject: object, constructorOpt?: ErrorConstructorLike): void;
}

function hasV8CaptureStackTrace(
  errorConstructor: ErrorConstructor
): errorConstructor is ErrorConstructor & V8ErrorStatics {
  return 'captureStackTrace' in errorConstructor &&
    typeof errorConstructor.captureStackTrace === 'function';
}

/**
 * Capture a stack trace on `error`, omitting frames from `constructorOpt` up.
 *
 * @example
 * ```typescript
 * class ScanError extends Error {
 *   constructor(message: string) {
 *     super(message);
 *     captureStackTrace(this, ScanError);
 *   }
 * }
 * ```
 */
export function captureStackTrace(error: Error, constructorOpt?: ErrorConstructorLike): void {
  if (hasV8CaptureStackTrace(Error)) {
    Error.captureStackTrace(error, constructorOpt);
  }
}
