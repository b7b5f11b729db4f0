/**
 * Error hierarchy for stream operations.
 *
 * Active I/O calls (`read`, `write`, `seek`, `tell`, `eof`, `getContents`)
 * throw one of these. Introspection calls (`getSize`, `getMetadata`) and
 * string conversion never do.
 */

/**
 * Base class for every error raised by a {@link Stream}.
 */
export class StreamError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "StreamError";
  }
}

/**
 * A value passed to a stream API is not acceptable: construction from
 * something that is not a live handle, a negative read length, an unknown
 * opener scheme.
 */
export class InvalidArgumentError extends StreamError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "InvalidArgumentError";
  }
}

/**
 * The stream no longer owns a handle (closed or detached).
 */
export class DetachedError extends StreamError {
  constructor(message = "Stream is detached", options?: ErrorOptions) {
    super(message, options);
    this.name = "DetachedError";
  }
}

/**
 * The underlying handle refused or failed an operation.
 */
export class IOFailureError extends StreamError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "IOFailureError";
  }
}

/**
 * Normalizes an unknown thrown value into an `Error`.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
