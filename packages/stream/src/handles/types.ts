/**
 * Contract of the resource a {@link Stream} wraps.
 *
 * A handle is the equivalent of an OS stream resource: it is already open
 * when it is handed over, it has a fixed open mode, and its primitives report
 * failure by throwing. The wrapping stream translates those failures into its
 * own error types.
 */

/**
 * Reference point for {@link StreamHandle.seek}.
 */
export const SeekWhence = {
  /** Absolute offset from the start */
  Set: 0,
  /** Relative to the current position */
  Current: 1,
  /** Relative to the end */
  End: 2,
} as const;

export type SeekWhence = (typeof SeekWhence)[keyof typeof SeekWhence];

/**
 * Result of a stat call on a handle.
 */
export interface HandleStats {
  /** Length of the resource in bytes */
  size: number;
}

/**
 * Descriptive information about an open handle.
 */
export interface HandleMetadata {
  /** Whether the last operation ran into a timeout */
  timedOut: boolean;
  /** Whether operations block until they complete */
  blocked: boolean;
  /** Whether the last read reached the end of the resource */
  eof: boolean;
  /** Implementation family, e.g. "memory", "plainfile", "ZLIB" */
  wrapperType: string;
  /** Concrete resource kind, e.g. "TEMP", "STDIO", "gzip" */
  streamType: string;
  /** Mode string the handle was opened with */
  mode: string;
  /** Bytes buffered by the handle and not yet consumed */
  unreadBytes: number;
  /** Whether the cursor can be repositioned */
  seekable: boolean;
  /** Locator of the resource, when it has one */
  uri?: string;
}

export interface StreamHandle {
  readonly mode: string;
  readonly uri: string | undefined;
  /** True once `close()` has been called */
  readonly closed: boolean;

  /** Read up to `length` bytes; an empty result at the end of the resource. */
  read(length: number): Uint8Array;
  /** Write all of `data`, returning the number of bytes written. */
  write(data: Uint8Array): number;
  seek(offset: number, whence: SeekWhence): void;
  tell(): number;
  eof(): boolean;
  /** Read everything from the current position to the end. */
  readAll(): Uint8Array;
  stat(): HandleStats;
  metadata(): HandleMetadata;
  /** Release the resource. Calling it again has no effect. */
  close(): void;
}

const HANDLE_METHODS = [
  "read",
  "write",
  "seek",
  "tell",
  "eof",
  "readAll",
  "stat",
  "metadata",
  "close",
] as const;

/**
 * Checks whether a value is a handle that is still open.
 */
export function isStreamHandle(value: unknown): value is StreamHandle {
  if (typeof value !== "object" || value === null) return false;
  for (const method of HANDLE_METHODS) {
    if (typeof Reflect.get(value, method) !== "function") return false;
  }
  return typeof Reflect.get(value, "mode") === "string" && Reflect.get(value, "closed") === false;
}
