/**
 * Capability-aware wrapper around a single {@link StreamHandle}.
 *
 * The stream snapshots what the handle allows (read, write, seek) once at
 * construction, caches the resource size, and translates primitive failures
 * into typed errors. Closing or detaching leaves the stream inert: every
 * active I/O call then throws {@link DetachedError}, while introspection
 * (`getSize`, `getMetadata`, `toString`) degrades to empty values.
 *
 * @example
 * ```ts
 * const stream = new Stream(openStream("temp://", "w+"));
 * stream.write("data");
 * stream.seek(0);
 * stream.getContents(); // Uint8Array [100, 97, 116, 97]
 * stream.close();
 * ```
 */

import { fromBytes, toBytes } from "./bytes.js";
import { DetachedError, InvalidArgumentError, IOFailureError, toError } from "./errors.js";
import {
  type HandleMetadata,
  isStreamHandle,
  SeekWhence,
  type StreamHandle,
} from "./handles/types.js";
import { getStreamLogger, type StreamLogger } from "./logger.js";
import { classifyMode } from "./mode.js";
import { isPathUri } from "./openers.js";

export interface StreamOptions {
  /** Known size of the resource, used instead of a first stat */
  size?: number;
  /** Extra entries returned by `getMetadata()`, overriding the handle's */
  metadata?: Record<string, unknown>;
  /** Side channel for failures that cannot be thrown */
  logger?: StreamLogger;
}

export type StreamMetadata = Partial<HandleMetadata> & Record<string, unknown>;

interface HeldHandle {
  handle: StreamHandle;
  logger: StreamLogger | undefined;
}

/**
 * Closes handles whose stream was collected while still owning them.
 */
const releaseOnCollect = new FinalizationRegistry<HeldHandle>(({ handle, logger }) => {
  try {
    handle.close();
  } catch (error) {
    (logger ?? getStreamLogger()).error?.("Unable to release a collected stream handle", error);
  }
});

export class Stream {
  private handle: StreamHandle | undefined;
  private size: number | undefined;
  private seekable = false;
  private readable = false;
  private writable = false;
  private uri: string | undefined;
  private readonly customMetadata: Record<string, unknown>;
  private readonly logger: StreamLogger | undefined;

  /**
   * @throws InvalidArgumentError when `handle` is not an open handle
   */
  constructor(handle: StreamHandle, options: StreamOptions = {}) {
    if (!isStreamHandle(handle)) {
      throw new InvalidArgumentError("Stream must be a resource");
    }
    this.handle = handle;
    this.size = options.size;
    this.customMetadata = options.metadata ?? {};
    this.logger = options.logger;

    const metadata = handle.metadata();
    const { readable, writable } = classifyMode(metadata.mode);
    this.seekable = metadata.seekable;
    this.readable = readable;
    this.writable = writable;
    this.uri = metadata.uri;

    releaseOnCollect.register(this, { handle, logger: options.logger }, this);
  }

  /**
   * Wraps a value that is expected to be a handle.
   *
   * @throws InvalidArgumentError when `value` is anything else
   */
  static from(value: unknown, options?: StreamOptions): Stream {
    if (!isStreamHandle(value)) {
      throw new InvalidArgumentError("Stream must be a resource");
    }
    return new Stream(value, options);
  }

  isReadable(): boolean {
    return this.readable;
  }

  isWritable(): boolean {
    return this.writable;
  }

  isSeekable(): boolean {
    return this.seekable;
  }

  read(length: number): Uint8Array {
    const handle = this.requireHandle();
    if (!this.readable) {
      throw new IOFailureError("Cannot read from non-readable stream");
    }
    if (length < 0) {
      throw new InvalidArgumentError("Length parameter cannot be negative");
    }
    if (!Number.isInteger(length)) {
      throw new InvalidArgumentError("Length parameter must be an integer");
    }
    if (length === 0) {
      return new Uint8Array(0);
    }
    try {
      return handle.read(length);
    } catch (error) {
      throw new IOFailureError("Unable to read from stream", { cause: error });
    }
  }

  /**
   * Writes the whole of `data` and returns the number of bytes written.
   * A known size grows by that count; overwrites are not special-cased.
   */
  write(data: Uint8Array | string): number {
    const handle = this.requireHandle();
    if (!this.writable) {
      throw new IOFailureError("Cannot write to a non-writable stream");
    }
    let written: number;
    try {
      written = handle.write(toBytes(data));
    } catch (error) {
      throw new IOFailureError("Unable to write to stream", { cause: error });
    }
    if (this.size !== undefined) {
      this.size += written;
    }
    return written;
  }

  seek(offset: number, whence: SeekWhence = SeekWhence.Set): void {
    const handle = this.requireHandle();
    if (!this.seekable) {
      throw new IOFailureError("Stream is not seekable");
    }
    try {
      handle.seek(offset, whence);
    } catch (error) {
      throw new IOFailureError(
        `Unable to seek to stream position ${offset} with whence ${whence}`,
        { cause: error },
      );
    }
  }

  rewind(): void {
    this.seek(0);
  }

  tell(): number {
    const handle = this.requireHandle();
    try {
      return handle.tell();
    } catch (error) {
      throw new IOFailureError("Unable to determine stream position", { cause: error });
    }
  }

  eof(): boolean {
    const handle = this.requireHandle();
    try {
      return handle.eof();
    } catch (error) {
      throw new IOFailureError("Unable to determine end of stream", { cause: error });
    }
  }

  /**
   * Reads everything from the current position to the end.
   */
  getContents(): Uint8Array {
    const handle = this.requireHandle();
    if (!this.readable) {
      throw new IOFailureError("Cannot read from non-readable stream");
    }
    try {
      return handle.readAll();
    } catch (error) {
      throw new IOFailureError("Unable to read stream contents", { cause: error });
    }
  }

  /**
   * Size of the resource in bytes, or `undefined` when it cannot be known.
   *
   * Cached sizes are reused except for path-backed resources, which are
   * re-stat'ed on every call since the file may change underneath the handle.
   */
  getSize(): number | undefined {
    const handle = this.handle;
    if (!handle) return undefined;
    if (this.size !== undefined && !isPathUri(this.uri)) {
      return this.size;
    }
    try {
      this.size = handle.stat().size;
    } catch (error) {
      this.log.debug?.("Unable to determine stream size", error);
      return undefined;
    }
    return this.size;
  }

  /**
   * Handle metadata merged with the `metadata` option; `{}` once detached.
   */
  getMetadata(): StreamMetadata;
  getMetadata<K extends keyof HandleMetadata>(key: K): HandleMetadata[K] | undefined;
  getMetadata(key: string): unknown;
  getMetadata(key?: string): unknown {
    const metadata = this.collectMetadata();
    if (key === undefined) return metadata;
    return Object.hasOwn(metadata, key) ? metadata[key] : undefined;
  }

  /**
   * Closes the handle. Has no effect on a closed or detached stream.
   */
  close(): void {
    const handle = this.handle;
    if (!handle) return;
    this.reset();
    try {
      handle.close();
    } catch (error) {
      this.log.error?.("Unable to close stream handle", error);
    }
  }

  /**
   * Hands the handle over to the caller without closing it.
   * Returns `undefined` when the stream no longer owns one.
   */
  detach(): StreamHandle | undefined {
    const handle = this.handle;
    if (!handle) return undefined;
    this.reset();
    return handle;
  }

  /**
   * Full contents as text, read from the start when the stream is seekable.
   *
   * Never throws: a failure is reported to the logger and yields `""`.
   */
  toString(): string {
    try {
      if (this.isSeekable()) {
        this.seek(0);
      }
      return fromBytes(this.getContents());
    } catch (error) {
      const err = toError(error);
      this.log.error?.(`Stream.toString exception: ${err.message}`, err);
      return "";
    }
  }

  private get log(): StreamLogger {
    return this.logger ?? getStreamLogger();
  }

  private requireHandle(): StreamHandle {
    if (!this.handle) {
      throw new DetachedError();
    }
    return this.handle;
  }

  private collectMetadata(): StreamMetadata {
    if (!this.handle) return {};
    try {
      const metadata: StreamMetadata = { ...this.handle.metadata() };
      return Object.assign(metadata, this.customMetadata);
    } catch (error) {
      this.log.debug?.("Unable to read stream metadata", error);
      return {};
    }
  }

  private reset(): void {
    releaseOnCollect.unregister(this);
    this.handle = undefined;
    this.size = undefined;
    this.uri = undefined;
    this.seekable = false;
    this.readable = false;
    this.writable = false;
  }
}
