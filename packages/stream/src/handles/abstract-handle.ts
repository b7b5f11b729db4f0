import { classifyMode } from "../mode.js";
import type { HandleMetadata, HandleStats, SeekWhence, StreamHandle } from "./types.js";

/**
 * Shared bookkeeping for handle implementations: open/closed state, access
 * checks derived from the mode, and the metadata record.
 */
export abstract class AbstractHandle implements StreamHandle {
  readonly mode: string;
  readonly uri: string | undefined;

  protected readonly canRead: boolean;
  protected readonly canWrite: boolean;
  protected atEof = false;

  private isClosed = false;

  protected abstract readonly wrapperType: string;
  protected abstract readonly streamType: string;
  protected abstract readonly seekable: boolean;

  constructor(mode: string, uri: string | undefined) {
    this.mode = mode;
    this.uri = uri;
    const { readable, writable } = classifyMode(mode);
    this.canRead = readable;
    this.canWrite = writable;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  abstract read(length: number): Uint8Array;
  abstract write(data: Uint8Array): number;
  abstract seek(offset: number, whence: SeekWhence): void;
  abstract tell(): number;
  abstract readAll(): Uint8Array;
  abstract stat(): HandleStats;

  eof(): boolean {
    this.assertOpen();
    return this.atEof;
  }

  metadata(): HandleMetadata {
    this.assertOpen();
    return {
      timedOut: false,
      blocked: true,
      eof: this.atEof,
      wrapperType: this.wrapperType,
      streamType: this.streamType,
      mode: this.mode,
      unreadBytes: 0,
      seekable: this.seekable,
      uri: this.uri,
    };
  }

  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;
    this.release();
  }

  /** Frees the underlying resource; runs once, on the first `close()`. */
  protected release(): void {}

  protected assertOpen(): void {
    if (this.isClosed) {
      throw new Error("Handle is closed");
    }
  }

  protected assertReadable(): void {
    this.assertOpen();
    if (!this.canRead) {
      throw new Error(`Handle opened with mode "${this.mode}" is not readable`);
    }
  }

  protected assertWritable(): void {
    this.assertOpen();
    if (!this.canWrite) {
      throw new Error(`Handle opened with mode "${this.mode}" is not writable`);
    }
  }

  protected assertSeekable(): void {
    this.assertOpen();
    if (!this.seekable) {
      throw new Error(`Handle of type "${this.streamType}" does not support seeking`);
    }
  }
}
