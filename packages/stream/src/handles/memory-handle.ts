import { toBytes } from "../bytes.js";
import { isAppendMode, isTruncatingMode } from "../mode.js";
import { AbstractHandle } from "./abstract-handle.js";
import { type HandleStats, SeekWhence } from "./types.js";

export interface MemoryHandleOptions {
  /** Locator reported by the handle, `temp://` by default */
  uri?: string;
  /** Initial content; ignored by truncating (`w`) modes */
  data?: Uint8Array | string;
}

const MIN_CAPACITY = 256;

/**
 * Seekable handle over a growable in-memory byte buffer.
 *
 * Writing past the current end zero-fills the gap. In append modes every
 * write lands at the end regardless of the cursor.
 */
export class MemoryHandle extends AbstractHandle {
  protected readonly wrapperType = "memory";
  protected readonly streamType: string;
  protected readonly seekable = true;

  private buffer: Uint8Array;
  private length = 0;
  private position = 0;
  private readonly append: boolean;

  constructor(mode: string, options: MemoryHandleOptions = {}) {
    super(mode, options.uri ?? "temp://");
    this.streamType = this.uri === "memory://" ? "MEMORY" : "TEMP";
    this.append = isAppendMode(mode);

    const initial =
      options.data !== undefined && !isTruncatingMode(mode) ? toBytes(options.data) : undefined;
    this.buffer = new Uint8Array(Math.max(MIN_CAPACITY, initial?.length ?? 0));
    if (initial) {
      this.buffer.set(initial);
      this.length = initial.length;
    }
  }

  read(length: number): Uint8Array {
    this.assertReadable();
    if (length === 0) return new Uint8Array(0);
    const available = Math.max(0, this.length - this.position);
    const count = Math.min(length, available);
    if (count < length) {
      this.atEof = true;
    }
    const result = this.buffer.slice(this.position, this.position + count);
    this.position += count;
    return result;
  }

  write(data: Uint8Array): number {
    this.assertWritable();
    const start = this.append ? this.length : this.position;
    const end = start + data.length;
    this.ensureCapacity(end);
    this.buffer.set(data, start);
    this.length = Math.max(this.length, end);
    this.position = end;
    return data.length;
  }

  seek(offset: number, whence: SeekWhence): void {
    this.assertOpen();
    const target = resolveSeekTarget(offset, whence, this.position, this.length);
    this.position = target;
    this.atEof = false;
  }

  tell(): number {
    this.assertOpen();
    return this.position;
  }

  readAll(): Uint8Array {
    this.assertReadable();
    const start = Math.min(this.position, this.length);
    const result = this.buffer.slice(start, this.length);
    this.position = Math.max(this.position, this.length);
    return result;
  }

  stat(): HandleStats {
    this.assertOpen();
    return { size: this.length };
  }

  protected release(): void {
    this.buffer = new Uint8Array(0);
    this.length = 0;
    this.position = 0;
  }

  private ensureCapacity(required: number): void {
    if (required <= this.buffer.length) return;
    let capacity = this.buffer.length * 2;
    while (capacity < required) {
      capacity *= 2;
    }
    const grown = new Uint8Array(capacity);
    grown.set(this.buffer.subarray(0, this.length));
    this.buffer = grown;
  }
}

/**
 * Computes an absolute cursor position for a seek request.
 * Throws when the result would be negative.
 */
export function resolveSeekTarget(
  offset: number,
  whence: SeekWhence,
  position: number,
  length: number,
): number {
  if (!Number.isInteger(offset)) {
    throw new Error(`Seek offset must be an integer, got ${offset}`);
  }
  let target: number;
  switch (whence) {
    case SeekWhence.Set:
      target = offset;
      break;
    case SeekWhence.Current:
      target = position + offset;
      break;
    case SeekWhence.End:
      target = length + offset;
      break;
    default:
      throw new Error(`Unknown seek whence: ${String(whence)}`);
  }
  if (target < 0) {
    throw new Error(`Cannot seek to negative position ${target}`);
  }
  return target;
}
