import { toBytes } from "../bytes.js";
import { AbstractHandle } from "./abstract-handle.js";
import type { HandleStats, SeekWhence } from "./types.js";

/**
 * Read-only, sequential handle over a fixed byte source, in the manner of a
 * request body handed to a process. Seeking is not supported.
 */
export class InputHandle extends AbstractHandle {
  protected readonly wrapperType = "input";
  protected readonly streamType = "Input";
  protected readonly seekable = false;

  private source: Uint8Array;
  private position = 0;

  constructor(source: Uint8Array | string, mode = "rb") {
    super(mode, "input://");
    this.source = toBytes(source);
  }

  read(length: number): Uint8Array {
    this.assertReadable();
    if (length === 0) return new Uint8Array(0);
    const result = this.source.slice(this.position, this.position + length);
    this.position += result.length;
    if (result.length < length) {
      this.atEof = true;
    }
    return result;
  }

  write(_data: Uint8Array): number {
    this.assertWritable();
    throw new Error("Input handles cannot be written to");
  }

  seek(_offset: number, _whence: SeekWhence): void {
    this.assertSeekable();
  }

  tell(): number {
    this.assertOpen();
    return this.position;
  }

  readAll(): Uint8Array {
    this.assertReadable();
    const result = this.source.slice(this.position);
    this.position = this.source.length;
    return result;
  }

  stat(): HandleStats {
    this.assertOpen();
    return { size: this.source.length };
  }

  protected release(): void {
    this.source = new Uint8Array(0);
  }
}
