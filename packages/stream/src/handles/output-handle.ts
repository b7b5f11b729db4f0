import { AbstractHandle } from "./abstract-handle.js";
import type { HandleStats, SeekWhence } from "./types.js";

export type OutputSink = (chunk: Uint8Array) => void;

/**
 * Write-only, sequential handle forwarding every chunk to a sink. It cannot
 * be read, sought or stat'ed.
 */
export class OutputHandle extends AbstractHandle {
  protected readonly wrapperType = "output";
  protected readonly streamType = "Output";
  protected readonly seekable = false;

  private readonly sink: OutputSink;
  private written = 0;

  constructor(sink: OutputSink, mode = "wb") {
    super(mode, "output://");
    this.sink = sink;
  }

  read(_length: number): Uint8Array {
    this.assertReadable();
    throw new Error("Output handles cannot be read from");
  }

  write(data: Uint8Array): number {
    this.assertWritable();
    this.sink(data.slice());
    this.written += data.length;
    return data.length;
  }

  seek(_offset: number, _whence: SeekWhence): void {
    this.assertSeekable();
  }

  tell(): number {
    this.assertOpen();
    return this.written;
  }

  readAll(): Uint8Array {
    this.assertReadable();
    throw new Error("Output handles cannot be read from");
  }

  stat(): HandleStats {
    this.assertOpen();
    throw new Error("Output handles cannot be stat'ed");
  }
}
