/**
 * Gzip codec over another handle.
 *
 * Reading inflates the whole remainder of the inner handle on first access
 * and serves the decoded bytes sequentially. Writing collects the plain bytes
 * and deflates them into the inner handle when the gzip handle is closed.
 * Both directions are sequential only, so the handle reports itself as not
 * seekable.
 */

import pako from "pako";
import { concatBytes } from "../bytes.js";
import { InvalidArgumentError } from "../errors.js";
import { modeBase, modeLevel } from "../mode.js";
import { AbstractHandle } from "./abstract-handle.js";
import type { HandleStats, SeekWhence, StreamHandle } from "./types.js";

const PAKO_LEVELS = [0, 1, 2, 3, 4, 5, 6, 7, 8, 9] as const;
type PakoLevel = (typeof PAKO_LEVELS)[number];

const DEFAULT_LEVEL: PakoLevel = 6;

export interface GzipOptions {
  /** Compression level 0-9; overrides a level digit in the mode */
  level?: number;
  /** Leave the inner handle open when the gzip handle closes */
  keepInnerOpen?: boolean;
}

function toPakoLevel(level: number | undefined): PakoLevel {
  return PAKO_LEVELS.find((candidate) => candidate === level) ?? DEFAULT_LEVEL;
}

export class GzipHandle extends AbstractHandle {
  protected readonly wrapperType = "ZLIB";
  protected readonly streamType = "gzip";
  protected readonly seekable = false;

  private readonly inner: StreamHandle;
  private readonly level: PakoLevel;
  private readonly keepInnerOpen: boolean;

  private decoded: Uint8Array | undefined;
  private pending: Uint8Array[] = [];
  private position = 0;

  constructor(inner: StreamHandle, mode: string, options: GzipOptions = {}) {
    super(mode, inner.uri);
    this.inner = inner;
    this.level = toPakoLevel(options.level ?? modeLevel(mode));
    this.keepInnerOpen = options.keepInnerOpen ?? false;
  }

  read(length: number): Uint8Array {
    this.assertReadable();
    if (length === 0) return new Uint8Array(0);
    const decoded = this.decode();
    const result = decoded.slice(this.position, this.position + length);
    this.position += result.length;
    if (result.length < length) {
      this.atEof = true;
    }
    return result;
  }

  write(data: Uint8Array): number {
    this.assertWritable();
    this.pending.push(data.slice());
    this.position += data.length;
    return data.length;
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
    const decoded = this.decode();
    const result = decoded.slice(this.position);
    this.position = Math.max(this.position, decoded.length);
    return result;
  }

  /** Reports the compressed size of the inner resource. */
  stat(): HandleStats {
    this.assertOpen();
    return this.inner.stat();
  }

  protected release(): void {
    try {
      if (this.canWrite) {
        const compressed = pako.gzip(concatBytes(this.pending), { level: this.level });
        this.inner.write(compressed);
      }
    } finally {
      this.pending = [];
      this.decoded = undefined;
      if (!this.keepInnerOpen) {
        this.inner.close();
      }
    }
  }

  private decode(): Uint8Array {
    if (this.decoded === undefined) {
      const compressed = this.inner.readAll();
      if (compressed.length === 0) {
        this.decoded = new Uint8Array(0);
      } else {
        try {
          this.decoded = pako.ungzip(compressed);
        } catch (error) {
          const err = error instanceof Error ? error : new Error(String(error));
          throw new Error(`Gzip decompression failed: ${err.message}`, { cause: err });
        }
      }
    }
    return this.decoded;
  }
}

/**
 * Wraps `inner` with a gzip codec. Gzip streams are one-directional: the
 * mode must start with `r` (decode) or `w`/`a` (encode) and carry no `+`.
 */
export function openGzip(inner: StreamHandle, mode: string, options?: GzipOptions): GzipHandle {
  const base = modeBase(mode);
  if (mode.includes("+") || (base !== "r" && base !== "w" && base !== "a")) {
    throw new InvalidArgumentError(`Unsupported gzip mode "${mode}"`);
  }
  return new GzipHandle(inner, mode, options);
}
