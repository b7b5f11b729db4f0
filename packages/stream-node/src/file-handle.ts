/**
 * File-backed handle using the synchronous `node:fs` primitives.
 *
 * Open modes follow the `fopen` family and are mapped onto `fs.constants`:
 *
 * | mode | flags                          |
 * |------|--------------------------------|
 * | `r`  | existing file                  |
 * | `w`  | create, truncate               |
 * | `a`  | create, writes go to the end   |
 * | `x`  | create, fail if it exists      |
 * | `c`  | create, keep existing content  |
 *
 * `+` (or `rw`) opens for both reading and writing; `b`/`t` are accepted
 * and ignored.
 */

import * as fs from "node:fs";
import {
  AbstractHandle,
  classifyMode,
  concatBytes,
  type HandleStats,
  InvalidArgumentError,
  isAppendMode,
  modeBase,
  resolveSeekTarget,
  type SeekWhence,
} from "@bytehold/stream";

const READ_CHUNK_SIZE = 64 * 1024;

/**
 * Translates an `fopen`-style mode into `fs.openSync` flags.
 */
export function toOpenFlags(mode: string): number {
  const { O_RDONLY, O_WRONLY, O_RDWR, O_CREAT, O_EXCL, O_TRUNC, O_APPEND } = fs.constants;
  const base = modeBase(mode);
  if (base === undefined) {
    throw new InvalidArgumentError(`Invalid file mode "${mode}"`);
  }
  const { readable, writable } = classifyMode(mode);
  let flags = readable && writable ? O_RDWR : writable ? O_WRONLY : O_RDONLY;
  switch (base) {
    case "w":
      flags |= O_CREAT | O_TRUNC;
      break;
    case "a":
      flags |= O_CREAT | O_APPEND;
      break;
    case "x":
      flags |= O_CREAT | O_EXCL;
      break;
    case "c":
      flags |= O_CREAT;
      break;
    case "r":
      break;
  }
  return flags;
}

export class FileHandle extends AbstractHandle {
  protected readonly wrapperType = "plainfile";
  protected readonly streamType = "STDIO";
  protected readonly seekable = true;

  readonly path: string;

  private readonly fd: number;
  private readonly append: boolean;
  private position = 0;

  constructor(path: string, mode: string) {
    super(mode, path);
    this.path = path;
    this.append = isAppendMode(mode);
    this.fd = fs.openSync(path, toOpenFlags(mode), 0o666);
  }

  read(length: number): Uint8Array {
    this.assertReadable();
    if (length === 0) return new Uint8Array(0);
    const buffer = new Uint8Array(length);
    const count = fs.readSync(this.fd, buffer, 0, length, this.position);
    this.position += count;
    if (count < length) {
      this.atEof = true;
    }
    return buffer.subarray(0, count);
  }

  write(data: Uint8Array): number {
    this.assertWritable();
    let offset = 0;
    while (offset < data.length) {
      // O_APPEND ignores the position; pass null so the kernel picks the end
      const position = this.append ? null : this.position + offset;
      offset += fs.writeSync(this.fd, data, offset, data.length - offset, position);
    }
    this.position = this.append ? fs.fstatSync(this.fd).size : this.position + data.length;
    return data.length;
  }

  seek(offset: number, whence: SeekWhence): void {
    this.assertOpen();
    const length = fs.fstatSync(this.fd).size;
    this.position = resolveSeekTarget(offset, whence, this.position, length);
    this.atEof = false;
  }

  tell(): number {
    this.assertOpen();
    return this.position;
  }

  readAll(): Uint8Array {
    this.assertReadable();
    const chunks: Uint8Array[] = [];
    while (true) {
      const buffer = new Uint8Array(READ_CHUNK_SIZE);
      const count = fs.readSync(this.fd, buffer, 0, READ_CHUNK_SIZE, this.position);
      if (count === 0) break;
      chunks.push(buffer.subarray(0, count));
      this.position += count;
    }
    return concatBytes(chunks);
  }

  /**
   * Stats the path rather than the descriptor so that a file replaced on
   * disk is reported as it is now.
   */
  stat(): HandleStats {
    this.assertOpen();
    return { size: fs.statSync(this.path).size };
  }

  protected release(): void {
    fs.closeSync(this.fd);
  }
}
