/**
 * Helpers layered on the public {@link Stream} contract.
 */

import { concatBytes, fromBytes, toBytes } from "./bytes.js";
import { InvalidArgumentError } from "./errors.js";
import { MemoryHandle } from "./handles/memory-handle.js";
import { isStreamHandle, type StreamHandle } from "./handles/types.js";
import { Stream, type StreamOptions } from "./stream.js";

export type StreamSource = Stream | StreamHandle | Uint8Array | string | undefined;

const CHUNK_SIZE = 1024 * 1024;
const COPY_BUFFER_SIZE = 8192;

/**
 * Creates a stream from a string, bytes or a handle. Strings and bytes are
 * placed in a `temp://` buffer positioned at the start; an existing stream is
 * returned as is.
 */
export function streamFor(resource: StreamSource = "", options?: StreamOptions): Stream {
  if (resource instanceof Stream) {
    return resource;
  }
  if (typeof resource === "string" || resource instanceof Uint8Array) {
    return new Stream(new MemoryHandle("r+", { data: toBytes(resource) }), options);
  }
  if (isStreamHandle(resource)) {
    return new Stream(resource, options);
  }
  throw new InvalidArgumentError(`Invalid resource type: ${typeof resource}`);
}

/**
 * Reads the stream from its current position until the end, or until
 * `maxLength` bytes were read, and decodes the result as UTF-8.
 */
export function copyToString(stream: Stream, maxLength = -1): string {
  const chunks: Uint8Array[] = [];
  let length = 0;
  while (!stream.eof() && (maxLength === -1 || length < maxLength)) {
    const wanted = maxLength === -1 ? CHUNK_SIZE : maxLength - length;
    const chunk = stream.read(wanted);
    if (chunk.length === 0) break;
    chunks.push(chunk);
    length += chunk.length;
  }
  return fromBytes(concatBytes(chunks));
}

/**
 * Copies bytes from `source` into `dest` until the source ends or
 * `maxLength` bytes were copied. Returns the number of bytes copied.
 */
export function copyToStream(
  source: Stream,
  dest: Stream,
  maxLength = -1,
  bufferSize = COPY_BUFFER_SIZE,
): number {
  let copied = 0;
  while (!source.eof() && (maxLength === -1 || copied < maxLength)) {
    const wanted = maxLength === -1 ? bufferSize : Math.min(bufferSize, maxLength - copied);
    const chunk = source.read(wanted);
    if (chunk.length === 0) break;
    dest.write(chunk);
    copied += chunk.length;
  }
  return copied;
}

/**
 * Reads one line, including its trailing `\n`, or up to `maxLength` bytes.
 */
export function readLine(stream: Stream, maxLength?: number): string {
  if (maxLength !== undefined && maxLength <= 0) return "";
  const bytes: number[] = [];
  while (!stream.eof()) {
    const chunk = stream.read(1);
    if (chunk.length === 0) break;
    bytes.push(chunk[0]);
    if (chunk[0] === 0x0a || bytes.length === maxLength) break;
  }
  return fromBytes(Uint8Array.from(bytes));
}

/**
 * Runs `fn` with a stream and closes it afterwards, whether `fn` returns or
 * throws.
 */
export function withStream<T>(
  source: Stream | StreamHandle,
  fn: (stream: Stream) => T,
  options?: StreamOptions,
): T {
  const stream = source instanceof Stream ? source : new Stream(source, options);
  try {
    return fn(stream);
  } finally {
    stream.close();
  }
}
