/**
 * Node.js handles for @bytehold/stream
 *
 * Registers the `file` scheme with the core opener registry so that plain
 * paths and `file://` URLs can be passed to `openStream()`, and lets
 * `output://` fall back to standard output when no sink is given.
 *
 * @example
 * ```ts
 * import { openStream, Stream } from "@bytehold/stream";
 * import { registerNodeOpeners } from "@bytehold/stream-node";
 *
 * registerNodeOpeners();
 * const stream = new Stream(openStream("./notes.txt", "r"));
 * ```
 *
 * @packageDocumentation
 */

import { fileURLToPath } from "node:url";
import {
  InvalidArgumentError,
  IOFailureError,
  type OutputSink,
  openOutput,
  parseScheme,
  registerStreamOpener,
  Stream,
  type StreamOptions,
} from "@bytehold/stream";
import { FileHandle } from "./file-handle.js";

export * from "./file-handle.js";

/**
 * Opens a file handle.
 *
 * @throws IOFailureError when the file cannot be opened in `mode`
 */
export function openFile(path: string, mode: string): FileHandle {
  try {
    return new FileHandle(path, mode);
  } catch (error) {
    if (error instanceof InvalidArgumentError) throw error;
    throw new IOFailureError(`Unable to open "${path}" using mode "${mode}"`, { cause: error });
  }
}

/**
 * Opens a file and wraps it into a {@link Stream}.
 */
export function openFileStream(path: string, mode: string, options?: StreamOptions): Stream {
  return new Stream(openFile(path, mode), options);
}

export const stdoutSink: OutputSink = (chunk) => {
  process.stdout.write(chunk);
};

export function registerNodeOpeners(): void {
  registerStreamOpener("file", (uri, mode) =>
    openFile(parseScheme(uri) === "file" ? fileURLToPath(uri) : uri, mode),
  );
  registerStreamOpener("output", (_uri, mode, options) =>
    openOutput(mode, options.sink ?? stdoutSink),
  );
}
