/**
 * Scheme-based registry of handle openers.
 *
 * `openStream()` resolves the scheme of a locator (`temp://`, `memory://`,
 * `input://`, `output://`, ...) and delegates to the opener registered for it.
 * Locators without a scheme are treated as file paths and go to the `file`
 * opener, which platform packages register explicitly.
 *
 * @example
 * ```ts
 * import { registerNodeOpeners } from "@bytehold/stream-node";
 *
 * registerNodeOpeners();
 * const handle = openStream("/tmp/report.txt", "r");
 * ```
 */

import { InvalidArgumentError } from "./errors.js";
import { InputHandle } from "./handles/input-handle.js";
import { MemoryHandle } from "./handles/memory-handle.js";
import { type OutputSink, OutputHandle } from "./handles/output-handle.js";
import type { StreamHandle } from "./handles/types.js";
import { getStreamLogger } from "./logger.js";
import { isReadableMode, isWritableMode } from "./mode.js";

export interface OpenStreamOptions {
  /** Initial content for `temp://`/`memory://`, the source for `input://` */
  data?: Uint8Array | string;
  /** Destination of `output://` writes */
  sink?: OutputSink;
}

export type StreamOpener = (uri: string, mode: string, options: OpenStreamOptions) => StreamHandle;

const SCHEME_PATTERN = /^([a-z][a-z0-9+.-]*):\/\//i;

const openers = new Map<string, StreamOpener>();

/**
 * Returns the lower-cased scheme of `uri`, or `undefined` for plain paths.
 */
export function parseScheme(uri: string): string | undefined {
  const match = SCHEME_PATTERN.exec(uri);
  return match ? match[1].toLowerCase() : undefined;
}

/**
 * Whether `uri` designates a local filesystem path.
 */
export function isPathUri(uri: string | undefined): boolean {
  if (uri === undefined || uri === "") return false;
  const scheme = parseScheme(uri);
  return scheme === undefined || scheme === "file";
}

export function registerStreamOpener(scheme: string, opener: StreamOpener): void {
  openers.set(scheme.toLowerCase(), opener);
}

export function unregisterStreamOpener(scheme: string): boolean {
  return openers.delete(scheme.toLowerCase());
}

export function openStream(
  uri: string,
  mode: string,
  options: OpenStreamOptions = {},
): StreamHandle {
  const scheme = parseScheme(uri) ?? "file";
  const opener = openers.get(scheme);
  if (!opener) {
    throw new InvalidArgumentError(`No stream opener registered for scheme "${scheme}"`);
  }
  getStreamLogger().debug?.(`Opening "${uri}" with mode "${mode}"`);
  return opener(uri, mode, options);
}

const memoryOpener: StreamOpener = (uri, mode, options) =>
  new MemoryHandle(mode, { uri: `${parseScheme(uri)}://`, data: options.data });

registerStreamOpener("temp", memoryOpener);
registerStreamOpener("memory", memoryOpener);

/**
 * Opens a read-only `input://` handle. Modes granting write access are
 * rejected.
 */
export function openInput(mode: string, data: Uint8Array | string | undefined): InputHandle {
  if (data === undefined) {
    throw new InvalidArgumentError('Opening "input://" requires a data source');
  }
  if (!isReadableMode(mode) || isWritableMode(mode)) {
    throw new InvalidArgumentError(`Unsupported input mode "${mode}"`);
  }
  return new InputHandle(data, mode);
}

/**
 * Opens a write-only `output://` handle. Modes granting read access are
 * rejected.
 */
export function openOutput(mode: string, sink: OutputSink | undefined): OutputHandle {
  if (sink === undefined) {
    throw new InvalidArgumentError('Opening "output://" requires a sink');
  }
  if (!isWritableMode(mode) || isReadableMode(mode)) {
    throw new InvalidArgumentError(`Unsupported output mode "${mode}"`);
  }
  return new OutputHandle(sink, mode);
}

registerStreamOpener("input", (_uri, mode, options) => openInput(mode, options.data));
registerStreamOpener("output", (_uri, mode, options) => openOutput(mode, options.sink));
