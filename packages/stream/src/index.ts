/**
 * Seekable byte streams over interchangeable handles.
 *
 * @packageDocumentation
 */

export * from "./bytes.js";
export * from "./errors.js";
export * from "./handles/index.js";
export * from "./logger.js";
export * from "./mode.js";
export * from "./openers.js";
export * from "./stream.js";
export * from "./utils.js";
