export * from "./abstract-handle.js";
export * from "./gzip-handle.js";
export * from "./input-handle.js";
export * from "./memory-handle.js";
export * from "./output-handle.js";
export * from "./types.js";
