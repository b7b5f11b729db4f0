/**
 * Open-mode classification.
 *
 * Modes follow the C `fopen` family: a base letter (`r`, `w`, `a`, `x`, `c`),
 * an optional `+` for read/write access, and optional `b`/`t` suffixes.
 * Compressed streams may carry a level digit (`wb9`) which is ignored here.
 */

export interface ModeCapabilities {
  readable: boolean;
  writable: boolean;
}

const READ_FLAGS = /[r+]/;
const WRITE_FLAGS = /[waxc+]/;

export function isReadableMode(mode: string): boolean {
  return READ_FLAGS.test(mode);
}

export function isWritableMode(mode: string): boolean {
  return WRITE_FLAGS.test(mode);
}

export function classifyMode(mode: string): ModeCapabilities {
  return {
    readable: isReadableMode(mode),
    writable: isWritableMode(mode),
  };
}

export type ModeBase = "r" | "w" | "a" | "x" | "c";

/**
 * The leading access letter of a mode, or `undefined` when the mode does not
 * start with one.
 */
export function modeBase(mode: string): ModeBase | undefined {
  switch (mode.charAt(0)) {
    case "r":
      return "r";
    case "w":
      return "w";
    case "a":
      return "a";
    case "x":
      return "x";
    case "c":
      return "c";
    default:
      return undefined;
  }
}

/** Whether writes must always land at the end of the resource. */
export function isAppendMode(mode: string): boolean {
  return modeBase(mode) === "a";
}

/** Whether opening in this mode discards existing content. */
export function isTruncatingMode(mode: string): boolean {
  return modeBase(mode) === "w";
}

/**
 * Extracts a compression level digit from a mode string (`"wb2"` → 2).
 */
export function modeLevel(mode: string): number | undefined {
  const match = /[0-9]/.exec(mode);
  return match ? Number(match[0]) : undefined;
}
