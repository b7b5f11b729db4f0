/**
 * Side channel for failures that cannot be thrown to the caller.
 */
export interface StreamLogger {
  debug?: (...args: unknown[]) => void;
  warn?: (...args: unknown[]) => void;
  error?: (...args: unknown[]) => void;
}

const consoleLogger: StreamLogger = {
  warn: (...args) => console.warn(...args),
  error: (...args) => console.error(...args),
};

let defaultLogger: StreamLogger = consoleLogger;

/**
 * Replace the process-wide logger used by streams created without an
 * explicit `logger` option. Pass `undefined` to restore the console logger.
 */
export function setStreamLogger(logger: StreamLogger | undefined): void {
  defaultLogger = logger ?? consoleLogger;
}

export function getStreamLogger(): StreamLogger {
  return defaultLogger;
}
