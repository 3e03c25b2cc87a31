/**
 * Logger interface for library code.
 *
 * Library modules (ingestion, index store, agent) accept a Logger instead of
 * writing to the console. The CLI passes its CommandContext, which satisfies
 * this interface; tests pass silentLogger or a vi.fn() pair.
 */

export interface Logger {
  /** Log a warning message */
  warn: (message: string) => void;
  /** Log a debug message (optional) */
  debug?: (message: string) => void;
}

/**
 * Used when nothing is injected. Debug output is dropped.
 */
export const consoleLogger: Logger = {
  warn: (message: string) => console.warn(message),
};

export const silentLogger: Logger = {
  warn: () => {},
  debug: () => {},
};
