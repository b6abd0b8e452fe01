/**
 * Logger Interface for Library Code
 *
 * Library code (the navigation controller) accepts a Logger by injection.
 * The CLI passes its CommandContext, which satisfies this interface;
 * tests pass spies or silentLogger.
 */

export interface Logger {
  /** Log a warning message */
  warn: (message: string) => void;
  /** Log a debug message (optional - not all contexts need debug) */
  debug?: (message: string) => void;
}

/**
 * Used when no logger is injected. Debug output is dropped so the
 * interactive screen is not disturbed.
 */
export const consoleLogger: Logger = {
  warn: (message: string) => console.warn(message),
};

/**
 * Silent logger for tests or when logging should be suppressed.
 */
export const silentLogger: Logger = {
  warn: () => {},
  debug: () => {},
};

/**
 * A Logger that holds messages until flush().
 */
export interface DeferredLogger extends Logger {
  /** Replay held messages to the target, in order, and empty the buffer */
  flush: () => void;
}

/**
 * Hold log lines while the interactive screen owns the terminal and replay
 * them to `target` afterwards.
 */
export function createDeferredLogger(target: Logger): DeferredLogger {
  let pending: Array<() => void> = [];

  return {
    warn: (message: string) => {
      pending.push(() => target.warn(message));
    },
    debug: (message: string) => {
      pending.push(() => target.debug?.(message));
    },
    flush: () => {
      const held = pending;
      pending = [];
      for (const emit of held) {
        emit();
      }
    },
  };
}
