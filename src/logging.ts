/**
 * swiftpick Logging
 * stderr only: stdout belongs to the stdio transport.
 */

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

export function createLogger(tag: string, debugEnabled = false): Logger {
  const prefix = `[swiftpick:${tag}]`;
  return {
    debug(message, ...details) {
      if (debugEnabled) console.error(prefix, message, ...details);
    },
    warn(message, ...details) {
      console.warn(prefix, message, ...details);
    },
    error(message, ...details) {
      console.error(prefix, message, ...details);
    },
  };
}

/** Discards everything; handy for tests and embedded use. */
export const silentLogger: Logger = {
  debug() {},
  warn() {},
  error() {},
};
