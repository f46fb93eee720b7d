/**
 * Console logging with `[Component]` prefixes.
 *
 * Loggers are passed explicitly into the loader, transformer and pipeline;
 * nothing reads a process-wide logger.
 */

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Logger for a sub-component: `[Pipeline]` -> `[Pipeline:Loader]` */
  child(scope: string): Logger;
}

export interface ConsoleLoggerOptions {
  /** Print debug messages (default: false) */
  verbose?: boolean;
}

export function createConsoleLogger(scope: string, options: ConsoleLoggerOptions = {}): Logger {
  const verbose = options.verbose ?? false;
  const prefix = `[${scope}]`;

  return {
    debug(message) {
      if (verbose) console.log(`${prefix} ${message}`);
    },
    info(message) {
      console.log(`${prefix} ${message}`);
    },
    warn(message) {
      console.warn(`${prefix} ${message}`);
    },
    error(message) {
      console.error(`${prefix} ${message}`);
    },
    child(childScope) {
      return createConsoleLogger(`${scope}:${childScope}`, options);
    },
  };
}

export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
  child() {
    return silentLogger;
  },
};
