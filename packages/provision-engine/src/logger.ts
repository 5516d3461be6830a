/**
 * Console logging for provisioning runs
 *
 * Progress lines (`<description>...`) go to stdout only in verbose mode.
 * Diagnostics carry a bracketed level tag; warnings are always printed.
 */

export interface Logger {
  /** Announce the step about to run */
  progress(description: string): void;
  info(message: string): void;
  debug(message: string): void;
  warn(message: string): void;
}

/**
 * Where log lines end up (defaults to the console)
 */
export interface LogSink {
  out(line: string): void;
  err(line: string): void;
}

export interface ConsoleLoggerOptions {
  verbose?: boolean;
  debug?: boolean;
  sink?: LogSink;
}

const consoleSink: LogSink = {
  out: line => console.log(line),
  err: line => console.error(line),
};

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const sink = options.sink ?? consoleSink;
  const verbose = options.verbose === true || options.debug === true;
  const debug = options.debug === true;

  return {
    progress(description) {
      if (verbose) sink.out(`${description}...`);
    },
    info(message) {
      if (verbose) sink.out(message);
    },
    debug(message) {
      if (debug) sink.err(`[DEBUG] ${message}`);
    },
    warn(message) {
      sink.err(`[WARN] ${message}`);
    },
  };
}

/**
 * Logger that drops everything
 */
export const silentLogger: Logger = {
  progress: () => {},
  info: () => {},
  debug: () => {},
  warn: () => {},
};
