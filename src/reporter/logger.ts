/**
 * Progress and error messages, written to stderr with a `stylegate:` prefix
 */

export interface MessageStream {
  write(chunk: string): unknown;
}

export interface LoggerOptions {
  quiet: boolean;
  verbose: boolean;
}

export interface Logger {
  /** Progress message, hidden by --quiet */
  info(message: string): void;
  /** Per-file detail, shown only with --verbose */
  debug(message: string): void;
  /** Always shown */
  error(message: string): void;
}

export function createLogger(options: LoggerOptions, stream: MessageStream = process.stderr): Logger {
  const write = (message: string) => {
    stream.write(`stylegate: ${message}\n`);
  };

  return {
    info(message) {
      if (!options.quiet) write(message);
    },
    debug(message) {
      if (options.verbose && !options.quiet) write(message);
    },
    error(message) {
      write(message);
    },
  };
}

export const silentLogger: Logger = {
  info() {},
  debug() {},
  error() {},
};
