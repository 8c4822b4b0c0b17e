/**
 * Console logger for progress and diagnostics.
 *
 * Everything goes to stderr: stdout is reserved for the command's result so it
 * can be piped. Octokit's own request log is routed into `debug`.
 */

export interface Logger {
  debug(message: string, ...meta: unknown[]): void;
  info(message: string, ...meta: unknown[]): void;
  warn(message: string, ...meta: unknown[]): void;
  error(message: string, ...meta: unknown[]): void;
}

export interface LoggerOptions {
  debug?: boolean;
  quiet?: boolean;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const { debug = false, quiet = false } = options;

  return {
    debug(message, ...meta) {
      if (debug) console.error(`🐛 ${message}`, ...meta);
    },
    info(message, ...meta) {
      if (!quiet) console.error(message, ...meta);
    },
    warn(message, ...meta) {
      console.error(`⚠️  ${message}`, ...meta);
    },
    error(message, ...meta) {
      console.error(`❌ ${message}`, ...meta);
    },
  };
}

export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};
