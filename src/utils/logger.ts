/**
 * Console logging for the CLI. Everything goes to stderr; stdout stays empty.
 */

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  /** Drop info lines; warnings and errors still print. */
  quiet?: boolean;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return {
    info(message) {
      if (!options.quiet) console.error(message);
    },
    warn(message) {
      console.warn(`⚠️  ${message}`);
    },
    error(message) {
      console.error(`❌ ${message}`);
    },
  };
}
