import chalk from 'chalk';

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  debug(message: string): void;
}

export interface LoggerOptions {
  debug?: boolean;
  quiet?: boolean;
}

// Diagnostics always go to stderr so stdout stays clean for reports.
export function createLogger(opts: LoggerOptions = {}): Logger {
  return {
    info(message) {
      if (!opts.quiet) console.error(message);
    },
    warn(message) {
      console.error(chalk.yellow(`Warning: ${message}`));
    },
    debug(message) {
      if (opts.debug) console.error(chalk.dim(message));
    },
  };
}

export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  debug: () => undefined,
};
