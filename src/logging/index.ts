import chalk from 'chalk';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface ConsoleLoggerOptions {
  verbose?: boolean;
}

/**
 * Console logger with chalk-coloured levels; debug lines only when verbose.
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  return {
    debug(message: string): void {
      if (options.verbose) {
        console.log(chalk.gray(message));
      }
    },
    info(message: string): void {
      console.log(message);
    },
    warn(message: string): void {
      console.warn(chalk.yellow(message));
    },
    error(message: string): void {
      console.error(chalk.red(message));
    }
  };
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined
};
