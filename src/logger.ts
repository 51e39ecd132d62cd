/**
 * Logging
 *
 * The library never writes to the console on its own; callers pass a Logger.
 */

import chalk from 'chalk';

export interface Logger {
  debug(message: string): void;
  warn(message: string): void;
}

export const silentLogger: Logger = {
  debug: () => undefined,
  warn: () => undefined,
};

/**
 * Logger writing to stderr, so that stdout carries only the report.
 * Debug messages are printed only when `verbose` is set.
 */
export function createConsoleLogger(verbose = false): Logger {
  return {
    debug(message: string): void {
      if (verbose) console.error(chalk.gray(`  ${message}`));
    },
    warn(message: string): void {
      console.error(chalk.yellow(`⚠️  ${message}`));
    },
  };
}
