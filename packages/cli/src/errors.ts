/**
 * CLI failures and exit codes
 */

import { TexChunkError } from '@texchunk/core';
import type { Logger } from '@texchunk/logger';
import chalk from 'chalk';

/** Invalid configuration file, environment variable or flag */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** Input that cannot be read */
export class InputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InputError';
  }
}

export const EXIT_PARSE_ERROR = 1;
export const EXIT_USAGE_ERROR = 2;

/**
 * 1 for errors found in the LaTeX source or selectors, 2 for everything else
 */
export function exitCodeFor(error: unknown): number {
  return error instanceof TexChunkError ? EXIT_PARSE_ERROR : EXIT_USAGE_ERROR;
}

/**
 * Log a failed command and print its message. Returns the exit code to use.
 */
export function reportFailure(error: unknown, logger: Logger, writeError: (line: string) => void): number {
  const message = error instanceof Error ? error.message : String(error);
  logger.error('command_failed', { error });
  writeError(chalk.red(`error: ${message}`));
  return exitCodeFor(error);
}
