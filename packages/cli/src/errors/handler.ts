/**
 * Error handling utilities
 */

import { BoardInvariantError, InvalidFenError, PositionError } from '@sentinel-chess/board';
import chalk from 'chalk';

import { ConfigValidationError } from '../config/validation.js';

import {
  CliError,
  FEN_SUGGESTION,
  INTERNAL_ERROR_EXIT_CODE,
  InputError,
} from './cli-errors.js';

/**
 * Map errors from the board core onto CLI errors
 *
 * Bad FEN or counter values are input errors. A broken board invariant is a
 * bug in the core and exits with the internal error code.
 */
export function toCliError(error: unknown): CliError | null {
  if (error instanceof CliError) {
    return error;
  }
  if (error instanceof InvalidFenError) {
    return new InputError(error.message, FEN_SUGGESTION);
  }
  if (error instanceof PositionError) {
    return new InputError(error.message);
  }
  if (error instanceof BoardInvariantError) {
    return new CliError(
      `Board invariant broken: ${error.message}`,
      'Report this together with the FEN that produced it',
      INTERNAL_ERROR_EXIT_CODE,
    );
  }
  return null;
}

/**
 * Format an error for CLI output
 */
export function formatError(error: unknown): string {
  if (error instanceof ConfigValidationError) {
    return chalk.red(error.format());
  }

  const cliError = toCliError(error);
  if (cliError) {
    return chalk.red(cliError.format());
  }

  const message = error instanceof Error ? error.message : String(error);
  return chalk.red(`Error: ${message}`);
}

/**
 * Print an error and exit with its code (1 unless the error carries one)
 */
export function handleError(error: unknown): never {
  console.error(formatError(error));
  process.exit(toCliError(error)?.exitCode ?? 1);
}

/**
 * Wrap an async command action with error handling
 */
export function withErrorHandling<T extends unknown[]>(
  fn: (...args: T) => Promise<void>,
): (...args: T) => Promise<void> {
  return async (...args: T) => {
    try {
      await fn(...args);
    } catch (error) {
      handleError(error);
    }
  };
}
