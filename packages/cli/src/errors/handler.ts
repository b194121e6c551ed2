/**
 * Error handling utilities
 */

import chalk from 'chalk';

import { ConfigValidationError } from '../config/validation.js';

import { CliError } from './cli-errors.js';

/**
 * Format an error for CLI output
 */
export function formatError(error: unknown, useColor = true): string {
  const text =
    error instanceof ConfigValidationError || error instanceof CliError
      ? error.format()
      : `Error: ${error instanceof Error ? error.message : String(error)}`;
  return useColor ? chalk.red(text) : text;
}

/**
 * Exit code for an error: the CliError's own, 1 otherwise
 */
export function exitCodeFor(error: unknown): number {
  return error instanceof CliError ? error.exitCode : 1;
}

/**
 * Handle an error and exit with appropriate code
 */
export function handleError(error: unknown): never {
  console.error(formatError(error));
  process.exit(exitCodeFor(error));
}
