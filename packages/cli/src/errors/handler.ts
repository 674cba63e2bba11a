/**
 * Error handling utilities
 */

import {
  InvalidYearError,
  LANGUAGE_CODES,
  LANGUAGE_NAMES,
  MAX_YEAR,
  MIN_YEAR,
  UnknownLanguageError,
  YearRangeError,
} from '@sexagenary/core';
import chalk from 'chalk';

import { ConfigValidationError } from '../config/validation.js';

import { CliError } from './cli-errors.js';

/**
 * Exit code for failures the user can fix by changing the input
 */
export const EXIT_INPUT_ERROR = 1;

/**
 * Exit code for anything unexpected
 */
export const EXIT_UNEXPECTED_ERROR = 2;

function withSuggestion(message: string, suggestion: string): string {
  return [`Error: ${message}`, '', `Suggestion: ${suggestion}`].join('\n');
}

/**
 * Render an error as plain text
 */
function describeError(error: unknown): string {
  if (error instanceof ConfigValidationError || error instanceof CliError) {
    return error.format();
  }

  if (error instanceof YearRangeError) {
    return withSuggestion(error.message, `Choose a year from ${MIN_YEAR} to ${MAX_YEAR}`);
  }

  if (error instanceof InvalidYearError) {
    return withSuggestion(error.message, 'Pass a whole number such as 2024');
  }

  if (error instanceof UnknownLanguageError) {
    const choices = LANGUAGE_CODES.map((code) => `${code} (${LANGUAGE_NAMES[code]})`).join(', ');
    return withSuggestion(error.message, `Use one of: ${choices}`);
  }

  if (error instanceof Error) {
    return `Error: ${error.message}`;
  }

  return `Error: ${String(error)}`;
}

/**
 * Format and display an error for CLI output
 */
export function formatError(error: unknown, useColor: boolean = true): string {
  const text = describeError(error);
  return useColor ? chalk.red(text) : text;
}

/**
 * Exit code for an error
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof CliError) {
    return error.exitCode;
  }
  if (
    error instanceof ConfigValidationError ||
    error instanceof YearRangeError ||
    error instanceof InvalidYearError ||
    error instanceof UnknownLanguageError
  ) {
    return EXIT_INPUT_ERROR;
  }
  return EXIT_UNEXPECTED_ERROR;
}

/**
 * Handle an error and exit with appropriate code
 */
export function handleError(error: unknown, useColor: boolean = true): never {
  console.error(formatError(error, useColor));
  process.exit(exitCodeFor(error));
}
