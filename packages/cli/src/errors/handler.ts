/**
 * Turning thrown errors into a red message and an exit code
 */

import chalk from 'chalk';

import {
  ChecklessError,
  DuplicatePlacementError,
  InvalidSearchDepthError,
  InvalidSquareError,
  NoLegalMovesError,
} from '@checkless/core';
import { BoardParseError, InvalidNotationError } from '@checkless/notation';

import { ConfigValidationError, MAX_SEARCH_DEPTH } from '../config/validation.js';

import { BoardFileError, CliError, EXIT_CODES, type ExitCode } from './cli-errors.js';

export interface ErrorReport {
  text: string;
  exitCode: ExitCode;
}

/**
 * Wrap an engine or notation error in a CliError with a hint.
 * Returns null for anything else.
 */
export function toCliError(error: unknown): CliError | null {
  if (error instanceof CliError) {
    return error;
  }
  if (error instanceof BoardParseError) {
    return new BoardFileError(error.message, 'board', error.line, error.column);
  }
  if (error instanceof InvalidSearchDepthError) {
    return new CliError(
      error.message,
      `Pass --depth a whole number from 1 to ${MAX_SEARCH_DEPTH}`,
      EXIT_CODES.usage,
    );
  }
  if (error instanceof NoLegalMovesError) {
    return new CliError(
      error.message,
      'Edit the board or its turn line so the side to move has a move',
      EXIT_CODES.data,
    );
  }
  if (error instanceof InvalidSquareError || error instanceof DuplicatePlacementError) {
    return new CliError(error.message, 'Each square holds at most one piece', EXIT_CODES.data);
  }
  if (error instanceof InvalidNotationError) {
    return new CliError(error.message, 'Write moves as two squares, e.g. e2e4', EXIT_CODES.usage);
  }
  if (error instanceof ChecklessError) {
    return new CliError(error.message, undefined, EXIT_CODES.internal);
  }
  return null;
}

export function describeError(error: unknown): ErrorReport {
  if (error instanceof ConfigValidationError) {
    return { text: error.format(), exitCode: EXIT_CODES.config };
  }

  const cliError = toCliError(error);
  if (cliError) {
    return { text: cliError.format(), exitCode: cliError.exitCode };
  }

  const message = error instanceof Error ? error.message : String(error);
  return { text: `Error: ${message}`, exitCode: EXIT_CODES.failure };
}

export function formatError(error: unknown): string {
  return chalk.red(describeError(error).text);
}

/**
 * Print the error to stderr and exit
 */
export function handleError(error: unknown): never {
  const { text, exitCode } = describeError(error);
  console.error(chalk.red(text));
  process.exit(exitCode);
}
