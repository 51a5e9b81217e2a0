/**
 * CLI error formatting and handling tests
 */

import chalk from 'chalk';
import { afterEach, beforeAll, describe, it, expect, vi } from 'vitest';

import {
  DuplicatePlacementError,
  InvalidSearchDepthError,
  NoLegalMovesError,
} from '@checkless/core';
import { BoardParseError, InvalidNotationError } from '@checkless/notation';

import { ConfigValidationError } from '../config/validation.js';
import {
  BoardFileError,
  CliError,
  ConfigError,
  EXIT_CODES,
  InputError,
  describeError,
  formatError,
  handleError,
  toCliError,
} from '../errors/index.js';

const BOARD_HINT = '  hint: Boards are 8 rows of . P R B Q K p r b q k followed by W or B';

class ExitCalled extends Error {
  constructor(public readonly code: string | number | null | undefined) {
    super(`exit ${code}`);
  }
}

describe('CLI errors', () => {
  it('should format a message with its hint', () => {
    const error = new InputError('Board file not found', 'Check the path');
    expect(error.format()).toBe('Input error: Board file not found\n  hint: Check the path');
    expect(error.exitCode).toBe(66);
  });

  it('should format a message without hint', () => {
    const error = new ConfigError('Bad config');
    expect(error.format()).toBe('Config error: Bad config');
    expect(error.exitCode).toBe(78);
  });

  it('should default to exit code 1', () => {
    expect(new CliError('Stopped').exitCode).toBe(1);
    expect(new CliError('Stopped').format()).toBe('Error: Stopped');
    expect(new CliError('Broken', undefined, EXIT_CODES.internal).exitCode).toBe(70);
  });

  it('should show where a board file is broken', () => {
    const error = new BoardFileError('Unknown piece character "n"', 'start.chb', 1, 2);
    expect(error.location).toBe('start.chb:1:2');
    expect(error.exitCode).toBe(65);
    expect(error.format()).toBe(
      `Board file error at start.chb:1:2: Unknown piece character "n"\n${BOARD_HINT}`,
    );
    expect(new BoardFileError('Missing side to move', 'start.chb', 9).location).toBe(
      'start.chb:9',
    );
    expect(new BoardFileError('Empty', 'start.chb').location).toBe('start.chb');
  });
});

describe('toCliError', () => {
  it('should pass CLI errors through', () => {
    const error = new InputError('No board');
    expect(toCliError(error)).toBe(error);
  });

  it('should hint at the depth range for a bad search depth', () => {
    const error = toCliError(new InvalidSearchDepthError(0));
    expect(error?.format()).toBe(
      'Error: Search depth must be a positive integer, got 0\n' +
        '  hint: Pass --depth a whole number from 1 to 8',
    );
    expect(error?.exitCode).toBe(EXIT_CODES.usage);
  });

  it('should treat a blocked side as a data error', () => {
    const error = toCliError(new NoLegalMovesError('black'));
    expect(error?.format()).toBe(
      'Error: No legal moves for Black\n' +
        '  hint: Edit the board or its turn line so the side to move has a move',
    );
    expect(error?.exitCode).toBe(65);
  });

  it('should treat a bad placement as a data error', () => {
    const error = toCliError(new DuplicatePlacementError({ file: 4, rank: 0 }));
    expect(error?.message).toBe('Square (4, 0) was given more than one piece');
    expect(error?.exitCode).toBe(65);
  });

  it('should keep the location of a board parse error', () => {
    const error = toCliError(new BoardParseError('Missing side to move', 9, 1));
    expect(error).toBeInstanceOf(BoardFileError);
    expect(error?.format()).toBe(`Board file error at board:9:1: Missing side to move\n${BOARD_HINT}`);
  });

  it('should show the move format for bad notation', () => {
    const error = toCliError(new InvalidNotationError('zz'));
    expect(error?.format()).toBe(
      'Error: Invalid notation: "zz"\n  hint: Write moves as two squares, e.g. e2e4',
    );
    expect(error?.exitCode).toBe(64);
  });

  it('should leave other errors alone', () => {
    expect(toCliError(new Error('boom'))).toBeNull();
    expect(toCliError('plain')).toBeNull();
  });
});

describe('formatError', () => {
  beforeAll(() => {
    chalk.level = 0;
  });

  it('should use the format of CLI errors', () => {
    expect(formatError(new InputError('No board'))).toBe('Input error: No board');
  });

  it('should use the format of validation errors', () => {
    const error = new ConfigValidationError([{ path: 'search.depth', message: 'Too big' }]);
    expect(formatError(error)).toBe(error.format());
    expect(describeError(error).exitCode).toBe(78);
  });

  it('should print the message of other errors', () => {
    expect(formatError(new Error('boom'))).toBe('Error: boom');
    expect(formatError('plain')).toBe('Error: plain');
    expect(describeError(new Error('boom')).exitCode).toBe(1);
  });
});

describe('handleError', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  function mockExit(): void {
    vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new ExitCalled(code);
    });
  }

  it('should print the error and exit with its code', () => {
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => {});
    mockExit();

    expect(() => handleError(new InputError('No board'))).toThrow('exit 66');
    expect(stderr).toHaveBeenCalledTimes(1);
  });

  it('should exit with the code of an engine error', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    mockExit();

    expect(() => handleError(new NoLegalMovesError('white'))).toThrow('exit 65');
    expect(() => handleError(new InvalidSearchDepthError(-1))).toThrow('exit 64');
  });

  it('should exit with 1 for unknown errors', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    mockExit();

    expect(() => handleError(new Error('boom'))).toThrow('exit 1');
  });
});
