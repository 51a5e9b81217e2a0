/**
 * Board file reading
 */

import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';

import type { Position } from '@checkless/core';
import { BoardParseError, parseBoard } from '@checkless/notation';

import { BoardFileError, InputError } from '../errors/index.js';

/**
 * Read and parse a board file
 * @throws InputError if the file cannot be read
 * @throws BoardFileError if the file is not a valid board
 */
export async function readBoardFile(filePath: string): Promise<Position> {
  let text: string;
  try {
    text = await readFile(filePath, 'utf-8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new InputError(
      `Cannot read board file: ${resolve(filePath)} (${reason})`,
      'Check the file path and try again, or set board.file in the config',
    );
  }

  try {
    return parseBoard(text);
  } catch (error) {
    if (error instanceof BoardParseError) {
      throw new BoardFileError(error.message, filePath, error.line, error.column);
    }
    throw error;
  }
}
