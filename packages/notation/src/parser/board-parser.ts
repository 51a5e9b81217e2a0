import { BOARD_SIZE, Position, type Placement, type Side } from '@checkless/core';

import { BoardParseError } from '../errors.js';
import { pieceFromLetter } from '../notation/pieces.js';

const EMPTY = '.';

/**
 * Parse a board file
 *
 * Eight rows of eight characters from rank 8 down to rank 1, then a line
 * holding `W` or `B` for the side to move. Carriage returns are dropped
 * and lines after the turn line are ignored.
 *
 * @throws BoardParseError with the 1-based line and column of the problem
 */
export function parseBoard(text: string): Position {
  const lines = text.replace(/\r/g, '').split('\n');
  const placements: Placement[] = [];

  for (let row = 0; row < BOARD_SIZE; row++) {
    const lineNumber = row + 1;
    const line = lines[row];
    if (line === undefined || (line === '' && lines.length <= row + 1)) {
      throw new BoardParseError(`Expected ${BOARD_SIZE} board rows, found ${row}`, lineNumber);
    }
    if (line.length !== BOARD_SIZE) {
      throw new BoardParseError(
        `Row has ${line.length} squares, expected ${BOARD_SIZE}`,
        lineNumber,
        Math.min(line.length, BOARD_SIZE) + 1,
      );
    }

    const rank = BOARD_SIZE - 1 - row;
    for (let file = 0; file < BOARD_SIZE; file++) {
      const char = line.charAt(file);
      if (char === EMPTY) continue;

      const piece = pieceFromLetter(char);
      if (!piece) {
        throw new BoardParseError(`Unknown piece character "${char}"`, lineNumber, file + 1);
      }
      placements.push({ square: { file, rank }, piece });
    }
  }

  return Position.fromPlacements(parseTurn(lines[BOARD_SIZE]), placements);
}

function parseTurn(line: string | undefined): Side {
  const lineNumber = BOARD_SIZE + 1;
  const marker = line?.trim().toUpperCase();
  if (marker === 'W') return 'white';
  if (marker === 'B') return 'black';
  throw new BoardParseError(
    marker ? `Expected W or B for the side to move, found "${marker}"` : 'Missing side to move',
    lineNumber,
    1,
  );
}
