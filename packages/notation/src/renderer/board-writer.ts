import { BOARD_SIZE, type Position } from '@checkless/core';

import { pieceLetter } from '../notation/pieces.js';

/**
 * Write a position in board file format
 *
 * `parseBoard(serializeBoard(p))` gives back the placement and turn of `p`.
 */
export function serializeBoard(position: Position): string {
  const lines: string[] = [];

  for (let rank = BOARD_SIZE - 1; rank >= 0; rank--) {
    let line = '';
    for (let file = 0; file < BOARD_SIZE; file++) {
      const piece = position.pieceAt({ file, rank });
      line += piece ? pieceLetter(piece) : '.';
    }
    lines.push(line);
  }
  lines.push(position.turn === 'white' ? 'W' : 'B');

  return `${lines.join('\n')}\n`;
}
