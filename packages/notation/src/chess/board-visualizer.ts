/**
 * Board Visualization
 *
 * Renders positions as ASCII boards. Brackets distinguish pieces from
 * empty squares.
 */

import { BOARD_SIZE, type Move, type Position, type Side } from '@checkless/core';

import { formatMove } from '../notation/coordinates.js';
import { pieceLetter } from '../notation/pieces.js';

/**
 * Board orientation perspective
 */
export type Perspective = Side;

/**
 * Options for board rendering
 */
export interface BoardRenderOptions {
  /** Board orientation (default: 'white') */
  perspective?: Perspective;
  /** Last move played, shown by `formatPosition` */
  lastMove?: Move;
}

const FILE_LABELS = ['a', 'b', 'c', 'd', 'e', 'f', 'g', 'h'];

/**
 * Render a position as an ASCII board
 *
 * Example output:
 * ```
 *    a   b   c   d   e   f   g   h
 * 8 [r]  .  [b] [q] [k] [b]  .  [r]  8
 * 7 [p] [p] [p] [p] [p] [p] [p] [p]  7
 * 6  .   .   .   .   .   .   .   .   6
 * 5  .   .   .   .   .   .   .   .   5
 * 4  .   .   .   .  [P]  .   .   .   4
 * 3  .   .   .   .   .   .   .   .   3
 * 2 [P] [P] [P] [P]  .  [P] [P] [P]  2
 * 1 [R]  .  [B] [Q] [K] [B]  .  [R]  1
 *    a   b   c   d   e   f   g   h
 * ```
 *
 * From Black's side files run h to a and ranks 1 to 8.
 */
export function renderBoard(position: Position, options?: BoardRenderOptions): string {
  const perspective = options?.perspective ?? 'white';
  const fromWhite = perspective === 'white';

  const files = fromWhite ? FILE_LABELS : [...FILE_LABELS].reverse();
  const ranks = Array.from({ length: BOARD_SIZE }, (_, i) => (fromWhite ? BOARD_SIZE - 1 - i : i));

  const lines: string[] = [];
  lines.push(`   ${files.join('   ')}`);

  for (const rank of ranks) {
    const rankNum = rank + 1;
    const squares: string[] = [];

    for (let col = 0; col < BOARD_SIZE; col++) {
      const file = fromWhite ? col : BOARD_SIZE - 1 - col;
      const piece = position.pieceAt({ file, rank });
      squares.push(piece ? `[${pieceLetter(piece)}]` : ' . ');
    }

    lines.push(`${rankNum} ${squares.join(' ')}  ${rankNum}`);
  }

  lines.push(`   ${files.join('   ')}`);

  return lines.join('\n');
}

/**
 * Board plus side to move, and the last move when given
 */
export function formatPosition(
  position: Position,
  options?: BoardRenderOptions & { includeBoard?: boolean },
): string {
  const parts: string[] = [];

  parts.push(`Side to move: ${position.turn === 'white' ? 'White' : 'Black'}`);

  if (options?.lastMove) {
    parts.push(`Last move: ${formatMove(options.lastMove)}`);
  }

  if (options?.includeBoard !== false) {
    parts.push('');
    parts.push(renderBoard(position, options));
  }

  return parts.join('\n');
}
