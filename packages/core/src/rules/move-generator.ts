/**
 * Legal move generation
 *
 * Brute force: every destination on the board is tried for every piece of
 * the side to move and filtered through `isLegal`. Output order follows
 * `SQUARES` for origins and for destinations.
 */

import type { Position } from '../board/position.js';
import { SQUARES } from '../board/squares.js';
import type { Move, Square } from '../board/types.js';

import { isLegal } from './move-rules.js';

/**
 * All legal moves for the side to move
 */
export function legalMoves(position: Position): Move[] {
  const moves: Move[] = [];
  for (const { square, piece } of position.placements()) {
    if (piece.side !== position.turn) continue;
    collectFrom(position, square, moves);
  }
  return moves;
}

/**
 * Legal moves starting from one square (empty if the square holds no
 * piece of the side to move)
 */
export function legalMovesFrom(position: Position, from: Square): Move[] {
  const moves: Move[] = [];
  collectFrom(position, from, moves);
  return moves;
}

function collectFrom(position: Position, from: Square, moves: Move[]): void {
  for (const to of SQUARES) {
    const move = { from, to };
    if (isLegal(position, move)) {
      moves.push(move);
    }
  }
}
