/**
 * Material Evaluation
 *
 * Scores are from White's point of view: positive favours White,
 * negative favours Black.
 */

import type { Position } from '../board/position.js';
import type { PieceKind, Side } from '../board/types.js';

/**
 * Material value of each piece kind
 */
export const PIECE_VALUES: Record<PieceKind, number> = {
  pawn: 1,
  rook: 10,
  bishop: 10,
  queen: 50,
  king: 150,
};

/**
 * Total material for one side
 */
export function material(position: Position, side: Side): number {
  let total = 0;
  for (const { piece } of position.placements()) {
    if (piece.side === side) {
      total += PIECE_VALUES[piece.kind];
    }
  }
  return total;
}

/**
 * Score a position
 *
 * The material balance is multiplied by the remaining search depth. A
 * king captured near the root therefore outweighs the same capture deep
 * in the tree, which makes the search take the fastest win and put off
 * a loss as long as it can when material is otherwise equal.
 *
 * @param depthRemaining - weight given to the balance
 */
export function evaluate(position: Position, depthRemaining: number): number {
  return (material(position, 'white') - material(position, 'black')) * depthRemaining;
}
