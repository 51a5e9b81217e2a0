/**
 * Square helpers and the fixed board scan order
 */

import { BOARD_SIZE, type Square } from './types.js';

/**
 * Check that both coordinates are integers within the board
 */
export function isOnBoard(square: Square): boolean {
  return (
    Number.isInteger(square.file) &&
    Number.isInteger(square.rank) &&
    square.file >= 0 &&
    square.file < BOARD_SIZE &&
    square.rank >= 0 &&
    square.rank < BOARD_SIZE
  );
}

/**
 * Storage index of an on-board square
 */
export function squareIndex(square: Square): number {
  return square.file * BOARD_SIZE + square.rank;
}

function buildScanOrder(): readonly Square[] {
  const squares: Square[] = [];
  for (let file = 0; file < BOARD_SIZE; file++) {
    for (let rank = BOARD_SIZE - 1; rank >= 0; rank--) {
      squares.push({ file, rank });
    }
  }
  return squares;
}

/**
 * Every square, files a-h outermost and ranks 8 down to 1 within each
 * file (a8, a7, ..., a1, b8, ...). Move generation and search tie-breaks
 * depend on this order.
 */
export const SQUARES: readonly Square[] = buildScanOrder();
