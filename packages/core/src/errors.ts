/**
 * Error types raised by the engine core
 */

import type { Side, Square } from './board/types.js';

/**
 * Base class for engine errors
 */
export class ChecklessError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ChecklessError';
  }
}

/**
 * Error thrown when a square lies outside the 8x8 board
 */
export class InvalidSquareError extends ChecklessError {
  constructor(public readonly square: Square) {
    super(`Square is off the board: (${square.file}, ${square.rank})`);
    this.name = 'InvalidSquareError';
  }
}

/**
 * Error thrown when a position is built with two pieces on one square
 */
export class DuplicatePlacementError extends ChecklessError {
  constructor(public readonly square: Square) {
    super(`Square (${square.file}, ${square.rank}) was given more than one piece`);
    this.name = 'DuplicatePlacementError';
  }
}

/**
 * Error thrown when a search is started from a position without legal moves
 */
export class NoLegalMovesError extends ChecklessError {
  constructor(public readonly side: Side) {
    super(`No legal moves for ${side === 'white' ? 'White' : 'Black'}`);
    this.name = 'NoLegalMovesError';
  }
}

/**
 * Error thrown when a search depth is not a positive integer
 */
export class InvalidSearchDepthError extends ChecklessError {
  constructor(public readonly depth: number) {
    super(`Search depth must be a positive integer, got ${depth}`);
    this.name = 'InvalidSearchDepthError';
  }
}
