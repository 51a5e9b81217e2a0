/**
 * Board model types
 *
 * Squares use zero-based coordinates: file 0-7 is a-h, rank 0-7 is 1-8.
 */

/**
 * Number of files and ranks on the board
 */
export const BOARD_SIZE = 8;

/**
 * Side to move or piece owner
 */
export type Side = 'white' | 'black';

/**
 * Piece kinds understood by the rules (no knights)
 */
export type PieceKind = 'pawn' | 'rook' | 'bishop' | 'queen' | 'king';

export const SIDES: readonly Side[] = ['white', 'black'];

export const PIECE_KINDS: readonly PieceKind[] = ['pawn', 'rook', 'bishop', 'queen', 'king'];

/**
 * A piece on the board
 */
export interface Piece {
  readonly side: Side;
  readonly kind: PieceKind;
}

/**
 * A board coordinate
 */
export interface Square {
  /** File index, 0 = a */
  readonly file: number;
  /** Rank index, 0 = rank 1 */
  readonly rank: number;
}

/**
 * A move is only an origin and a destination; captures are implicit
 */
export interface Move {
  readonly from: Square;
  readonly to: Square;
}

/**
 * A piece together with the square it stands on
 */
export interface Placement {
  readonly square: Square;
  readonly piece: Piece;
}

/**
 * Get the other side
 */
export function opponentOf(side: Side): Side {
  return side === 'white' ? 'black' : 'white';
}

/**
 * Rank direction a pawn of the given side advances in
 */
export function forwardOf(side: Side): 1 | -1 {
  return side === 'white' ? 1 : -1;
}

export function sameSquare(a: Square, b: Square): boolean {
  return a.file === b.file && a.rank === b.rank;
}
