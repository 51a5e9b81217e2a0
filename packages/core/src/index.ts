/**
 * @checkless/core - Engine core for Checkless
 *
 * This package contains:
 * - The immutable board position
 * - Move legality rules and move generation
 * - Material evaluation
 * - Minimax and alpha-beta search
 */

export const VERSION = '0.1.0';

// Board model
export type { Side, PieceKind, Piece, Square, Move, Placement } from './board/types.js';
export {
  BOARD_SIZE,
  SIDES,
  PIECE_KINDS,
  opponentOf,
  forwardOf,
  sameSquare,
} from './board/types.js';
export { SQUARES, isOnBoard } from './board/squares.js';
export { Position } from './board/position.js';

// Rules
export {
  onBoard,
  destinationBlocked,
  shapeAllowed,
  pathClear,
  isLegal,
} from './rules/move-rules.js';
export { legalMoves, legalMovesFrom } from './rules/move-generator.js';

// Evaluation and search
export { PIECE_VALUES, material, evaluate } from './search/evaluator.js';
export { bestMove, minimax, alphaBeta, SEARCH_STRATEGIES } from './search/search.js';
export type { SearchStrategy, SearchResult } from './search/search.js';

// Errors
export {
  ChecklessError,
  InvalidSquareError,
  DuplicatePlacementError,
  NoLegalMovesError,
  InvalidSearchDepthError,
} from './errors.js';
