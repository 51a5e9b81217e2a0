/**
 * @checkless/notation - Text formats for Checkless
 *
 * This package handles:
 * - Coordinate notation for squares and moves (`e2`, `e2e4`)
 * - Board files: parsing and writing
 * - ASCII board rendering
 */

export const VERSION = '0.1.0';

// Coordinate notation
export {
  parseSquare,
  formatSquare,
  parseMove,
  tryParseMove,
  formatMove,
} from './notation/coordinates.js';
export { pieceLetter, pieceFromLetter } from './notation/pieces.js';

// Board files
export { parseBoard } from './parser/board-parser.js';
export { serializeBoard } from './renderer/board-writer.js';

// Board visualization
export { renderBoard, formatPosition } from './chess/board-visualizer.js';
export type { Perspective, BoardRenderOptions } from './chess/board-visualizer.js';

// Errors
export { InvalidNotationError, BoardParseError } from './errors.js';
