/**
 * Test position helpers
 *
 * Positions are written as a map from square name to piece letter
 * (uppercase White, lowercase Black), e.g. `{ e1: 'K', e8: 'k' }`.
 */

import { Position } from '../board/position.js';
import type { Move, Piece, PieceKind, Placement, Side, Square } from '../board/types.js';

const KINDS: Record<string, PieceKind> = {
  p: 'pawn',
  r: 'rook',
  b: 'bishop',
  q: 'queen',
  k: 'king',
};

export function sq(name: string): Square {
  return { file: name.charCodeAt(0) - 97, rank: Number(name.slice(1)) - 1 };
}

export function mv(text: string): Move {
  return { from: sq(text.slice(0, 2)), to: sq(text.slice(2, 4)) };
}

export function squareName(square: Square): string {
  return `${String.fromCharCode(97 + square.file)}${square.rank + 1}`;
}

export function moveText(move: Move): string {
  return `${squareName(move.from)}${squareName(move.to)}`;
}

export function piece(letter: string): Piece {
  const kind = KINDS[letter.toLowerCase()];
  if (!kind) throw new Error(`Unknown piece letter: ${letter}`);
  return { side: letter === letter.toUpperCase() ? 'white' : 'black', kind };
}

export function board(turn: Side, pieces: Record<string, string>): Position {
  const placements: Placement[] = Object.entries(pieces).map(([name, letter]) => ({
    square: sq(name),
    piece: piece(letter),
  }));
  return Position.fromPlacements(turn, placements);
}

/**
 * Black king walled in on the a- and b-files by its own pawns; Black has
 * no legal move although both kings are on the board
 */
export function blockedBlack(): Position {
  const pieces: Record<string, string> = { a8: 'k', h1: 'K' };
  for (let rank = 1; rank <= 7; rank++) pieces[`a${rank}`] = 'p';
  for (let rank = 1; rank <= 8; rank++) pieces[`b${rank}`] = 'p';
  return board('black', pieces);
}
