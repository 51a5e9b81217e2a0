import { PIECE_KINDS, type Piece, type PieceKind } from '@checkless/core';

const LETTERS: Record<PieceKind, string> = {
  pawn: 'p',
  rook: 'r',
  bishop: 'b',
  queen: 'q',
  king: 'k',
};

const KINDS: ReadonlyMap<string, PieceKind> = new Map(
  PIECE_KINDS.map((kind): [string, PieceKind] => [LETTERS[kind], kind]),
);

/**
 * Letter for a piece: uppercase White, lowercase Black
 */
export function pieceLetter(piece: Piece): string {
  const letter = LETTERS[piece.kind];
  return piece.side === 'white' ? letter.toUpperCase() : letter;
}

/**
 * Piece for a letter, or null if the letter names no piece
 */
export function pieceFromLetter(letter: string): Piece | null {
  const kind = KINDS.get(letter.toLowerCase());
  if (!kind || letter.length !== 1) return null;
  return { side: letter === letter.toUpperCase() ? 'white' : 'black', kind };
}
