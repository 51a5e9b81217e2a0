/**
 * Coordinate notation
 *
 * Squares are written file letter then rank digit (`e2`), moves as two
 * squares run together (`e2e4`).
 */

import { isOnBoard, type Move, type Square } from '@checkless/core';

import { InvalidNotationError } from '../errors.js';

const FILES = 'abcdefgh';
const RANKS = '12345678';

/**
 * Parse a square such as `e2`
 * @throws InvalidNotationError
 */
export function parseSquare(text: string): Square {
  const normalized = text.trim().toLowerCase();
  const file = normalized.length === 2 ? FILES.indexOf(normalized.charAt(0)) : -1;
  const rank = normalized.length === 2 ? RANKS.indexOf(normalized.charAt(1)) : -1;
  if (file < 0 || rank < 0) {
    throw new InvalidNotationError(text);
  }
  return { file, rank };
}

/**
 * Format an on-board square
 * @throws InvalidNotationError if the square is off the board
 */
export function formatSquare(square: Square): string {
  if (!isOnBoard(square)) {
    throw new InvalidNotationError(`(${square.file}, ${square.rank})`);
  }
  return `${FILES.charAt(square.file)}${RANKS.charAt(square.rank)}`;
}

/**
 * Parse a four-character move such as `e2e4`
 * @throws InvalidNotationError
 */
export function parseMove(text: string): Move {
  const normalized = text.trim();
  if (normalized.length !== 4) {
    throw new InvalidNotationError(text);
  }
  try {
    return { from: parseSquare(normalized.slice(0, 2)), to: parseSquare(normalized.slice(2)) };
  } catch (error) {
    if (error instanceof InvalidNotationError) {
      throw new InvalidNotationError(text);
    }
    throw error;
  }
}

/**
 * Parse a move, returning null instead of throwing
 */
export function tryParseMove(text: string): Move | null {
  try {
    return parseMove(text);
  } catch (error) {
    if (error instanceof InvalidNotationError) return null;
    throw error;
  }
}

export function formatMove(move: Move): string {
  return `${formatSquare(move.from)}${formatSquare(move.to)}`;
}
