/**
 * Move Legality Rules
 *
 * Pure predicates over a position and a candidate move. `isLegal` is the
 * single gate used by move generation, search and the game loop.
 *
 * There is no check rule: a move that leaves the mover's king attacked is
 * still legal, and losing the king is detected afterwards with
 * `Position.kingMissing`.
 */

import type { Position } from '../board/position.js';
import { isOnBoard } from '../board/squares.js';
import { forwardOf, sameSquare, type Move, type PieceKind } from '../board/types.js';

/**
 * Both squares lie on the board and the move goes somewhere
 */
export function onBoard(move: Move): boolean {
  return isOnBoard(move.from) && isOnBoard(move.to) && !sameSquare(move.from, move.to);
}

/**
 * The destination holds a piece of the mover's own side
 *
 * An empty origin is not "blocked"; `shapeAllowed` rejects it.
 */
export function destinationBlocked(position: Position, move: Move): boolean {
  const moving = position.pieceAt(move.from);
  const target = position.pieceAt(move.to);
  if (!moving || !target) return false;
  return moving.side === target.side;
}

/**
 * The displacement matches the moving piece's pattern
 *
 * Also fails when the origin is empty or holds a piece of the side that
 * is not to move.
 */
export function shapeAllowed(position: Position, move: Move): boolean {
  const moving = position.pieceAt(move.from);
  if (!moving || moving.side !== position.turn) return false;

  const df = move.to.file - move.from.file;
  const dr = move.to.rank - move.from.rank;

  switch (moving.kind) {
    case 'pawn': {
      if (dr !== forwardOf(moving.side)) return false;
      const target = position.pieceAt(move.to);
      if (df === 0) return target === null;
      if (Math.abs(df) === 1) return target !== null && target.side !== moving.side;
      return false;
    }
    case 'rook':
      return isStraight(df, dr);
    case 'bishop':
      return isDiagonal(df, dr);
    case 'queen':
      return isStraight(df, dr) || isDiagonal(df, dr);
    case 'king':
      return Math.max(Math.abs(df), Math.abs(dr)) === 1;
  }
}

/**
 * Every square strictly between origin and destination is empty
 *
 * Only sliding pieces can be obstructed. A displacement that is not a
 * straight or diagonal line has no squares in between.
 */
export function pathClear(position: Position, move: Move): boolean {
  const moving = position.pieceAt(move.from);
  if (!moving || !isSlider(moving.kind)) return true;

  const df = move.to.file - move.from.file;
  const dr = move.to.rank - move.from.rank;
  if (!isStraight(df, dr) && !isDiagonal(df, dr)) return true;

  const stepFile = Math.sign(df);
  const stepRank = Math.sign(dr);
  const steps = Math.max(Math.abs(df), Math.abs(dr));

  for (let i = 1; i < steps; i++) {
    const between = { file: move.from.file + stepFile * i, rank: move.from.rank + stepRank * i };
    if (position.pieceAt(between) !== null) return false;
  }
  return true;
}

/**
 * Full legality check
 *
 * `onBoard` runs first so that the remaining predicates only ever look
 * at on-board squares.
 */
export function isLegal(position: Position, move: Move): boolean {
  return (
    onBoard(move) &&
    !destinationBlocked(position, move) &&
    shapeAllowed(position, move) &&
    pathClear(position, move)
  );
}

function isStraight(df: number, dr: number): boolean {
  return (df === 0) !== (dr === 0);
}

function isDiagonal(df: number, dr: number): boolean {
  return df !== 0 && Math.abs(df) === Math.abs(dr);
}

function isSlider(kind: PieceKind): boolean {
  return kind === 'rook' || kind === 'bishop' || kind === 'queen';
}
