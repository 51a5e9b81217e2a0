/**
 * Immutable board position
 */

import { DuplicatePlacementError, InvalidSquareError } from '../errors.js';

import { SQUARES, isOnBoard, squareIndex } from './squares.js';
import { opponentOf, type Move, type Piece, type Placement, type Side, type Square } from './types.js';

const SQUARE_COUNT = SQUARES.length;

/**
 * A board snapshot plus the side to move
 *
 * Positions are never modified after construction. Every transition
 * (`apply`, `withPiece`, `withTurn`) allocates a new position, so a
 * search can branch from one ancestor any number of times.
 */
export class Position {
  private constructor(
    /** Side to move */
    public readonly turn: Side,
    private readonly squares: ReadonlyArray<Piece | null>,
  ) {}

  /**
   * Create a position with no pieces
   */
  static empty(turn: Side): Position {
    return new Position(turn, new Array<Piece | null>(SQUARE_COUNT).fill(null));
  }

  /**
   * Create a position from a list of placed pieces
   * @throws InvalidSquareError if a placement is off the board
   * @throws DuplicatePlacementError if two placements share a square
   */
  static fromPlacements(turn: Side, placements: Iterable<Placement>): Position {
    const squares = new Array<Piece | null>(SQUARE_COUNT).fill(null);

    for (const { square, piece } of placements) {
      if (!isOnBoard(square)) {
        throw new InvalidSquareError(square);
      }
      const idx = squareIndex(square);
      if (squares[idx] !== null) {
        throw new DuplicatePlacementError(square);
      }
      squares[idx] = { side: piece.side, kind: piece.kind };
    }

    return new Position(turn, squares);
  }

  /**
   * Get the piece on a square
   * @throws InvalidSquareError if the square is off the board
   */
  pieceAt(square: Square): Piece | null {
    if (!isOnBoard(square)) {
      throw new InvalidSquareError(square);
    }
    return this.squares[squareIndex(square)] ?? null;
  }

  /**
   * Play a move and return the resulting position
   *
   * The moving piece replaces whatever stood on the destination. The move
   * is not validated; callers check it with `isLegal` first.
   */
  apply(move: Move): Position {
    const moving = this.pieceAt(move.from);
    const next = [...this.squares];
    next[squareIndex(move.to)] = moving;
    next[squareIndex(move.from)] = null;
    return new Position(opponentOf(this.turn), next);
  }

  /**
   * Whether `side` has no king left on the board
   */
  kingMissing(side: Side): boolean {
    return !this.squares.some((piece) => piece?.kind === 'king' && piece.side === side);
  }

  /**
   * Return a copy with one square replaced
   */
  withPiece(square: Square, piece: Piece | null): Position {
    if (!isOnBoard(square)) {
      throw new InvalidSquareError(square);
    }
    const next = [...this.squares];
    next[squareIndex(square)] = piece;
    return new Position(this.turn, next);
  }

  /**
   * Return a copy with a different side to move
   */
  withTurn(turn: Side): Position {
    return turn === this.turn ? this : new Position(turn, this.squares);
  }

  /**
   * Occupied squares in scan order
   */
  *placements(): IterableIterator<Placement> {
    for (const square of SQUARES) {
      const piece = this.squares[squareIndex(square)];
      if (piece) {
        yield { square, piece };
      }
    }
  }

  /**
   * Compare piece placement with another position, ignoring the turn
   */
  samePlacement(other: Position): boolean {
    for (let i = 0; i < SQUARE_COUNT; i++) {
      const a = this.squares[i] ?? null;
      const b = other.squares[i] ?? null;
      if (a === null || b === null) {
        if (a !== b) return false;
      } else if (a.side !== b.side || a.kind !== b.kind) {
        return false;
      }
    }
    return true;
  }
}
