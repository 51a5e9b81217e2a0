/**
 * Game loop types
 */

import type { Move, NoLegalMovesError, Position, SearchResult, SearchStrategy, Side } from '@checkless/core';

import type { ComputerSide } from '../config/schema.js';

/**
 * Source of moves typed by a player
 */
export interface MoveSource {
  /**
   * Show the prompt and wait for one line of input
   * @returns the line, or null once input has ended
   */
  nextMove(prompt: string): Promise<string | null>;
}

/**
 * Everything the game loop reports
 */
export interface GameOutput {
  showPosition(position: Position, lastMove?: Move): void;
  showScore(score: number): void;
  searchStarted(strategy: SearchStrategy, depth: number): void;
  searchFinished(result: SearchResult): void;
  searchFailed(error: NoLegalMovesError): void;
  showLegalMoves(moves: readonly Move[]): void;
  invalidMove(text: string): void;
  computerMoved(move: Move, side: Side): void;
  announceWinner(winner: Side): void;
}

export interface GameOptions {
  depth: number;
  strategy: SearchStrategy;
  computerSide: ComputerSide;
  showLegalMoves: boolean;
  input: MoveSource;
  reporter: GameOutput;
}

/**
 * How a game ended
 */
export type GameOutcome =
  | { kind: 'king-captured'; winner: Side }
  | { kind: 'no-legal-moves'; side: Side }
  | { kind: 'quit' };
