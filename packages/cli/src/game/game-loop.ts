/**
 * Interactive game loop
 *
 * Each turn shows the board and the current score, searches for the best
 * move, then either plays it (computer side) or asks for a move until a
 * legal one is typed. The game ends when a king is captured, the side to
 * move is stuck, or the player quits.
 */

import { setImmediate } from 'node:timers/promises';

import {
  NoLegalMovesError,
  bestMove,
  evaluate,
  isLegal,
  legalMoves,
  type Move,
  type Position,
  type SearchResult,
  type SearchStrategy,
  type Side,
} from '@checkless/core';
import { tryParseMove } from '@checkless/notation';

import type { GameOptions, GameOutcome, GameOutput } from './types.js';

export const MOVE_PROMPT = 'Indicate your move (or q to stop): ';

const QUIT_COMMAND = 'q';

/**
 * Side that has won, if either king is gone
 */
export function winnerOf(position: Position): Side | null {
  if (position.kingMissing('black')) return 'white';
  if (position.kingMissing('white')) return 'black';
  return null;
}

/**
 * Search for the best move between the reporter's start and finish calls.
 * `bestMove` blocks, so the event loop gets one turn first to draw the
 * spinner.
 */
export async function searchWithProgress(
  position: Position,
  depth: number,
  strategy: SearchStrategy,
  reporter: Pick<GameOutput, 'searchStarted' | 'searchFinished'>,
): Promise<SearchResult> {
  reporter.searchStarted(strategy, depth);
  await setImmediate();
  const result = bestMove(position, depth, strategy);
  reporter.searchFinished(result);
  return result;
}

/**
 * Run the game loop from a starting position
 */
export async function runGame(start: Position, options: GameOptions): Promise<GameOutcome> {
  const { reporter } = options;
  let position = start;
  let lastMove: Move | undefined;

  for (;;) {
    reporter.showPosition(position, lastMove);

    const winner = winnerOf(position);
    if (winner) {
      reporter.announceWinner(winner);
      return { kind: 'king-captured', winner };
    }

    reporter.showScore(evaluate(position, options.depth));

    let result: SearchResult;
    try {
      result = await searchWithProgress(position, options.depth, options.strategy, reporter);
    } catch (error) {
      if (error instanceof NoLegalMovesError) {
        reporter.searchFailed(error);
        return { kind: 'no-legal-moves', side: error.side };
      }
      throw error;
    }

    let move: Move;
    if (options.computerSide === position.turn) {
      move = result.move;
      reporter.computerMoved(move, position.turn);
    } else {
      const chosen = await promptMove(position, options);
      if (!chosen) {
        return { kind: 'quit' };
      }
      move = chosen;
    }

    position = position.apply(move);
    lastMove = move;
  }
}

/**
 * Ask until a legal move is typed; null when the player quits
 */
async function promptMove(position: Position, options: GameOptions): Promise<Move | null> {
  if (options.showLegalMoves) {
    options.reporter.showLegalMoves(legalMoves(position));
  }

  for (;;) {
    const text = await options.input.nextMove(MOVE_PROMPT);
    if (text === null || text.trim().toLowerCase() === QUIT_COMMAND) {
      return null;
    }

    const move = tryParseMove(text);
    if (move && isLegal(position, move)) {
      return move;
    }
    options.reporter.invalidMove(text);
  }
}
