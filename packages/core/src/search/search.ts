/**
 * Adversarial Search
 *
 * Minimax and alpha-beta share one recursive walk. White maximizes and
 * Black minimizes, decided by the side to move at each node, so the same
 * code handles both players.
 *
 * Depth rule: root moves are searched with `maxDepth - 1` plies left. A
 * node is a leaf when the side to move has lost its king or no plies are
 * left, and is scored with `evaluate(position, pliesLeft + 1)`. Leaves at
 * the horizon are weighted 1 and earlier leaves more heavily.
 */

import type { Position } from '../board/position.js';
import type { Move } from '../board/types.js';
import { InvalidSearchDepthError, NoLegalMovesError } from '../errors.js';
import { legalMoves } from '../rules/move-generator.js';

import { evaluate } from './evaluator.js';

/**
 * Available search strategies
 */
export type SearchStrategy = 'minimax' | 'alphabeta';

export const SEARCH_STRATEGIES: readonly SearchStrategy[] = ['minimax', 'alphabeta'];

/**
 * Outcome of a search
 */
export interface SearchResult {
  /** Recommended move for the side to move */
  move: Move;
  /** Score reached by that move (positive favours White) */
  score: number;
  /** Strategy that produced the result */
  strategy: SearchStrategy;
  /** Depth searched, in plies */
  depth: number;
  /** Number of positions visited below the root */
  nodes: number;
}

interface SearchStats {
  nodes: number;
}

/**
 * Find the best move with the given strategy
 * @throws InvalidSearchDepthError if maxDepth is not a positive integer
 * @throws NoLegalMovesError if the side to move has no legal moves
 */
export function bestMove(
  position: Position,
  maxDepth: number,
  strategy: SearchStrategy = 'alphabeta',
): SearchResult {
  if (!Number.isInteger(maxDepth) || maxDepth < 1) {
    throw new InvalidSearchDepthError(maxDepth);
  }

  const [first, ...rest] = legalMoves(position);
  if (first === undefined) {
    throw new NoLegalMovesError(position.turn);
  }

  const prune = strategy === 'alphabeta';
  const maximizing = position.turn === 'white';
  const stats: SearchStats = { nodes: 0 };

  let alpha = -Infinity;
  let beta = Infinity;
  const best = {
    move: first,
    score: searchNode(position.apply(first), maxDepth - 1, alpha, beta, prune, stats),
  };
  if (maximizing) alpha = best.score;
  else beta = best.score;

  for (const move of rest) {
    const score = searchNode(position.apply(move), maxDepth - 1, alpha, beta, prune, stats);
    if (maximizing ? score > best.score : score < best.score) {
      best.move = move;
      best.score = score;
      if (maximizing) alpha = score;
      else beta = score;
    }
  }

  return { move: best.move, score: best.score, strategy, depth: maxDepth, nodes: stats.nodes };
}

/**
 * Plain minimax: explores the full tree
 */
export function minimax(position: Position, maxDepth: number): SearchResult {
  return bestMove(position, maxDepth, 'minimax');
}

/**
 * Minimax with alpha-beta pruning; same move and score as `minimax`
 */
export function alphaBeta(position: Position, maxDepth: number): SearchResult {
  return bestMove(position, maxDepth, 'alphabeta');
}

function searchNode(
  position: Position,
  pliesLeft: number,
  alpha: number,
  beta: number,
  prune: boolean,
  stats: SearchStats,
): number {
  stats.nodes++;

  if (pliesLeft <= 0 || position.kingMissing(position.turn)) {
    return evaluate(position, pliesLeft + 1);
  }

  const moves = legalMoves(position);
  if (moves.length === 0) {
    // Stuck side: scored statically, there is no stalemate rule
    return evaluate(position, pliesLeft + 1);
  }

  const maximizing = position.turn === 'white';
  let best = maximizing ? -Infinity : Infinity;

  for (const move of moves) {
    const value = searchNode(position.apply(move), pliesLeft - 1, alpha, beta, prune, stats);

    if (maximizing) {
      if (value > best) best = value;
      if (prune) {
        if (best > alpha) alpha = best;
        if (alpha >= beta) break;
      }
    } else {
      if (value < best) best = value;
      if (prune) {
        if (best < beta) beta = best;
        if (alpha >= beta) break;
      }
    }
  }

  return best;
}
