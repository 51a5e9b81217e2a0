/**
 * Game loop tests with scripted input
 */

import { describe, it, expect } from 'vitest';

import {
  Position,
  type Move,
  type NoLegalMovesError,
  type Piece,
  type SearchResult,
  type SearchStrategy,
  type Side,
} from '@checkless/core';
import { formatMove, parseSquare } from '@checkless/notation';

import { MOVE_PROMPT, runGame, searchWithProgress, winnerOf } from '../game/game-loop.js';
import type { GameOptions, GameOutput, MoveSource } from '../game/types.js';

class ScriptedInput implements MoveSource {
  readonly prompts: string[] = [];

  constructor(private readonly lines: string[]) {}

  async nextMove(prompt: string): Promise<string | null> {
    this.prompts.push(prompt);
    return this.lines.shift() ?? null;
  }
}

class RecordingOutput implements GameOutput {
  readonly events: string[] = [];

  showPosition(_position: Position, lastMove?: Move): void {
    this.events.push(lastMove ? `position ${formatMove(lastMove)}` : 'position');
  }

  showScore(score: number): void {
    this.events.push(`score ${score}`);
  }

  searchStarted(strategy: SearchStrategy, depth: number): void {
    this.events.push(`search ${strategy} ${depth}`);
  }

  searchFinished(result: SearchResult): void {
    this.events.push(`best ${formatMove(result.move)} ${result.score}`);
  }

  searchFailed(error: NoLegalMovesError): void {
    this.events.push(`stuck ${error.side}`);
  }

  showLegalMoves(moves: readonly Move[]): void {
    this.events.push(`legal ${moves.length}`);
  }

  invalidMove(text: string): void {
    this.events.push(`invalid ${text}`);
  }

  computerMoved(move: Move, side: Side): void {
    this.events.push(`computer ${formatMove(move)} ${side}`);
  }

  announceWinner(winner: Side): void {
    this.events.push(`winner ${winner}`);
  }
}

const LETTERS: Record<string, Piece> = {
  K: { side: 'white', kind: 'king' },
  R: { side: 'white', kind: 'rook' },
  k: { side: 'black', kind: 'king' },
  r: { side: 'black', kind: 'rook' },
  p: { side: 'black', kind: 'pawn' },
};

function board(turn: Side, pieces: Record<string, string>): Position {
  return Position.fromPlacements(
    turn,
    Object.entries(pieces).map(([square, letter]) => {
      const piece = LETTERS[letter];
      if (!piece) throw new Error(`Unknown piece letter: ${letter}`);
      return { square: parseSquare(square), piece };
    }),
  );
}

function setup(
  lines: string[],
  overrides: Partial<GameOptions> = {},
): { input: ScriptedInput; output: RecordingOutput; options: GameOptions } {
  const input = new ScriptedInput(lines);
  const output = new RecordingOutput();
  const options: GameOptions = {
    depth: 1,
    strategy: 'alphabeta',
    computerSide: 'none',
    showLegalMoves: true,
    input,
    reporter: output,
    ...overrides,
  };
  return { input, output, options };
}

// White rook can take the black king along the eighth rank
const ROOK_MATE = (): Position => board('white', { a1: 'K', a8: 'R', h8: 'k' });

describe('runGame', () => {
  it('should end when a king is captured', async () => {
    const { input, output, options } = setup(['a8h8']);

    const outcome = await runGame(ROOK_MATE(), options);

    expect(outcome).toEqual({ kind: 'king-captured', winner: 'white' });
    expect(output.events).toEqual([
      'position',
      'score 10',
      'search alphabeta 1',
      'best a8h8 160',
      'legal 16',
      'position a8h8',
      'winner white',
    ]);
    expect(input.prompts).toEqual([MOVE_PROMPT]);
  });

  it('should ask again after an incorrect move', async () => {
    const { input, output, options } = setup(['e9e1', 'a1a3', 'hello', 'q']);

    const outcome = await runGame(ROOK_MATE(), options);

    expect(outcome).toEqual({ kind: 'quit' });
    expect(output.events.filter((event) => event.startsWith('invalid'))).toEqual([
      'invalid e9e1',
      'invalid a1a3',
      'invalid hello',
    ]);
    expect(input.prompts).toHaveLength(4);
  });

  it('should accept an uppercase quit command', async () => {
    const { options } = setup([' Q ']);
    expect(await runGame(ROOK_MATE(), options)).toEqual({ kind: 'quit' });
  });

  it('should quit when input ends', async () => {
    const { input, options } = setup([]);
    expect(await runGame(ROOK_MATE(), options)).toEqual({ kind: 'quit' });
    expect(input.prompts).toEqual([MOVE_PROMPT]);
  });

  it('should not list legal moves when disabled', async () => {
    const { output, options } = setup(['q'], { showLegalMoves: false });
    await runGame(ROOK_MATE(), options);
    expect(output.events.some((event) => event.startsWith('legal'))).toBe(false);
  });

  it('should play the best move for the computer side', async () => {
    const { input, output, options } = setup([], { computerSide: 'white' });

    const outcome = await runGame(ROOK_MATE(), options);

    expect(outcome).toEqual({ kind: 'king-captured', winner: 'white' });
    expect(output.events).toContain('computer a8h8 white');
    expect(input.prompts).toEqual([]);
  });

  it('should alternate between player and computer', async () => {
    const start = board('white', { a1: 'K', h8: 'k', b8: 'r' });
    const { output, options } = setup(['a1a2'], { computerSide: 'black' });

    const outcome = await runGame(start, options);

    expect(outcome).toEqual({ kind: 'quit' });
    expect(output.events).toEqual([
      'position',
      'score -10',
      'search alphabeta 1',
      'best a1a2 -10',
      'legal 3',
      'position a1a2',
      'score -10',
      'search alphabeta 1',
      'best b8a8 -10',
      'computer b8a8 black',
      'position b8a8',
      'score -10',
      'search alphabeta 1',
      'best a2a3 -10',
      'legal 5',
    ]);
  });

  it('should stop when the side to move has no legal moves', async () => {
    const pieces: Record<string, string> = { a8: 'k', h1: 'K' };
    for (let rank = 1; rank <= 7; rank++) pieces[`a${rank}`] = 'p';
    for (let rank = 1; rank <= 8; rank++) pieces[`b${rank}`] = 'p';
    const { output, options } = setup([]);

    const outcome = await runGame(board('black', pieces), options);

    expect(outcome).toEqual({ kind: 'no-legal-moves', side: 'black' });
    expect(output.events.at(-1)).toBe('stuck black');
  });

  it('should end at once when a king is already missing', async () => {
    const { output, options } = setup([]);
    const outcome = await runGame(board('black', { e1: 'K' }), options);
    expect(outcome).toEqual({ kind: 'king-captured', winner: 'white' });
    expect(output.events).toEqual(['position', 'winner white']);
  });
});

describe('searchWithProgress', () => {
  class TickingOutput extends RecordingOutput {
    override searchStarted(strategy: SearchStrategy, depth: number): void {
      super.searchStarted(strategy, depth);
      setImmediate(() => {
        this.events.push('tick');
      });
    }
  }

  it('should give the event loop a turn before searching', async () => {
    const output = new TickingOutput();

    const result = await searchWithProgress(ROOK_MATE(), 1, 'minimax', output);

    expect(formatMove(result.move)).toBe('a8h8');
    expect(output.events).toEqual(['search minimax 1', 'tick', 'best a8h8 160']);
  });

  it('should not report a finished search when there is no move', async () => {
    const pieces: Record<string, string> = { a8: 'k', h1: 'K' };
    for (let rank = 1; rank <= 7; rank++) pieces[`a${rank}`] = 'p';
    for (let rank = 1; rank <= 8; rank++) pieces[`b${rank}`] = 'p';
    const output = new RecordingOutput();

    await expect(
      searchWithProgress(board('black', pieces), 2, 'alphabeta', output),
    ).rejects.toThrow('No legal moves for Black');
    expect(output.events).toEqual(['search alphabeta 2']);
  });
});

describe('winnerOf', () => {
  it('should name the side whose king survives', () => {
    expect(winnerOf(board('white', { e1: 'K' }))).toBe('white');
    expect(winnerOf(board('white', { e8: 'k' }))).toBe('black');
    expect(winnerOf(board('white', { e1: 'K', e8: 'k' }))).toBeNull();
  });
});
