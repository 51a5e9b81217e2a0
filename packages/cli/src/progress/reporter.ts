/**
 * Game reporter with an ora spinner
 */

import type {
  Move,
  NoLegalMovesError,
  Position,
  SearchResult,
  SearchStrategy,
  Side,
} from '@checkless/core';
import { formatMove, formatPosition } from '@checkless/notation';
import ora, { type Color, type Ora } from 'ora';

import type { GameOutput } from '../game/types.js';

import { createColorFns } from './colors.js';
import { formatDuration, formatSide } from './formatters.js';
import type { ColorFunctions, GameReporterOptions } from './types.js';

export type { GameReporterOptions } from './types.js';

/**
 * Console reporter for the game loop and the best command
 */
export class GameReporter implements GameOutput {
  private spinner: Ora | null = null;
  private searchStartTime: number = 0;
  private silent: boolean;
  private useColor: boolean;
  private perspective: Side;

  // Color functions
  private c: ColorFunctions;

  constructor(options: GameReporterOptions = {}) {
    this.silent = options.silent ?? false;
    this.useColor = options.color ?? true;
    this.perspective = options.perspective ?? 'white';
    this.c = createColorFns(this.useColor);
  }

  /**
   * Print the version header
   */
  printHeader(version: string): void {
    if (this.silent) return;
    console.log(this.c.bold(`Checkless v${version}`));
    console.log('');
  }

  showPosition(position: Position, lastMove?: Move): void {
    if (this.silent) return;
    console.log(formatPosition(position, { perspective: this.perspective, lastMove }));
    console.log('');
  }

  showScore(score: number): void {
    if (this.silent) return;
    console.log(`Current score: ${this.c.cyan(String(score))}`);
  }

  /**
   * Start the spinner for a search
   */
  searchStarted(strategy: SearchStrategy, depth: number): void {
    this.searchStartTime = Date.now();
    if (this.silent) return;

    this.stop();

    // Build ora options - only include color if colors are enabled
    const oraOptions: { text: string; prefixText: string; color?: Color } = {
      text: `Calculating best move (${strategy}, depth ${depth})...`,
      prefixText: '',
    };
    if (this.useColor) {
      oraOptions.color = 'cyan';
    }

    this.spinner = ora(oraOptions).start();
  }

  searchFinished(result: SearchResult): void {
    if (this.silent) return;

    const duration = Date.now() - this.searchStartTime;
    const durationStr = duration > 1000 ? this.c.dim(` (${formatDuration(duration)})`) : '';
    const summary = `Searched ${result.nodes} positions${durationStr}`;

    if (this.spinner) {
      this.spinner.succeed(summary);
      this.spinner = null;
    }

    console.log(`Best move: ${this.c.bold(formatMove(result.move))}`);
    console.log(`Score to achieve: ${this.c.cyan(String(result.score))}`);
  }

  searchFailed(error: NoLegalMovesError): void {
    if (this.silent) return;

    if (this.spinner) {
      this.spinner.fail(error.message);
      this.spinner = null;
    } else {
      this.printError(error.message);
    }
  }

  showLegalMoves(moves: readonly Move[]): void {
    if (this.silent) return;
    const list = moves.length > 0 ? moves.map(formatMove).join(' ') : 'none';
    console.log(this.c.dim(`Legal moves: ${list}`));
  }

  invalidMove(_text: string): void {
    if (this.silent) return;
    console.log(this.c.red('Incorrect move!'));
  }

  computerMoved(move: Move, side: Side): void {
    if (this.silent) return;
    console.log(`${formatSide(side)} (computer) plays ${this.c.bold(formatMove(move))}`);
    console.log('');
  }

  announceWinner(winner: Side): void {
    if (this.silent) return;
    console.log(this.c.bold(this.c.green(`${formatSide(winner)} wins!`)));
  }

  /**
   * Print a message
   */
  printMessage(message: string): void {
    if (this.silent) return;
    console.log(message);
  }

  /**
   * Print an error message
   */
  printError(message: string): void {
    if (this.silent) return;
    console.log(this.c.red(`✗ ${message}`));
  }

  /**
   * Stop any running spinner
   */
  stop(): void {
    if (this.spinner) {
      this.spinner.stop();
      this.spinner = null;
    }
  }
}
