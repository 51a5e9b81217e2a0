/**
 * Best command implementation
 */

import { evaluate } from '@checkless/core';

import { parseCliOptions } from '../cli.js';
import { loadConfig } from '../config/loader.js';
import { handleError } from '../errors/index.js';
import { readBoardFile } from '../game/board-file.js';
import { searchWithProgress } from '../game/game-loop.js';
import { GameReporter } from '../progress/reporter.js';

import { printConfig } from './shared.js';

/**
 * Print the board, its score and the recommended move
 */
export async function bestCommand(
  board: string | undefined,
  rawOptions: Record<string, unknown>,
): Promise<void> {
  let reporter: GameReporter | undefined;

  try {
    const options = parseCliOptions(rawOptions, board);
    const config = await loadConfig(options);

    if (options.showConfig) {
      printConfig(config);
      return;
    }

    reporter = new GameReporter({
      color: config.output.color,
      perspective: config.output.perspective,
    });

    const position = await readBoardFile(config.board.file);
    const { depth, strategy } = config.search;

    reporter.showPosition(position);
    reporter.showScore(evaluate(position, depth));
    await searchWithProgress(position, depth, strategy, reporter);
  } catch (error) {
    reporter?.stop();
    handleError(error);
  }
}
