/**
 * Play command implementation
 */

import { parseCliOptions, VERSION } from '../cli.js';
import { loadConfig } from '../config/loader.js';
import { handleError } from '../errors/index.js';
import { readBoardFile } from '../game/board-file.js';
import { ConsoleMoveSource } from '../game/console-input.js';
import { runGame } from '../game/game-loop.js';
import { GameReporter } from '../progress/reporter.js';

import { printConfig } from './shared.js';

/**
 * Main play command handler
 */
export async function playCommand(
  board: string | undefined,
  rawOptions: Record<string, unknown>,
): Promise<void> {
  let reporter: GameReporter | undefined;
  let input: ConsoleMoveSource | undefined;

  try {
    const options = parseCliOptions(rawOptions, board);
    const config = await loadConfig(options);

    // Show config and exit if requested
    if (options.showConfig) {
      printConfig(config);
      return;
    }

    reporter = new GameReporter({
      color: config.output.color,
      perspective: config.output.perspective,
    });
    reporter.printHeader(VERSION);

    const position = await readBoardFile(config.board.file);

    input = new ConsoleMoveSource();
    const outcome = await runGame(position, {
      depth: config.search.depth,
      strategy: config.search.strategy,
      computerSide: config.play.computerSide,
      showLegalMoves: config.output.showLegalMoves,
      input,
      reporter,
    });

    if (outcome.kind === 'quit') {
      reporter.printMessage('Game stopped.');
    }
  } catch (error) {
    reporter?.stop();
    handleError(error);
  } finally {
    input?.close();
  }
}
