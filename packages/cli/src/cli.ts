/**
 * CLI definition using Commander.js
 */

import { Command } from 'commander';
import { z } from 'zod';

import type { CliOptions } from './config/schema.js';
import {
  computerSideSchema,
  searchStrategySchema,
  sideSchema,
  toValidationError,
} from './config/validation.js';

export const VERSION = '0.1.0';

/**
 * Strategy descriptions for help text
 */
const STRATEGY_HELP = `Search strategy:
    minimax   - Full minimax search
    alphabeta - Minimax with alpha-beta pruning [default]`;

/**
 * Computer side descriptions for help text
 */
const COMPUTER_HELP = `Side played by the computer:
    none  - Two human players [default]
    white - Computer plays White
    black - Computer plays Black`;

/**
 * Options shared by every command
 */
function addSharedOptions(command: Command): Command {
  return command
    .argument('[board]', 'Board file (default: test_board.chb)')
    .option('-c, --config <file>', 'Path to config file')
    .option('-d, --depth <plies>', 'Search depth in plies, 1-8 (default: 4)')
    .option('-s, --strategy <name>', STRATEGY_HELP)
    .option('--perspective <side>', 'Board orientation: white or black (default: white)')
    .option('--show-config', 'Print resolved configuration and exit')
    .option('--no-color', 'Disable colored output (useful for piping)');
}

/**
 * Create and configure the CLI program
 */
export function createProgram(): Command {
  const program = new Command()
    .name('checkless')
    .description('Two-player chess engine with minimax and alpha-beta search')
    .version(VERSION);

  addSharedOptions(program.command('play').description('Play a game from a board file'))
    .option('--computer <side>', COMPUTER_HELP)
    .option('--hide-moves', 'Do not list legal moves before each prompt')
    .action(async (board: string | undefined, options: Record<string, unknown>) => {
      // Import dynamically to avoid circular dependencies
      const { playCommand } = await import('./commands/play.js');
      await playCommand(board, options);
    });

  addSharedOptions(
    program.command('best').description('Print the best move for the side to move and exit'),
  ).action(async (board: string | undefined, options: Record<string, unknown>) => {
    const { bestCommand } = await import('./commands/best.js');
    await bestCommand(board, options);
  });

  return program;
}

/**
 * Raw option values as Commander hands them over
 */
const rawOptionsSchema = z.object({
  config: z.string().optional(),
  depth: z.coerce.number().optional(),
  strategy: searchStrategySchema.optional(),
  perspective: sideSchema.optional(),
  color: z.boolean().optional(),
  showConfig: z.boolean().optional(),
  computer: computerSideSchema.optional(),
  hideMoves: z.boolean().optional(),
});

/**
 * Parse CLI options from command options object
 * @throws ConfigValidationError if an option value is invalid
 */
export function parseCliOptions(options: Record<string, unknown>, board?: string): CliOptions {
  const parsed = rawOptionsSchema.safeParse(options);
  if (!parsed.success) {
    throw toValidationError(parsed.error);
  }

  const { color, ...rest } = parsed.data;
  const result: CliOptions = { ...rest };

  // Note: Commander.js uses 'color' (negated) when --no-color is used
  if (color === false) result.noColor = true;
  if (board !== undefined) result.board = board;

  return result;
}
