/**
 * Default configuration values
 */

import type {
  BoardConfigSchema,
  ChecklessConfig,
  OutputConfigSchema,
  PlayConfigSchema,
  SearchConfigSchema,
} from './schema.js';

export const DEFAULT_SEARCH_CONFIG: SearchConfigSchema = {
  depth: 4,
  strategy: 'alphabeta',
};

export const DEFAULT_BOARD_CONFIG: BoardConfigSchema = {
  file: 'test_board.chb',
};

export const DEFAULT_PLAY_CONFIG: PlayConfigSchema = {
  computerSide: 'none',
};

export const DEFAULT_OUTPUT_CONFIG: OutputConfigSchema = {
  color: true,
  showLegalMoves: true,
  perspective: 'white',
};

/**
 * Complete default configuration
 */
export const DEFAULT_CONFIG: ChecklessConfig = {
  search: DEFAULT_SEARCH_CONFIG,
  board: DEFAULT_BOARD_CONFIG,
  play: DEFAULT_PLAY_CONFIG,
  output: DEFAULT_OUTPUT_CONFIG,
};
