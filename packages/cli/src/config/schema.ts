/**
 * Configuration schema types for the Checkless CLI
 */

import type { SearchStrategy, Side } from '@checkless/core';

/**
 * Side played by the computer in the game loop
 */
export type ComputerSide = Side | 'none';

/**
 * Board orientation
 */
export type BoardPerspective = Side;

/**
 * Search configuration
 */
export interface SearchConfigSchema {
  /** Plies searched for each recommendation (1-8) */
  depth: number;
  /** Search strategy */
  strategy: SearchStrategy;
}

/**
 * Board input configuration
 */
export interface BoardConfigSchema {
  /** Board file read when no file is given on the command line */
  file: string;
}

/**
 * Game loop configuration
 */
export interface PlayConfigSchema {
  /** Side the computer plays; 'none' for two human players */
  computerSide: ComputerSide;
}

/**
 * Output configuration
 */
export interface OutputConfigSchema {
  /** Colored output */
  color: boolean;
  /** List legal moves before each prompt */
  showLegalMoves: boolean;
  /** Board orientation */
  perspective: BoardPerspective;
}

/**
 * Complete Checkless configuration
 */
export interface ChecklessConfig {
  search: SearchConfigSchema;
  board: BoardConfigSchema;
  play: PlayConfigSchema;
  output: OutputConfigSchema;
}

/**
 * Configuration with every field optional, as read from a config file or
 * the environment
 */
export interface PartialChecklessConfig {
  search?: Partial<SearchConfigSchema>;
  board?: Partial<BoardConfigSchema>;
  play?: Partial<PlayConfigSchema>;
  output?: Partial<OutputConfigSchema>;
}

/**
 * CLI options from command line arguments
 */
export interface CliOptions {
  /** Board file path (positional argument) */
  board?: string;
  /** Path to config file */
  config?: string;
  /** Search depth in plies */
  depth?: number;
  /** Search strategy */
  strategy?: SearchStrategy;
  /** Board orientation */
  perspective?: BoardPerspective;
  /** Disable colored output */
  noColor?: boolean;
  /** Print resolved config and exit */
  showConfig?: boolean;
  /** Side played by the computer */
  computer?: ComputerSide;
  /** Do not list legal moves before prompting */
  hideMoves?: boolean;
}
