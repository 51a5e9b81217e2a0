/**
 * Shared types for progress reporting
 */

import type { Side } from '@checkless/core';

/**
 * Color functions for consistent styling
 */
export interface ColorFunctions {
  bold: (text: string) => string;
  dim: (text: string) => string;
  green: (text: string) => string;
  red: (text: string) => string;
  cyan: (text: string) => string;
}

/**
 * Options for the game reporter
 */
export interface GameReporterOptions {
  /** Suppress all output */
  silent?: boolean;
  /** Enable colored output (default: true) */
  color?: boolean;
  /** Board orientation (default: 'white') */
  perspective?: Side;
}
