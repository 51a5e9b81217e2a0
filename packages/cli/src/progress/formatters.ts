/**
 * Output formatting utilities
 */

import type { ChecklessConfig } from '../config/schema.js';

import type { ColorFunctions } from './types.js';

/**
 * Format configuration for display
 */
export function formatConfigDisplay(config: ChecklessConfig, c: ColorFunctions): string {
  const lines: string[] = [];

  lines.push(c.bold('Configuration:'));
  lines.push('');

  lines.push(c.dim('Search:'));
  lines.push(`  Depth: ${config.search.depth}`);
  lines.push(`  Strategy: ${config.search.strategy}`);
  lines.push('');

  lines.push(c.dim('Board:'));
  lines.push(`  File: ${config.board.file}`);
  lines.push('');

  lines.push(c.dim('Play:'));
  lines.push(`  Computer plays: ${config.play.computerSide}`);
  lines.push('');

  lines.push(c.dim('Output:'));
  lines.push(`  Color: ${config.output.color}`);
  lines.push(`  Show legal moves: ${config.output.showLegalMoves}`);
  lines.push(`  Perspective: ${config.output.perspective}`);

  return lines.join('\n');
}

/**
 * Format a time duration in human-readable format
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  if (ms < 60000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  const minutes = Math.floor(ms / 60000);
  const seconds = Math.round((ms % 60000) / 1000);
  return `${minutes}m ${seconds}s`;
}

/**
 * Capitalized side name
 */
export function formatSide(side: 'white' | 'black'): string {
  return side === 'white' ? 'White' : 'Black';
}
