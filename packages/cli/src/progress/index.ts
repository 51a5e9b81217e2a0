/**
 * Progress module exports
 */

export type { ColorFunctions, GameReporterOptions } from './types.js';
export { GameReporter } from './reporter.js';
export { createColorFns } from './colors.js';
export { formatConfigDisplay, formatDuration, formatSide } from './formatters.js';
