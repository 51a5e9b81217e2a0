/**
 * Game module exports
 */

export type { GameOptions, GameOutcome, GameOutput, MoveSource } from './types.js';
export { runGame, searchWithProgress, winnerOf, MOVE_PROMPT } from './game-loop.js';
export { readBoardFile } from './board-file.js';
export { ConsoleMoveSource } from './console-input.js';
