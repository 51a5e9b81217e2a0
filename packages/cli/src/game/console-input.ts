/**
 * Terminal move input
 */

import * as readline from 'node:readline/promises';

import type { MoveSource } from './types.js';

/**
 * Reads moves from stdin, one line per prompt
 */
export class ConsoleMoveSource implements MoveSource {
  private readonly rl: readline.Interface;
  private closed = false;
  private readonly whenClosed: Promise<null>;

  constructor(
    input: NodeJS.ReadableStream = process.stdin,
    output: NodeJS.WritableStream = process.stdout,
  ) {
    this.rl = readline.createInterface({ input, output });
    this.whenClosed = new Promise((resolve) => {
      this.rl.once('close', () => {
        this.closed = true;
        resolve(null);
      });
    });
  }

  async nextMove(prompt: string): Promise<string | null> {
    if (this.closed) return null;

    try {
      return await Promise.race([this.rl.question(prompt), this.whenClosed]);
    } catch (error) {
      // question() rejects once the interface has closed
      if (this.closed) return null;
      throw error;
    }
  }

  close(): void {
    this.rl.close();
  }
}
