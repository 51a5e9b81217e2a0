/**
 * CLI options parsing tests
 */

import { describe, it, expect } from 'vitest';

import { createProgram, parseCliOptions } from '../cli.js';
import { ConfigValidationError } from '../config/validation.js';

describe('parseCliOptions', () => {
  describe('basic options', () => {
    it('should parse config option', () => {
      const result = parseCliOptions({ config: './my-config.json' });
      expect(result.config).toBe('./my-config.json');
    });

    it('should take the board file from the positional argument', () => {
      expect(parseCliOptions({}, 'games/endgame.chb').board).toBe('games/endgame.chb');
      expect(parseCliOptions({}).board).toBeUndefined();
    });
  });

  describe('search options', () => {
    it('should parse depth given as text', () => {
      expect(parseCliOptions({ depth: '3' }).depth).toBe(3);
    });

    it('should parse depth given as a number', () => {
      expect(parseCliOptions({ depth: 5 }).depth).toBe(5);
    });

    it('should reject a depth that is not a number', () => {
      expect(() => parseCliOptions({ depth: 'deep' })).toThrow(ConfigValidationError);
    });

    it('should parse strategy option', () => {
      expect(parseCliOptions({ strategy: 'minimax' }).strategy).toBe('minimax');
      expect(parseCliOptions({ strategy: 'alphabeta' }).strategy).toBe('alphabeta');
    });

    it('should reject an unknown strategy', () => {
      try {
        parseCliOptions({ strategy: 'fast' });
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigValidationError);
        if (error instanceof ConfigValidationError) {
          expect(error.errors).toHaveLength(1);
          expect(error.errors[0]?.path).toBe('strategy');
        }
      }
    });
  });

  describe('play options', () => {
    it('should parse computer option', () => {
      expect(parseCliOptions({ computer: 'none' }).computer).toBe('none');
      expect(parseCliOptions({ computer: 'black' }).computer).toBe('black');
    });

    it('should reject an unknown computer side', () => {
      expect(() => parseCliOptions({ computer: 'both' })).toThrow(ConfigValidationError);
    });

    it('should parse hideMoves flag', () => {
      expect(parseCliOptions({ hideMoves: true }).hideMoves).toBe(true);
    });
  });

  describe('output options', () => {
    it('should parse perspective option', () => {
      expect(parseCliOptions({ perspective: 'black' }).perspective).toBe('black');
    });

    it('should parse showConfig flag', () => {
      expect(parseCliOptions({ showConfig: true }).showConfig).toBe(true);
      expect(parseCliOptions({ showConfig: false }).showConfig).toBe(false);
    });

    it('should parse noColor when color is false (Commander.js negated flag)', () => {
      // Commander.js converts --no-color to color: false
      const result = parseCliOptions({ color: false });
      expect(result.noColor).toBe(true);
    });

    it('should not set noColor when color is true', () => {
      const result = parseCliOptions({ color: true });
      expect(result.noColor).toBeUndefined();
    });
  });
});

describe('createProgram', () => {
  const program = createProgram();

  it('should define the play and best commands', () => {
    expect(program.name()).toBe('checkless');
    expect(program.commands.map((command) => command.name())).toEqual(['play', 'best']);
  });

  it('should give play the shared and game options', () => {
    const play = program.commands.find((command) => command.name() === 'play');
    expect(play?.options.map((option) => option.long)).toEqual([
      '--config',
      '--depth',
      '--strategy',
      '--perspective',
      '--show-config',
      '--no-color',
      '--computer',
      '--hide-moves',
    ]);
  });

  it('should give best only the shared options', () => {
    const best = program.commands.find((command) => command.name() === 'best');
    expect(best?.options.map((option) => option.long)).toEqual([
      '--config',
      '--depth',
      '--strategy',
      '--perspective',
      '--show-config',
      '--no-color',
    ]);
  });
});
