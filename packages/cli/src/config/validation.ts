/**
 * Zod validation schemas for configuration
 */

import { z } from 'zod';

import type { ChecklessConfig, PartialChecklessConfig } from './schema.js';

/**
 * Deepest search the CLI accepts
 */
export const MAX_SEARCH_DEPTH = 8;

/**
 * Search depth schema (1-8 plies)
 */
const depthSchema = z.number().int().min(1).max(MAX_SEARCH_DEPTH);

export const searchStrategySchema = z.enum(['minimax', 'alphabeta']);

export const sideSchema = z.enum(['white', 'black']);

export const computerSideSchema = z.enum(['none', 'white', 'black']);

export const searchConfigSchema = z.object({
  depth: depthSchema,
  strategy: searchStrategySchema,
});

export const boardConfigSchema = z.object({
  file: z.string().min(1),
});

export const playConfigSchema = z.object({
  computerSide: computerSideSchema,
});

export const outputConfigSchema = z.object({
  color: z.boolean(),
  showLegalMoves: z.boolean(),
  perspective: sideSchema,
});

/**
 * Complete configuration schema
 */
export const configSchema = z.object({
  search: searchConfigSchema,
  board: boardConfigSchema,
  play: playConfigSchema,
  output: outputConfigSchema,
});

/**
 * Partial configuration schema (config files and environment)
 */
export const partialConfigSchema = z
  .object({
    search: searchConfigSchema.partial().optional(),
    board: boardConfigSchema.partial().optional(),
    play: playConfigSchema.partial().optional(),
    output: outputConfigSchema.partial().optional(),
  })
  .strict();

/**
 * Configuration validation error
 */
export class ConfigValidationError extends Error {
  constructor(public readonly errors: Array<{ path: string; message: string }>) {
    const errorMessages = errors.map((e) => `  ${e.path}: ${e.message}`).join('\n');
    super(`Configuration validation failed:\n${errorMessages}`);
    this.name = 'ConfigValidationError';
  }

  /**
   * Format error for CLI display
   */
  format(): string {
    return [
      'Configuration validation failed:',
      '',
      ...this.errors.map((e) => `  ${e.path}: ${e.message}`),
      '',
      'Use --help to see available options',
      'Use --show-config to see current configuration',
    ].join('\n');
  }
}

/**
 * Convert zod issues into a ConfigValidationError
 */
export function toValidationError(error: z.ZodError, prefix: string[] = []): ConfigValidationError {
  return new ConfigValidationError(
    error.issues.map((issue) => ({
      path: [...prefix, ...issue.path].join('.'),
      message: issue.message,
    })),
  );
}

/**
 * Validate a complete configuration
 * @throws ConfigValidationError if validation fails
 */
export function validateConfig(config: unknown): ChecklessConfig {
  const result = configSchema.safeParse(config);
  if (!result.success) {
    throw toValidationError(result.error);
  }
  return result.data;
}

/**
 * Validate a partial configuration (config file or environment)
 * @throws ConfigValidationError if validation fails
 */
export function validatePartialConfig(config: unknown): PartialChecklessConfig {
  const result = partialConfigSchema.safeParse(config);
  if (!result.success) {
    throw toValidationError(result.error);
  }
  return result.data;
}
