/**
 * Configuration module exports
 */

// Schema types
export type {
  BoardPerspective,
  ComputerSide,
  SearchConfigSchema,
  BoardConfigSchema,
  PlayConfigSchema,
  OutputConfigSchema,
  ChecklessConfig,
  PartialChecklessConfig,
  CliOptions,
} from './schema.js';

// Defaults
export {
  DEFAULT_SEARCH_CONFIG,
  DEFAULT_BOARD_CONFIG,
  DEFAULT_PLAY_CONFIG,
  DEFAULT_OUTPUT_CONFIG,
  DEFAULT_CONFIG,
} from './defaults.js';

// Validation
export {
  MAX_SEARCH_DEPTH,
  configSchema,
  partialConfigSchema,
  searchStrategySchema,
  sideSchema,
  computerSideSchema,
  ConfigValidationError,
  toValidationError,
  validateConfig,
  validatePartialConfig,
} from './validation.js';

// Loader
export { loadConfig, loadEnvConfig, mapCliToConfig, mergeConfig, formatConfig } from './loader.js';
