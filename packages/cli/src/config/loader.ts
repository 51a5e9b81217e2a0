/**
 * Configuration loading from files, environment variables, and CLI arguments
 */

import { cosmiconfig, type CosmiconfigResult } from 'cosmiconfig';

import { ConfigError } from '../errors/cli-errors.js';

import { DEFAULT_CONFIG } from './defaults.js';
import type { ChecklessConfig, CliOptions, PartialChecklessConfig } from './schema.js';
import { validateConfig, validatePartialConfig } from './validation.js';

type ConfigSection = keyof ChecklessConfig;

interface EnvBinding {
  section: ConfigSection;
  key: string;
  parse: (value: string) => unknown;
}

const asString = (value: string): string => value;

const asNumber = (value: string): unknown => {
  const num = Number(value);
  return Number.isNaN(num) ? value : num;
};

const asBoolean = (value: string): boolean => value.toLowerCase() === 'true' || value === '1';

/**
 * Environment variable mapping
 * Maps env var names to config fields
 */
const ENV_VAR_MAP: Record<string, EnvBinding> = {
  CHECKLESS_DEPTH: { section: 'search', key: 'depth', parse: asNumber },
  CHECKLESS_STRATEGY: { section: 'search', key: 'strategy', parse: asString },
  CHECKLESS_BOARD: { section: 'board', key: 'file', parse: asString },
  CHECKLESS_COMPUTER: { section: 'play', key: 'computerSide', parse: asString },
  CHECKLESS_PERSPECTIVE: { section: 'output', key: 'perspective', parse: asString },
  CHECKLESS_SHOW_MOVES: { section: 'output', key: 'showLegalMoves', parse: asBoolean },
};

const SEARCH_PLACES = [
  'package.json',
  '.checklessrc',
  '.checklessrc.json',
  '.checklessrc.yaml',
  '.checklessrc.yml',
  '.checklessrc.js',
  '.checklessrc.cjs',
  'checkless.config.js',
  'checkless.config.cjs',
];

/**
 * Deep merge a partial configuration over a complete one
 * Source values override target values
 */
export function mergeConfig(target: ChecklessConfig, source: PartialChecklessConfig): ChecklessConfig {
  return {
    search: { ...target.search, ...source.search },
    board: { ...target.board, ...source.board },
    play: { ...target.play, ...source.play },
    output: { ...target.output, ...source.output },
  };
}

/**
 * Load configuration from environment variables
 * @throws ConfigValidationError if a variable holds an invalid value
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): PartialChecklessConfig {
  const config: Partial<Record<ConfigSection, Record<string, unknown>>> = {};

  for (const [envVar, binding] of Object.entries(ENV_VAR_MAP)) {
    const value = env[envVar];
    if (value !== undefined && value !== '') {
      const section = (config[binding.section] ??= {});
      section[binding.key] = binding.parse(value);
    }
  }

  return validatePartialConfig(config);
}

/**
 * Load configuration from config file using cosmiconfig
 *
 * Without an explicit path the current directory is searched; finding
 * nothing there is not an error.
 */
async function loadConfigFile(configPath?: string): Promise<PartialChecklessConfig | null> {
  const explorer = cosmiconfig('checkless', { searchPlaces: SEARCH_PLACES });

  let result: CosmiconfigResult;
  try {
    result = configPath ? await explorer.load(configPath) : await explorer.search();
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(
      `Failed to load config file${configPath ? ` ${configPath}` : ''}: ${reason}`,
      'Check that the file exists and holds valid JSON, YAML or JavaScript',
    );
  }

  if (!result || result.isEmpty) {
    return null;
  }
  return validatePartialConfig(result.config);
}

/**
 * Map CLI options to config object
 */
export function mapCliToConfig(options: CliOptions): PartialChecklessConfig {
  const config: PartialChecklessConfig = {};

  if (options.depth !== undefined) {
    config.search = { ...config.search, depth: options.depth };
  }

  if (options.strategy !== undefined) {
    config.search = { ...config.search, strategy: options.strategy };
  }

  if (options.board !== undefined) {
    config.board = { file: options.board };
  }

  if (options.computer !== undefined) {
    config.play = { computerSide: options.computer };
  }

  if (options.noColor) {
    config.output = { ...config.output, color: false };
  }

  if (options.hideMoves) {
    config.output = { ...config.output, showLegalMoves: false };
  }

  if (options.perspective !== undefined) {
    config.output = { ...config.output, perspective: options.perspective };
  }

  return config;
}

/**
 * Load and merge configuration from all sources
 *
 * Precedence (highest to lowest):
 * 1. CLI arguments
 * 2. Environment variables
 * 3. Config file
 * 4. Default values
 */
export async function loadConfig(
  cliOptions: CliOptions,
  env: NodeJS.ProcessEnv = process.env,
): Promise<ChecklessConfig> {
  let config = mergeConfig(DEFAULT_CONFIG, {});

  const fileConfig = await loadConfigFile(cliOptions.config);
  if (fileConfig) {
    config = mergeConfig(config, fileConfig);
  }

  config = mergeConfig(config, loadEnvConfig(env));
  config = mergeConfig(config, mapCliToConfig(cliOptions));

  return validateConfig(config);
}

/**
 * Format configuration for display
 */
export function formatConfig(config: ChecklessConfig): string {
  return JSON.stringify(config, null, 2);
}
