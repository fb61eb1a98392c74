/**
 * Configuration loading from files, environment variables, and CLI arguments
 */

import { cosmiconfig, type CosmiconfigResult } from 'cosmiconfig';

import { ConfigError, resolveAbsolutePath } from '../errors/cli-errors.js';

import { DEFAULT_CONFIG } from './defaults.js';
import type { CliOptions, SentinelConfig } from './schema.js';
import { validateConfig, validatePartialConfig, type PartialSentinelConfig } from './validation.js';

type ConfigSection = keyof SentinelConfig;

interface EnvBinding {
  section: ConfigSection;
  key: string;
  boolean: boolean;
}

/**
 * Environment variable mapping
 * Maps env var names to config keys
 */
const ENV_VAR_MAP: Record<string, EnvBinding> = {
  // Display
  SENTINEL_GLYPHS: { section: 'display', key: 'glyphs', boolean: false },
  SENTINEL_PERSPECTIVE: { section: 'display', key: 'perspective', boolean: false },
  SENTINEL_COORDINATES: { section: 'display', key: 'coordinates', boolean: true },
  SENTINEL_COLOR: { section: 'display', key: 'color', boolean: true },
  SENTINEL_LIGHT_SQUARE: { section: 'display', key: 'lightSquare', boolean: false },
  SENTINEL_DARK_SQUARE: { section: 'display', key: 'darkSquare', boolean: false },

  // Output
  SENTINEL_VERBOSE: { section: 'output', key: 'verbose', boolean: true },
};

export interface LoadConfigOptions {
  /** Environment to read SENTINEL_* variables from (default: process.env) */
  env?: NodeJS.ProcessEnv | undefined;
  /** Directory to search for a config file (default: current directory) */
  searchFrom?: string | undefined;
}

/**
 * Copy of `base` with every defined value of `override` applied
 */
function mergeSection<T extends object>(
  base: T,
  override: { [K in keyof T]?: T[K] | undefined } | undefined,
): T {
  const result = { ...base };
  if (!override) {
    return result;
  }

  for (const key in base) {
    const value = override[key];
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}

function mergeConfig(base: SentinelConfig, override: PartialSentinelConfig | null): SentinelConfig {
  return {
    display: mergeSection(base.display, override?.display),
    output: mergeSection(base.output, override?.output),
  };
}

/**
 * Parse environment variable value based on expected type
 */
function parseEnvValue(value: string, binding: EnvBinding): unknown {
  if (binding.boolean) {
    return value.toLowerCase() === 'true' || value === '1';
  }
  return value;
}

/**
 * Load configuration from environment variables
 * @throws ConfigValidationError if a variable holds an invalid value
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): PartialSentinelConfig {
  const config: Partial<Record<ConfigSection, Record<string, unknown>>> = {};

  for (const [envVar, binding] of Object.entries(ENV_VAR_MAP)) {
    const value = env[envVar];
    if (value !== undefined && value !== '') {
      const section = (config[binding.section] ??= {});
      section[binding.key] = parseEnvValue(value, binding);
    }
  }

  return validatePartialConfig(config);
}

/**
 * Load configuration from config file using cosmiconfig
 *
 * A missing file is not an error when searching. A file named with
 * --config must load.
 */
export async function loadConfigFile(
  configPath?: string,
  searchFrom?: string,
): Promise<PartialSentinelConfig | null> {
  const explorer = cosmiconfig('sentinel', {
    searchPlaces: [
      'package.json',
      '.sentinelrc',
      '.sentinelrc.json',
      '.sentinelrc.yaml',
      '.sentinelrc.yml',
      'sentinel.config.js',
      'sentinel.config.cjs',
    ],
  });

  let result: CosmiconfigResult;
  if (configPath) {
    try {
      result = await explorer.load(configPath);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfigError(
        `Failed to load config file: ${resolveAbsolutePath(configPath)}`,
        reason,
      );
    }
  } else {
    result = await explorer.search(searchFrom);
  }

  if (!result || result.isEmpty) {
    return null;
  }
  return validatePartialConfig(result.config);
}

/**
 * Map CLI options to config object
 */
function mapCliToConfig(options: CliOptions): PartialSentinelConfig {
  return {
    display: {
      glyphs: options.glyphs,
      perspective: options.perspective,
      coordinates: options.noCoordinates ? false : undefined,
      color: options.noColor ? false : undefined,
    },
    output: {
      status: options.status,
      verbose: options.verbose,
    },
  };
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
  options: LoadConfigOptions = {},
): Promise<SentinelConfig> {
  let config = mergeConfig(DEFAULT_CONFIG, null);

  const fileConfig = await loadConfigFile(cliOptions.config, options.searchFrom);
  config = mergeConfig(config, fileConfig);

  config = mergeConfig(config, loadEnvConfig(options.env));

  config = mergeConfig(config, mapCliToConfig(cliOptions));

  validateConfig(config);

  return config;
}

/**
 * Format configuration for display
 */
export function formatConfig(config: SentinelConfig): string {
  return JSON.stringify(config, null, 2);
}
