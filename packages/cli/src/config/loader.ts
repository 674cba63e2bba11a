/**
 * Configuration loading from files, environment variables, and CLI arguments
 */

import { cosmiconfig, type CosmiconfigResult } from 'cosmiconfig';

import { ConfigError } from '../errors/cli-errors.js';

import { DEFAULT_CONFIG } from './defaults.js';
import type {
  CliOptions,
  OutputConfigSchema,
  PartialSexagenaryConfig,
  SexagenaryConfig,
} from './schema.js';
import { validateConfig, validatePartialConfig } from './validation.js';

/**
 * Environment variable mapping
 * Maps env var names to output config keys
 */
const ENV_VAR_MAP: Record<string, keyof OutputConfigSchema> = {
  SEXAGENARY_LANGUAGE: 'language',
  SEXAGENARY_FORMAT: 'format',
  SEXAGENARY_SEPARATOR: 'separator',
  SEXAGENARY_COLOR: 'color',
};

/**
 * Options for {@link loadConfig}
 */
export interface LoadConfigOptions {
  /** Environment to read (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Directory to search for a config file (default: cwd) */
  searchFrom?: string;
}

/**
 * Expand the escapes a shell leaves literal in a separator
 */
export function decodeSeparator(value: string): string {
  return value.replace(/\\t/g, '\t').replace(/\\n/g, '\n');
}

/**
 * Merge config layers; later values override earlier ones
 */
export function mergeConfig(
  target: SexagenaryConfig,
  source: PartialSexagenaryConfig,
): SexagenaryConfig {
  return {
    output: { ...target.output, ...source.output },
  };
}

/**
 * Parse an environment variable value for its config key
 */
function parseEnvValue(value: string, key: keyof OutputConfigSchema): unknown {
  switch (key) {
    case 'color':
      return value.toLowerCase() === 'true' || value === '1';
    case 'separator':
      return decodeSeparator(value);
    default:
      return value;
  }
}

/**
 * Load configuration from environment variables
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): PartialSexagenaryConfig {
  const output: Record<string, unknown> = {};

  for (const [envVar, key] of Object.entries(ENV_VAR_MAP)) {
    const value = env[envVar];
    if (value !== undefined && value !== '') {
      output[key] = parseEnvValue(value, key);
    }
  }

  if (Object.keys(output).length === 0) {
    return {};
  }
  return validatePartialConfig({ output });
}

/**
 * Load configuration from a config file using cosmiconfig
 */
async function loadConfigFile(
  configPath: string | undefined,
  searchFrom: string | undefined,
): Promise<PartialSexagenaryConfig> {
  const explorer = cosmiconfig('sexagenary', {
    searchPlaces: [
      'package.json',
      '.sexagenaryrc',
      '.sexagenaryrc.json',
      '.sexagenaryrc.yaml',
      '.sexagenaryrc.yml',
      'sexagenary.config.js',
      'sexagenary.config.cjs',
    ],
  });

  let result: CosmiconfigResult;
  try {
    result = configPath ? await explorer.load(configPath) : await explorer.search(searchFrom);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(
      `Failed to load config file${configPath ? ` ${configPath}` : ''}: ${reason}`,
      configPath ? 'Check the --config path and file syntax' : 'Check the config file syntax',
    );
  }

  if (!result || result.isEmpty) {
    return {};
  }
  return validatePartialConfig(result.config);
}

/**
 * Map CLI options to a config layer
 */
export function mapCliToConfig(options: CliOptions): PartialSexagenaryConfig {
  const output: Partial<OutputConfigSchema> = {};

  if (options.json) {
    output.format = 'json';
  }
  if (options.separator !== undefined) {
    output.separator = decodeSeparator(options.separator);
  }
  if (options.noColor) {
    output.color = false;
  }

  return Object.keys(output).length > 0 ? { output } : {};
}

/**
 * Load and merge configuration.
 * Precedence: defaults < config file < environment < CLI options
 *
 * @throws ConfigError if the config file cannot be read
 * @throws ConfigValidationError if any layer is invalid
 */
export async function loadConfig(
  options: CliOptions = {},
  loadOptions: LoadConfigOptions = {},
): Promise<SexagenaryConfig> {
  let config = DEFAULT_CONFIG;

  config = mergeConfig(config, await loadConfigFile(options.config, loadOptions.searchFrom));
  config = mergeConfig(config, loadEnvConfig(loadOptions.env));
  config = mergeConfig(config, mapCliToConfig(options));

  return validateConfig(config);
}

/**
 * Format configuration as JSON for display
 */
export function formatConfig(config: SexagenaryConfig): string {
  return JSON.stringify(config, null, 2);
}
