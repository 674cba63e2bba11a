/**
 * Shared setup for command handlers
 */

import { parseLanguageCode, type LanguageCode } from '@sexagenary/core';

import { parseCliOptions } from '../cli.js';
import { loadConfig, type LoadConfigOptions } from '../config/loader.js';
import type { CliOptions, SexagenaryConfig } from '../config/schema.js';
import { Reporter } from '../output/index.js';
import type { LineSink } from '../output/index.js';

/**
 * Injection points for command handlers
 */
export interface CommandDeps extends LoadConfigOptions {
  stdout?: LineSink;
  stderr?: LineSink;
}

export interface CommandContext {
  options: CliOptions;
  config: SexagenaryConfig;
  reporter: Reporter;
}

/**
 * Parse options, load configuration and build the reporter
 */
export async function createCommandContext(
  rawOptions: Record<string, unknown>,
  deps: CommandDeps = {},
): Promise<CommandContext> {
  const options = parseCliOptions(rawOptions);
  const config = await loadConfig(options, { env: deps.env, searchFrom: deps.searchFrom });
  const reporter = new Reporter({
    color: config.output.color,
    verbose: options.verbose,
    stdout: deps.stdout,
    stderr: deps.stderr,
  });
  return { options, config, reporter };
}

/**
 * Language from the command line, or the configured default
 *
 * @throws UnknownLanguageError for an unsupported code
 */
export function resolveLanguage(
  language: string | undefined,
  config: SexagenaryConfig,
): LanguageCode {
  return language === undefined ? config.output.language : parseLanguageCode(language);
}
