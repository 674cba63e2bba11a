/**
 * Name command implementation
 */

import { nameYear, nameYearInAllLanguages, resolve } from '@sexagenary/core';

import { parseYearArgument } from '../cli.js';
import type { SexagenaryConfig } from '../config/schema.js';
import {
  formatAllNames,
  formatAllNamesJson,
  formatNameJson,
  formatNameLine,
  formatResolution,
} from '../output/index.js';

import { createCommandContext, resolveLanguage, type CommandDeps } from './context.js';

/**
 * Render the output of the name command
 */
export function renderName(
  year: number,
  language: string | undefined,
  config: SexagenaryConfig,
  all: boolean = false,
): string {
  const { format, separator } = config.output;
  const position = resolve(year);

  if (all) {
    const names = nameYearInAllLanguages(year);
    return format === 'json'
      ? formatAllNamesJson(position, names)
      : formatAllNames(names, separator);
  }

  const code = resolveLanguage(language, config);
  const name = nameYear(year, code);
  return format === 'json' ? formatNameJson(position, code, name) : formatNameLine(name, separator);
}

/**
 * Main name command handler
 */
export async function nameCommand(
  rawYear: string,
  language: string | undefined,
  rawOptions: Record<string, unknown>,
  deps: CommandDeps = {},
): Promise<void> {
  const { options, config, reporter } = await createCommandContext(rawOptions, deps);

  const year = parseYearArgument(rawYear);
  const output = renderName(year, language, config, options.all);

  reporter.printVerbose(formatResolution(year));
  reporter.printResult(output);
}
