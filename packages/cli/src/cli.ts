/**
 * CLI definition using Commander.js
 */

import { LANGUAGE_CODES, LANGUAGE_NAMES, MAX_YEAR, MIN_YEAR } from '@sexagenary/core';
import { Command } from 'commander';

import type { CliOptions } from './config/schema.js';
import { InputError } from './errors/cli-errors.js';

export const VERSION = '0.1.0';

/**
 * Language descriptions for help text
 */
const LANGUAGE_HELP = `Output language (default from config: eng):
${LANGUAGE_CODES.map((code) => `    ${code.padEnd(5)}- ${LANGUAGE_NAMES[code]}`).join('\n')}`;

const YEAR_HELP = `Gregorian year (${MIN_YEAR}-${MAX_YEAR})`;

/**
 * Create and configure the CLI program
 */
export function createProgram(): Command {
  const program = new Command()
    .name('sexagenary')
    .description(
      'Name a Gregorian year in the 60-year sexagenary cycle, in Chinese, Korean, Japanese, Vietnamese or English',
    )
    .version(VERSION)
    .option('-c, --config <file>', 'Path to config file')
    .option('--separator <text>', 'Separator between the name and its Han characters (default: tab)')
    .option('--json', 'Print JSON instead of text')
    .option('--no-color', 'Disable colored output (useful for piping)')
    .option('--verbose', 'Print how the year was resolved to stderr');

  // Name command (default)
  program
    .command('name', { isDefault: true })
    .description('Print the year-name of a Gregorian year')
    .argument('<year>', YEAR_HELP)
    .argument('[language]', LANGUAGE_HELP)
    .option('-a, --all', 'Print the name in every language')
    .action(
      async (
        year: string,
        language: string | undefined,
        _options: Record<string, unknown>,
        command: Command,
      ) => {
        const { nameCommand } = await import('./commands/name.js');
        await nameCommand(year, language, command.optsWithGlobals());
      },
    );

  // Cycle command
  program
    .command('cycle')
    .description('List the 60 years of the cycle containing a year')
    .argument('<year>', YEAR_HELP)
    .argument('[language]', LANGUAGE_HELP)
    .action(
      async (
        year: string,
        language: string | undefined,
        _options: Record<string, unknown>,
        command: Command,
      ) => {
        const { cycleCommand } = await import('./commands/cycle.js');
        await cycleCommand(year, language, command.optsWithGlobals());
      },
    );

  // Config command
  program
    .command('config')
    .description('Print the resolved configuration')
    .action(async (_options: Record<string, unknown>, command: Command) => {
      const { configCommand } = await import('./commands/config.js');
      await configCommand(command.optsWithGlobals());
    });

  return program;
}

/**
 * Parse CLI options from command options object
 */
export function parseCliOptions(options: Record<string, unknown>): CliOptions {
  const result: CliOptions = {};

  if (typeof options['config'] === 'string') result.config = options['config'];
  if (typeof options['separator'] === 'string') result.separator = options['separator'];
  if (typeof options['json'] === 'boolean') result.json = options['json'];
  // Note: Commander.js uses 'color' (negated) when --no-color is used
  if (options['color'] === false) result.noColor = true;
  if (typeof options['verbose'] === 'boolean') result.verbose = options['verbose'];
  if (typeof options['all'] === 'boolean') result.all = options['all'];

  return result;
}

/**
 * Parse the year argument; range checks are left to the resolver
 *
 * @throws InputError if the argument is not an integer literal
 */
export function parseYearArgument(raw: string): number {
  const trimmed = raw.trim();
  if (!/^[+-]?\d+$/.test(trimmed)) {
    throw new InputError(
      `Year must be an integer, got '${raw}'`,
      'Pass a whole number such as 2024',
    );
  }
  return Number.parseInt(trimmed, 10);
}
