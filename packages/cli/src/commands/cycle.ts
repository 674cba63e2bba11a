/**
 * Cycle command implementation
 */

import { CYCLE_LENGTH } from '@sexagenary/core';

import { parseYearArgument } from '../cli.js';
import { buildCycleRows, formatCycleRows, formatResolution } from '../output/index.js';

import { createCommandContext, resolveLanguage, type CommandDeps } from './context.js';

/**
 * Main cycle command handler
 */
export async function cycleCommand(
  rawYear: string,
  language: string | undefined,
  rawOptions: Record<string, unknown>,
  deps: CommandDeps = {},
): Promise<void> {
  const { config, reporter } = await createCommandContext(rawOptions, deps);

  const year = parseYearArgument(rawYear);
  const code = resolveLanguage(language, config);
  const rows = buildCycleRows(year, code);

  reporter.printVerbose(formatResolution(year));
  if (rows.length < CYCLE_LENGTH) {
    reporter.printWarning(`Cycle truncated after ${rows.length} years (last supported year)`);
  }

  reporter.printResult(
    config.output.format === 'json'
      ? JSON.stringify({ language: code, years: rows }, null, 2)
      : formatCycleRows(rows, config.output.separator),
  );
}
