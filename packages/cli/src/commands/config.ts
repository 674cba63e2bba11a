/**
 * Config command implementation
 */

import { formatConfig } from '../config/loader.js';
import { formatConfigDisplay } from '../output/index.js';

import { createCommandContext, type CommandDeps } from './context.js';

/**
 * Print the resolved configuration
 */
export async function configCommand(
  rawOptions: Record<string, unknown>,
  deps: CommandDeps = {},
): Promise<void> {
  const { config, reporter } = await createCommandContext(rawOptions, deps);

  if (config.output.format === 'json') {
    reporter.printResult(formatConfig(config));
    return;
  }

  reporter.printResult(formatConfigDisplay(config, reporter.c));
}
