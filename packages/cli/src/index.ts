#!/usr/bin/env node

/**
 * sexagenary CLI
 *
 * Main entry point for the sexagenary command-line interface.
 */

import { createProgram } from './cli.js';
import { handleError } from './errors/index.js';

export { VERSION } from './cli.js';

/**
 * Main entry point
 */
export async function main(argv: string[] = process.argv): Promise<void> {
  try {
    const program = createProgram();
    await program.parseAsync(argv);
  } catch (error) {
    handleError(error, !argv.includes('--no-color'));
  }
}

// Run if executed directly
main().catch(handleError);
