/**
 * Console reporter: results to stdout, diagnostics to stderr
 */

import chalk from 'chalk';

import type { ColorFunctions, LineSink, ReporterOptions } from './types.js';

/**
 * Build color functions; without color every function returns its input
 */
export function createColorFns(useColor: boolean): ColorFunctions {
  if (useColor) {
    return {
      bold: (text: string) => chalk.bold(text),
      dim: (text: string) => chalk.dim(text),
      yellow: (text: string) => chalk.yellow(text),
      cyan: (text: string) => chalk.cyan(text),
    };
  }
  const identity = (text: string): string => text;
  return {
    bold: identity,
    dim: identity,
    yellow: identity,
    cyan: identity,
  };
}

const writeStdout: LineSink = (line) => {
  process.stdout.write(`${line}\n`);
};

const writeStderr: LineSink = (line) => {
  process.stderr.write(`${line}\n`);
};

/**
 * Reporter for CLI output
 */
export class Reporter {
  private readonly verbose: boolean;
  private readonly out: LineSink;
  private readonly err: LineSink;

  /** Color functions, exposed for formatters */
  readonly c: ColorFunctions;

  constructor(options: ReporterOptions = {}) {
    this.verbose = options.verbose ?? false;
    this.out = options.stdout ?? writeStdout;
    this.err = options.stderr ?? writeStderr;
    this.c = createColorFns(options.color ?? true);
  }

  /**
   * Print result text; never colorized so it can be piped
   */
  printResult(text: string): void {
    for (const line of text.split('\n')) {
      this.out(line);
    }
  }

  /**
   * Print a detail line, only in verbose mode
   */
  printVerbose(message: string): void {
    if (!this.verbose) return;
    this.err(this.c.dim(message));
  }

  printWarning(message: string): void {
    this.err(this.c.yellow(`Warning: ${message}`));
  }
}
