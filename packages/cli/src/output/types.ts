/**
 * Shared types for console output
 */

/**
 * Color function type for conditional colorization
 */
export type ColorFn = (text: string) => string;

/**
 * Color functions bundle
 */
export interface ColorFunctions {
  bold: ColorFn;
  dim: ColorFn;
  yellow: ColorFn;
  cyan: ColorFn;
}

/**
 * Destination for one line of output
 */
export type LineSink = (line: string) => void;

/**
 * Reporter options
 */
export interface ReporterOptions {
  /** Colorize diagnostics (default: true) */
  color?: boolean;
  /** Print resolution details (default: false) */
  verbose?: boolean;
  /** Result lines (default: stdout) */
  stdout?: LineSink;
  /** Diagnostic lines (default: stderr) */
  stderr?: LineSink;
}
