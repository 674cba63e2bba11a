/**
 * Configuration schema types for the sexagenary CLI
 */

import type { LanguageCode } from '@sexagenary/core';

/**
 * Output format
 */
export type OutputFormat = 'text' | 'json';

/**
 * Output configuration
 */
export interface OutputConfigSchema {
  /** Language used when none is given on the command line */
  language: LanguageCode;
  /** Text or JSON output */
  format: OutputFormat;
  /** Separator between display string and Han characters in text output */
  separator: string;
  /** Colorize diagnostics */
  color: boolean;
}

/**
 * Complete configuration
 */
export interface SexagenaryConfig {
  /** Output settings */
  output: OutputConfigSchema;
}

/**
 * Config layer as read from a file or the environment
 */
export interface PartialSexagenaryConfig {
  output?: Partial<OutputConfigSchema>;
}

/**
 * CLI options (parsed from command line)
 */
export interface CliOptions {
  config?: string;
  separator?: string;
  json?: boolean;
  noColor?: boolean;
  verbose?: boolean;
  all?: boolean;
}
