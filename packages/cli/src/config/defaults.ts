/**
 * Default configuration values
 */

import type { OutputConfigSchema, SexagenaryConfig } from './schema.js';

/**
 * Default output configuration
 */
export const DEFAULT_OUTPUT_CONFIG: OutputConfigSchema = {
  language: 'eng',
  format: 'text',
  separator: '\t',
  color: true,
};

/**
 * Complete default configuration
 */
export const DEFAULT_CONFIG: SexagenaryConfig = {
  output: DEFAULT_OUTPUT_CONFIG,
};
