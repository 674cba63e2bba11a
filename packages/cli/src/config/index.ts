/**
 * Configuration module exports
 */

// Schema types
export type {
  OutputFormat,
  OutputConfigSchema,
  SexagenaryConfig,
  PartialSexagenaryConfig,
  CliOptions,
} from './schema.js';

// Defaults
export { DEFAULT_OUTPUT_CONFIG, DEFAULT_CONFIG } from './defaults.js';

// Validation
export {
  configSchema,
  partialConfigSchema,
  outputConfigSchema,
  outputFormatSchema,
  languageSchema,
  ConfigValidationError,
  validateConfig,
  validatePartialConfig,
} from './validation.js';

// Loader
export {
  loadConfig,
  loadEnvConfig,
  mapCliToConfig,
  mergeConfig,
  decodeSeparator,
  formatConfig,
  type LoadConfigOptions,
} from './loader.js';
