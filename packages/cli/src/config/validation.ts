/**
 * Zod validation schemas for configuration
 */

import { LANGUAGE_CODES, isLanguageCode, type LanguageCode } from '@sexagenary/core';
import { z } from 'zod';

import type { PartialSexagenaryConfig, SexagenaryConfig } from './schema.js';

/**
 * Language code schema
 */
export const languageSchema = z.custom<LanguageCode>(isLanguageCode, {
  message: `Expected one of: ${LANGUAGE_CODES.join(', ')}`,
});

/**
 * Output format schema
 */
export const outputFormatSchema = z.enum(['text', 'json']);

/**
 * Output configuration schema
 */
export const outputConfigSchema = z.object({
  language: languageSchema,
  format: outputFormatSchema,
  separator: z.string().max(16),
  color: z.boolean(),
});

/**
 * Complete configuration schema
 */
export const configSchema = z.object({
  output: outputConfigSchema,
});

/**
 * Partial configuration schema (for config files and the environment)
 */
export const partialConfigSchema = z.object({
  output: outputConfigSchema.partial().optional(),
});

/**
 * Configuration validation error
 */
export class ConfigValidationError extends Error {
  constructor(public readonly errors: Array<{ path: string; message: string }>) {
    const errorMessages = errors.map((e) => `  ${e.path}: ${e.message}`).join('\n');
    super(`Configuration validation failed:\n${errorMessages}`);
    this.name = 'ConfigValidationError';
  }

  /**
   * Format error for CLI display
   */
  format(): string {
    return [
      'Configuration validation failed:',
      '',
      ...this.errors.map((e) => `  ${e.path}: ${e.message}`),
      '',
      'Use --help to see available options',
      "Use 'sexagenary config' to see current configuration",
    ].join('\n');
  }
}

function toValidationError(error: z.ZodError): ConfigValidationError {
  return new ConfigValidationError(
    error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    })),
  );
}

/**
 * Validate a complete configuration
 * @throws ConfigValidationError if validation fails
 */
export function validateConfig(config: unknown): SexagenaryConfig {
  const result = configSchema.safeParse(config);
  if (!result.success) {
    throw toValidationError(result.error);
  }
  return result.data;
}

/**
 * Validate a partial configuration (from config file or environment)
 * @throws ConfigValidationError if validation fails
 */
export function validatePartialConfig(config: unknown): PartialSexagenaryConfig {
  const result = partialConfigSchema.safeParse(config);
  if (!result.success) {
    throw toValidationError(result.error);
  }
  return result.data;
}
