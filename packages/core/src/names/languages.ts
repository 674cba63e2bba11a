/**
 * Language code guards for untyped input
 */

import { UnknownLanguageError } from '../errors.js';
import { LANGUAGE_CODES, type LanguageCode } from '../types.js';

/**
 * Type guard for supported language codes
 */
export function isLanguageCode(value: unknown): value is LanguageCode {
  return typeof value === 'string' && (LANGUAGE_CODES as readonly string[]).includes(value);
}

/**
 * Narrow a raw string (CLI argument, env var) to a language code
 *
 * @throws UnknownLanguageError if the code is not supported
 */
export function parseLanguageCode(value: string): LanguageCode {
  if (!isLanguageCode(value)) {
    throw new UnknownLanguageError(value, LANGUAGE_CODES);
  }
  return value;
}
