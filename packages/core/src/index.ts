/**
 * @sexagenary/core - Sexagenary cycle year-names
 *
 * This package provides:
 * - Cycle resolution (Gregorian year to stem, branch and cycle ordinal)
 * - Stem, branch and reading tables
 * - Year-name rendering in Chinese, Korean, Japanese, Vietnamese and English
 */

export const VERSION = '0.1.0';

// Re-export types
export * from './types.js';

// Re-export cycle resolution
export * from './cycle/index.js';

// Re-export name tables
export { STEMS, BRANCHES, ONYOMI_READINGS } from './tables/index.js';

// Re-export name rendering
export * from './names/index.js';

export { SexagenaryYear } from './year.js';

// Re-export errors
export {
  YearRangeError,
  InvalidYearError,
  UnknownLanguageError,
  CycleIndexError,
  TableDataError,
} from './errors.js';
