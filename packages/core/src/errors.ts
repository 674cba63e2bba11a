/**
 * Error classes for cycle resolution and name lookup
 */

/**
 * Thrown when a year falls outside the supported range
 */
export class YearRangeError extends RangeError {
  constructor(
    public readonly year: number,
    public readonly min: number,
    public readonly max: number,
  ) {
    super(`Year must be between ${min} and ${max}, got ${year}`);
    this.name = 'YearRangeError';
    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, YearRangeError);
    }
  }
}

/**
 * Thrown when a year is not a whole number
 */
export class InvalidYearError extends TypeError {
  constructor(public readonly value: unknown) {
    super(`Year must be an integer, got ${String(value)}`);
    this.name = 'InvalidYearError';
  }
}

/**
 * Thrown for a language code outside the supported set
 */
export class UnknownLanguageError extends Error {
  constructor(
    public readonly language: string,
    public readonly supported: readonly string[],
  ) {
    super(
      `Language '${language}' not supported. Choose from: ${[...supported].sort().join(', ')}`,
    );
    this.name = 'UnknownLanguageError';
  }
}

/**
 * Thrown when a stem/branch pair does not name a year in the cycle
 */
export class CycleIndexError extends RangeError {
  constructor(
    public readonly stemIndex: number,
    public readonly branchIndex: number,
    reason: string,
  ) {
    super(`Invalid cycle indices (stem ${stemIndex}, branch ${branchIndex}): ${reason}`);
    this.name = 'CycleIndexError';
  }
}

/**
 * Thrown when a bundled name table fails validation
 */
export class TableDataError extends Error {
  constructor(
    public readonly table: string,
    message: string,
  ) {
    super(`Invalid ${table} table: ${message}`);
    this.name = 'TableDataError';
  }
}
