/**
 * Gregorian year to cycle position
 */

import { CycleIndexError, InvalidYearError, YearRangeError } from '../errors.js';
import type { CyclePosition } from '../types.js';

import {
  ANCHOR_YEAR,
  BRANCH_COUNT,
  CYCLE_LENGTH,
  MAX_YEAR,
  MIN_YEAR,
  STEM_COUNT,
} from './constants.js';

/**
 * Modulo with a result in [0, n) for any sign of `a`
 */
export function floorMod(a: number, n: number): number {
  return ((a % n) + n) % n;
}

/**
 * Check that a year is a whole number inside [MIN_YEAR, MAX_YEAR]
 *
 * @throws InvalidYearError if the value is not an integer
 * @throws YearRangeError if the year is out of range
 */
export function assertValidYear(year: number): void {
  if (!Number.isInteger(year)) {
    throw new InvalidYearError(year);
  }
  if (year < MIN_YEAR || year > MAX_YEAR) {
    throw new YearRangeError(year, MIN_YEAR, MAX_YEAR);
  }
}

/**
 * Resolve a Gregorian year to its position in the sexagenary cycle.
 *
 * Stem and branch both derive from the same offset, so they always share
 * parity.
 *
 * @example
 * resolve(2024); // { year: 2024, stemIndex: 0, branchIndex: 4, cycleOrdinal: 41 }
 */
export function resolve(year: number): CyclePosition {
  assertValidYear(year);

  const offset = floorMod(year - ANCHOR_YEAR, CYCLE_LENGTH);

  return Object.freeze({
    year,
    stemIndex: offset % STEM_COUNT,
    branchIndex: offset % BRANCH_COUNT,
    cycleOrdinal: offset + 1,
  });
}

/**
 * Check stem and branch indices against their ranges and each other
 *
 * @throws CycleIndexError if the pair does not occur in the cycle
 */
export function assertValidPair(stemIndex: number, branchIndex: number): void {
  if (!Number.isInteger(stemIndex) || stemIndex < 0 || stemIndex >= STEM_COUNT) {
    throw new CycleIndexError(stemIndex, branchIndex, `stem index must be 0-${STEM_COUNT - 1}`);
  }
  if (!Number.isInteger(branchIndex) || branchIndex < 0 || branchIndex >= BRANCH_COUNT) {
    throw new CycleIndexError(
      stemIndex,
      branchIndex,
      `branch index must be 0-${BRANCH_COUNT - 1}`,
    );
  }
  if (stemIndex % 2 !== branchIndex % 2) {
    throw new CycleIndexError(stemIndex, branchIndex, 'stem and branch parity differ');
  }
}

/**
 * 1-based cycle ordinal of a stem/branch pair.
 *
 * Solves offset ≡ stem (mod 10), offset ≡ branch (mod 12): 6·stem − 5·branch
 * satisfies both congruences whenever the parities match.
 */
export function ordinalOf(stemIndex: number, branchIndex: number): number {
  assertValidPair(stemIndex, branchIndex);
  return floorMod(6 * stemIndex - 5 * branchIndex, CYCLE_LENGTH) + 1;
}

/**
 * Stem and branch indices for a 1-based cycle ordinal
 */
export function positionOfOrdinal(ordinal: number): { stemIndex: number; branchIndex: number } {
  if (!Number.isInteger(ordinal) || ordinal < 1 || ordinal > CYCLE_LENGTH) {
    throw new RangeError(`Cycle ordinal must be between 1 and ${CYCLE_LENGTH}, got ${ordinal}`);
  }
  const offset = ordinal - 1;
  return { stemIndex: offset % STEM_COUNT, branchIndex: offset % BRANCH_COUNT };
}

/**
 * First Gregorian year of the cycle that contains `year`
 */
export function cycleStartYear(year: number): number {
  return year - (resolve(year).cycleOrdinal - 1);
}
