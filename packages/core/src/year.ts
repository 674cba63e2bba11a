/**
 * Resolved year value
 */

import { CYCLE_LENGTH } from './cycle/constants.js';
import { resolve } from './cycle/resolver.js';
import { hanCharactersOf, lookup } from './names/lookup.js';
import type { CyclePosition, LocalizedName } from './types.js';

/**
 * A Gregorian year together with its place in the sexagenary cycle.
 *
 * @example
 * const year = new SexagenaryYear(2024);
 * year.cycleOrdinal; // 41
 * year.name('viet').displayString; // 'Giáp Thìn'
 */
export class SexagenaryYear implements CyclePosition {
  readonly year: number;
  readonly stemIndex: number;
  readonly branchIndex: number;
  readonly cycleOrdinal: number;
  readonly hanCharacters: string;

  /**
   * @throws InvalidYearError if the year is not an integer
   * @throws YearRangeError if the year is outside 4-9999
   */
  constructor(year: number) {
    const position = resolve(year);
    this.year = position.year;
    this.stemIndex = position.stemIndex;
    this.branchIndex = position.branchIndex;
    this.cycleOrdinal = position.cycleOrdinal;
    this.hanCharacters = hanCharactersOf(position.stemIndex, position.branchIndex);
    Object.freeze(this);
  }

  /**
   * Year-name in the given language
   *
   * @throws UnknownLanguageError for an unsupported language code
   */
  name(language: string): LocalizedName {
    return lookup(this.stemIndex, this.branchIndex, language);
  }

  toString(): string {
    return `${this.year} (${this.hanCharacters}, ${this.cycleOrdinal}/${CYCLE_LENGTH})`;
  }
}
