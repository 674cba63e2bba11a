/**
 * Shared types for the sexagenary cycle
 */

/**
 * Supported output languages
 */
export type LanguageCode = 'chi' | 'kor' | 'jap' | 'viet' | 'eng';

/**
 * Every supported language code, in display order
 */
export const LANGUAGE_CODES: readonly LanguageCode[] = Object.freeze([
  'chi',
  'kor',
  'jap',
  'viet',
  'eng',
]);

/**
 * Human-readable language names
 */
export const LANGUAGE_NAMES: Readonly<Record<LanguageCode, string>> = Object.freeze({
  chi: 'Chinese',
  kor: 'Korean',
  jap: 'Japanese',
  viet: 'Vietnamese',
  eng: 'English',
});

/**
 * The five elements, in stem order
 */
export type Element = 'Wood' | 'Fire' | 'Earth' | 'Metal' | 'Water';

export type Polarity = 'Yang' | 'Yin';

export type Animal =
  | 'Rat'
  | 'Ox'
  | 'Tiger'
  | 'Rabbit'
  | 'Dragon'
  | 'Snake'
  | 'Horse'
  | 'Goat'
  | 'Monkey'
  | 'Rooster'
  | 'Dog'
  | 'Pig';

/**
 * Position of a year within its 60-year cycle
 */
export interface CyclePosition {
  /** Gregorian year the position was resolved from */
  readonly year: number;
  /** Celestial stem index (0-9) */
  readonly stemIndex: number;
  /** Earthly branch index (0-11) */
  readonly branchIndex: number;
  /** 1-based position in the cycle (1-60) */
  readonly cycleOrdinal: number;
}

/**
 * Celestial stem record
 */
export interface StemEntry {
  readonly han: string;
  readonly pinyin: string;
  readonly hangul: string;
  /** Revised romanization of the Korean reading */
  readonly korean: string;
  /** Japanese kun reading (e.g. "kinoe") */
  readonly kun: string;
  readonly vietnamese: string;
  readonly element: Element;
  readonly polarity: Polarity;
}

/**
 * Earthly branch record
 */
export interface BranchEntry {
  readonly han: string;
  readonly pinyin: string;
  readonly hangul: string;
  readonly korean: string;
  readonly kun: string;
  readonly vietnamese: string;
  readonly animal: Animal;
}

/**
 * A rendered year-name
 */
export interface LocalizedName {
  /** Language-specific rendering */
  readonly displayString: string;
  /** Stem and branch Han characters, identical across languages */
  readonly hanCharacters: string;
}
