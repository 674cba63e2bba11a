/**
 * Localized year-names
 *
 * Every language assembles its display string from the stem and branch
 * records; only Japanese needs the per-pair on'yomi table, since its fused
 * readings change shape at the join (kasshi, itchū).
 */

import { assertValidPair, ordinalOf, resolve } from '../cycle/resolver.js';
import { CycleIndexError } from '../errors.js';
import { BRANCHES, ONYOMI_READINGS, STEMS } from '../tables/loader.js';
import type {
  BranchEntry,
  Element,
  LanguageCode,
  LocalizedName,
  Polarity,
  StemEntry,
} from '../types.js';

import { parseLanguageCode } from './languages.js';

/**
 * Elements in stem order; each covers two consecutive stems
 */
export const ELEMENTS: readonly Element[] = Object.freeze([
  'Wood',
  'Fire',
  'Earth',
  'Metal',
  'Water',
]);

/**
 * Polarity and element of a stem, as used in the English name
 */
export function englishAttributes(stemIndex: number): { polarity: Polarity; element: Element } {
  const element = ELEMENTS[Math.floor(stemIndex / 2)];
  if (element === undefined) {
    throw new CycleIndexError(stemIndex, 0, `stem index must be 0-${STEMS.length - 1}`);
  }
  return {
    polarity: stemIndex % 2 === 0 ? 'Yang' : 'Yin',
    element,
  };
}

/**
 * Pair context handed to each language formatter
 */
interface PairContext {
  stem: StemEntry;
  branch: BranchEntry;
  stemIndex: number;
  branchIndex: number;
  /** Fused on'yomi reading of the pair */
  onyomi: string;
}

type DisplayFormatter = (pair: PairContext) => string;

const DISPLAY_FORMATTERS: Record<LanguageCode, DisplayFormatter> = {
  // jiǎ-chén
  chi: ({ stem, branch }) => `${stem.pinyin}-${branch.pinyin}`,

  // gapjin 갑진: read as one unit, so no separator inside either half
  kor: ({ stem, branch }) => `${stem.korean}${branch.korean} ${stem.hangul}${branch.hangul}`,

  // kōshin/kinoe-tatsu
  jap: ({ stem, branch, onyomi }) => `${onyomi}/${stem.kun}-${branch.kun}`,

  // Giáp Thìn
  viet: ({ stem, branch }) => `${stem.vietnamese} ${branch.vietnamese}`,

  // Yang Wood Dragon
  eng: ({ branch, stemIndex }) => {
    const { polarity, element } = englishAttributes(stemIndex);
    return `${polarity} ${element} ${branch.animal}`;
  },
};

function pairContext(stemIndex: number, branchIndex: number): PairContext {
  assertValidPair(stemIndex, branchIndex);

  const stem = STEMS[stemIndex];
  const branch = BRANCHES[branchIndex];
  const onyomi = ONYOMI_READINGS[ordinalOf(stemIndex, branchIndex) - 1];
  if (stem === undefined || branch === undefined || onyomi === undefined) {
    throw new CycleIndexError(stemIndex, branchIndex, 'no table entry');
  }

  return { stem, branch, stemIndex, branchIndex, onyomi };
}

/**
 * Han characters of a stem/branch pair (e.g. "甲辰")
 */
export function hanCharactersOf(stemIndex: number, branchIndex: number): string {
  const { stem, branch } = pairContext(stemIndex, branchIndex);
  return `${stem.han}${branch.han}`;
}

/**
 * Render a stem/branch pair in one language.
 *
 * The language is checked at runtime as well, since it often comes from
 * untyped input.
 *
 * @throws UnknownLanguageError for an unsupported language code
 * @throws CycleIndexError for indices out of range or of mismatched parity
 */
export function lookup(stemIndex: number, branchIndex: number, language: string): LocalizedName {
  const code = parseLanguageCode(language);
  const pair = pairContext(stemIndex, branchIndex);

  return Object.freeze({
    displayString: DISPLAY_FORMATTERS[code](pair),
    hanCharacters: `${pair.stem.han}${pair.branch.han}`,
  });
}

/**
 * Name of a Gregorian year in one language
 *
 * @example
 * nameYear(2024, 'eng'); // { displayString: 'Yang Wood Dragon', hanCharacters: '甲辰' }
 */
export function nameYear(year: number, language: string): LocalizedName {
  const { stemIndex, branchIndex } = resolve(year);
  return lookup(stemIndex, branchIndex, language);
}

/**
 * Name of a Gregorian year in every supported language
 */
export function nameYearInAllLanguages(year: number): Record<LanguageCode, LocalizedName> {
  const { stemIndex, branchIndex } = resolve(year);
  return {
    chi: lookup(stemIndex, branchIndex, 'chi'),
    kor: lookup(stemIndex, branchIndex, 'kor'),
    jap: lookup(stemIndex, branchIndex, 'jap'),
    viet: lookup(stemIndex, branchIndex, 'viet'),
    eng: lookup(stemIndex, branchIndex, 'eng'),
  };
}
