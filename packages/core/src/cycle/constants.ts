/**
 * Sexagenary cycle constants.
 *
 * The cycle interleaves 10 celestial stems with 12 earthly branches. Both
 * counts are even, so only the 60 same-parity pairs ever occur.
 */

/**
 * Number of celestial stems.
 */
export const STEM_COUNT = 10;

/**
 * Number of earthly branches.
 */
export const BRANCH_COUNT = 12;

/**
 * Length of the full cycle (least common multiple of stems and branches).
 */
export const CYCLE_LENGTH = 60;

/**
 * Year that opens a cycle (jiǎ-zǐ, stem 0 / branch 0).
 */
export const ANCHOR_YEAR = 4;

/**
 * Earliest supported year.
 */
export const MIN_YEAR = 4;

/**
 * Latest supported year.
 */
export const MAX_YEAR = 9999;
