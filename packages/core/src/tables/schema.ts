/**
 * Zod schemas for the bundled name tables
 */

import { z } from 'zod';

import { BRANCH_COUNT, CYCLE_LENGTH, STEM_COUNT } from '../cycle/constants.js';

/**
 * A single Han character
 */
const hanSchema = z.string().length(1);

const textSchema = z.string().min(1);

export const elementSchema = z.enum(['Wood', 'Fire', 'Earth', 'Metal', 'Water']);

export const polaritySchema = z.enum(['Yang', 'Yin']);

export const animalSchema = z.enum([
  'Rat',
  'Ox',
  'Tiger',
  'Rabbit',
  'Dragon',
  'Snake',
  'Horse',
  'Goat',
  'Monkey',
  'Rooster',
  'Dog',
  'Pig',
]);

const baseEntrySchema = z.object({
  han: hanSchema,
  pinyin: textSchema,
  hangul: hanSchema,
  korean: textSchema,
  kun: textSchema,
  vietnamese: textSchema,
});

export const stemEntrySchema = baseEntrySchema.extend({
  element: elementSchema,
  polarity: polaritySchema,
});

export const branchEntrySchema = baseEntrySchema.extend({
  animal: animalSchema,
});

export const stemTableSchema = z.array(stemEntrySchema).length(STEM_COUNT);

export const branchTableSchema = z.array(branchEntrySchema).length(BRANCH_COUNT);

/**
 * Fused on'yomi readings, indexed by cycle ordinal - 1
 */
export const onyomiTableSchema = z.array(textSchema).length(CYCLE_LENGTH);
