import { describe, it, expect } from 'vitest';

import { TableDataError } from '../errors.js';
import { englishAttributes } from '../names/lookup.js';
import { BRANCHES, ONYOMI_READINGS, STEMS, loadTable } from '../tables/loader.js';
import { onyomiTableSchema, stemTableSchema } from '../tables/schema.js';

describe('Name tables', () => {
  it('should load 10 stems, 12 branches and 60 readings', () => {
    expect(STEMS).toHaveLength(10);
    expect(BRANCHES).toHaveLength(12);
    expect(ONYOMI_READINGS).toHaveLength(60);
  });

  it('should hold the stems in cycle order', () => {
    expect(STEMS.map((s) => s.han).join('')).toBe('甲乙丙丁戊己庚辛壬癸');
  });

  it('should hold the branches in cycle order', () => {
    expect(BRANCHES.map((b) => b.han).join('')).toBe('子丑寅卯辰巳午未申酉戌亥');
    expect(BRANCHES.map((b) => b.animal)).toEqual([
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
  });

  it('should agree with the derived English attributes', () => {
    STEMS.forEach((stem, index) => {
      const { polarity, element } = englishAttributes(index);
      expect(stem.polarity).toBe(polarity);
      expect(stem.element).toBe(element);
    });
  });

  it('should be frozen', () => {
    expect(Object.isFrozen(STEMS)).toBe(true);
    expect(Object.isFrozen(STEMS[0])).toBe(true);
    expect(Object.isFrozen(BRANCHES)).toBe(true);
    expect(Object.isFrozen(ONYOMI_READINGS)).toBe(true);
  });
});

describe('loadTable', () => {
  it('should load a bundled table against its schema', () => {
    expect(loadTable('onyomi.json', onyomiTableSchema)[40]).toBe('kōshin');
  });

  it('should reject a table that does not match its schema', () => {
    expect(() => loadTable('branches.json', stemTableSchema)).toThrow(TableDataError);
  });

  it('should reject a missing file', () => {
    expect(() => loadTable('missing.json', onyomiTableSchema)).toThrow(
      /^Invalid missing\.json table: /,
    );
  });
});
