/**
 * Command handler tests
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

import { UnknownLanguageError, YearRangeError } from '@sexagenary/core';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { configCommand } from '../commands/config.js';
import type { CommandDeps } from '../commands/context.js';
import { cycleCommand } from '../commands/cycle.js';
import { nameCommand, renderName } from '../commands/name.js';
import { DEFAULT_CONFIG } from '../config/defaults.js';
import { InputError } from '../errors/cli-errors.js';

describe('renderName', () => {
  it('should default to the configured language', () => {
    expect(renderName(2024, undefined, DEFAULT_CONFIG)).toBe('Yang Wood Dragon\t甲辰');
  });

  it('should render the requested language', () => {
    expect(renderName(2020, 'kor', DEFAULT_CONFIG)).toBe('gyeongja 경자\t庚子');
  });

  it('should reject unknown languages', () => {
    expect(() => renderName(2024, 'spanish', DEFAULT_CONFIG)).toThrow(UnknownLanguageError);
  });

  it('should reject years out of range', () => {
    expect(() => renderName(10000, 'eng', DEFAULT_CONFIG)).toThrow(YearRangeError);
  });
});

describe('command handlers', () => {
  let dir: string;
  let stdout: string[];
  let stderr: string[];
  let deps: CommandDeps;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'sexagenary-cmd-'));
    stdout = [];
    stderr = [];
    deps = {
      env: {},
      searchFrom: dir,
      stdout: (line) => stdout.push(line),
      stderr: (line) => stderr.push(line),
    };
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe('nameCommand', () => {
    it('should print the name and Han characters', async () => {
      await nameCommand('2024', 'chi', {}, deps);
      expect(stdout).toEqual(['jiǎ-chén\t甲辰']);
      expect(stderr).toEqual([]);
    });

    it('should print every language with --all', async () => {
      await nameCommand('2025', undefined, { all: true, separator: ' ' }, deps);
      expect(stdout).toEqual([
        'chi yǐ-sì 乙巳',
        'kor eulsa 을사 乙巳',
        'jap itsushi/kinoto-mi 乙巳',
        'viet Ất Tỵ 乙巳',
        'eng Yin Wood Snake 乙巳',
      ]);
    });

    it('should print JSON with --json', async () => {
      await nameCommand('2024', 'viet', { json: true }, deps);
      expect(JSON.parse(stdout.join('\n'))).toEqual({
        year: 2024,
        cycleOrdinal: 41,
        language: 'viet',
        displayString: 'Giáp Thìn',
        hanCharacters: '甲辰',
      });
    });

    it('should take the default language from the environment', async () => {
      await nameCommand('2024', undefined, {}, { ...deps, env: { SEXAGENARY_LANGUAGE: 'jap' } });
      expect(stdout).toEqual(['kōshin/kinoe-tatsu\t甲辰']);
    });

    it('should print resolution details with --verbose', async () => {
      await nameCommand('2024', 'eng', { verbose: true, color: false }, deps);
      expect(stderr).toEqual(['Year 2024: offset 40, stem 0, branch 4, ordinal 41/60 (甲辰)']);
    });

    it('should reject a year that is not an integer', async () => {
      await expect(nameCommand('twenty', 'eng', {}, deps)).rejects.toThrow(InputError);
    });

    it('should reject a year out of range', async () => {
      await expect(nameCommand('3', 'eng', {}, deps)).rejects.toThrow(
        'Year must be between 4 and 9999, got 3',
      );
    });

    it('should reject an unknown language', async () => {
      await expect(nameCommand('2024', 'spanish', {}, deps)).rejects.toThrow(UnknownLanguageError);
    });
  });

  describe('cycleCommand', () => {
    it('should list the 60 years of the cycle', async () => {
      await cycleCommand('2024', 'eng', {}, deps);
      expect(stdout).toHaveLength(60);
      expect(stdout[0]).toBe('1\t1984\tYang Wood Rat\t甲子');
      expect(stdout[40]).toBe('41\t2024\tYang Wood Dragon\t甲辰');
      expect(stderr).toEqual([]);
    });

    it('should warn when the cycle runs past the last supported year', async () => {
      await cycleCommand('9999', 'eng', { color: false }, deps);
      expect(stdout).toHaveLength(36);
      expect(stderr).toEqual(['Warning: Cycle truncated after 36 years (last supported year)']);
    });
  });

  describe('configCommand', () => {
    it('should print the resolved configuration', async () => {
      await configCommand({ color: false }, deps);
      expect(stdout).toEqual([
        'Configuration:',
        '',
        'Output:',
        '  Language: eng',
        '  Format: text',
        '  Separator: "\\t"',
        '  Color: no',
      ]);
    });

    it('should print JSON with --json', async () => {
      await configCommand({ json: true }, deps);
      expect(JSON.parse(stdout.join('\n'))).toEqual({
        output: { language: 'eng', format: 'json', separator: '\t', color: true },
      });
    });
  });
});
