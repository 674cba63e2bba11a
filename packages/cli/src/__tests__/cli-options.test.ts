/**
 * CLI options parsing tests
 */

import { describe, it, expect } from 'vitest';

import { createProgram, parseCliOptions, parseYearArgument, VERSION } from '../cli.js';
import { InputError } from '../errors/cli-errors.js';

describe('parseCliOptions', () => {
  it('should parse config and separator options', () => {
    const result = parseCliOptions({ config: './my-config.json', separator: ' | ' });
    expect(result.config).toBe('./my-config.json');
    expect(result.separator).toBe(' | ');
  });

  it('should parse boolean flags', () => {
    expect(parseCliOptions({ json: true }).json).toBe(true);
    expect(parseCliOptions({ verbose: true }).verbose).toBe(true);
    expect(parseCliOptions({ all: false }).all).toBe(false);
  });

  it('should parse noColor when color is false (Commander.js negated flag)', () => {
    expect(parseCliOptions({ color: false }).noColor).toBe(true);
    expect(parseCliOptions({ color: true }).noColor).toBeUndefined();
  });

  it('should ignore values of the wrong type', () => {
    expect(parseCliOptions({ config: 42, json: 'yes' })).toEqual({});
  });
});

describe('parseYearArgument', () => {
  it('should parse integer literals', () => {
    expect(parseYearArgument('2024')).toBe(2024);
    expect(parseYearArgument(' 4 ')).toBe(4);
    expect(parseYearArgument('+1984')).toBe(1984);
  });

  it('should leave range checks to the resolver', () => {
    expect(parseYearArgument('10000')).toBe(10000);
    expect(parseYearArgument('-3')).toBe(-3);
  });

  it('should reject anything that is not an integer', () => {
    expect(() => parseYearArgument('abc')).toThrow(InputError);
    expect(() => parseYearArgument('2024.5')).toThrow("Year must be an integer, got '2024.5'");
    expect(() => parseYearArgument('')).toThrow(InputError);
  });
});

describe('createProgram', () => {
  it('should register the name, cycle and config commands', () => {
    const program = createProgram();
    expect(program.commands.map((command) => command.name())).toEqual(['name', 'cycle', 'config']);
  });

  it('should report the package version', () => {
    expect(createProgram().version()).toBe(VERSION);
  });

  it('should declare year and language arguments on the name command', () => {
    const name = createProgram().commands.find((command) => command.name() === 'name');
    expect(name?.registeredArguments.map((arg) => [arg.name(), arg.required])).toEqual([
      ['year', true],
      ['language', false],
    ]);
  });
});
