/**
 * Error handling tests
 */

import { UnknownLanguageError, YearRangeError, InvalidYearError } from '@sexagenary/core';
import { describe, it, expect, vi, afterEach } from 'vitest';

import { ConfigValidationError } from '../config/validation.js';
import { CliError, ConfigError, InputError } from '../errors/cli-errors.js';
import { exitCodeFor, formatError, handleError } from '../errors/handler.js';

describe('CliError', () => {
  it('should format message and suggestion', () => {
    const error = new InputError('Bad year', 'Try 2024');
    expect(error.format()).toBe('Error: Bad year\n\nSuggestion: Try 2024');
    expect(error.exitCode).toBe(1);
    expect(error.name).toBe('InputError');
  });

  it('should format without a suggestion', () => {
    expect(new ConfigError('Broken').format()).toBe('Error: Broken');
  });

  it('should be instanceof CliError', () => {
    expect(new ConfigError('x')).toBeInstanceOf(CliError);
    expect(new InputError('x')).toBeInstanceOf(Error);
  });
});

describe('formatError', () => {
  it('should add a range suggestion to year errors', () => {
    expect(formatError(new YearRangeError(10000, 4, 9999), false)).toBe(
      'Error: Year must be between 4 and 9999, got 10000\n\nSuggestion: Choose a year from 4 to 9999',
    );
  });

  it('should list the languages for unknown language errors', () => {
    const error = new UnknownLanguageError('spanish', ['chi', 'kor', 'jap', 'viet', 'eng']);
    expect(formatError(error, false)).toBe(
      [
        "Error: Language 'spanish' not supported. Choose from: chi, eng, jap, kor, viet",
        '',
        'Suggestion: Use one of: chi (Chinese), kor (Korean), jap (Japanese), viet (Vietnamese), eng (English)',
      ].join('\n'),
    );
  });

  it('should use the error format of CLI errors', () => {
    expect(formatError(new InputError('Bad', 'Try'), false)).toBe('Error: Bad\n\nSuggestion: Try');
  });

  it('should fall back to the message for other errors', () => {
    expect(formatError(new Error('boom'), false)).toBe('Error: boom');
    expect(formatError('boom', false)).toBe('Error: boom');
  });

  it('should keep the text when colored', () => {
    expect(formatError(new Error('boom'))).toContain('Error: boom');
  });
});

describe('exitCodeFor', () => {
  it('should return 1 for input problems', () => {
    expect(exitCodeFor(new InputError('x'))).toBe(1);
    expect(exitCodeFor(new YearRangeError(3, 4, 9999))).toBe(1);
    expect(exitCodeFor(new InvalidYearError(1.5))).toBe(1);
    expect(exitCodeFor(new UnknownLanguageError('x', ['eng']))).toBe(1);
    expect(exitCodeFor(new ConfigValidationError([]))).toBe(1);
  });

  it('should honour a custom CLI exit code', () => {
    expect(exitCodeFor(new CliError('x', undefined, 3))).toBe(3);
  });

  it('should return 2 for anything unexpected', () => {
    expect(exitCodeFor(new Error('x'))).toBe(2);
    expect(exitCodeFor('x')).toBe(2);
  });
});

describe('handleError', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should print the error and exit with its code', () => {
    const exit = vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`exit ${String(code)}`);
    });
    const log = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    expect(() => handleError(new InputError('Bad year'), false)).toThrow('exit 1');
    expect(log).toHaveBeenCalledWith('Error: Bad year');
    expect(exit).toHaveBeenCalledWith(1);
  });
});
