/**
 * Output formatting utilities
 */

import {
  CYCLE_LENGTH,
  LANGUAGE_CODES,
  MAX_YEAR,
  cycleStartYear,
  hanCharactersOf,
  nameYear,
  resolve,
  type CyclePosition,
  type LanguageCode,
  type LocalizedName,
} from '@sexagenary/core';

import type { SexagenaryConfig } from '../config/schema.js';

import type { ColorFunctions } from './types.js';

/**
 * One year of a cycle listing
 */
export interface CycleRow {
  cycleOrdinal: number;
  year: number;
  displayString: string;
  hanCharacters: string;
}

/**
 * Format a name as `<display><separator><han>`
 */
export function formatNameLine(name: LocalizedName, separator: string): string {
  return `${name.displayString}${separator}${name.hanCharacters}`;
}

/**
 * Format every language, one line each, prefixed by the language code
 */
export function formatAllNames(
  names: Record<LanguageCode, LocalizedName>,
  separator: string,
): string {
  return LANGUAGE_CODES.map(
    (code) => `${code}${separator}${formatNameLine(names[code], separator)}`,
  ).join('\n');
}

/**
 * Format a single name as JSON
 */
export function formatNameJson(
  position: CyclePosition,
  language: LanguageCode,
  name: LocalizedName,
): string {
  return JSON.stringify(
    {
      year: position.year,
      cycleOrdinal: position.cycleOrdinal,
      language,
      displayString: name.displayString,
      hanCharacters: name.hanCharacters,
    },
    null,
    2,
  );
}

/**
 * Format every language as JSON
 */
export function formatAllNamesJson(
  position: CyclePosition,
  names: Record<LanguageCode, LocalizedName>,
): string {
  return JSON.stringify(
    {
      year: position.year,
      cycleOrdinal: position.cycleOrdinal,
      names,
    },
    null,
    2,
  );
}

/**
 * Rows for the 60-year cycle containing `year`; years past MAX_YEAR are left out
 */
export function buildCycleRows(year: number, language: LanguageCode): CycleRow[] {
  const start = cycleStartYear(year);
  const rows: CycleRow[] = [];

  for (let offset = 0; offset < CYCLE_LENGTH; offset++) {
    const current = start + offset;
    if (current > MAX_YEAR) break;
    const name = nameYear(current, language);
    rows.push({
      cycleOrdinal: offset + 1,
      year: current,
      displayString: name.displayString,
      hanCharacters: name.hanCharacters,
    });
  }

  return rows;
}

/**
 * Format cycle rows as `<ordinal><sep><year><sep><display><sep><han>` lines
 */
export function formatCycleRows(rows: CycleRow[], separator: string): string {
  return rows
    .map((row) =>
      [row.cycleOrdinal, row.year, row.displayString, row.hanCharacters].join(separator),
    )
    .join('\n');
}

/**
 * Describe how a year was resolved (for verbose output)
 */
export function formatResolution(year: number): string {
  const position = resolve(year);
  const han = hanCharactersOf(position.stemIndex, position.branchIndex);
  return (
    `Year ${position.year}: offset ${position.cycleOrdinal - 1}, ` +
    `stem ${position.stemIndex}, branch ${position.branchIndex}, ` +
    `ordinal ${position.cycleOrdinal}/${CYCLE_LENGTH} (${han})`
  );
}

/**
 * Show control characters in a separator
 */
function showSeparator(separator: string): string {
  return JSON.stringify(separator);
}

/**
 * Format configuration for display
 */
export function formatConfigDisplay(config: SexagenaryConfig, c: ColorFunctions): string {
  const lines: string[] = [];

  lines.push(c.bold('Configuration:'));
  lines.push('');
  lines.push(c.dim('Output:'));
  lines.push(`  Language: ${c.cyan(config.output.language)}`);
  lines.push(`  Format: ${config.output.format}`);
  lines.push(`  Separator: ${showSeparator(config.output.separator)}`);
  lines.push(`  Color: ${config.output.color ? 'yes' : c.yellow('no')}`);

  return lines.join('\n');
}
