/**
 * Name table loader
 *
 * Reads the stem, branch and on'yomi tables from `packages/core/data/`,
 * validates them and freezes the result. Runs once, when the module loads.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';

import type { z } from 'zod';

import { TableDataError } from '../errors.js';
import type { BranchEntry, StemEntry } from '../types.js';

import { branchTableSchema, onyomiTableSchema, stemTableSchema } from './schema.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

/**
 * Get the path to the data directory
 */
export function getDataDir(): string {
  // src/tables -> src -> core -> data (same depth from dist/tables)
  return path.resolve(__dirname, '../../data');
}

/**
 * Read and validate one JSON table
 */
export function loadTable<T>(
  fileName: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): T {
  const filePath = path.join(getDataDir(), fileName);

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new TableDataError(
      fileName,
      error instanceof Error ? error.message : String(error),
    );
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new TableDataError(fileName, details);
  }
  return result.data;
}

function freezeAll<T extends object>(entries: T[]): readonly Readonly<T>[] {
  return Object.freeze(entries.map((entry) => Object.freeze(entry)));
}

/**
 * Celestial stems, index 0 (甲) to 9 (癸)
 */
export const STEMS: readonly StemEntry[] = freezeAll(loadTable('stems.json', stemTableSchema));

/**
 * Earthly branches, index 0 (子) to 11 (亥)
 */
export const BRANCHES: readonly BranchEntry[] = freezeAll(
  loadTable('branches.json', branchTableSchema),
);

/**
 * Fused Sino-Japanese reading of each pair, index = cycle ordinal - 1
 */
export const ONYOMI_READINGS: readonly string[] = Object.freeze(
  loadTable('onyomi.json', onyomiTableSchema),
);
