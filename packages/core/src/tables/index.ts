/**
 * Static name tables for stems, branches and fused readings.
 */

export { STEMS, BRANCHES, ONYOMI_READINGS, getDataDir, loadTable } from './loader.js';
export {
  stemEntrySchema,
  branchEntrySchema,
  stemTableSchema,
  branchTableSchema,
  onyomiTableSchema,
  elementSchema,
  polaritySchema,
  animalSchema,
} from './schema.js';
