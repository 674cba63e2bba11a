/**
 * Console output exports
 */

export { Reporter, createColorFns } from './reporter.js';
export type { ColorFn, ColorFunctions, LineSink, ReporterOptions } from './types.js';
export {
  formatNameLine,
  formatAllNames,
  formatNameJson,
  formatAllNamesJson,
  buildCycleRows,
  formatCycleRows,
  formatResolution,
  formatConfigDisplay,
  type CycleRow,
} from './formatters.js';
