/**
 * Cycle resolution: Gregorian year to stem/branch indices.
 */

export * from './constants.js';
export * from './resolver.js';
