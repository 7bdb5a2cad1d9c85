/**
 * @sweepmind/core - Shared primitives for the mine-deduction workspace
 *
 * - Geometry: cells, keys, bounds, neighbourhoods
 * - Collections: CellSet with value semantics
 * - Validation: zod schemas and SweepError
 * - Randomness: seeded and replayable sources
 * - Trace: in-memory inference log
 */

export * from './types.js';
export * from './errors.js';
export * from './validate.js';
export * from './geometry.js';
export * from './cell-set.js';
export * from './rng.js';
export * from './context.js';
