/**
 * Refinement Layer
 * Merges and validates raw schema models
 */

export * from './types.js';
export { SchemaRefiner, dedupeIndexes } from './schema-refiner.js';
