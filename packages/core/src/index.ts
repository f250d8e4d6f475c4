/**
 * @schemasmith/core
 * Schema ingestion, refinement, type mapping and code generation
 */

// Configuration
export * from './config/index.js';

// Ingestion Layer - SQL tokenizing and parsing
export * from './ingestion/index.js';

// Refinement Layer - merge, duplicate detection, reference resolution
export * from './refinement/index.js';

// Type Mapping Layer - rule compilation and resolution
export * from './type-mapping/index.js';

// Transformation Layer - target entity models and value sets
export * from './transformation/index.js';

// Generation Layer - TypeScript artifacts
export * from './generation/index.js';

// Orchestrator
export * from './orchestrator/index.js';
