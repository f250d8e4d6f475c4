/**
 * Core types for SchemaSmith
 */

export * from './diagnostics.js';

/**
 * One unit of schema-definition text, identified by its source name
 * (usually a file path)
 */
export interface SchemaSource {
  name: string;
  text: string;
}

/**
 * Pipeline phases in execution order
 */
export const PIPELINE_PHASES = {
  INGEST: 'ingest',
  REFINE: 'refine',
  TRANSFORM: 'transform',
  GENERATE: 'generate',
} as const;

export type PipelinePhase = (typeof PIPELINE_PHASES)[keyof typeof PIPELINE_PHASES];
