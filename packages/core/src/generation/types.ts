/**
 * Types for code generation
 */

import type { Diagnostic } from '@schemasmith/shared';
import type { OutputConfig } from '../config/generator-config.js';

/**
 * Value sets with at most this many values get a `match` helper with one
 * handler per value
 */
export const DISPATCH_HELPER_THRESHOLD = 25;

/**
 * Entity key used for artifacts not owned by a single entity
 */
export const BARREL_OWNER = '(barrel)';

/**
 * One named unit of generated output
 */
export interface GeneratedArtifact {
  /** Relative path, `/`-separated, e.g. `dbo/Orders.ts` */
  name: string;
  content: string;
  /** Qualified name of the entity that produced it */
  entity: string;
}

export interface GenerationResult {
  /** Artifacts of every entity that generated cleanly, in entity order */
  artifacts: GeneratedArtifact[];
  diagnostics: Diagnostic[];
}

export type CodeGeneratorConfig = OutputConfig;

export interface FileWriteResult {
  success: boolean;
  path: string;
  error?: string;
}

export interface BatchFileWriteResult {
  success: boolean;
  written: string[];
  failed: Array<{ path: string; error: string }>;
  totalFiles: number;
}
