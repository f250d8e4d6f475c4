/**
 * Refinement Layer Types
 * The merged, cross-referenced schema produced from all raw models
 */

import type { Diagnostic, SourceLocation } from '@schemasmith/shared';
import type {
  ColumnDefinition,
  ForeignKeyReference,
  IndexDefinition,
  QualifiedName,
  SeedRow,
  ViewDefinition,
} from '../ingestion/types.js';

export interface RefinedTable {
  readonly qualifiedName: QualifiedName;
  /** Ordered by ordinal */
  readonly columns: readonly ColumnDefinition[];
  /** Normalized: no two share (column sequence, uniqueness) */
  readonly indexes: readonly IndexDefinition[];
  /** Every reference resolved against the merged schema */
  readonly foreignKeys: readonly ForeignKeyReference[];
  /** Primary key column names in ordinal order */
  readonly primaryKey: readonly string[];
  readonly sourceName: string;
  readonly location: SourceLocation;
}

export interface RefinedView extends ViewDefinition {
  readonly sourceName: string;
}

export interface RefinedSchema {
  readonly tables: readonly RefinedTable[];
  readonly views: readonly RefinedView[];
  /** Seed rows with column keys in their declared casing */
  readonly seedRows: readonly SeedRow[];
}

export type RefinementResult =
  | { success: true; schema: RefinedSchema; diagnostics: Diagnostic[] }
  | { success: false; diagnostics: Diagnostic[] };
