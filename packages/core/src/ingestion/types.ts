/**
 * Ingestion Layer Types
 * Raw, per-source structural extraction of schema text
 */

import type { Diagnostic, SourceLocation } from '@schemasmith/shared';

// ===========================================
// Names
// ===========================================

export interface QualifiedName {
  schema: string;
  name: string;
}

/**
 * Case-insensitive key for a qualified name, e.g. `dbo.users`
 */
export function qualifiedKey(name: QualifiedName): string {
  return `${name.schema.toLowerCase()}.${name.name.toLowerCase()}`;
}

export function formatQualifiedName(name: QualifiedName): string {
  return `${name.schema}.${name.name}`;
}

// ===========================================
// Schema Objects
// ===========================================

export interface ColumnDefinition {
  name: string;
  /** Upper-case base type name, e.g. `NVARCHAR`; empty when undeclared */
  sourceType: string;
  /** Type arguments such as `['50']`, `['10', '2']` or `['MAX']` */
  typeParameters: string[];
  nullable: boolean;
  isPrimaryKey: boolean;
  isIdentity: boolean;
  /** Zero-based, contiguous within the owning table */
  ordinal: number;
  defaultExpression?: string;
  location: SourceLocation;
}

export interface IndexDefinition {
  name: string;
  isUnique: boolean;
  isClustered: boolean;
  /** Set for PRIMARY KEY constraints */
  isPrimaryKey: boolean;
  columns: string[];
  includedColumns: string[];
  location: SourceLocation;
}

export interface ForeignKeyReference {
  /** Constraint name; composite constraints share it across references */
  name: string;
  table: QualifiedName;
  column: string;
  referencedTable: QualifiedName;
  referencedColumn: string;
  /** Zero-based position of `column` within its constraint */
  position: number;
  location: SourceLocation;
}

export interface TableDefinition {
  qualifiedName: QualifiedName;
  columns: ColumnDefinition[];
  indexes: IndexDefinition[];
  foreignKeys: ForeignKeyReference[];
  location: SourceLocation;
}

export interface ViewDefinition {
  qualifiedName: QualifiedName;
  /** Query text, carried through verbatim */
  query: string;
  /** Columns declared as `CREATE VIEW v (a, b) AS ...` */
  columns: string[];
  location: SourceLocation;
}

/**
 * Index created outside its table, by CREATE INDEX or ALTER TABLE ... ADD
 */
export interface StandaloneIndex {
  table: QualifiedName;
  index: IndexDefinition;
}

export type LiteralValue = string | number | boolean | null;

/**
 * One row of an INSERT ... VALUES statement
 */
export interface SeedRow {
  table: QualifiedName;
  values: Record<string, LiteralValue>;
  location: SourceLocation;
}

/**
 * Everything extracted from a single schema source
 */
export interface RawSchemaModel {
  sourceName: string;
  tables: TableDefinition[];
  views: ViewDefinition[];
  indexes: StandaloneIndex[];
  foreignKeys: ForeignKeyReference[];
  seedRows: SeedRow[];
}

export interface IngestionResult {
  /** One model per source, in input order */
  models: RawSchemaModel[];
  diagnostics: Diagnostic[];
}

export interface SchemaIngestorConfig {
  /** Schema assigned to unqualified object names */
  defaultSchema: string;
}
