/**
 * Transformation Layer Types
 * Target-language entity models built from the refined schema
 */

import type { Diagnostic } from '@schemasmith/shared';
import type { LiteralValue, QualifiedName } from '../ingestion/types.js';
import type { ResolvedType } from '../type-mapping/types.js';
import type { ValueSetConfig } from '../config/generator-config.js';

export type EntityKind = 'entity' | 'valueSet';

export interface PropertyModel {
  /** camelCase property name */
  readonly name: string;
  readonly columnName: string;
  readonly type: ResolvedType;
  readonly nullable: boolean;
  readonly isPrimaryKey: boolean;
  readonly isIdentity: boolean;
  readonly ordinal: number;
  readonly defaultExpression?: string;
}

export interface ValueSetAttribute {
  /** camelCase getter name */
  readonly name: string;
  readonly columnName: string;
  /** Inferred TypeScript type, e.g. `number` or `string | null` */
  readonly type: string;
}

export interface ValueSetEntry {
  readonly value: string;
  readonly displayName: string;
  /** PascalCase constant name, unique within the value set */
  readonly memberName: string;
  /** Parallel to ValueSetSpecification.attributes */
  readonly attributes: readonly LiteralValue[];
}

export interface ValueSetSpecification {
  readonly valueColumn: string;
  readonly displayColumn?: string;
  readonly attributes: readonly ValueSetAttribute[];
  /** In declaration order; an entry's position is its index */
  readonly entries: readonly ValueSetEntry[];
  /** value → index, built once */
  readonly lookup: ReadonlyMap<string, number>;
}

export interface TargetEntityModel {
  /** Case-insensitive qualified key of the source object */
  readonly key: string;
  readonly kind: EntityKind;
  /** PascalCase type name */
  readonly typeName: string;
  readonly source: QualifiedName;
  readonly sourceName: string;
  readonly isView: boolean;
  /** View query text, carried through for documentation */
  readonly viewQuery?: string;
  /** Ordered by ordinal */
  readonly properties: readonly PropertyModel[];
  /** Property names of the primary key, in ordinal order */
  readonly primaryKey: readonly string[];
  readonly valueSet?: ValueSetSpecification;
}

export interface TransformationResult {
  entities: TargetEntityModel[];
  diagnostics: Diagnostic[];
}

export interface ModelTransformerConfig {
  /** Schema assumed for value set tables named without one */
  defaultSchema: string;
  /** Tables generated as value sets instead of row entities */
  valueSets: readonly ValueSetConfig[];
}
