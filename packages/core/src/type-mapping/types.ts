/**
 * Type Mapping Types
 */

import type { SqlType } from './sql-type.js';
import type { TypeMappingRule } from './schemas.js';

export type { TypeMappingRule, TypeMappingRuleInput } from './schemas.js';

/** Target type given to columns no rule matches */
export const UNKNOWN_TARGET_TYPE = 'unknown';

export type PatternField = 'schema' | 'table' | 'column' | 'sourceType';

/**
 * The column being resolved
 */
export interface ColumnTypeQuery {
  schemaName: string;
  tableName: string;
  columnName: string;
  sourceType: SqlType;
}

export interface ResolvedType {
  /** Target-language type expression */
  target: string;
  /** No rule matched; `target` is UNKNOWN_TARGET_TYPE */
  isUnknown: boolean;
  /** Normalized source type text, e.g. `NVARCHAR(50)` */
  sourceType: string;
  importFrom?: string;
  /** Declaration index of the winning rule */
  ruleIndex?: number;
  /** Number of pattern fields the winning rule declared (0 when unknown) */
  specificity: number;
}

export interface FieldMatcher {
  field: PatternField;
  pattern: string;
  test: (query: ColumnTypeQuery) => boolean;
}

export interface CompiledRule {
  /** Position in the original rule list */
  index: number;
  rule: TypeMappingRule;
  matchers: FieldMatcher[];
  /** Count of declared pattern fields; all must match */
  specificity: number;
}
