/**
 * Type Mapper
 * Resolves a column's source type to a target type using a scored rule list.
 *
 * A rule matches when every pattern it declares matches. Among matching
 * rules the one declaring the most patterns wins; ties go to the rule
 * declared first. Nothing matching is a normal outcome and yields the
 * Unknown target type.
 */

import {
  createChildLogger,
  createDiagnostic,
  DIAGNOSTIC_KINDS,
  type Diagnostic,
} from '@schemasmith/shared';
import { SqlType } from './sql-type.js';
import type { TypeMappingRuleInput } from './schemas.js';
import {
  UNKNOWN_TARGET_TYPE,
  type ColumnTypeQuery,
  type CompiledRule,
  type FieldMatcher,
  type PatternField,
  type ResolvedType,
} from './types.js';

const PATTERN_FIELDS: readonly PatternField[] = ['schema', 'table', 'column', 'sourceType'];

export interface RuleCompilationResult {
  rules: CompiledRule[];
  diagnostics: Diagnostic[];
}

/**
 * Compile rules once. A rule with a malformed pattern is reported a
 * single time and left out.
 */
export function compileRules(rules: readonly TypeMappingRuleInput[]): RuleCompilationResult {
  const compiled: CompiledRule[] = [];
  const diagnostics: Diagnostic[] = [];

  rules.forEach((input, index) => {
    const rule = { ...input, regex: input.regex ?? false };
    const matchers: FieldMatcher[] = [];
    const problems: string[] = [];

    for (const field of PATTERN_FIELDS) {
      const pattern = rule[field];
      if (pattern === undefined) continue;

      const matcher = rule.regex ? regexMatcher(field, pattern) : literalMatcher(field, pattern);
      if (typeof matcher === 'string') {
        problems.push(matcher);
      } else {
        matchers.push(matcher);
      }
    }

    if (problems.length > 0) {
      diagnostics.push(
        createDiagnostic(
          DIAGNOSTIC_KINDS.TYPE_RULE_COMPILATION_ERROR,
          `type mapping rule #${index + 1} (${describeRule(rule)}) was rejected: ${problems.join('; ')}`,
          { subject: `rule #${index + 1}` }
        )
      );
      return;
    }

    compiled.push({ index, rule, matchers, specificity: matchers.length });
  });

  return { rules: compiled, diagnostics };
}

function literalMatcher(field: PatternField, pattern: string): FieldMatcher | string {
  if (field === 'sourceType') {
    const expected = SqlType.parse(pattern);
    if (expected.isUnknown) {
      return `sourceType '${pattern}' is not a type name`;
    }
    // NVARCHAR matches any NVARCHAR(n); NVARCHAR(50) only that length
    return {
      field,
      pattern,
      test: (query) =>
        expected.parameters.length > 0
          ? query.sourceType.text === expected.text
          : query.sourceType.name === expected.name,
    };
  }

  const lower = pattern.toLowerCase();
  return {
    field,
    pattern,
    test: (query) => queryField(query, field).toLowerCase() === lower,
  };
}

function regexMatcher(field: PatternField, pattern: string): FieldMatcher | string {
  let expression: RegExp;
  try {
    expression = new RegExp(pattern, 'i');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return `${field} pattern /${pattern}/ is not a valid regular expression (${reason})`;
  }
  return {
    field,
    pattern,
    test: (query) => expression.test(queryField(query, field)),
  };
}

function queryField(query: ColumnTypeQuery, field: PatternField): string {
  switch (field) {
    case 'schema':
      return query.schemaName;
    case 'table':
      return query.tableName;
    case 'column':
      return query.columnName;
    case 'sourceType':
      return query.sourceType.text;
  }
}

function describeRule(rule: TypeMappingRuleInput): string {
  return PATTERN_FIELDS.filter((f) => rule[f] !== undefined)
    .map((f) => `${f}=${rule[f]}`)
    .concat(`target=${rule.target}`)
    .join(', ');
}

export class TypeMapper {
  private readonly rules: readonly CompiledRule[];
  private readonly cache = new Map<string, ResolvedType>();
  private logger = createChildLogger({ component: 'TypeMapper' });

  /** Problems found while compiling the rules */
  readonly diagnostics: readonly Diagnostic[];

  constructor(rules: readonly TypeMappingRuleInput[] = []) {
    const { rules: compiled, diagnostics } = compileRules(rules);
    this.rules = compiled;
    this.diagnostics = diagnostics;

    this.logger.debug({
      ruleCount: rules.length,
      compiled: compiled.length,
      rejected: diagnostics.length,
    }, 'Type mapping rules compiled');
  }

  get ruleCount(): number {
    return this.rules.length;
  }

  resolve(query: ColumnTypeQuery): ResolvedType {
    // A column without a declared type has nothing to match on
    if (query.sourceType.isUnknown) {
      return unknownType(query.sourceType);
    }

    const key = [query.schemaName, query.tableName, query.columnName, query.sourceType.text]
      .map((part) => part.toLowerCase())
      .join('\u0000');
    const cached = this.cache.get(key);
    if (cached) return cached;

    let best: CompiledRule | undefined;
    for (const rule of this.rules) {
      if (best && rule.specificity <= best.specificity) continue;
      if (rule.matchers.every((m) => m.test(query))) {
        best = rule;
      }
    }

    const resolved: ResolvedType = best
      ? {
          target: best.rule.target,
          isUnknown: false,
          sourceType: query.sourceType.text,
          ruleIndex: best.index,
          specificity: best.specificity,
          ...(best.rule.importFrom !== undefined ? { importFrom: best.rule.importFrom } : {}),
        }
      : unknownType(query.sourceType);

    this.cache.set(key, resolved);
    return resolved;
  }
}

function unknownType(sourceType: SqlType): ResolvedType {
  return {
    target: UNKNOWN_TARGET_TYPE,
    isUnknown: true,
    sourceType: sourceType.text,
    specificity: 0,
  };
}
