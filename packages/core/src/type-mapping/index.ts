/**
 * Type Mapping
 * Precedence-ordered resolution of source column types
 */

export * from './types.js';
export { SqlType } from './sql-type.js';
export { TypeMapper, compileRules } from './type-mapper.js';
export type { RuleCompilationResult } from './type-mapper.js';
export { typeMappingRuleSchema, typeMappingRuleListSchema } from './schemas.js';
export { loadDefaultTypeMappings } from './default-mappings.js';
