/**
 * Zod schemas for type mapping rules
 */

import { z } from 'zod';

export const typeMappingRuleSchema = z
  .object({
    schema: z.string().min(1).optional(),
    table: z.string().min(1).optional(),
    column: z.string().min(1).optional(),
    sourceType: z.string().min(1, 'sourceType is required'),
    target: z.string().min(1, 'target is required'),
    /** Patterns are regular expressions instead of literals */
    regex: z.boolean().default(false),
    /** Module the target type is imported from in generated code */
    importFrom: z.string().min(1).optional(),
  })
  .strict();

export const typeMappingRuleListSchema = z.array(typeMappingRuleSchema);

export type TypeMappingRule = z.infer<typeof typeMappingRuleSchema>;

/**
 * Rule as written by callers: `regex` may be left out
 */
export type TypeMappingRuleInput = z.input<typeof typeMappingRuleSchema>;
