/**
 * Generator configuration
 * Read from a YAML or JSON document and validated with zod
 */

import { z } from 'zod';
import { parse as parseYaml, YAMLParseError } from 'yaml';
import { ConfigurationError, ValidationError } from '@schemasmith/shared';
import { typeMappingRuleListSchema } from '../type-mapping/schemas.js';

export const DEFAULT_ARTIFACT_HEADER = 'Generated by schemasmith. Do not edit.';

const literalValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const valueSetValueSchema = z
  .object({
    value: z.union([z.string(), z.number()]),
    displayName: z.string().optional(),
    /** Keyed by attribute column name */
    attributes: z.record(literalValueSchema).default({}),
  })
  .strict();

export const valueSetConfigSchema = z
  .object({
    /** `schema.table` or `table` (default schema) */
    table: z.string().min(1),
    valueColumn: z.string().min(1),
    displayColumn: z.string().min(1).optional(),
    attributeColumns: z.array(z.string().min(1)).default([]),
    /** Explicit entries; otherwise the table's seed rows are used */
    values: z.array(valueSetValueSchema).optional(),
  })
  .strict();

export const outputConfigSchema = z
  .object({
    /** Place artifacts under a directory per schema */
    groupBySchema: z.boolean().default(true),
    header: z.string().default(DEFAULT_ARTIFACT_HEADER),
    valueSetChunkSize: z.number().int().positive().default(500),
    emitValueSetMembers: z.boolean().default(true),
    emitBarrels: z.boolean().default(false),
  })
  .strict();

export const generatorConfigSchema = z
  .object({
    defaultSchema: z.string().min(1).default('dbo'),
    useDefaultTypeMappings: z.boolean().default(false),
    typeMappings: typeMappingRuleListSchema.default([]),
    valueSets: z.array(valueSetConfigSchema).default([]),
    output: outputConfigSchema.default({}),
  })
  .strict();

export type GeneratorConfig = z.infer<typeof generatorConfigSchema>;
export type GeneratorConfigInput = z.input<typeof generatorConfigSchema>;
export type ValueSetConfig = z.infer<typeof valueSetConfigSchema>;
export type ValueSetValueConfig = z.infer<typeof valueSetValueSchema>;
export type OutputConfig = z.infer<typeof outputConfigSchema>;

/**
 * Apply defaults and validate a configuration object
 */
export function resolveGeneratorConfig(input: unknown = {}, sourceName = 'generator configuration'): GeneratorConfig {
  const result = generatorConfigSchema.safeParse(input ?? {});
  if (!result.success) {
    throw new ValidationError(
      `Invalid ${sourceName}`,
      result.error.errors.map((e) => `${e.path.join('.') || '(root)'}: ${e.message}`),
      { path: sourceName }
    );
  }
  return result.data;
}

/**
 * Parse configuration text. YAML is a superset of JSON, so both are accepted.
 */
export function parseGeneratorConfig(text: string, sourceName = 'generator configuration'): GeneratorConfig {
  let document: unknown;
  try {
    document = parseYaml(text);
  } catch (error) {
    if (error instanceof YAMLParseError) {
      throw new ConfigurationError(`Cannot parse ${sourceName}: ${error.message}`, { path: sourceName });
    }
    throw error;
  }
  return resolveGeneratorConfig(document, sourceName);
}
