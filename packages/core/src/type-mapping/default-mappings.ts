/**
 * Bundled SQL Server to TypeScript type mappings
 */

import { readFileSync } from 'node:fs';
import { typeMappingRuleListSchema, type TypeMappingRule } from './schemas.js';

const DEFAULT_MAPPINGS_URL = new URL('./default-type-mappings.json', import.meta.url);

let defaultMappings: readonly TypeMappingRule[] | null = null;

/**
 * Load the bundled rules. They declare only a source type, so any rule
 * with a narrower pattern overrides them.
 */
export function loadDefaultTypeMappings(): readonly TypeMappingRule[] {
  if (!defaultMappings) {
    const raw: unknown = JSON.parse(readFileSync(DEFAULT_MAPPINGS_URL, 'utf-8'));
    defaultMappings = typeMappingRuleListSchema.parse(raw);
  }
  return defaultMappings;
}
