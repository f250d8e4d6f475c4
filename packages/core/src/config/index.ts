/**
 * Generator Configuration
 */

export {
  DEFAULT_ARTIFACT_HEADER,
  generatorConfigSchema,
  outputConfigSchema,
  valueSetConfigSchema,
  valueSetValueSchema,
  parseGeneratorConfig,
  resolveGeneratorConfig,
} from './generator-config.js';
export type {
  GeneratorConfig,
  GeneratorConfigInput,
  OutputConfig,
  ValueSetConfig,
  ValueSetValueConfig,
} from './generator-config.js';
