/**
 * Transformation Layer
 * Target entity models and value sets
 */

export * from './types.js';
export { ModelTransformer, inferAttributeType, parseObjectName } from './model-transformer.js';
export {
  UniqueNamer,
  propertyNameFor,
  sanitizeIdentifier,
  splitWords,
  toCamelCase,
  toPascalCase,
  typeNameFor,
} from './naming.js';
