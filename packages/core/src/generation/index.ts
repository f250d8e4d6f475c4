/**
 * Code Generation
 * TypeScript artifacts for entities and value sets
 */

export * from './types.js';
export { CodeGenerator, detectCollisions } from './code-generator.js';
export { emitEntity, propertyType } from './entity-emitter.js';
export { emitValueSet, hasDispatchHelper, schemaConstantName } from './value-set-emitter.js';
export { FileManager } from './file-manager.js';
export type { ArtifactFile } from './file-manager.js';
