/**
 * Code Generator
 * Emits TypeScript artifacts for every target entity.
 *
 * Each entity is emitted in its own task. A failing entity is reported and
 * the others still complete; artifact names are checked for collisions once
 * every task has finished.
 */

import { setImmediate as yieldToEventLoop } from 'node:timers/promises';
import {
  createChildLogger,
  createDiagnostic,
  DIAGNOSTIC_KINDS,
  type Diagnostic,
} from '@schemasmith/shared';
import { DEFAULT_ARTIFACT_HEADER } from '../config/generator-config.js';
import { formatQualifiedName } from '../ingestion/types.js';
import type { TargetEntityModel } from '../transformation/types.js';
import { emitEntity } from './entity-emitter.js';
import { emitValueSet, schemaConstantName } from './value-set-emitter.js';
import { artifactName, entityDirectory, fileHeader, joinSections } from './source-text.js';
import {
  BARREL_OWNER,
  type CodeGeneratorConfig,
  type GeneratedArtifact,
  type GenerationResult,
} from './types.js';

const DEFAULT_CONFIG: CodeGeneratorConfig = {
  groupBySchema: true,
  header: DEFAULT_ARTIFACT_HEADER,
  valueSetChunkSize: 500,
  emitValueSetMembers: true,
  emitBarrels: false,
};

type EntityOutcome =
  | { ok: true; entity: TargetEntityModel; artifacts: GeneratedArtifact[] }
  | { ok: false; diagnostic: Diagnostic };

export class CodeGenerator {
  private config: CodeGeneratorConfig;
  private logger = createChildLogger({ component: 'CodeGenerator' });

  constructor(config: Partial<CodeGeneratorConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Emit the artifacts of a single entity
   */
  emit(entity: TargetEntityModel): GeneratedArtifact[] {
    return entity.kind === 'valueSet' ? emitValueSet(entity, this.config) : emitEntity(entity, this.config);
  }

  async generate(entities: readonly TargetEntityModel[]): Promise<GenerationResult> {
    const outcomes = await Promise.all(
      entities.map(async (entity): Promise<EntityOutcome> => {
        await yieldToEventLoop();
        try {
          return { ok: true, entity, artifacts: this.emit(entity) };
        } catch (error) {
          const subject = formatQualifiedName(entity.source);
          const reason = error instanceof Error ? error.message : String(error);
          this.logger.warn({ entity: subject, error: reason }, 'Entity emission failed');
          return {
            ok: false,
            diagnostic: createDiagnostic(DIAGNOSTIC_KINDS.EMIT_ERROR, `cannot emit ${subject}: ${reason}`, { subject }),
          };
        }
      })
    );

    const diagnostics: Diagnostic[] = [];
    const emitted: Array<{ entity: TargetEntityModel; artifacts: GeneratedArtifact[] }> = [];
    for (const outcome of outcomes) {
      if (outcome.ok) emitted.push(outcome);
      else diagnostics.push(outcome.diagnostic);
    }

    const artifacts = emitted.flatMap((e) => e.artifacts);
    if (this.config.emitBarrels) {
      artifacts.push(...this.barrels(emitted.map((e) => e.entity)));
    }

    const { unique, collisions } = detectCollisions(artifacts);
    diagnostics.push(...collisions);

    this.logger.debug({
      entities: entities.length,
      artifacts: unique.length,
      failed: diagnostics.length,
    }, 'Code generation finished');

    return { artifacts: unique, diagnostics };
  }

  /**
   * One `index.ts` per output directory re-exporting its entity modules
   */
  private barrels(entities: readonly TargetEntityModel[]): GeneratedArtifact[] {
    const byDirectory = new Map<string, TargetEntityModel[]>();
    for (const entity of entities) {
      const directory = entityDirectory(entity, this.config);
      byDirectory.set(directory, [...(byDirectory.get(directory) ?? []), entity]);
    }

    return [...byDirectory.entries()]
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([directory, members]) => {
        const exports = members
          .flatMap((entity) =>
            entity.kind === 'valueSet'
              ? [
                  `export { ${entity.typeName} } from './${entity.typeName}.js';`,
                  `export { ${schemaConstantName(entity.typeName)}, serialize${entity.typeName}, deserialize${entity.typeName} } from './${entity.typeName}.serialization.js';`,
                ]
              : [`export * from './${entity.typeName}.js';`]
          )
          .sort();
        return {
          name: artifactName(directory, 'index.ts'),
          content: joinSections([fileHeader(this.config), exports.join('\n')]),
          entity: BARREL_OWNER,
        };
      });
  }
}

/**
 * Keep the first artifact per name (compared case-insensitively) and report
 * every later one
 */
export function detectCollisions(artifacts: readonly GeneratedArtifact[]): {
  unique: GeneratedArtifact[];
  collisions: Diagnostic[];
} {
  const seen = new Map<string, GeneratedArtifact>();
  const unique: GeneratedArtifact[] = [];
  const collisions: Diagnostic[] = [];

  for (const artifact of artifacts) {
    const key = artifact.name.toLowerCase();
    const first = seen.get(key);
    if (first) {
      collisions.push(
        createDiagnostic(
          DIAGNOSTIC_KINDS.OUTPUT_COLLISION_ERROR,
          `artifact ${artifact.name} is produced by both ${first.entity} and ${artifact.entity}`,
          { subject: artifact.name, related: [first.entity, artifact.entity] }
        )
      );
      continue;
    }
    seen.set(key, artifact);
    unique.push(artifact);
  }

  return { unique, collisions };
}
