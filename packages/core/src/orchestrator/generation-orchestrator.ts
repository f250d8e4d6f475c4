/**
 * Generation Orchestrator
 *
 * Runs the pipeline phases in order:
 *
 *   ingest → refine → transform (type mapping) → generate
 *
 * Each phase either hands its output to the next or stops the run when it
 * produced a fatal diagnostic. Warnings from every completed phase are kept
 * and returned with the artifacts. Cancellation is observed between phases;
 * a phase that has started always runs to completion.
 */

import { EventEmitter } from 'eventemitter3';
import { randomUUID } from 'node:crypto';
import {
  PIPELINE_PHASES,
  DIAGNOSTIC_KINDS,
  createChildLogger,
  createDiagnostic,
  hasFatalDiagnostics,
  logPhaseTransition,
  type Diagnostic,
  type Logger,
  type PipelinePhase,
  type SchemaSource,
} from '@schemasmith/shared';
import { resolveGeneratorConfig, type GeneratorConfig } from '../config/generator-config.js';
import { SchemaIngestor } from '../ingestion/schema-ingestor.js';
import { SchemaRefiner } from '../refinement/schema-refiner.js';
import { TypeMapper } from '../type-mapping/type-mapper.js';
import { loadDefaultTypeMappings } from '../type-mapping/default-mappings.js';
import { ModelTransformer } from '../transformation/model-transformer.js';
import { CodeGenerator } from '../generation/code-generator.js';

// ===========================================
// Types
// ===========================================

export interface GenerationOrchestratorDependencies {
  /** Receives phase transitions; defaults to the shared logger */
  logger?: Logger;
  ingestor?: SchemaIngestor;
  refiner?: SchemaRefiner;
}

export interface RunOptions {
  signal?: AbortSignal;
  runId?: string;
}

export type PhaseDurations = Partial<Record<PipelinePhase, number>>;

export interface GenerationRunResult {
  runId: string;
  success: boolean;
  /** Artifact name → content; empty unless the run succeeded */
  artifacts: ReadonlyMap<string, string>;
  diagnostics: Diagnostic[];
  /** Milliseconds spent in each phase that ran */
  durations: PhaseDurations;
  /** Phase that stopped the run */
  failedPhase?: PipelinePhase;
}

export interface OrchestratorEvents {
  'phase:started': (event: { runId: string; phase: PipelinePhase }) => void;
  'phase:completed': (event: { runId: string; phase: PipelinePhase; durationMs: number; diagnostics: number }) => void;
  'generation:completed': (event: { runId: string; artifacts: number; durationMs: number }) => void;
  'generation:failed': (event: {
    runId: string;
    phase: PipelinePhase;
    reason: string;
    diagnostics: Diagnostic[];
  }) => void;
}

interface RunState {
  runId: string;
  signal?: AbortSignal;
  diagnostics: Diagnostic[];
  durations: PhaseDurations;
}

type PhaseOutcome<T> =
  | { ok: true; value: T }
  | { ok: false; phase: PipelinePhase; reason: string };

interface PhaseWork<T> {
  /** Undefined when the phase could not produce a result */
  value: T | undefined;
  diagnostics: readonly Diagnostic[];
}

// ===========================================
// Orchestrator
// ===========================================

export class GenerationOrchestrator extends EventEmitter<OrchestratorEvents> {
  private config: GeneratorConfig;
  private logger: Logger;
  private ingestor: SchemaIngestor;
  private refiner: SchemaRefiner;

  constructor(config: GeneratorConfig = resolveGeneratorConfig(), dependencies: GenerationOrchestratorDependencies = {}) {
    super();
    this.config = config;
    this.logger = dependencies.logger ?? createChildLogger({ component: 'GenerationOrchestrator' });
    this.ingestor = dependencies.ingestor ?? new SchemaIngestor({ defaultSchema: config.defaultSchema });
    this.refiner = dependencies.refiner ?? new SchemaRefiner();
  }

  /**
   * Run every phase over the given sources
   */
  async run(sources: readonly SchemaSource[], options: RunOptions = {}): Promise<GenerationRunResult> {
    const state: RunState = {
      runId: options.runId ?? randomUUID(),
      signal: options.signal,
      diagnostics: [],
      durations: {},
    };
    const startedAt = Date.now();

    this.logger.info({ runId: state.runId, sources: sources.length }, 'Generation run started');

    const ingested = await this.phase(state, PIPELINE_PHASES.INGEST, async () => {
      const result = await this.ingestor.ingest(sources);
      return { value: result.models, diagnostics: result.diagnostics };
    });
    if (!ingested.ok) return this.fail(state, ingested);

    const refined = await this.phase(state, PIPELINE_PHASES.REFINE, async () => {
      const result = this.refiner.refine(ingested.value);
      return { value: result.success ? result.schema : undefined, diagnostics: result.diagnostics };
    });
    if (!refined.ok) return this.fail(state, refined);

    const transformed = await this.phase(state, PIPELINE_PHASES.TRANSFORM, async () => {
      const typeMapper = this.createTypeMapper();
      const transformer = new ModelTransformer(typeMapper, {
        defaultSchema: this.config.defaultSchema,
        valueSets: this.config.valueSets,
      });
      const result = transformer.transform(refined.value);
      return { value: result.entities, diagnostics: [...typeMapper.diagnostics, ...result.diagnostics] };
    });
    if (!transformed.ok) return this.fail(state, transformed);

    const generated = await this.phase(state, PIPELINE_PHASES.GENERATE, async () => {
      const result = await new CodeGenerator(this.config.output).generate(transformed.value);
      return { value: result.artifacts, diagnostics: result.diagnostics };
    });
    if (!generated.ok) return this.fail(state, generated);

    const artifacts = new Map(generated.value.map((a): [string, string] => [a.name, a.content]));
    const durationMs = Date.now() - startedAt;

    this.logger.info({
      runId: state.runId,
      artifacts: artifacts.size,
      warnings: state.diagnostics.length,
      durationMs,
    }, 'Generation run completed');
    this.emit('generation:completed', { runId: state.runId, artifacts: artifacts.size, durationMs });

    return {
      runId: state.runId,
      success: true,
      artifacts,
      diagnostics: state.diagnostics,
      durations: state.durations,
    };
  }

  /**
   * User rules first, then the bundled defaults when enabled
   */
  private createTypeMapper(): TypeMapper {
    const rules = this.config.useDefaultTypeMappings
      ? [...this.config.typeMappings, ...loadDefaultTypeMappings()]
      : this.config.typeMappings;
    return new TypeMapper(rules);
  }

  // ===========================================
  // Phase Handling
  // ===========================================

  private async phase<T>(
    state: RunState,
    phase: PipelinePhase,
    work: () => Promise<PhaseWork<T>>
  ): Promise<PhaseOutcome<T>> {
    if (state.signal?.aborted) {
      state.diagnostics.push(
        createDiagnostic(DIAGNOSTIC_KINDS.CANCELLED, `run cancelled before the ${phase} phase`, { subject: phase })
      );
      return { ok: false, phase, reason: 'cancelled' };
    }

    this.emit('phase:started', { runId: state.runId, phase });
    logPhaseTransition(this.logger, state.runId, phase, 'started');

    const startedAt = Date.now();
    const { value, diagnostics } = await work();
    const durationMs = Date.now() - startedAt;

    state.durations[phase] = durationMs;
    state.diagnostics.push(...diagnostics);

    if (value === undefined || hasFatalDiagnostics(diagnostics)) {
      const fatal = diagnostics.filter((d) => d.severity === 'error').length;
      const reason = `${phase} phase reported ${fatal} fatal diagnostic(s)`;
      logPhaseTransition(this.logger, state.runId, phase, 'failed', { durationMs, fatal });
      return { ok: false, phase, reason };
    }

    logPhaseTransition(this.logger, state.runId, phase, 'completed', {
      durationMs,
      diagnostics: diagnostics.length,
    });
    this.emit('phase:completed', { runId: state.runId, phase, durationMs, diagnostics: diagnostics.length });

    return { ok: true, value };
  }

  private fail(state: RunState, outcome: { phase: PipelinePhase; reason: string }): GenerationRunResult {
    this.logger.warn({ runId: state.runId, phase: outcome.phase, reason: outcome.reason }, 'Generation run failed');
    this.emit('generation:failed', {
      runId: state.runId,
      phase: outcome.phase,
      reason: outcome.reason,
      diagnostics: state.diagnostics,
    });

    return {
      runId: state.runId,
      success: false,
      artifacts: new Map(),
      diagnostics: state.diagnostics,
      durations: state.durations,
      failedPhase: outcome.phase,
    };
  }
}
