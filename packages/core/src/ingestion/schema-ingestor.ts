/**
 * Schema Ingestor
 * Parses schema sources into raw per-source models
 */

import { setImmediate as yieldToEventLoop } from 'node:timers/promises';
import { createChildLogger, type SchemaSource } from '@schemasmith/shared';
import { parseSchemaSource, type ParseSourceResult } from './schema-parser.js';
import type { IngestionResult, SchemaIngestorConfig } from './types.js';

const DEFAULT_CONFIG: SchemaIngestorConfig = {
  defaultSchema: 'dbo',
};

export class SchemaIngestor {
  private config: SchemaIngestorConfig;
  private logger = createChildLogger({ component: 'SchemaIngestor' });

  constructor(config: Partial<SchemaIngestorConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Parse a single source. Never throws for malformed SQL; problems come
   * back as diagnostics next to whatever could be extracted.
   */
  ingestSource(source: SchemaSource): ParseSourceResult {
    const result = parseSchemaSource(source, this.config);

    this.logger.debug({
      source: source.name,
      tables: result.model.tables.length,
      views: result.model.views.length,
      indexes: result.model.indexes.length,
      diagnostics: result.diagnostics.length,
    }, 'Ingested schema source');

    return result;
  }

  /**
   * Parse every source in its own task and wait for all of them.
   * Models come back in input order regardless of completion order.
   */
  async ingest(sources: readonly SchemaSource[]): Promise<IngestionResult> {
    const results = await Promise.all(
      sources.map(async (source) => {
        await yieldToEventLoop();
        return this.ingestSource(source);
      })
    );

    return {
      models: results.map((r) => r.model),
      diagnostics: results.flatMap((r) => r.diagnostics),
    };
  }
}
