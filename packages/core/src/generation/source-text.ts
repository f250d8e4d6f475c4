/**
 * Helpers shared by the emitters
 */

import { formatQualifiedName } from '../ingestion/types.js';
import type { TargetEntityModel } from '../transformation/types.js';
import type { CodeGeneratorConfig } from './types.js';

/**
 * String literal in generated code
 */
export function literal(value: string): string {
  return JSON.stringify(value);
}

/**
 * Directory an entity's artifacts go to, `''` for the output root
 */
export function entityDirectory(entity: TargetEntityModel, config: CodeGeneratorConfig): string {
  return config.groupBySchema ? entity.source.schema.toLowerCase() : '';
}

export function artifactName(directory: string, fileName: string): string {
  return directory ? `${directory}/${fileName}` : fileName;
}

/**
 * Leading comment block: the configured header and the source object
 */
export function fileHeader(config: CodeGeneratorConfig, source?: TargetEntityModel): string {
  const lines = config.header
    .split('\n')
    .filter((line) => line.trim().length > 0)
    .map((line) => `// ${line.trim()}`);
  if (source) {
    const kind = source.isView ? 'view' : 'table';
    lines.push(`// Source: ${kind} ${formatQualifiedName(source.source)} (${source.sourceName})`);
  }
  return lines.join('\n');
}

/**
 * Join sections with a blank line between them and end with a newline
 */
export function joinSections(sections: readonly string[]): string {
  return `${sections.filter((s) => s.length > 0).join('\n\n')}\n`;
}

/**
 * Doc comment text cannot contain a comment terminator
 */
export function docText(text: string): string {
  return text.replace(/\*\//g, '*\\/').replace(/\s+/g, ' ').trim();
}

export function chunk<T>(items: readonly T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}
