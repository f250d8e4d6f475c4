/**
 * Value Set Emitter
 *
 * A value set becomes several modules that can be emitted independently:
 * - `<T>.ts`: the enumeration class, indexed by position
 * - `<T>.data.ts`: parallel arrays and the value → index map
 * - `<T>.serialization.ts`: zod schema and serialize/deserialize
 * - `<T>.members.ts`: one named constant per value (optional)
 *
 * Past `valueSetChunkSize` values the data and member modules are split into
 * numbered chunks that the aggregate modules combine.
 */

import type { LiteralValue } from '../ingestion/types.js';
import { formatQualifiedName } from '../ingestion/types.js';
import type { TargetEntityModel, ValueSetEntry, ValueSetSpecification } from '../transformation/types.js';
import { artifactName, chunk, entityDirectory, fileHeader, joinSections, literal } from './source-text.js';
import { DISPATCH_HELPER_THRESHOLD, type CodeGeneratorConfig, type GeneratedArtifact } from './types.js';

interface ValueSetContext {
  entity: TargetEntityModel;
  valueSet: ValueSetSpecification;
  typeName: string;
  header: string;
}

export function emitValueSet(entity: TargetEntityModel, config: CodeGeneratorConfig): GeneratedArtifact[] {
  const { valueSet } = entity;
  if (!valueSet) {
    throw new Error(`entity ${formatQualifiedName(entity.source)} is not a value set`);
  }

  const context: ValueSetContext = {
    entity,
    valueSet,
    typeName: entity.typeName,
    header: fileHeader(config, entity),
  };
  const directory = entityDirectory(entity, config);
  const owner = formatQualifiedName(entity.source);
  const artifact = (fileName: string, content: string): GeneratedArtifact => ({
    name: artifactName(directory, fileName),
    content,
    entity: owner,
  });

  const chunks = valueSet.entries.length > config.valueSetChunkSize
    ? chunk(valueSet.entries, config.valueSetChunkSize)
    : [];

  const artifacts = [
    artifact(`${context.typeName}.ts`, coreModule(context)),
    artifact(`${context.typeName}.data.ts`, chunks.length > 0 ? dataAggregateModule(context, chunks.length) : dataModule(context, valueSet.entries, true)),
    ...chunks.map((entries, i) => artifact(`${context.typeName}.data.${i + 1}.ts`, dataModule(context, entries, false))),
    artifact(`${context.typeName}.serialization.ts`, serializationModule(context)),
  ];

  if (config.emitValueSetMembers) {
    if (chunks.length > 0) {
      let offset = 0;
      artifacts.push(artifact(`${context.typeName}.members.ts`, membersAggregateModule(context, chunks.length)));
      chunks.forEach((entries, i) => {
        artifacts.push(artifact(`${context.typeName}.members.${i + 1}.ts`, membersModule(context, entries, offset)));
        offset += entries.length;
      });
    } else {
      artifacts.push(artifact(`${context.typeName}.members.ts`, membersModule(context, valueSet.entries, 0)));
    }
  }

  return artifacts;
}

export function hasDispatchHelper(valueSet: ValueSetSpecification): boolean {
  return valueSet.entries.length <= DISPATCH_HELPER_THRESHOLD;
}

// ===========================================
// Core Class
// ===========================================

function attributeArrayName(attributeName: string): string {
  return `${attributeName}Values`;
}

function coreModule({ entity, valueSet, typeName, header }: ValueSetContext): string {
  const dataImports = [
    'displayNames',
    'valueIndex',
    'values',
    ...valueSet.attributes.map((a) => attributeArrayName(a.name)),
  ].sort();

  const attributeGetters = valueSet.attributes.flatMap((a) => [
    '',
    `  /** ${a.columnName} */`,
    `  get ${a.name}(): ${a.type} {`,
    `    return ${attributeArrayName(a.name)}[this.index];`,
    '  }',
  ]);

  const lines = [
    '/**',
    ` * Values of ${formatQualifiedName(entity.source)}`,
    ' */',
    `export class ${typeName} {`,
    `  private static readonly instances: readonly ${typeName}[] = values.map((_, index) => new ${typeName}(index));`,
    '',
    '  /** Every value, in declaration order */',
    `  static readonly AllValues: readonly ${typeName}[] = ${typeName}.instances;`,
    '',
    '  private constructor(readonly index: number) {}',
    '',
    '  get value(): string {',
    '    return values[this.index];',
    '  }',
    '',
    '  get displayName(): string {',
    '    return displayNames[this.index];',
    '  }',
    ...attributeGetters,
    '',
    `  static fromIndex(index: number): ${typeName} {`,
    `    const instance = ${typeName}.instances[index];`,
    '    if (!instance) {',
    `      throw new RangeError(\`\${index} is not a valid ${typeName} index\`);`,
    '    }',
    '    return instance;',
    '  }',
    '',
    `  static parse(value: string): ${typeName} {`,
    `    const instance = ${typeName}.tryParse(value);`,
    '    if (!instance) {',
    `      throw new Error(\`'\${value}' is not a valid ${typeName}\`);`,
    '    }',
    '    return instance;',
    '  }',
    '',
    `  static tryParse(value: string): ${typeName} | undefined {`,
    '    const index = valueIndex.get(value);',
    `    return index === undefined ? undefined : ${typeName}.instances[index];`,
    '  }',
    '',
    `  equals(other: ${typeName}): boolean {`,
    '    return this.index === other.index;',
    '  }',
    '',
    '  toString(): string {',
    '    return this.value;',
    '  }',
    '',
    '  toJSON(): string {',
    '    return this.value;',
    '  }',
    ...(hasDispatchHelper(valueSet) ? ['', ...dispatchHelper(typeName, valueSet.entries)] : []),
    '}',
  ];

  return joinSections([
    header,
    `import { ${dataImports.join(', ')} } from './${typeName}.data.js';`,
    lines.join('\n'),
  ]);
}

function dispatchHelper(typeName: string, entries: readonly ValueSetEntry[]): string[] {
  return [
    '  /**',
    '   * Call the handler registered for this value',
    '   */',
    '  match<R>(handlers: {',
    ...entries.map((e) => `    ${e.memberName}: () => R;`),
    '  }): R {',
    '    switch (this.index) {',
    ...entries.flatMap((e, i) => [`      case ${i}:`, `        return handlers.${e.memberName}();`]),
    '      default:',
    `        throw new RangeError(\`Unhandled ${typeName} index \${this.index}\`);`,
    '    }',
    '  }',
  ];
}

// ===========================================
// Data
// ===========================================

function renderLiteral(value: LiteralValue): string {
  if (value === null) return 'null';
  if (typeof value === 'string') return literal(value);
  return String(value);
}

function arrayConstant(name: string, elementType: string, items: readonly string[]): string {
  const type = elementType.includes('|') ? `(${elementType})` : elementType;
  if (items.length === 0) return `export const ${name}: readonly ${type}[] = [];`;
  return [`export const ${name}: readonly ${type}[] = [`, ...items.map((item) => `  ${item},`), '];'].join('\n');
}

const VALUE_INDEX_DECLARATION = [
  '/** value → index, built once at load */',
  'export const valueIndex: ReadonlyMap<string, number> = new Map(values.map((value, index): [string, number] => [value, index]));',
].join('\n');

function dataModule(
  { valueSet, header }: ValueSetContext,
  entries: readonly ValueSetEntry[],
  withIndex: boolean
): string {
  return joinSections([
    header,
    arrayConstant('values', 'string', entries.map((e) => literal(e.value))),
    arrayConstant('displayNames', 'string', entries.map((e) => literal(e.displayName))),
    ...valueSet.attributes.map((a, i) =>
      arrayConstant(attributeArrayName(a.name), a.type, entries.map((e) => renderLiteral(e.attributes[i] ?? null)))
    ),
    withIndex ? VALUE_INDEX_DECLARATION : '',
  ]);
}

function dataAggregateModule({ valueSet, typeName, header }: ValueSetContext, chunkCount: number): string {
  const chunkNames = Array.from({ length: chunkCount }, (_, i) => `chunk${i + 1}`);
  const imports = chunkNames.map((name, i) => `import * as ${name} from './${typeName}.data.${i + 1}.js';`).join('\n');

  const combined = (arrayName: string, elementType: string) => {
    const type = elementType.includes('|') ? `(${elementType})` : elementType;
    return `export const ${arrayName}: readonly ${type}[] = [${chunkNames.map((c) => `...${c}.${arrayName}`).join(', ')}];`;
  };

  return joinSections([
    header,
    imports,
    [
      combined('values', 'string'),
      combined('displayNames', 'string'),
      ...valueSet.attributes.map((a) => combined(attributeArrayName(a.name), a.type)),
    ].join('\n'),
    VALUE_INDEX_DECLARATION,
  ]);
}

// ===========================================
// Members
// ===========================================

function membersModule({ typeName, header }: ValueSetContext, entries: readonly ValueSetEntry[], offset: number): string {
  return joinSections([
    header,
    `import { ${typeName} } from './${typeName}.js';`,
    entries
      .map((e, i) => `export const ${e.memberName}: ${typeName} = ${typeName}.fromIndex(${offset + i});`)
      .join('\n'),
  ]);
}

function membersAggregateModule({ typeName, header }: ValueSetContext, chunkCount: number): string {
  return joinSections([
    header,
    Array.from({ length: chunkCount }, (_, i) => `export * from './${typeName}.members.${i + 1}.js';`).join('\n'),
  ]);
}

// ===========================================
// Serialization
// ===========================================

export function schemaConstantName(typeName: string): string {
  return `${typeName.charAt(0).toLowerCase()}${typeName.slice(1)}Schema`;
}

function serializationModule({ typeName, header }: ValueSetContext): string {
  const schemaName = schemaConstantName(typeName);
  return joinSections([
    header,
    [`import { z } from 'zod';`, `import { ${typeName} } from './${typeName}.js';`].join('\n'),
    [
      `export const ${schemaName} = z`,
      '  .string()',
      `  .refine((value) => ${typeName}.tryParse(value) !== undefined, { message: ${literal(`Not a valid ${typeName}`)} })`,
      `  .transform((value) => ${typeName}.parse(value));`,
    ].join('\n'),
    [
      `export function serialize${typeName}(value: ${typeName}): string {`,
      '  return value.value;',
      '}',
    ].join('\n'),
    [
      `export function deserialize${typeName}(raw: unknown): ${typeName} {`,
      `  return ${schemaName}.parse(raw);`,
      '}',
    ].join('\n'),
  ]);
}
