/**
 * Entity Emitter
 * Emits an immutable class for a row-shaped table or view
 */

import { formatQualifiedName } from '../ingestion/types.js';
import type { PropertyModel, TargetEntityModel } from '../transformation/types.js';
import { UNKNOWN_TARGET_TYPE } from '../type-mapping/types.js';
import { artifactName, docText, entityDirectory, fileHeader, joinSections, literal } from './source-text.js';
import type { CodeGeneratorConfig, GeneratedArtifact } from './types.js';

const IMPORTED_NAME = /^[A-Za-z_$][\w$]*/;

const VALUES_EQUAL_HELPER = `function valuesEqual(a: unknown, b: unknown): boolean {
  if (a instanceof Date && b instanceof Date) {
    return a.getTime() === b.getTime();
  }
  if (a instanceof Uint8Array && b instanceof Uint8Array) {
    return a.length === b.length && a.every((byte, i) => byte === b[i]);
  }
  return Object.is(a, b);
}`;

export function emitEntity(entity: TargetEntityModel, config: CodeGeneratorConfig): GeneratedArtifact[] {
  return [
    {
      name: artifactName(entityDirectory(entity, config), `${entity.typeName}.ts`),
      content: entityModule(entity, config),
      entity: formatQualifiedName(entity.source),
    },
  ];
}

export function propertyType(property: PropertyModel): string {
  if (property.type.isUnknown) return UNKNOWN_TARGET_TYPE;
  return property.nullable ? `${property.type.target} | null` : property.type.target;
}

function propertyDoc(property: PropertyModel): string {
  const details = [`${property.columnName} ${property.type.sourceType || 'computed'}`];
  if (property.isPrimaryKey) details.push('primary key');
  if (property.isIdentity) details.push('identity');
  if (property.defaultExpression !== undefined) details.push(`default ${property.defaultExpression}`);
  const doc = details.join(', ');
  return property.type.isUnknown ? `${doc}; no type mapping` : doc;
}

/**
 * `import type` lines for rule targets that declare a module
 */
function typeImports(properties: readonly PropertyModel[]): string {
  const modules = new Map<string, Set<string>>();
  for (const property of properties) {
    const { importFrom, target } = property.type;
    const name = IMPORTED_NAME.exec(target)?.[0];
    if (importFrom === undefined || name === undefined) continue;
    const names = modules.get(importFrom) ?? new Set<string>();
    names.add(name);
    modules.set(importFrom, names);
  }

  return [...modules.entries()]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([module, names]) => `import type { ${[...names].sort().join(', ')} } from ${literal(module)};`)
    .join('\n');
}

function entityModule(entity: TargetEntityModel, config: CodeGeneratorConfig): string {
  const { typeName, properties } = entity;
  const propsName = `${typeName}Props`;

  const propsInterface = [
    `export interface ${propsName} {`,
    ...properties.flatMap((p) => [`  /** ${docText(propertyDoc(p))} */`, `  readonly ${p.name}: ${propertyType(p)};`]),
    '}',
  ].join('\n');

  const statics = [
    `  static readonly tableName = ${literal(formatQualifiedName(entity.source))};`,
    `  static readonly primaryKey: readonly (keyof ${propsName})[] = [${entity.primaryKey.map(literal).join(', ')}];`,
  ];
  if (entity.isView && entity.viewQuery !== undefined) {
    statics.push(`  static readonly viewDefinition = ${literal(entity.viewQuery)};`);
  }

  const fields = properties.map((p) => `  readonly ${p.name}: ${propertyType(p)};`);
  const assignments = properties.map((p) => `    this.${p.name} = props.${p.name};`);

  const toProps = properties.length > 0
    ? [
        `  toProps(): ${propsName} {`,
        '    return {',
        ...properties.map((p) => `      ${p.name}: this.${p.name},`),
        '    };',
        '  }',
      ]
    : [`  toProps(): ${propsName} {`, '    return {};', '  }'];

  const equals = properties.length > 0
    ? [
        `  equals(other: ${typeName}): boolean {`,
        '    return (',
        properties.map((p) => `      valuesEqual(this.${p.name}, other.${p.name})`).join(' &&\n'),
        '    );',
        '  }',
      ]
    : [`  equals(other: ${typeName}): boolean {`, `    return other instanceof ${typeName};`, '  }'];

  const kind = entity.isView ? 'view' : 'table';
  const classBody = [
    '/**',
    ` * Row of ${kind} ${formatQualifiedName(entity.source)}`,
    ' */',
    `export class ${typeName} implements ${propsName} {`,
    ...statics,
    '',
    ...(fields.length > 0 ? [...fields, ''] : []),
    `  constructor(${properties.length > 0 ? 'props' : '_props'}: ${propsName}) {`,
    ...assignments,
    '  }',
    '',
    `  with(changes: Partial<${propsName}>): ${typeName} {`,
    `    return new ${typeName}({ ...this.toProps(), ...changes });`,
    '  }',
    '',
    ...toProps,
    '',
    ...equals,
    '}',
  ].join('\n');

  return joinSections([
    fileHeader(config, entity),
    typeImports(properties),
    propsInterface,
    classBody,
    properties.length > 0 ? VALUES_EQUAL_HELPER : '',
  ]);
}
