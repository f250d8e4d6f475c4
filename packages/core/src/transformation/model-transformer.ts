/**
 * Model Transformer
 * Turns the refined schema into target entity models: one per table or
 * view, with every column type resolved and value-set tables expanded into
 * their entries.
 */

import {
  createChildLogger,
  createDiagnostic,
  DIAGNOSTIC_KINDS,
  formatLocation,
  type Diagnostic,
  type SourceLocation,
} from '@schemasmith/shared';
import {
  formatQualifiedName,
  qualifiedKey,
  type ColumnDefinition,
  type LiteralValue,
  type QualifiedName,
  type SeedRow,
} from '../ingestion/types.js';
import type { RefinedSchema, RefinedTable, RefinedView } from '../refinement/types.js';
import { SqlType } from '../type-mapping/sql-type.js';
import type { TypeMapper } from '../type-mapping/type-mapper.js';
import type { ValueSetConfig } from '../config/generator-config.js';
import { UniqueNamer, propertyNameFor, sanitizeIdentifier, toPascalCase, typeNameFor } from './naming.js';
import type {
  ModelTransformerConfig,
  PropertyModel,
  TargetEntityModel,
  TransformationResult,
  ValueSetAttribute,
  ValueSetEntry,
  ValueSetSpecification,
} from './types.js';

const DEFAULT_CONFIG: ModelTransformerConfig = {
  defaultSchema: 'dbo',
  valueSets: [],
};

// Members of the generated entity class that properties must not shadow
const ENTITY_MEMBERS: ReadonlySet<string> = new Set(['constructor', 'with', 'toProps', 'equals']);

// Members of the generated value set class that attribute getters must not shadow
const VALUE_SET_MEMBERS: ReadonlySet<string> = new Set([
  'constructor', 'index', 'value', 'displayName', 'equals', 'toString', 'toJSON', 'match',
]);

interface RawEntry {
  value: LiteralValue | undefined;
  displayName: LiteralValue | undefined;
  attributes: LiteralValue[];
  location: SourceLocation;
}

export class ModelTransformer {
  private config: ModelTransformerConfig;
  private logger = createChildLogger({ component: 'ModelTransformer' });

  constructor(
    private readonly typeMapper: TypeMapper,
    config: Partial<ModelTransformerConfig> = {}
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  transform(schema: RefinedSchema): TransformationResult {
    const diagnostics: Diagnostic[] = [];
    const valueSetConfigs = this.indexValueSetConfigs(schema, diagnostics);
    const entities: TargetEntityModel[] = [];

    for (const table of schema.tables) {
      const key = qualifiedKey(table.qualifiedName);
      const properties = this.buildProperties(table, diagnostics);
      const byColumn = new Map(properties.map((p) => [p.columnName, p.name]));
      const primaryKey = table.primaryKey.map((c) => byColumn.get(c) ?? c);
      const valueSetConfig = valueSetConfigs.get(key);

      if (!valueSetConfig) {
        entities.push({
          key,
          kind: 'entity',
          typeName: typeNameFor(table.qualifiedName.name),
          source: table.qualifiedName,
          sourceName: table.sourceName,
          isView: false,
          properties,
          primaryKey,
        });
        continue;
      }

      const typeName = typeNameFor(table.qualifiedName.name);
      const valueSet = this.buildValueSet(table, typeName, valueSetConfig, schema.seedRows, diagnostics);
      if (!valueSet) continue;

      entities.push({
        key,
        kind: 'valueSet',
        typeName,
        source: table.qualifiedName,
        sourceName: table.sourceName,
        isView: false,
        properties,
        primaryKey,
        valueSet,
      });
    }

    for (const view of schema.views) {
      entities.push(this.buildView(view));
    }

    this.logger.debug({
      entities: entities.length,
      valueSets: entities.filter((e) => e.kind === 'valueSet').length,
      unmapped: diagnostics.filter((d) => d.kind === DIAGNOSTIC_KINDS.UNMAPPED_TYPE).length,
    }, 'Schema transformed');

    return { entities, diagnostics };
  }

  // ===========================================
  // Row Entities
  // ===========================================

  private buildProperties(table: RefinedTable, diagnostics: Diagnostic[]): PropertyModel[] {
    const namer = new UniqueNamer();
    const subject = formatQualifiedName(table.qualifiedName);

    return [...table.columns]
      .sort((a, b) => a.ordinal - b.ordinal)
      .map((column) => {
        const type = this.typeMapper.resolve({
          schemaName: table.qualifiedName.schema,
          tableName: table.qualifiedName.name,
          columnName: column.name,
          sourceType: SqlType.fromColumn(column),
        });

        if (type.isUnknown) {
          const message = column.sourceType === ''
            ? `column ${subject}.${column.name} has no declared type`
            : `no type mapping rule matches ${subject}.${column.name} (${type.sourceType})`;
          diagnostics.push(
            createDiagnostic(DIAGNOSTIC_KINDS.UNMAPPED_TYPE, message, {
              location: column.location,
              subject: `${subject}.${column.name}`,
            })
          );
        }

        const property: PropertyModel = {
          name: namer.claim(propertyNameFor(column.name, ENTITY_MEMBERS)),
          columnName: column.name,
          type,
          nullable: column.nullable,
          isPrimaryKey: column.isPrimaryKey,
          isIdentity: column.isIdentity,
          ordinal: column.ordinal,
          ...(column.defaultExpression !== undefined ? { defaultExpression: column.defaultExpression } : {}),
        };
        return property;
      });
  }

  /**
   * Views carry no column types, so every declared column is Unknown
   */
  private buildView(view: RefinedView): TargetEntityModel {
    const namer = new UniqueNamer();
    const properties = view.columns.map((columnName, ordinal): PropertyModel => ({
      name: namer.claim(propertyNameFor(columnName, ENTITY_MEMBERS)),
      columnName,
      type: this.typeMapper.resolve({
        schemaName: view.qualifiedName.schema,
        tableName: view.qualifiedName.name,
        columnName,
        sourceType: SqlType.UNKNOWN,
      }),
      nullable: true,
      isPrimaryKey: false,
      isIdentity: false,
      ordinal,
    }));

    return {
      key: qualifiedKey(view.qualifiedName),
      kind: 'entity',
      typeName: typeNameFor(view.qualifiedName.name),
      source: view.qualifiedName,
      sourceName: view.sourceName,
      isView: true,
      viewQuery: view.query,
      properties,
      primaryKey: [],
    };
  }

  // ===========================================
  // Value Sets
  // ===========================================

  private indexValueSetConfigs(schema: RefinedSchema, diagnostics: Diagnostic[]): Map<string, ValueSetConfig> {
    const configs = new Map<string, ValueSetConfig>();
    const tableKeys = new Set(schema.tables.map((t) => qualifiedKey(t.qualifiedName)));
    const viewKeys = new Set(schema.views.map((v) => qualifiedKey(v.qualifiedName)));

    for (const config of this.config.valueSets) {
      const name = parseObjectName(config.table, this.config.defaultSchema);
      const key = qualifiedKey(name);
      const subject = formatQualifiedName(name);

      if (!tableKeys.has(key)) {
        const reason = viewKeys.has(key) ? 'is a view, not a table' : 'does not exist';
        diagnostics.push(
          createDiagnostic(DIAGNOSTIC_KINDS.REFERENCE_ERROR, `value set table ${subject} ${reason}`, { subject })
        );
        continue;
      }
      if (configs.has(key)) {
        diagnostics.push(
          createDiagnostic(
            DIAGNOSTIC_KINDS.DUPLICATE_DEFINITION_ERROR,
            `value set for ${subject} is configured more than once`,
            { subject }
          )
        );
        continue;
      }
      configs.set(key, config);
    }

    return configs;
  }

  private buildValueSet(
    table: RefinedTable,
    typeName: string,
    config: ValueSetConfig,
    seedRows: readonly SeedRow[],
    diagnostics: Diagnostic[]
  ): ValueSetSpecification | undefined {
    const subject = formatQualifiedName(table.qualifiedName);
    const errorCount = diagnostics.length;

    const column = (name: string, role: string): ColumnDefinition | undefined => {
      const found = findColumn(table.columns, name);
      if (!found) {
        diagnostics.push(
          createDiagnostic(
            DIAGNOSTIC_KINDS.REFERENCE_ERROR,
            `value set ${subject} names unknown ${role} column '${name}'`,
            { location: table.location, subject }
          )
        );
      }
      return found;
    };

    const valueColumn = column(config.valueColumn, 'value');
    const displayColumn = config.displayColumn !== undefined ? column(config.displayColumn, 'display') : undefined;
    const attributeColumns = config.attributeColumns.flatMap((name) => {
      const found = column(name, 'attribute');
      return found ? [found] : [];
    });
    if (!valueColumn || diagnostics.length > errorCount) return undefined;

    const rawEntries: RawEntry[] = config.values
      ? config.values.map((entry) => ({
          value: entry.value,
          displayName: entry.displayName,
          attributes: attributeColumns.map((c) => lookupCaseInsensitive(entry.attributes, c.name) ?? null),
          location: table.location,
        }))
      : seedRows
          .filter((row) => qualifiedKey(row.table) === qualifiedKey(table.qualifiedName))
          .map((row) => ({
            value: row.values[valueColumn.name],
            displayName: displayColumn ? row.values[displayColumn.name] : undefined,
            attributes: attributeColumns.map((c) => row.values[c.name] ?? null),
            location: row.location,
          }));

    if (rawEntries.length === 0) {
      diagnostics.push(
        createDiagnostic(DIAGNOSTIC_KINDS.CONSTRAINT_ERROR, `value set ${subject} has no values`, {
          location: table.location,
          subject,
        })
      );
      return undefined;
    }

    const lookup = new Map<string, number>();
    const firstSeen = new Map<string, SourceLocation>();
    const members = new UniqueNamer();
    members.claim(typeName);
    const entries: ValueSetEntry[] = [];

    for (const raw of rawEntries) {
      if (raw.value === undefined || raw.value === null || raw.value === '') {
        diagnostics.push(
          createDiagnostic(DIAGNOSTIC_KINDS.CONSTRAINT_ERROR, `value set ${subject} has an entry without a value`, {
            location: raw.location,
            subject,
          })
        );
        continue;
      }

      const value = String(raw.value);
      const previous = firstSeen.get(value);
      if (previous) {
        diagnostics.push(
          createDiagnostic(
            DIAGNOSTIC_KINDS.DUPLICATE_DEFINITION_ERROR,
            `value '${value}' appears more than once in value set ${subject}`,
            { location: raw.location, subject, related: [formatLocation(previous)] }
          )
        );
        continue;
      }
      firstSeen.set(value, raw.location);
      lookup.set(value, entries.length);

      entries.push({
        value,
        displayName: raw.displayName === undefined || raw.displayName === null ? value : String(raw.displayName),
        memberName: members.claim(sanitizeIdentifier(toPascalCase(value))),
        attributes: raw.attributes,
      });
    }

    if (diagnostics.length > errorCount) return undefined;

    const attributeNames = new UniqueNamer();
    const attributes: ValueSetAttribute[] = attributeColumns.map((c, i) => ({
      name: attributeNames.claim(propertyNameFor(c.name, VALUE_SET_MEMBERS)),
      columnName: c.name,
      type: inferAttributeType(entries.map((e) => e.attributes[i] ?? null)),
    }));

    this.logger.debug({ valueSet: subject, values: entries.length }, 'Value set built');

    return {
      valueColumn: valueColumn.name,
      ...(displayColumn ? { displayColumn: displayColumn.name } : {}),
      attributes,
      entries,
      lookup,
    };
  }
}

function findColumn(columns: readonly ColumnDefinition[], name: string): ColumnDefinition | undefined {
  const lower = name.toLowerCase();
  return columns.find((c) => c.name.toLowerCase() === lower);
}

function lookupCaseInsensitive(record: Record<string, LiteralValue>, key: string): LiteralValue | undefined {
  const lower = key.toLowerCase();
  for (const [name, value] of Object.entries(record)) {
    if (name.toLowerCase() === lower) return value;
  }
  return undefined;
}

/**
 * `sales.OrderStatus`, `[sales].[OrderStatus]` or `OrderStatus`
 */
export function parseObjectName(text: string, defaultSchema: string): QualifiedName {
  const parts = text.split('.').map((part) => part.trim().replace(/^\[(.*)\]$|^"(.*)"$/, '$1$2'));
  const name = parts[parts.length - 1] ?? text;
  const schema = parts.length >= 2 ? (parts[parts.length - 2] ?? defaultSchema) : defaultSchema;
  return { schema, name };
}

/**
 * Union of the literal kinds present, in a fixed order, plus `null` when
 * any entry lacks the attribute
 */
export function inferAttributeType(values: readonly LiteralValue[]): string {
  const kinds = new Set<string>();
  let hasNull = false;
  for (const value of values) {
    if (value === null) hasNull = true;
    else kinds.add(typeof value);
  }
  const types = ['boolean', 'number', 'string'].filter((k) => kinds.has(k));
  if (hasNull) types.push('null');
  return types.length > 0 ? types.join(' | ') : 'null';
}
