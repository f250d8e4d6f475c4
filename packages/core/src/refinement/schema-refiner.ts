/**
 * Schema Refiner
 * Merges raw models into one namespace, resolves references across sources
 * and normalizes indexes and primary keys.
 *
 * Steps:
 * 1. Merge tables and views by qualified name (duplicates are errors)
 * 2. Resolve standalone indexes, foreign keys and seed rows
 * 3. Deduplicate indexes and validate primary keys
 *
 * Step 2 needs a consistent namespace, so it is skipped when step 1 fails.
 * Within steps 2 and 3 every problem is collected before returning.
 */

import {
  createDiagnostic,
  DIAGNOSTIC_KINDS,
  formatLocation,
  hasFatalDiagnostics,
  createChildLogger,
  type Diagnostic,
  type SourceLocation,
} from '@schemasmith/shared';
import {
  formatQualifiedName,
  qualifiedKey,
  type ColumnDefinition,
  type ForeignKeyReference,
  type IndexDefinition,
  type QualifiedName,
  type RawSchemaModel,
  type SeedRow,
  type TableDefinition,
} from '../ingestion/types.js';
import type { RefinedSchema, RefinedTable, RefinedView, RefinementResult } from './types.js';

/**
 * Mutable working copy of a table while refinement runs
 */
interface WorkingTable {
  qualifiedName: QualifiedName;
  columns: ColumnDefinition[];
  indexes: IndexDefinition[];
  foreignKeys: ForeignKeyReference[];
  sourceName: string;
  location: SourceLocation;
}

interface NamespaceEntry {
  kind: 'table' | 'view';
  location: SourceLocation;
}

export class SchemaRefiner {
  private logger = createChildLogger({ component: 'SchemaRefiner' });

  refine(models: readonly RawSchemaModel[]): RefinementResult {
    const diagnostics: Diagnostic[] = [];

    // Step 1: merge
    const namespace = new Map<string, NamespaceEntry>();
    const tables = new Map<string, WorkingTable>();
    const views: RefinedView[] = [];

    const declare = (name: QualifiedName, kind: NamespaceEntry['kind'], location: SourceLocation): boolean => {
      const key = qualifiedKey(name);
      const existing = namespace.get(key);
      if (existing) {
        diagnostics.push(
          createDiagnostic(
            DIAGNOSTIC_KINDS.DUPLICATE_DEFINITION_ERROR,
            `${kind} ${formatQualifiedName(name)} is already defined as a ${existing.kind} at ${formatLocation(existing.location)}`,
            { location, subject: formatQualifiedName(name), related: [formatLocation(existing.location)] }
          )
        );
        return false;
      }
      namespace.set(key, { kind, location });
      return true;
    };

    for (const model of models) {
      for (const table of model.tables) {
        if (declare(table.qualifiedName, 'table', table.location)) {
          tables.set(qualifiedKey(table.qualifiedName), toWorkingTable(table, model.sourceName));
        }
      }
      for (const view of model.views) {
        if (declare(view.qualifiedName, 'view', view.location)) {
          views.push({ ...view, sourceName: model.sourceName });
        }
      }
    }

    if (hasFatalDiagnostics(diagnostics)) {
      this.logger.debug({ errors: diagnostics.length }, 'Merge failed, skipping reference resolution');
      return { success: false, diagnostics };
    }

    // Step 2: resolve
    const reportReference = (message: string, location: SourceLocation, subject: string) => {
      diagnostics.push(createDiagnostic(DIAGNOSTIC_KINDS.REFERENCE_ERROR, message, { location, subject }));
    };

    for (const model of models) {
      for (const { table: tableName, index } of model.indexes) {
        const table = tables.get(qualifiedKey(tableName));
        if (!table) {
          reportReference(
            `index ${index.name} targets unknown table ${formatQualifiedName(tableName)}`,
            index.location,
            formatQualifiedName(tableName)
          );
          continue;
        }
        table.indexes.push(index);
      }

      for (const reference of model.foreignKeys) {
        const table = tables.get(qualifiedKey(reference.table));
        if (!table) {
          reportReference(
            `foreign key ${reference.name} is declared on unknown table ${formatQualifiedName(reference.table)}`,
            reference.location,
            formatQualifiedName(reference.table)
          );
          continue;
        }
        table.foreignKeys.push(reference);
      }
    }

    for (const table of tables.values()) {
      const subject = formatQualifiedName(table.qualifiedName);

      table.indexes = table.indexes.flatMap((index) => {
        const missing: string[] = [];
        const resolve = (names: readonly string[]): string[] =>
          names.flatMap((name) => {
            const column = findColumn(table.columns, name);
            if (column) return [column.name];
            missing.push(name);
            return [];
          });
        const columns = resolve(index.columns);
        const includedColumns = resolve(index.includedColumns);
        if (missing.length > 0) {
          reportReference(
            `index ${index.name} on ${subject} references unknown column(s) ${missing.map((m) => `'${m}'`).join(', ')}`,
            index.location,
            subject
          );
          return [];
        }
        return [{ ...index, columns, includedColumns }];
      });
    }

    // Primary keys adopted from ALTER TABLE constraints are needed before
    // implicit foreign key targets can be resolved
    for (const table of tables.values()) {
      adoptPrimaryKey(table);
    }

    for (const table of tables.values()) {
      table.foreignKeys = table.foreignKeys.flatMap((reference) => {
        const resolved = resolveForeignKey(reference, table, tables);
        if (typeof resolved === 'string') {
          reportReference(resolved, reference.location, formatQualifiedName(table.qualifiedName));
          return [];
        }
        return [resolved];
      });
    }

    const seedRows: SeedRow[] = [];
    for (const model of models) {
      for (const row of model.seedRows) {
        const table = tables.get(qualifiedKey(row.table));
        const subject = formatQualifiedName(row.table);
        if (!table) {
          reportReference(`seed row targets unknown table ${subject}`, row.location, subject);
          continue;
        }
        const values: SeedRow['values'] = {};
        let valid = true;
        for (const [name, value] of Object.entries(row.values)) {
          const column = findColumn(table.columns, name);
          if (!column) {
            reportReference(`seed row for ${subject} sets unknown column '${name}'`, row.location, subject);
            valid = false;
            continue;
          }
          values[column.name] = value;
        }
        if (valid) seedRows.push({ table: table.qualifiedName, values, location: row.location });
      }
    }

    // Step 3: normalize
    const refinedTables: RefinedTable[] = [];
    for (const table of tables.values()) {
      const indexes = dedupeIndexes(table.indexes);
      const primaryKey = table.columns.filter((c) => c.isPrimaryKey).map((c) => c.name);
      diagnostics.push(...validatePrimaryKey(table, indexes, primaryKey));

      refinedTables.push({
        qualifiedName: table.qualifiedName,
        columns: table.columns,
        indexes,
        foreignKeys: table.foreignKeys,
        primaryKey,
        sourceName: table.sourceName,
        location: table.location,
      });
    }

    if (hasFatalDiagnostics(diagnostics)) {
      return { success: false, diagnostics };
    }

    const schema: RefinedSchema = { tables: refinedTables, views, seedRows };

    this.logger.debug({
      tables: refinedTables.length,
      views: views.length,
      foreignKeys: refinedTables.reduce((sum, t) => sum + t.foreignKeys.length, 0),
      seedRows: seedRows.length,
    }, 'Schema refined');

    return { success: true, schema, diagnostics };
  }
}

function toWorkingTable(table: TableDefinition, sourceName: string): WorkingTable {
  return {
    qualifiedName: table.qualifiedName,
    columns: table.columns.map((c) => ({ ...c })),
    indexes: [...table.indexes],
    foreignKeys: [...table.foreignKeys],
    sourceName,
    location: table.location,
  };
}

function findColumn(columns: readonly ColumnDefinition[], name: string): ColumnDefinition | undefined {
  const lower = name.toLowerCase();
  return columns.find((c) => c.name.toLowerCase() === lower);
}

/**
 * A table whose columns carry no primary key flag takes its key from a
 * PRIMARY KEY constraint added elsewhere (ALTER TABLE)
 */
function adoptPrimaryKey(table: WorkingTable): void {
  if (table.columns.some((c) => c.isPrimaryKey)) return;
  const constraint = table.indexes.find((i) => i.isPrimaryKey);
  if (!constraint) return;
  for (const name of constraint.columns) {
    const column = findColumn(table.columns, name);
    if (column) {
      column.isPrimaryKey = true;
      column.nullable = false;
    }
  }
}

/**
 * Primary key columns in PRIMARY KEY constraint order, or in ordinal order
 * when the key was declared on the columns themselves
 */
function primaryKeyColumns(table: WorkingTable): ColumnDefinition[] {
  const constraint = table.indexes.find((i) => i.isPrimaryKey);
  if (!constraint) return table.columns.filter((c) => c.isPrimaryKey);
  return constraint.columns.flatMap((name) => {
    const column = findColumn(table.columns, name);
    return column ? [column] : [];
  });
}

/**
 * Returns the resolved reference, or the error message
 */
function resolveForeignKey(
  reference: ForeignKeyReference,
  table: WorkingTable,
  tables: ReadonlyMap<string, WorkingTable>
): ForeignKeyReference | string {
  const owningColumn = findColumn(table.columns, reference.column);
  if (!owningColumn) {
    return `foreign key ${reference.name} uses unknown column '${reference.column}' of ${formatQualifiedName(table.qualifiedName)}`;
  }

  const target = tables.get(qualifiedKey(reference.referencedTable));
  if (!target) {
    return `foreign key ${reference.name} references unknown table ${formatQualifiedName(reference.referencedTable)}`;
  }

  let targetColumn: ColumnDefinition | undefined;
  if (reference.referencedColumn === '') {
    targetColumn = primaryKeyColumns(target)[reference.position];
    if (!targetColumn) {
      return `foreign key ${reference.name} omits its referenced columns but ${formatQualifiedName(target.qualifiedName)} has no matching primary key column`;
    }
  } else {
    targetColumn = findColumn(target.columns, reference.referencedColumn);
    if (!targetColumn) {
      return `foreign key ${reference.name} references unknown column '${reference.referencedColumn}' of ${formatQualifiedName(target.qualifiedName)}`;
    }
  }

  return {
    ...reference,
    table: table.qualifiedName,
    column: owningColumn.name,
    referencedTable: target.qualifiedName,
    referencedColumn: targetColumn.name,
  };
}

/**
 * Keep the first index for each (column sequence, uniqueness). A later
 * duplicate that is a primary key constraint marks the kept one as such.
 */
export function dedupeIndexes(indexes: readonly IndexDefinition[]): IndexDefinition[] {
  const kept = new Map<string, IndexDefinition>();
  for (const index of indexes) {
    const key = `${index.isUnique ? 'unique' : 'plain'}|${index.columns.map((c) => c.toLowerCase()).join(',')}`;
    const first = kept.get(key);
    if (!first) {
      kept.set(key, index);
    } else if (index.isPrimaryKey && !first.isPrimaryKey) {
      kept.set(key, { ...first, isPrimaryKey: true });
    }
  }
  return [...kept.values()];
}

function validatePrimaryKey(
  table: WorkingTable,
  indexes: readonly IndexDefinition[],
  primaryKey: readonly string[]
): Diagnostic[] {
  const subject = formatQualifiedName(table.qualifiedName);
  const constraints = indexes.filter((i) => i.isPrimaryKey);
  const diagnostics: Diagnostic[] = [];

  const second = constraints[1];
  if (second) {
    diagnostics.push(
      createDiagnostic(
        DIAGNOSTIC_KINDS.CONSTRAINT_ERROR,
        `${subject} declares more than one primary key (${constraints.map((c) => c.name).join(', ')})`,
        { location: second.location, subject }
      )
    );
    return diagnostics;
  }

  const expected = normalizeColumnSet(primaryKey);
  for (const constraint of constraints) {
    if (normalizeColumnSet(constraint.columns) !== expected) {
      diagnostics.push(
        createDiagnostic(
          DIAGNOSTIC_KINDS.CONSTRAINT_ERROR,
          `primary key ${constraint.name} (${constraint.columns.join(', ')}) does not match the primary key columns of ${subject} (${primaryKey.join(', ')})`,
          { location: constraint.location, subject }
        )
      );
    }
  }
  return diagnostics;
}

function normalizeColumnSet(columns: readonly string[]): string {
  return columns.map((c) => c.toLowerCase()).sort().join(',');
}
