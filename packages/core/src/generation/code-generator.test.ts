/**
 * Code Generator Tests
 * Tests for entity and value set emission from transformed models
 */
import { describe, it, expect } from 'vitest';
import { DIAGNOSTIC_KINDS } from '@schemasmith/shared';
import { SchemaIngestor } from '../ingestion/schema-ingestor.js';
import { SchemaRefiner } from '../refinement/schema-refiner.js';
import { TypeMapper } from '../type-mapping/type-mapper.js';
import { resolveGeneratorConfig } from '../config/generator-config.js';
import { ModelTransformer } from '../transformation/model-transformer.js';
import type { TargetEntityModel } from '../transformation/types.js';
import { CodeGenerator, detectCollisions } from './code-generator.js';
import type { GeneratedArtifact } from './types.js';

// ===========================================
// Fixtures
// ===========================================

const RULES = [
  { sourceType: 'INT', target: 'number' },
  { sourceType: 'NVARCHAR', target: 'string' },
  { sourceType: 'VARCHAR', target: 'string' },
];

const USERS = 'CREATE TABLE Users (Id INT PRIMARY KEY, Username NVARCHAR(50) NOT NULL, Email NVARCHAR(255))';

const ORDER_STATUS = `
CREATE TABLE OrderStatus (Code VARCHAR(20) PRIMARY KEY, Label NVARCHAR(50), SortOrder INT, IsFinal BIT);
INSERT INTO OrderStatus (Code, Label, SortOrder, IsFinal) VALUES
  ('new', 'New', 1, 0),
  ('in-progress', 'In progress', 2, 0),
  ('done', NULL, 3, 1);`;

const ORDER_STATUS_VALUE_SET = {
  table: 'OrderStatus',
  valueColumn: 'Code',
  displayColumn: 'Label',
  attributeColumns: ['SortOrder', 'IsFinal'],
};

const COLOR_TABLE = 'CREATE TABLE Color (Code VARCHAR(20) PRIMARY KEY)';

const colorValueSet = (values: string[]) => ({
  table: 'Color',
  valueColumn: 'Code',
  values: values.map((value) => ({ value })),
});

const entitiesFor = (texts: string[], configInput: unknown = {}): TargetEntityModel[] => {
  const config = resolveGeneratorConfig(configInput);
  const ingestor = new SchemaIngestor();
  const models = texts.map((text, i) => ingestor.ingestSource({ name: `file${i + 1}.sql`, text }).model);
  const refined = new SchemaRefiner().refine(models);
  if (!refined.success) {
    throw new Error(refined.diagnostics.map((d) => d.message).join('; '));
  }
  const transformer = new ModelTransformer(new TypeMapper(RULES), {
    defaultSchema: config.defaultSchema,
    valueSets: config.valueSets,
  });
  return transformer.transform(refined.schema).entities;
};

const byName = (artifacts: readonly GeneratedArtifact[], name: string): string => {
  const artifact = artifacts.find((a) => a.name === name);
  if (!artifact) {
    throw new Error(`no artifact named ${name}`);
  }
  return artifact.content;
};

const caseLines = (content: string): number =>
  content.split('\n').filter((line) => line.trim().startsWith('case ')).length;

describe('CodeGenerator', () => {
  // ===========================================
  // Row Entities
  // ===========================================

  describe('row entities', () => {
    it('should emit one module per entity under its schema directory', async () => {
      const generator = new CodeGenerator({ header: 'Test header' });
      const { artifacts, diagnostics } = await generator.generate(entitiesFor([USERS]));

      expect(diagnostics).toEqual([]);
      expect(artifacts.map((a) => [a.name, a.entity])).toEqual([['dbo/Users.ts', 'dbo.Users']]);

      const content = byName(artifacts, 'dbo/Users.ts');
      const lines = content.split('\n');
      expect(lines.slice(0, 2)).toEqual(['// Test header', '// Source: table dbo.Users (file1.sql)']);
      expect(lines).toContain('export interface UsersProps {');
      expect(lines).toContain('  /** Id INT, primary key */');
      expect(lines).toContain('  readonly id: number;');
      expect(lines).toContain('  readonly username: string;');
      expect(lines).toContain('  readonly email: string | null;');
      expect(lines).toContain('export class Users implements UsersProps {');
      expect(lines).toContain('  static readonly tableName = "dbo.Users";');
      expect(lines).toContain('  static readonly primaryKey: readonly (keyof UsersProps)[] = ["id"];');
      expect(lines).toContain('  with(changes: Partial<UsersProps>): Users {');
      expect(lines).toContain('function valuesEqual(a: unknown, b: unknown): boolean {');
      expect(content.endsWith('}\n')).toBe(true);
    });

    it('should place artifacts at the output root when grouping is off', async () => {
      const generator = new CodeGenerator({ groupBySchema: false });
      const { artifacts } = await generator.generate(entitiesFor([USERS]));

      expect(artifacts.map((a) => a.name)).toEqual(['Users.ts']);
    });

    it('should carry the view query and leave unmapped columns unknown', async () => {
      const generator = new CodeGenerator();
      const { artifacts } = await generator.generate(
        entitiesFor(['CREATE VIEW reporting.ActiveUsers (UserId) AS SELECT Id FROM dbo.Users'])
      );
      const lines = byName(artifacts, 'reporting/ActiveUsers.ts').split('\n');

      expect(lines).toContain('// Source: view reporting.ActiveUsers (file1.sql)');
      expect(lines).toContain('  static readonly viewDefinition = "SELECT Id FROM dbo.Users";');
      expect(lines).toContain('  readonly userId: unknown;');
      expect(lines).toContain('  /** UserId computed; no type mapping */');
    });
  });

  // ===========================================
  // Value Sets
  // ===========================================

  describe('value sets', () => {
    it('should emit the core, data, serialization and member modules', async () => {
      const generator = new CodeGenerator({ header: 'Test header' });
      const { artifacts, diagnostics } = await generator.generate(
        entitiesFor([ORDER_STATUS], { valueSets: [ORDER_STATUS_VALUE_SET] })
      );

      expect(diagnostics).toEqual([]);
      expect(artifacts.map((a) => a.name)).toEqual([
        'dbo/OrderStatus.ts',
        'dbo/OrderStatus.data.ts',
        'dbo/OrderStatus.serialization.ts',
        'dbo/OrderStatus.members.ts',
      ]);

      expect(byName(artifacts, 'dbo/OrderStatus.data.ts')).toBe(
        [
          '// Test header',
          '// Source: table dbo.OrderStatus (file1.sql)',
          '',
          'export const values: readonly string[] = [',
          '  "new",',
          '  "in-progress",',
          '  "done",',
          '];',
          '',
          'export const displayNames: readonly string[] = [',
          '  "New",',
          '  "In progress",',
          '  "done",',
          '];',
          '',
          'export const sortOrderValues: readonly number[] = [',
          '  1,',
          '  2,',
          '  3,',
          '];',
          '',
          'export const isFinalValues: readonly number[] = [',
          '  0,',
          '  0,',
          '  1,',
          '];',
          '',
          '/** value → index, built once at load */',
          'export const valueIndex: ReadonlyMap<string, number> = new Map(values.map((value, index): [string, number] => [value, index]));',
          '',
        ].join('\n')
      );

      expect(byName(artifacts, 'dbo/OrderStatus.members.ts')).toBe(
        [
          '// Test header',
          '// Source: table dbo.OrderStatus (file1.sql)',
          '',
          "import { OrderStatus } from './OrderStatus.js';",
          '',
          'export const New: OrderStatus = OrderStatus.fromIndex(0);',
          'export const InProgress: OrderStatus = OrderStatus.fromIndex(1);',
          'export const Done: OrderStatus = OrderStatus.fromIndex(2);',
          '',
        ].join('\n')
      );
    });

    it('should give the core class attribute getters and a dispatch helper', async () => {
      const generator = new CodeGenerator();
      const { artifacts } = await generator.generate(entitiesFor([ORDER_STATUS], { valueSets: [ORDER_STATUS_VALUE_SET] }));
      const core = byName(artifacts, 'dbo/OrderStatus.ts');
      const lines = core.split('\n');

      expect(lines).toContain(
        "import { displayNames, isFinalValues, sortOrderValues, valueIndex, values } from './OrderStatus.data.js';"
      );
      expect(lines).toContain('  get sortOrder(): number {');
      expect(lines).toContain('  static tryParse(value: string): OrderStatus | undefined {');
      expect(lines).toContain('  match<R>(handlers: {');
      expect(lines).toContain('    InProgress: () => R;');
      expect(caseLines(core)).toBe(3);
    });

    it('should emit a zod schema with serialize and deserialize functions', async () => {
      const generator = new CodeGenerator();
      const { artifacts } = await generator.generate(entitiesFor([ORDER_STATUS], { valueSets: [ORDER_STATUS_VALUE_SET] }));
      const lines = byName(artifacts, 'dbo/OrderStatus.serialization.ts').split('\n');

      expect(lines).toContain("import { z } from 'zod';");
      expect(lines).toContain('export const orderStatusSchema = z');
      expect(lines).toContain('export function serializeOrderStatus(value: OrderStatus): string {');
      expect(lines).toContain('export function deserializeOrderStatus(raw: unknown): OrderStatus {');
    });

    it('should omit the dispatch helper above 25 values', async () => {
      const generator = new CodeGenerator();
      const values = Array.from({ length: 30 }, (_, i) => `value${i + 1}`);
      const { artifacts } = await generator.generate(
        entitiesFor([COLOR_TABLE], { valueSets: [colorValueSet(values)] })
      );
      const core = byName(artifacts, 'dbo/Color.ts');

      expect(core).not.toContain('match<R>(');
      expect(caseLines(core)).toBe(0);
    });

    it('should emit a dispatch helper with one case per value at 10 values', async () => {
      const generator = new CodeGenerator();
      const values = Array.from({ length: 10 }, (_, i) => `value${i + 1}`);
      const { artifacts } = await generator.generate(
        entitiesFor([COLOR_TABLE], { valueSets: [colorValueSet(values)] })
      );
      const core = byName(artifacts, 'dbo/Color.ts');

      expect(core.split('match<R>(')).toHaveLength(2);
      expect(caseLines(core)).toBe(10);
    });

    it('should split large value sets into chunks', async () => {
      const generator = new CodeGenerator({ header: 'Test header', valueSetChunkSize: 2 });
      const { artifacts } = await generator.generate(
        entitiesFor([COLOR_TABLE], { valueSets: [colorValueSet(['red', 'green', 'blue', 'cyan', 'black'])] })
      );

      expect(artifacts.map((a) => a.name)).toEqual([
        'dbo/Color.ts',
        'dbo/Color.data.ts',
        'dbo/Color.data.1.ts',
        'dbo/Color.data.2.ts',
        'dbo/Color.data.3.ts',
        'dbo/Color.serialization.ts',
        'dbo/Color.members.ts',
        'dbo/Color.members.1.ts',
        'dbo/Color.members.2.ts',
        'dbo/Color.members.3.ts',
      ]);

      const aggregate = byName(artifacts, 'dbo/Color.data.ts').split('\n');
      expect(aggregate).toContain("import * as chunk1 from './Color.data.1.js';");
      expect(aggregate).toContain(
        'export const values: readonly string[] = [...chunk1.values, ...chunk2.values, ...chunk3.values];'
      );

      expect(byName(artifacts, 'dbo/Color.data.3.ts')).not.toContain('valueIndex');
      expect(byName(artifacts, 'dbo/Color.members.2.ts').split('\n').slice(-3)).toEqual([
        'export const Blue: Color = Color.fromIndex(2);',
        'export const Cyan: Color = Color.fromIndex(3);',
        '',
      ]);
      expect(byName(artifacts, 'dbo/Color.members.ts').split('\n')).toContain("export * from './Color.members.3.js';");
    });

    it('should skip member modules when they are disabled', async () => {
      const generator = new CodeGenerator({ emitValueSetMembers: false });
      const { artifacts } = await generator.generate(
        entitiesFor([COLOR_TABLE], { valueSets: [colorValueSet(['red'])] })
      );

      expect(artifacts.map((a) => a.name)).toEqual(['dbo/Color.ts', 'dbo/Color.data.ts', 'dbo/Color.serialization.ts']);
    });
  });

  // ===========================================
  // Barrels, Collisions and Failures
  // ===========================================

  describe('barrels', () => {
    it('should emit a sorted index per directory', async () => {
      const generator = new CodeGenerator({ header: 'Test header', emitBarrels: true, emitValueSetMembers: false });
      const { artifacts } = await generator.generate(
        entitiesFor([USERS, ORDER_STATUS], { valueSets: [ORDER_STATUS_VALUE_SET] })
      );
      const barrel = artifacts.find((a) => a.name === 'dbo/index.ts');

      expect(barrel?.entity).toBe('(barrel)');
      expect(barrel?.content).toBe(
        [
          '// Test header',
          '',
          "export * from './Users.js';",
          "export { OrderStatus } from './OrderStatus.js';",
          "export { orderStatusSchema, serializeOrderStatus, deserializeOrderStatus } from './OrderStatus.serialization.js';",
          '',
        ].join('\n')
      );
    });
  });

  describe('collisions', () => {
    it('should keep the first artifact and report the second', async () => {
      const generator = new CodeGenerator({ groupBySchema: false });
      const { artifacts, diagnostics } = await generator.generate(
        entitiesFor([USERS, 'CREATE TABLE sales.Users (Id INT)'])
      );

      expect(artifacts.map((a) => a.entity)).toEqual(['dbo.Users']);
      expect(diagnostics).toEqual([
        {
          kind: DIAGNOSTIC_KINDS.OUTPUT_COLLISION_ERROR,
          severity: 'error',
          message: 'artifact Users.ts is produced by both dbo.Users and sales.Users',
          subject: 'Users.ts',
          related: ['dbo.Users', 'sales.Users'],
        },
      ]);
    });

    it('should compare names case-insensitively', () => {
      const { unique, collisions } = detectCollisions([
        { name: 'dbo/Users.ts', content: '', entity: 'dbo.Users' },
        { name: 'DBO/users.ts', content: '', entity: 'DBO.users' },
        { name: 'dbo/Orders.ts', content: '', entity: 'dbo.Orders' },
      ]);

      expect(unique.map((a) => a.name)).toEqual(['dbo/Users.ts', 'dbo/Orders.ts']);
      expect(collisions).toHaveLength(1);
    });
  });

  describe('failures', () => {
    it('should report an entity that cannot be emitted and still emit the others', async () => {
      const broken: TargetEntityModel = {
        key: 'dbo.broken',
        kind: 'valueSet',
        typeName: 'Broken',
        source: { schema: 'dbo', name: 'Broken' },
        sourceName: 'test.sql',
        isView: false,
        properties: [],
        primaryKey: [],
      };
      const generator = new CodeGenerator();
      const { artifacts, diagnostics } = await generator.generate([broken, ...entitiesFor([USERS])]);

      expect(artifacts.map((a) => a.name)).toEqual(['dbo/Users.ts']);
      expect(diagnostics).toEqual([
        {
          kind: DIAGNOSTIC_KINDS.EMIT_ERROR,
          severity: 'error',
          message: 'cannot emit dbo.Broken: entity dbo.Broken is not a value set',
          subject: 'dbo.Broken',
        },
      ]);
    });
  });

  it('should produce identical output on repeated runs', async () => {
    const entities = entitiesFor([USERS, ORDER_STATUS], { valueSets: [ORDER_STATUS_VALUE_SET] });
    const generator = new CodeGenerator({ emitBarrels: true });

    const first = await generator.generate(entities);
    const second = await generator.generate(entities);

    expect(second).toEqual(first);
  });
});
