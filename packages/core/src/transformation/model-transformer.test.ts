/**
 * ModelTransformer Tests
 */
import { describe, it, expect } from 'vitest';
import { DIAGNOSTIC_KINDS } from '@schemasmith/shared';
import { SchemaIngestor } from '../ingestion/schema-ingestor.js';
import { SchemaRefiner } from '../refinement/schema-refiner.js';
import type { RefinedSchema } from '../refinement/types.js';
import { TypeMapper } from '../type-mapping/type-mapper.js';
import { resolveGeneratorConfig } from '../config/generator-config.js';
import type { ValueSetConfig } from '../config/generator-config.js';
import { ModelTransformer, inferAttributeType, parseObjectName } from './model-transformer.js';

const refine = (...texts: string[]): RefinedSchema => {
  const ingestor = new SchemaIngestor();
  const models = texts.map((text, i) => ingestor.ingestSource({ name: `file${i + 1}.sql`, text }).model);
  const result = new SchemaRefiner().refine(models);
  if (!result.success) {
    throw new Error(result.diagnostics.map((d) => d.message).join('; '));
  }
  return result.schema;
};

const valueSets = (...input: unknown[]): ValueSetConfig[] => resolveGeneratorConfig({ valueSets: input }).valueSets;

const USERS_AND_ORDERS = [
  'CREATE TABLE Users (Id INT PRIMARY KEY, Username NVARCHAR(50) NOT NULL, Email NVARCHAR(255))',
  'CREATE TABLE Orders (Id INT PRIMARY KEY, UserId INT NOT NULL REFERENCES Users(Id), Total DECIMAL(10,2))',
];

const ORDER_STATUS = `
CREATE TABLE OrderStatus (Code VARCHAR(20) PRIMARY KEY, Label NVARCHAR(50), SortOrder INT, IsFinal BIT);
INSERT INTO OrderStatus (Code, Label, SortOrder, IsFinal) VALUES
  ('new', 'New', 1, 0),
  ('in-progress', 'In progress', 2, 0),
  ('done', NULL, 3, 1);`;

describe('ModelTransformer', () => {
  describe('row entities', () => {
    it('should resolve every column to unknown when no rules are configured', () => {
      const transformer = new ModelTransformer(new TypeMapper());
      const { entities, diagnostics } = transformer.transform(refine(...USERS_AND_ORDERS));

      expect(entities.map((e) => [e.typeName, e.kind])).toEqual([
        ['Users', 'entity'],
        ['Orders', 'entity'],
      ]);
      expect(entities.flatMap((e) => e.properties.map((p) => p.type.target))).toEqual(
        Array(6).fill('unknown')
      );
      expect(diagnostics).toHaveLength(6);
      expect(diagnostics.every((d) => d.kind === DIAGNOSTIC_KINDS.UNMAPPED_TYPE && d.severity === 'warning')).toBe(true);
      expect(diagnostics[2]?.message).toBe('no type mapping rule matches dbo.Users.Email (NVARCHAR(255))');
    });

    it('should build ordered camelCase properties with their resolved types', () => {
      const transformer = new ModelTransformer(
        new TypeMapper([
          { sourceType: 'INT', target: 'number' },
          { sourceType: 'NVARCHAR', target: 'string' },
          { sourceType: 'DECIMAL', target: 'Decimal', importFrom: 'decimal.js' },
        ])
      );
      const { entities, diagnostics } = transformer.transform(refine(...USERS_AND_ORDERS));
      const orders = entities[1];

      expect(diagnostics).toEqual([]);
      expect(orders?.properties.map((p) => [p.name, p.columnName, p.type.target, p.nullable, p.isPrimaryKey])).toEqual([
        ['id', 'Id', 'number', false, true],
        ['userId', 'UserId', 'number', false, false],
        ['total', 'Total', 'Decimal', true, false],
      ]);
      expect(orders?.properties[2]?.type.importFrom).toBe('decimal.js');
      expect(orders?.primaryKey).toEqual(['id']);
    });

    it('should keep property names clear of class members and each other', () => {
      const transformer = new ModelTransformer(new TypeMapper([{ sourceType: 'INT', target: 'number' }]));
      const { entities } = transformer.transform(refine('CREATE TABLE T ([With] INT, Order_Id INT, OrderId INT, [default] INT)'));

      expect(entities[0]?.properties.map((p) => p.name)).toEqual(['with_', 'orderId', 'orderId_2', 'default_']);
    });

    it('should warn about computed columns without a type', () => {
      const transformer = new ModelTransformer(new TypeMapper([{ sourceType: 'INT', target: 'number' }]));
      const { diagnostics } = transformer.transform(refine('CREATE TABLE T (A INT, B AS (A * 2))'));

      expect(diagnostics.map((d) => d.message)).toEqual(['column dbo.T.B has no declared type']);
    });

    it('should model views from their declared columns', () => {
      const transformer = new ModelTransformer(new TypeMapper());
      const { entities, diagnostics } = transformer.transform(
        refine('CREATE VIEW reporting.active_users (UserId, UserName) AS SELECT Id, Username FROM dbo.Users')
      );

      expect(diagnostics).toEqual([]);
      expect(entities[0]).toMatchObject({
        key: 'reporting.active_users',
        typeName: 'ActiveUsers',
        isView: true,
        viewQuery: 'SELECT Id, Username FROM dbo.Users',
        primaryKey: [],
      });
      expect(entities[0]?.properties.map((p) => [p.name, p.type.isUnknown])).toEqual([
        ['userId', true],
        ['userName', true],
      ]);
    });
  });

  describe('value sets', () => {
    it('should build entries from seed rows', () => {
      const transformer = new ModelTransformer(new TypeMapper(), {
        valueSets: valueSets({
          table: 'dbo.OrderStatus',
          valueColumn: 'code',
          displayColumn: 'Label',
          attributeColumns: ['SortOrder', 'IsFinal'],
        }),
      });
      const { entities, diagnostics } = transformer.transform(refine(ORDER_STATUS));
      const valueSet = entities[0]?.valueSet;

      expect(diagnostics.filter((d) => d.severity === 'error')).toEqual([]);
      expect(entities[0]?.kind).toBe('valueSet');
      expect(valueSet?.valueColumn).toBe('Code');
      expect(valueSet?.entries).toEqual([
        { value: 'new', displayName: 'New', memberName: 'New', attributes: [1, 0] },
        { value: 'in-progress', displayName: 'In progress', memberName: 'InProgress', attributes: [2, 0] },
        { value: 'done', displayName: 'done', memberName: 'Done', attributes: [3, 1] },
      ]);
      expect(valueSet?.attributes).toEqual([
        { name: 'sortOrder', columnName: 'SortOrder', type: 'number' },
        { name: 'isFinal', columnName: 'IsFinal', type: 'number' },
      ]);
      expect([...(valueSet?.lookup ?? [])]).toEqual([
        ['new', 0],
        ['in-progress', 1],
        ['done', 2],
      ]);
    });

    it('should prefer configured values over seed rows', () => {
      const transformer = new ModelTransformer(new TypeMapper(), {
        valueSets: valueSets({
          table: '[dbo].[OrderStatus]',
          valueColumn: 'Code',
          attributeColumns: ['SortOrder'],
          values: [
            { value: 'open', attributes: { sortorder: 10 } },
            { value: 7, displayName: 'Seven' },
          ],
        }),
      });
      const { entities } = transformer.transform(refine(ORDER_STATUS));

      expect(entities[0]?.valueSet?.entries).toEqual([
        { value: 'open', displayName: 'open', memberName: 'Open', attributes: [10] },
        { value: '7', displayName: 'Seven', memberName: '_7', attributes: [null] },
      ]);
      expect(entities[0]?.valueSet?.attributes[0]?.type).toBe('number | null');
    });

    it('should disambiguate member names and keep them off the type name', () => {
      const transformer = new ModelTransformer(new TypeMapper(), {
        valueSets: valueSets({
          table: 'Colour',
          valueColumn: 'Name',
          values: [{ value: 'red' }, { value: 'RED' }, { value: 'colour' }],
        }),
      });
      const { entities } = transformer.transform(refine('CREATE TABLE Colour (Name VARCHAR(10) PRIMARY KEY)'));

      expect(entities[0]?.valueSet?.entries.map((e) => e.memberName)).toEqual(['Red', 'Red_2', 'Colour_2']);
    });

    it('should report a value set table that does not exist', () => {
      const transformer = new ModelTransformer(new TypeMapper(), {
        valueSets: valueSets({ table: 'sales.Missing', valueColumn: 'Code' }),
      });
      const { diagnostics } = transformer.transform(refine(ORDER_STATUS));

      expect(diagnostics.find((d) => d.severity === 'error')).toMatchObject({
        kind: DIAGNOSTIC_KINDS.REFERENCE_ERROR,
        message: 'value set table sales.Missing does not exist',
      });
    });

    it('should report unknown value set columns', () => {
      const transformer = new ModelTransformer(new TypeMapper(), {
        valueSets: valueSets({ table: 'OrderStatus', valueColumn: 'Code', attributeColumns: ['Colour'] }),
      });
      const { entities, diagnostics } = transformer.transform(refine(ORDER_STATUS));

      expect(entities).toEqual([]);
      expect(diagnostics.filter((d) => d.severity === 'error').map((d) => d.message)).toEqual([
        "value set dbo.OrderStatus names unknown attribute column 'Colour'",
      ]);
    });

    it('should reject duplicate and empty values', () => {
      const transformer = new ModelTransformer(new TypeMapper(), {
        valueSets: valueSets({
          table: 'OrderStatus',
          valueColumn: 'Code',
          values: [{ value: 'a' }, { value: '' }, { value: 'a' }],
        }),
      });
      const { diagnostics } = transformer.transform(refine(ORDER_STATUS));

      expect(diagnostics.filter((d) => d.severity === 'error').map((d) => d.kind)).toEqual([
        DIAGNOSTIC_KINDS.CONSTRAINT_ERROR,
        DIAGNOSTIC_KINDS.DUPLICATE_DEFINITION_ERROR,
      ]);
    });

    it('should reject a value set without values', () => {
      const transformer = new ModelTransformer(new TypeMapper(), {
        valueSets: valueSets({ table: 'Empty', valueColumn: 'Code' }),
      });
      const { diagnostics } = transformer.transform(refine('CREATE TABLE Empty (Code INT)'));

      expect(diagnostics.filter((d) => d.severity === 'error').map((d) => d.message)).toEqual([
        'value set dbo.Empty has no values',
      ]);
    });
  });
});

describe('inferAttributeType', () => {
  it('should union the kinds present in a fixed order', () => {
    expect(inferAttributeType([1, 2])).toBe('number');
    expect(inferAttributeType(['x', true, 3])).toBe('boolean | number | string');
    expect(inferAttributeType(['x', null])).toBe('string | null');
    expect(inferAttributeType([null])).toBe('null');
  });
});

describe('parseObjectName', () => {
  it('should apply the default schema and strip quoting', () => {
    expect(parseObjectName('OrderStatus', 'dbo')).toEqual({ schema: 'dbo', name: 'OrderStatus' });
    expect(parseObjectName('[sales].[Order Status]', 'dbo')).toEqual({ schema: 'sales', name: 'Order Status' });
    expect(parseObjectName('"app".Items', 'dbo')).toEqual({ schema: 'app', name: 'Items' });
  });
});
