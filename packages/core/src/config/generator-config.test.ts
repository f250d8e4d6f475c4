/**
 * Generator configuration tests
 */
import { describe, it, expect } from 'vitest';
import { ConfigurationError, ValidationError } from '@schemasmith/shared';
import { parseGeneratorConfig, resolveGeneratorConfig, DEFAULT_ARTIFACT_HEADER } from './generator-config.js';

describe('resolveGeneratorConfig', () => {
  it('should fill in defaults for an empty configuration', () => {
    expect(resolveGeneratorConfig()).toEqual({
      defaultSchema: 'dbo',
      useDefaultTypeMappings: false,
      typeMappings: [],
      valueSets: [],
      output: {
        groupBySchema: true,
        header: DEFAULT_ARTIFACT_HEADER,
        valueSetChunkSize: 500,
        emitValueSetMembers: true,
        emitBarrels: false,
      },
    });
  });

  it('should list every invalid field', () => {
    try {
      resolveGeneratorConfig({ typeMappings: [{ target: 'x' }], output: { valueSetChunkSize: 0 } });
      expect.unreachable('configuration should be rejected');
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.issues).toHaveLength(2);
        expect(error.issues[0]).toMatch(/^typeMappings\.0\.sourceType: /);
        expect(error.issues[1]).toMatch(/^output\.valueSetChunkSize: /);
      }
    }
  });

  it('should reject unknown keys', () => {
    expect(() => resolveGeneratorConfig({ outputs: {} })).toThrow(ValidationError);
  });
});

describe('parseGeneratorConfig', () => {
  it('should read YAML', () => {
    const config = parseGeneratorConfig(`
defaultSchema: app
typeMappings:
  - sourceType: NVARCHAR
    target: string
  - column: Email
    sourceType: NVARCHAR
    target: EmailAddress
    importFrom: ../types/email.js
valueSets:
  - table: app.OrderStatus
    valueColumn: Code
    attributeColumns: [SortOrder]
output:
  groupBySchema: false
`);

    expect(config.defaultSchema).toBe('app');
    expect(config.typeMappings).toEqual([
      { sourceType: 'NVARCHAR', target: 'string', regex: false },
      { column: 'Email', sourceType: 'NVARCHAR', target: 'EmailAddress', regex: false, importFrom: '../types/email.js' },
    ]);
    expect(config.valueSets[0]).toEqual({ table: 'app.OrderStatus', valueColumn: 'Code', attributeColumns: ['SortOrder'] });
    expect(config.output.groupBySchema).toBe(false);
    expect(config.output.emitValueSetMembers).toBe(true);
  });

  it('should read JSON', () => {
    const config = parseGeneratorConfig('{"useDefaultTypeMappings": true}');
    expect(config.useDefaultTypeMappings).toBe(true);
  });

  it('should treat an empty document as the defaults', () => {
    expect(parseGeneratorConfig('').defaultSchema).toBe('dbo');
  });

  it('should raise a configuration error for malformed YAML', () => {
    expect(() => parseGeneratorConfig('valueSets: [unclosed', 'generator.yaml')).toThrow(ConfigurationError);
  });
});
