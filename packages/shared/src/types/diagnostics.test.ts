/**
 * Diagnostics Tests
 */
import { describe, it, expect } from 'vitest';
import {
  DIAGNOSTIC_KINDS,
  createDiagnostic,
  formatDiagnostic,
  hasFatalDiagnostics,
  isFatalKind,
} from './diagnostics.js';

describe('diagnostics', () => {
  it('should derive severity from the kind', () => {
    expect(createDiagnostic(DIAGNOSTIC_KINDS.REFERENCE_ERROR, 'missing').severity).toBe('error');
    expect(createDiagnostic(DIAGNOSTIC_KINDS.UNMAPPED_TYPE, 'unmapped').severity).toBe('warning');
    expect(isFatalKind(DIAGNOSTIC_KINDS.TYPE_RULE_COMPILATION_ERROR)).toBe(false);
    expect(isFatalKind(DIAGNOSTIC_KINDS.CANCELLED)).toBe(false);
  });

  it('should leave out empty details', () => {
    expect(createDiagnostic(DIAGNOSTIC_KINDS.PARSE_ERROR, 'bad', { related: [] })).toEqual({
      kind: 'ParseError',
      severity: 'error',
      message: 'bad',
    });
  });

  it('should detect fatal diagnostics in a list', () => {
    const warning = createDiagnostic(DIAGNOSTIC_KINDS.UNSUPPORTED_STATEMENT, 'skipped');
    const fatal = createDiagnostic(DIAGNOSTIC_KINDS.OUTPUT_COLLISION_ERROR, 'collision');

    expect(hasFatalDiagnostics([warning])).toBe(false);
    expect(hasFatalDiagnostics([warning, fatal])).toBe(true);
  });

  it('should format a diagnostic on one line', () => {
    const diagnostic = createDiagnostic(DIAGNOSTIC_KINDS.PARSE_ERROR, "expected ')'", {
      location: { source: 'schema.sql', line: 3, column: 5 },
    });

    expect(formatDiagnostic(diagnostic)).toBe("schema.sql:3:5 ParseError: expected ')'");
    expect(formatDiagnostic(createDiagnostic(DIAGNOSTIC_KINDS.CANCELLED, 'stopped'))).toBe('Cancelled: stopped');
  });
});
