/**
 * Diagnostic types shared by the generation pipeline and its callers
 */

/**
 * Every kind of diagnostic the pipeline can report.
 * Kinds ending in `Error` are fatal except TypeRuleCompilationError,
 * which only excludes the offending rule.
 */
export const DIAGNOSTIC_KINDS = {
  PARSE_ERROR: 'ParseError',
  DUPLICATE_DEFINITION_ERROR: 'DuplicateDefinitionError',
  REFERENCE_ERROR: 'ReferenceError',
  CONSTRAINT_ERROR: 'ConstraintError',
  TYPE_RULE_COMPILATION_ERROR: 'TypeRuleCompilationError',
  OUTPUT_COLLISION_ERROR: 'OutputCollisionError',
  EMIT_ERROR: 'EmitError',
  UNMAPPED_TYPE: 'UnmappedType',
  UNSUPPORTED_STATEMENT: 'UnsupportedStatement',
  CANCELLED: 'Cancelled',
} as const;

export type DiagnosticKind = (typeof DIAGNOSTIC_KINDS)[keyof typeof DIAGNOSTIC_KINDS];

export type DiagnosticSeverity = 'error' | 'warning';

const FATAL_KINDS: ReadonlySet<DiagnosticKind> = new Set<DiagnosticKind>([
  DIAGNOSTIC_KINDS.PARSE_ERROR,
  DIAGNOSTIC_KINDS.DUPLICATE_DEFINITION_ERROR,
  DIAGNOSTIC_KINDS.REFERENCE_ERROR,
  DIAGNOSTIC_KINDS.CONSTRAINT_ERROR,
  DIAGNOSTIC_KINDS.OUTPUT_COLLISION_ERROR,
  DIAGNOSTIC_KINDS.EMIT_ERROR,
]);

/**
 * Position inside one schema source (1-based)
 */
export interface SourceLocation {
  source: string;
  line: number;
  column: number;
}

export interface Diagnostic {
  kind: DiagnosticKind;
  severity: DiagnosticSeverity;
  message: string;
  location?: SourceLocation;
  /** Object the diagnostic is about, e.g. `dbo.Orders` */
  subject?: string;
  /** Other objects implicated, e.g. the second entity in a collision */
  related?: string[];
}

export function isFatalKind(kind: DiagnosticKind): boolean {
  return FATAL_KINDS.has(kind);
}

/**
 * Build a diagnostic whose severity follows from its kind
 */
export function createDiagnostic(
  kind: DiagnosticKind,
  message: string,
  details: Pick<Diagnostic, 'location' | 'subject' | 'related'> = {}
): Diagnostic {
  const diagnostic: Diagnostic = {
    kind,
    severity: isFatalKind(kind) ? 'error' : 'warning',
    message,
  };
  if (details.location) diagnostic.location = details.location;
  if (details.subject !== undefined) diagnostic.subject = details.subject;
  if (details.related && details.related.length > 0) diagnostic.related = details.related;
  return diagnostic;
}

export function hasFatalDiagnostics(diagnostics: readonly Diagnostic[]): boolean {
  return diagnostics.some((d) => isFatalKind(d.kind));
}

export function formatLocation(location: SourceLocation): string {
  return `${location.source}:${location.line}:${location.column}`;
}

/**
 * Render a diagnostic as a single line, e.g.
 * `schema.sql:3:5 ParseError: expected ')'`
 */
export function formatDiagnostic(diagnostic: Diagnostic): string {
  const where = diagnostic.location ? `${formatLocation(diagnostic.location)} ` : '';
  return `${where}${diagnostic.kind}: ${diagnostic.message}`;
}
