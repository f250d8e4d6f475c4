/**
 * Custom error hierarchy for SchemaSmith
 *
 * The pipeline core reports problems as diagnostics. These errors are thrown
 * only by the outer layers: configuration loading, file access and the CLI.
 */

import type { Diagnostic } from '../types/diagnostics.js';

export type ErrorCategory =
  | 'VALIDATION'
  | 'CONFIGURATION'
  | 'FILE_SYSTEM'
  | 'GENERATION'
  | 'UNKNOWN';

export type ErrorSeverity = 'LOW' | 'MEDIUM' | 'HIGH' | 'CRITICAL';

export interface ErrorContext {
  category: ErrorCategory;
  severity: ErrorSeverity;
  path?: string;
  [key: string]: unknown;
}

/**
 * Base error class for SchemaSmith
 */
export class SchemaSmithError extends Error {
  public readonly code: string;
  public readonly context: ErrorContext;
  public readonly timestamp: Date;

  constructor(
    message: string,
    code: string,
    context: Partial<ErrorContext> = {}
  ) {
    super(message);
    this.name = 'SchemaSmithError';
    this.code = code;
    this.context = {
      category: context.category ?? 'UNKNOWN',
      severity: context.severity ?? 'MEDIUM',
      ...context,
    };
    this.timestamp = new Date();

    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      timestamp: this.timestamp.toISOString(),
      stack: this.stack,
    };
  }
}

/**
 * Validation errors (malformed configuration values, bad CLI input)
 */
export class ValidationError extends SchemaSmithError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = [], context: Partial<ErrorContext> = {}) {
    super(message, 'E1001', {
      category: 'VALIDATION',
      severity: 'LOW',
      ...context,
    });
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

/**
 * Configuration errors
 */
export class ConfigurationError extends SchemaSmithError {
  constructor(message: string, context: Partial<ErrorContext> = {}) {
    super(message, 'E2001', {
      category: 'CONFIGURATION',
      severity: 'CRITICAL',
      ...context,
    });
    this.name = 'ConfigurationError';
  }
}

/**
 * Reading schema sources or writing artifacts failed
 */
export class FileSystemError extends SchemaSmithError {
  constructor(message: string, path: string, context: Partial<ErrorContext> = {}) {
    super(message, 'E3001', {
      category: 'FILE_SYSTEM',
      severity: 'HIGH',
      path,
      ...context,
    });
    this.name = 'FileSystemError';
  }
}

/**
 * A generation run finished with fatal diagnostics
 */
export class GenerationError extends SchemaSmithError {
  public readonly diagnostics: readonly Diagnostic[];

  constructor(diagnostics: readonly Diagnostic[], context: Partial<ErrorContext> = {}) {
    const fatalCount = diagnostics.filter((d) => d.severity === 'error').length;
    super(`Generation failed with ${fatalCount} error(s)`, 'E4001', {
      category: 'GENERATION',
      severity: 'HIGH',
      ...context,
    });
    this.name = 'GenerationError';
    this.diagnostics = diagnostics;
  }
}

/**
 * Helper to wrap unknown errors
 */
export function wrapError(error: unknown, context: Partial<ErrorContext> = {}): SchemaSmithError {
  if (error instanceof SchemaSmithError) {
    return error;
  }

  if (error instanceof Error) {
    return new SchemaSmithError(error.message, 'E9999', {
      category: 'UNKNOWN',
      severity: 'MEDIUM',
      originalError: error.name,
      ...context,
    });
  }

  return new SchemaSmithError(String(error), 'E9999', {
    category: 'UNKNOWN',
    severity: 'MEDIUM',
    ...context,
  });
}
