/**
 * Ingestion Layer
 * Tokenizes and parses schema sources into raw models
 */

export * from './types.js';
export { SchemaIngestor } from './schema-ingestor.js';
export { parseSchemaSource } from './schema-parser.js';
export type { ParseSourceResult } from './schema-parser.js';
export { tokenize } from './sql-tokenizer.js';
export type { Token, TokenKind, TokenizeResult, TokenizerIssue } from './sql-tokenizer.js';
