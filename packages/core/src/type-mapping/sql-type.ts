/**
 * SqlType
 * Parsed form of a column's source type string such as `NVARCHAR(50)`
 */

import type { ColumnDefinition } from '../ingestion/types.js';

const TYPE_TEXT_PATTERN = /^\s*\[?([A-Za-z_][A-Za-z0-9_ ]*?)\]?\s*(?:\(\s*([^()]*?)\s*\))?\s*$/;

export class SqlType {
  /** Placeholder for a missing or unparseable type */
  static readonly UNKNOWN = new SqlType('', []);

  private constructor(
    /** Upper-case base name, e.g. `NVARCHAR`; empty for UNKNOWN */
    readonly name: string,
    readonly parameters: readonly string[]
  ) {}

  /**
   * Build from a base name and parameters. A blank name yields UNKNOWN.
   */
  static of(name: string, parameters: readonly string[] = []): SqlType {
    const normalized = name.trim().replace(/\s+/g, ' ').toUpperCase();
    if (normalized.length === 0) {
      return SqlType.UNKNOWN;
    }
    return new SqlType(
      normalized,
      parameters.map((p) => p.trim().toUpperCase()).filter((p) => p.length > 0)
    );
  }

  /**
   * Parse type text such as `decimal(10, 2)` or `[nvarchar](max)`.
   * Never throws: text that is not a type yields UNKNOWN.
   */
  static parse(text: string): SqlType {
    const match = TYPE_TEXT_PATTERN.exec(text);
    if (!match) {
      return SqlType.UNKNOWN;
    }
    const parameters = match[2] ? match[2].split(',') : [];
    return SqlType.of(match[1] ?? '', parameters);
  }

  static fromColumn(column: Pick<ColumnDefinition, 'sourceType' | 'typeParameters'>): SqlType {
    return SqlType.of(column.sourceType, column.typeParameters);
  }

  get isUnknown(): boolean {
    return this.name.length === 0;
  }

  /**
   * Normalized text, e.g. `DECIMAL(10,2)`
   */
  get text(): string {
    return this.parameters.length > 0 ? `${this.name}(${this.parameters.join(',')})` : this.name;
  }

  toString(): string {
    return this.text;
  }
}
