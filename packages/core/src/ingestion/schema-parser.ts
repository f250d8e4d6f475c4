/**
 * Schema Parser
 * Recursive-descent parser for SQL Server flavoured DDL. Each statement is
 * parsed on its own; a malformed statement is reported and skipped so the
 * rest of the source still yields a model.
 */

import {
  createDiagnostic,
  DIAGNOSTIC_KINDS,
  type Diagnostic,
  type DiagnosticKind,
  type SchemaSource,
  type SourceLocation,
} from '@schemasmith/shared';
import { tokenize, type Token } from './sql-tokenizer.js';
import type {
  ColumnDefinition,
  ForeignKeyReference,
  IndexDefinition,
  LiteralValue,
  QualifiedName,
  RawSchemaModel,
  SchemaIngestorConfig,
  SeedRow,
  TableDefinition,
} from './types.js';

class SqlSyntaxError extends Error {
  constructor(message: string, readonly token: Token) {
    super(message);
    this.name = 'SqlSyntaxError';
  }
}

type TableConstraint =
  | { kind: 'index'; index: IndexDefinition }
  | {
      kind: 'foreignKey';
      name: string;
      columns: string[];
      referencedTable: QualifiedName;
      referencedColumns: string[];
      location: SourceLocation;
    }
  | { kind: 'other' };

const STATEMENT_KEYWORDS = new Set(['CREATE', 'ALTER', 'INSERT']);

// Statements with no schema meaning, skipped without a warning
const IGNORED_STATEMENTS = new Set([
  'SET', 'USE', 'PRINT', 'GRANT', 'DENY', 'REVOKE', 'EXEC', 'EXECUTE',
  'DECLARE', 'BEGIN', 'COMMIT', 'ROLLBACK', 'DROP',
]);

// CREATE statements whose bodies may hold further statements; skipped to the next batch
const BATCH_BODIED_OBJECTS = new Set(['PROCEDURE', 'PROC', 'FUNCTION', 'TRIGGER']);

const COLUMN_FLAG_WORDS = new Set(['ROWGUIDCOL', 'SPARSE', 'FILESTREAM', 'PERSISTED', 'HIDDEN', 'ASC', 'DESC']);

const GENERATED_COLUMN_WORDS = new Set([
  'ALWAYS', 'AS', 'ROW', 'START', 'END', 'TRANSACTION_ID', 'SEQUENCE_NUMBER', 'HIDDEN',
]);

// Words that cannot start a data type, so a column missing one is caught
const NON_TYPE_WORDS = new Set([
  'NOT', 'NULL', 'PRIMARY', 'CONSTRAINT', 'DEFAULT', 'IDENTITY', 'UNIQUE',
  'REFERENCES', 'CHECK', 'FOREIGN', 'COLLATE',
]);

export interface ParseSourceResult {
  model: RawSchemaModel;
  diagnostics: Diagnostic[];
}

export function parseSchemaSource(source: SchemaSource, config: SchemaIngestorConfig): ParseSourceResult {
  return new SchemaParser(source, config).parse();
}

class SchemaParser {
  private readonly tokens: Token[];
  private pos = 0;
  private readonly diagnostics: Diagnostic[] = [];
  private readonly model: RawSchemaModel;

  constructor(
    private readonly source: SchemaSource,
    private readonly config: SchemaIngestorConfig
  ) {
    const { tokens, issues } = tokenize(source.text);
    this.tokens = tokens;
    this.model = {
      sourceName: source.name,
      tables: [],
      views: [],
      indexes: [],
      foreignKeys: [],
      seedRows: [],
    };

    for (const issue of issues) {
      this.diagnostics.push(
        createDiagnostic(DIAGNOSTIC_KINDS.PARSE_ERROR, issue.message, {
          location: { source: source.name, line: issue.line, column: issue.column },
        })
      );
    }
  }

  parse(): ParseSourceResult {
    while (this.peek().kind !== 'eof') {
      const statementStart = this.pos;
      try {
        this.parseStatement();
      } catch (error) {
        if (!(error instanceof SqlSyntaxError)) throw error;
        this.report(DIAGNOSTIC_KINDS.PARSE_ERROR, error.message, error.token);
        this.recover(statementStart);
      }
    }

    return { model: this.model, diagnostics: this.diagnostics };
  }

  // ===========================================
  // Statements
  // ===========================================

  private parseStatement(): void {
    const token = this.peek();

    if (this.isSymbol(token, ';')) {
      this.pos++;
      return;
    }

    if (this.isBatchSeparator(token)) {
      this.pos++;
      // GO <count>
      const count = this.peek();
      if (count.kind === 'number' && count.line === token.line) this.pos++;
      return;
    }

    if (token.kind === 'word') {
      switch (token.upper) {
        case 'CREATE':
          this.parseCreate();
          return;
        case 'ALTER':
          this.parseAlter();
          return;
        case 'INSERT':
          this.parseInsert();
          return;
        default:
          if (IGNORED_STATEMENTS.has(token.upper)) {
            this.skipStatement();
            return;
          }
      }
    }

    this.warnUnsupported(token, token.text || 'statement');
    this.skipStatement();
  }

  private parseCreate(): void {
    const createToken = this.next();
    if (this.acceptWord('OR')) {
      this.expectWord('ALTER');
    }

    const kind = this.peek();
    if (this.acceptWord('TABLE')) {
      this.parseCreateTable(createToken);
    } else if (this.acceptWord('VIEW')) {
      this.parseCreateView(createToken);
    } else if (this.atWord('UNIQUE', 'CLUSTERED', 'NONCLUSTERED', 'INDEX')) {
      this.parseCreateIndex(createToken);
    } else if (this.atWord('SCHEMA')) {
      this.skipRest();
    } else if (kind.kind === 'word' && BATCH_BODIED_OBJECTS.has(kind.upper)) {
      this.warnUnsupported(createToken, `CREATE ${kind.upper}`);
      this.skipBatch();
    } else {
      this.warnUnsupported(createToken, `CREATE ${kind.text}`);
      this.skipRest();
    }
  }

  private parseCreateTable(createToken: Token): void {
    const qualifiedName = this.qualifiedName();
    const table: TableDefinition = {
      qualifiedName,
      columns: [],
      indexes: [],
      foreignKeys: [],
      location: this.location(createToken),
    };

    this.expectSymbol('(');
    do {
      // Trailing comma before the closing parenthesis
      if (this.atSymbol(')')) break;
      this.parseTableElement(table);
    } while (this.acceptSymbol(','));
    this.expectSymbol(')');

    // ON [PRIMARY], WITH (...), TEXTIMAGE_ON ...
    this.skipRest();

    for (const index of table.indexes) {
      if (!index.isPrimaryKey) continue;
      for (const columnName of index.columns) {
        const column = findColumn(table, columnName);
        if (column) {
          column.isPrimaryKey = true;
          column.nullable = false;
        }
      }
    }

    this.model.tables.push(table);
  }

  private parseTableElement(table: TableDefinition): void {
    const token = this.peek();

    if (this.acceptWord('CONSTRAINT')) {
      const name = this.identifier('constraint name');
      this.applyTableConstraint(table, this.parseTableConstraint(table.qualifiedName, name, token));
      return;
    }

    if (this.atWord('PRIMARY', 'UNIQUE', 'FOREIGN', 'CHECK', 'INDEX')) {
      this.applyTableConstraint(table, this.parseTableConstraint(table.qualifiedName, undefined, token));
      return;
    }

    if (this.acceptWord('PERIOD')) {
      this.skipElementTail();
      return;
    }

    this.parseColumn(table);
  }

  private applyTableConstraint(table: TableDefinition, constraint: TableConstraint): void {
    if (constraint.kind === 'index') {
      table.indexes.push(constraint.index);
    } else if (constraint.kind === 'foreignKey') {
      table.foreignKeys.push(...expandForeignKey(table.qualifiedName, constraint));
    }
  }

  private parseColumn(table: TableDefinition): void {
    const nameToken = this.peek();
    const name = this.identifier('column name');
    const location = this.location(nameToken);
    const tableName = table.qualifiedName;

    let sourceType = '';
    let typeParameters: string[] = [];
    let explicitNullable: boolean | undefined;
    let isPrimaryKey = false;
    let isIdentity = false;
    let defaultExpression: string | undefined;
    let constraintName: string | undefined;

    if (this.acceptWord('AS')) {
      // Computed column: the expression carries no declared type
      this.skipElementTail();
    } else {
      ({ sourceType, typeParameters } = this.dataType(name));
    }

    for (;;) {
      const token = this.peek();
      if (token.kind === 'eof' || this.isSymbol(token, ',') || this.isSymbol(token, ')') || this.isSymbol(token, ';')) {
        break;
      }
      if (token.kind !== 'word') {
        throw new SqlSyntaxError(`unexpected '${token.text}' in definition of column '${name}'`, token);
      }

      switch (token.upper) {
        case 'NULL':
          this.next();
          explicitNullable = true;
          break;
        case 'NOT':
          this.next();
          if (this.acceptWord('NULL')) {
            explicitNullable = false;
          } else {
            this.expectWord('FOR');
            this.expectWord('REPLICATION');
          }
          break;
        case 'IDENTITY':
          this.next();
          isIdentity = true;
          if (this.atSymbol('(')) this.skipParenthesized();
          break;
        case 'PRIMARY': {
          this.next();
          this.expectWord('KEY');
          isPrimaryKey = true;
          const isClustered = this.clusteredOption(true);
          this.acceptWord('ASC', 'DESC');
          table.indexes.push({
            name: constraintName ?? `PK_${tableName.name}`,
            isUnique: true,
            isClustered,
            isPrimaryKey: true,
            columns: [name],
            includedColumns: [],
            location: this.location(token),
          });
          constraintName = undefined;
          break;
        }
        case 'UNIQUE': {
          this.next();
          const isClustered = this.clusteredOption(false);
          table.indexes.push({
            name: constraintName ?? `UQ_${tableName.name}_${name}`,
            isUnique: true,
            isClustered,
            isPrimaryKey: false,
            columns: [name],
            includedColumns: [],
            location: this.location(token),
          });
          constraintName = undefined;
          break;
        }
        case 'DEFAULT':
          this.next();
          defaultExpression = this.expressionText();
          constraintName = undefined;
          break;
        case 'CONSTRAINT':
          this.next();
          constraintName = this.identifier('constraint name');
          break;
        case 'FOREIGN':
          this.next();
          this.expectWord('KEY');
          this.expectWord('REFERENCES');
          table.foreignKeys.push(this.columnReference(tableName, name, constraintName, token));
          constraintName = undefined;
          break;
        case 'REFERENCES':
          this.next();
          table.foreignKeys.push(this.columnReference(tableName, name, constraintName, token));
          constraintName = undefined;
          break;
        case 'CHECK':
          this.next();
          this.acceptNotForReplication();
          this.skipParenthesized();
          constraintName = undefined;
          break;
        case 'COLLATE':
          this.next();
          this.identifier('collation name');
          break;
        case 'GENERATED':
          this.next();
          while (this.peek().kind === 'word' && GENERATED_COLUMN_WORDS.has(this.peek().upper)) this.next();
          break;
        case 'MASKED':
          this.next();
          this.expectWord('WITH');
          this.skipParenthesized();
          break;
        case 'INDEX': {
          this.next();
          const indexName = this.identifier('index name');
          const isUnique = this.acceptWord('UNIQUE');
          const isClustered = this.clusteredOption(false);
          table.indexes.push({
            name: indexName,
            isUnique,
            isClustered,
            isPrimaryKey: false,
            columns: [name],
            includedColumns: [],
            location: this.location(token),
          });
          break;
        }
        default:
          if (COLUMN_FLAG_WORDS.has(token.upper)) {
            this.next();
            break;
          }
          throw new SqlSyntaxError(`unexpected '${token.text}' in definition of column '${name}'`, token);
      }
    }

    if (findColumn(table, name)) {
      this.report(
        DIAGNOSTIC_KINDS.PARSE_ERROR,
        `duplicate column '${name}' in table ${tableName.schema}.${tableName.name}`,
        nameToken
      );
      return;
    }

    const column: ColumnDefinition = {
      name,
      sourceType,
      typeParameters,
      nullable: explicitNullable ?? !(isPrimaryKey || isIdentity),
      isPrimaryKey,
      isIdentity,
      ordinal: table.columns.length,
      location,
    };
    if (defaultExpression !== undefined) column.defaultExpression = defaultExpression;
    table.columns.push(column);
  }

  private dataType(columnName: string): { sourceType: string; typeParameters: string[] } {
    const token = this.peek();
    const isTypeToken =
      (token.kind === 'word' && !NON_TYPE_WORDS.has(token.upper)) || token.kind === 'quoted';
    if (!isTypeToken) {
      throw new SqlSyntaxError(`expected data type for column '${columnName}'`, token);
    }

    // sys.nvarchar, dbo.CustomType: the last part names the type
    let typeName = this.identifier('data type');
    while (this.acceptSymbol('.')) {
      typeName = this.identifier('data type');
    }
    if (this.atWord('VARYING', 'PRECISION')) {
      typeName = `${typeName} ${this.next().text}`;
    }

    const typeParameters: string[] = [];
    if (this.acceptSymbol('(')) {
      while (!this.atSymbol(')')) {
        const param = this.next();
        if (param.kind === 'number' || param.kind === 'word') {
          typeParameters.push(param.kind === 'word' ? param.upper : param.text);
        } else if (this.isSymbol(param, '-') && this.peek().kind === 'number') {
          typeParameters.push(`-${this.next().text}`);
        } else {
          throw new SqlSyntaxError(`unexpected '${param.text || 'end of input'}' in type parameters of column '${columnName}'`, param);
        }
        if (!this.acceptSymbol(',')) break;
      }
      this.expectSymbol(')');
    }

    return { sourceType: typeName.toUpperCase(), typeParameters };
  }

  private columnReference(
    table: QualifiedName,
    column: string,
    constraintName: string | undefined,
    token: Token
  ): ForeignKeyReference {
    const referencedTable = this.qualifiedName();
    const referencedColumns = this.atSymbol('(') ? this.columnList() : [];
    if (referencedColumns.length > 1) {
      throw new SqlSyntaxError(`column '${column}' cannot reference ${referencedColumns.length} columns`, token);
    }
    this.referentialActions();
    this.acceptNotForReplication();

    return {
      name: constraintName ?? `FK_${table.name}_${column}`,
      table,
      column,
      referencedTable,
      // Empty: the referenced table's primary key, resolved by the refiner
      referencedColumn: referencedColumns[0] ?? '',
      position: 0,
      location: this.location(token),
    };
  }

  private parseTableConstraint(table: QualifiedName, name: string | undefined, startToken: Token): TableConstraint {
    const token = this.peek();
    const location = this.location(startToken);

    if (this.acceptWord('PRIMARY')) {
      this.expectWord('KEY');
      const isClustered = this.clusteredOption(true);
      const columns = this.columnList();
      this.skipElementTail();
      return {
        kind: 'index',
        index: {
          name: name ?? `PK_${table.name}`,
          isUnique: true,
          isClustered,
          isPrimaryKey: true,
          columns,
          includedColumns: [],
          location,
        },
      };
    }

    if (this.acceptWord('UNIQUE')) {
      const isClustered = this.clusteredOption(false);
      const columns = this.columnList();
      this.skipElementTail();
      return {
        kind: 'index',
        index: {
          name: name ?? `UQ_${table.name}_${columns.join('_')}`,
          isUnique: true,
          isClustered,
          isPrimaryKey: false,
          columns,
          includedColumns: [],
          location,
        },
      };
    }

    if (this.acceptWord('INDEX')) {
      const indexName = name ?? this.identifier('index name');
      const isUnique = this.acceptWord('UNIQUE');
      const isClustered = this.clusteredOption(false);
      const columns = this.columnList();
      const includedColumns = this.acceptWord('INCLUDE') ? this.columnList() : [];
      this.skipElementTail();
      return {
        kind: 'index',
        index: { name: indexName, isUnique, isClustered, isPrimaryKey: false, columns, includedColumns, location },
      };
    }

    if (this.acceptWord('FOREIGN')) {
      this.expectWord('KEY');
      const columns = this.columnList();
      this.expectWord('REFERENCES');
      const referencedTable = this.qualifiedName();
      const referencedColumns = this.atSymbol('(') ? this.columnList() : [];
      if (referencedColumns.length > 0 && referencedColumns.length !== columns.length) {
        throw new SqlSyntaxError(
          `foreign key lists ${columns.length} column(s) but references ${referencedColumns.length}`,
          token
        );
      }
      this.referentialActions();
      this.skipElementTail();
      return {
        kind: 'foreignKey',
        name: name ?? `FK_${table.name}_${columns.join('_')}`,
        columns,
        referencedTable,
        referencedColumns,
        location,
      };
    }

    if (this.acceptWord('CHECK')) {
      this.acceptNotForReplication();
      this.skipParenthesized();
      this.skipElementTail();
      return { kind: 'other' };
    }

    if (this.acceptWord('DEFAULT')) {
      this.expressionText();
      this.expectWord('FOR');
      this.identifier('column name');
      this.skipElementTail();
      return { kind: 'other' };
    }

    throw new SqlSyntaxError(`expected table constraint but found '${token.text || 'end of input'}'`, token);
  }

  private parseCreateView(createToken: Token): void {
    const qualifiedName = this.qualifiedName();
    const columns = this.atSymbol('(') ? this.columnList() : [];

    // WITH SCHEMABINDING, VIEW_METADATA ...
    if (this.acceptWord('WITH')) {
      while (this.peek().kind !== 'eof' && !this.atWord('AS')) this.next();
    }
    const asToken = this.peek();
    this.expectWord('AS');

    const bodyStart = this.peek().start;
    let bodyEnd = bodyStart;
    let depth = 0;
    for (;;) {
      const token = this.peek();
      if (token.kind === 'eof') break;
      if (depth === 0 && (this.isSymbol(token, ';') || this.isBatchSeparator(token) || this.isStatementStart(token))) {
        break;
      }
      if (this.isSymbol(token, '(')) depth++;
      if (this.isSymbol(token, ')')) depth = Math.max(0, depth - 1);
      bodyEnd = token.end;
      this.pos++;
    }
    this.acceptSymbol(';');

    const query = this.source.text.slice(bodyStart, bodyEnd).trim();
    if (query.length === 0) {
      throw new SqlSyntaxError(`view ${qualifiedName.schema}.${qualifiedName.name} has no query`, asToken);
    }

    this.model.views.push({ qualifiedName, query, columns, location: this.location(createToken) });
  }

  private parseCreateIndex(createToken: Token): void {
    const isUnique = this.acceptWord('UNIQUE');
    const isClustered = this.clusteredOption(false);

    if (this.atWord('COLUMNSTORE', 'XML', 'SPATIAL', 'FULLTEXT')) {
      this.warnUnsupported(createToken, `CREATE ${this.peek().upper} INDEX`);
      this.skipRest();
      return;
    }

    this.expectWord('INDEX');
    const name = this.identifier('index name');
    this.expectWord('ON');
    const table = this.qualifiedName();
    const columns = this.columnList();
    const includedColumns = this.acceptWord('INCLUDE') ? this.columnList() : [];

    // WHERE filter, WITH (...), ON filegroup
    this.skipRest();

    this.model.indexes.push({
      table,
      index: {
        name,
        isUnique,
        isClustered,
        isPrimaryKey: false,
        columns,
        includedColumns,
        location: this.location(createToken),
      },
    });
  }

  private parseAlter(): void {
    const alterToken = this.next();
    if (!this.acceptWord('TABLE')) {
      this.warnUnsupported(alterToken, `ALTER ${this.peek().text}`);
      this.skipRest();
      return;
    }

    const table = this.qualifiedName();
    if (this.acceptWord('WITH')) {
      this.acceptWord('CHECK', 'NOCHECK');
    }
    if (!this.acceptWord('ADD')) {
      this.warnUnsupported(alterToken, `ALTER TABLE ... ${this.peek().text}`);
      this.skipRest();
      return;
    }

    do {
      const token = this.peek();
      const name = this.acceptWord('CONSTRAINT') ? this.identifier('constraint name') : undefined;
      if (!this.atWord('PRIMARY', 'UNIQUE', 'FOREIGN', 'CHECK', 'DEFAULT')) {
        this.warnUnsupported(alterToken, 'ALTER TABLE ... ADD column');
        this.skipRest();
        return;
      }

      const constraint = this.parseTableConstraint(table, name, token);
      if (constraint.kind === 'index') {
        this.model.indexes.push({ table, index: constraint.index });
      } else if (constraint.kind === 'foreignKey') {
        this.model.foreignKeys.push(...expandForeignKey(table, constraint));
      }
    } while (this.acceptSymbol(','));

    this.skipRest();
  }

  private parseInsert(): void {
    const insertToken = this.next();
    this.acceptWord('INTO');
    const table = this.qualifiedName();

    if (!this.atSymbol('(')) {
      this.warnUnsupported(insertToken, 'INSERT without a column list');
      this.skipRest();
      return;
    }
    const columns = this.columnList();

    if (!this.acceptWord('VALUES')) {
      this.warnUnsupported(insertToken, 'INSERT ... SELECT');
      this.skipRest();
      return;
    }

    const rows: SeedRow[] = [];
    do {
      const rowToken = this.peek();
      this.expectSymbol('(');
      const values: LiteralValue[] = [];
      do {
        const value = this.literal();
        if (value === undefined) {
          this.warnUnsupported(insertToken, 'INSERT with non-literal values');
          this.skipRest();
          return;
        }
        values.push(value);
      } while (this.acceptSymbol(','));
      this.expectSymbol(')');

      if (values.length !== columns.length) {
        throw new SqlSyntaxError(
          `row has ${values.length} value(s) but ${columns.length} column(s) were listed`,
          rowToken
        );
      }

      const record: Record<string, LiteralValue> = {};
      columns.forEach((column, i) => {
        record[column] = values[i] ?? null;
      });
      rows.push({ table, values: record, location: this.location(rowToken) });
    } while (this.acceptSymbol(','));

    this.skipRest();
    this.model.seedRows.push(...rows);
  }

  // ===========================================
  // Clause Helpers
  // ===========================================

  private qualifiedName(): QualifiedName {
    const parts = [this.identifier('object name')];
    while (this.acceptSymbol('.')) {
      parts.push(this.identifier('object name'));
    }
    const name = parts[parts.length - 1] ?? '';
    const schema = parts.length >= 2 ? (parts[parts.length - 2] ?? '') : this.config.defaultSchema;
    return { schema, name };
  }

  private columnList(): string[] {
    const open = this.peek();
    this.expectSymbol('(');
    const columns: string[] = [];
    while (!this.atSymbol(')')) {
      columns.push(this.identifier('column name'));
      this.acceptWord('ASC', 'DESC');
      if (!this.acceptSymbol(',')) break;
    }
    this.expectSymbol(')');
    if (columns.length === 0) {
      throw new SqlSyntaxError('column list must name at least one column', open);
    }
    return columns;
  }

  private clusteredOption(defaultValue: boolean): boolean {
    if (this.acceptWord('CLUSTERED')) return true;
    if (this.acceptWord('NONCLUSTERED')) return false;
    return defaultValue;
  }

  private referentialActions(): void {
    while (this.atWord('ON') && ['DELETE', 'UPDATE'].includes(this.peek(1).upper)) {
      this.next();
      this.next();
      if (this.acceptWord('NO')) {
        this.expectWord('ACTION');
      } else if (this.acceptWord('SET')) {
        if (!this.acceptWord('NULL', 'DEFAULT')) {
          throw new SqlSyntaxError(`expected NULL or DEFAULT but found '${this.peek().text}'`, this.peek());
        }
      } else if (!this.acceptWord('CASCADE', 'RESTRICT')) {
        throw new SqlSyntaxError(`expected referential action but found '${this.peek().text}'`, this.peek());
      }
    }
  }

  private acceptNotForReplication(): void {
    if (this.atWord('NOT') && this.peek(1).upper === 'FOR') {
      this.next();
      this.next();
      this.expectWord('REPLICATION');
    }
  }

  /**
   * Source text of a DEFAULT expression: a parenthesized group, a signed
   * literal, or a literal/function call
   */
  private expressionText(): string {
    const first = this.peek();
    if (this.atSymbol('(')) {
      this.skipParenthesized();
    } else if (this.isSymbol(first, '-') || this.isSymbol(first, '+')) {
      this.next();
      this.next();
    } else if (first.kind === 'eof' || first.kind === 'symbol') {
      throw new SqlSyntaxError(`expected expression but found '${first.text || 'end of input'}'`, first);
    } else {
      this.next();
      if (this.atSymbol('(')) this.skipParenthesized();
    }
    const last = this.tokens[this.pos - 1] ?? first;
    return this.source.text.slice(first.start, last.end);
  }

  private literal(): LiteralValue | undefined {
    const token = this.peek();
    if (token.kind === 'string') {
      this.next();
      return token.text;
    }
    if (token.kind === 'number') {
      this.next();
      return Number(token.text);
    }
    if ((this.isSymbol(token, '-') || this.isSymbol(token, '+')) && this.peek(1).kind === 'number') {
      this.next();
      const value = Number(this.next().text);
      return token.text === '-' ? -value : value;
    }
    if (this.acceptWord('NULL')) return null;
    if (this.acceptWord('TRUE')) return true;
    if (this.acceptWord('FALSE')) return false;
    return undefined;
  }

  // ===========================================
  // Skipping and Recovery
  // ===========================================

  private skipParenthesized(): void {
    const open = this.peek();
    this.expectSymbol('(');
    let depth = 1;
    while (depth > 0) {
      const token = this.next();
      if (token.kind === 'eof') {
        throw new SqlSyntaxError("unbalanced '('", open);
      }
      if (this.isSymbol(token, '(')) depth++;
      if (this.isSymbol(token, ')')) depth--;
    }
  }

  /**
   * Skip to the end of the current table element: the next `,` or `)` at
   * depth 0, without consuming it
   */
  private skipElementTail(): void {
    let depth = 0;
    for (;;) {
      const token = this.peek();
      if (token.kind === 'eof') return;
      if (depth === 0) {
        if (this.isSymbol(token, ',') || this.isSymbol(token, ')') || this.isSymbol(token, ';')) return;
        if (this.isBatchSeparator(token) || this.isStatementStart(token)) return;
      }
      if (this.isSymbol(token, '(')) depth++;
      if (this.isSymbol(token, ')')) depth--;
      this.pos++;
    }
  }

  /**
   * Skip to the end of the current statement, consuming a terminating `;`
   * but stopping before a batch separator or the next statement
   */
  private skipRest(): void {
    let depth = 0;
    for (;;) {
      const token = this.peek();
      if (token.kind === 'eof') return;
      if (depth === 0) {
        if (this.isSymbol(token, ';')) {
          this.pos++;
          return;
        }
        if (this.isBatchSeparator(token) || this.isStatementStart(token)) return;
      }
      if (this.isSymbol(token, '(')) depth++;
      if (this.isSymbol(token, ')')) depth = Math.max(0, depth - 1);
      this.pos++;
    }
  }

  /**
   * Skip a whole statement starting at its first token
   */
  private skipStatement(): void {
    if (!this.isSymbol(this.peek(), ';')) this.next();
    this.skipRest();
  }

  private skipBatch(): void {
    while (this.peek().kind !== 'eof' && !this.isBatchSeparator(this.peek())) {
      this.pos++;
    }
  }

  private recover(statementStart: number): void {
    const token = this.peek();
    const resumeHere =
      this.pos > statementStart && (this.isStatementStart(token) || this.isBatchSeparator(token));
    if (!resumeHere) {
      this.skipRest();
    }
    if (this.pos === statementStart) {
      this.pos++;
    }
  }

  // ===========================================
  // Token Helpers
  // ===========================================

  private peek(offset = 0): Token {
    const index = Math.min(this.pos + offset, this.tokens.length - 1);
    const token = this.tokens[index];
    if (!token) {
      throw new Error('token stream is empty');
    }
    return token;
  }

  private next(): Token {
    const token = this.peek();
    if (token.kind !== 'eof') this.pos++;
    return token;
  }

  private isSymbol(token: Token, symbol: string): boolean {
    return token.kind === 'symbol' && token.text === symbol;
  }

  private isBatchSeparator(token: Token): boolean {
    return token.kind === 'word' && token.upper === 'GO' && token.firstOnLine;
  }

  private isStatementStart(token: Token): boolean {
    return token.kind === 'word' && STATEMENT_KEYWORDS.has(token.upper);
  }

  private atWord(...words: string[]): boolean {
    const token = this.peek();
    return token.kind === 'word' && words.includes(token.upper);
  }

  private acceptWord(...words: string[]): boolean {
    if (this.atWord(...words)) {
      this.pos++;
      return true;
    }
    return false;
  }

  private expectWord(word: string): void {
    if (!this.acceptWord(word)) {
      const token = this.peek();
      throw new SqlSyntaxError(`expected '${word}' but found '${token.text || 'end of input'}'`, token);
    }
  }

  private atSymbol(symbol: string): boolean {
    return this.isSymbol(this.peek(), symbol);
  }

  private acceptSymbol(symbol: string): boolean {
    if (this.atSymbol(symbol)) {
      this.pos++;
      return true;
    }
    return false;
  }

  private expectSymbol(symbol: string): void {
    if (!this.acceptSymbol(symbol)) {
      const token = this.peek();
      throw new SqlSyntaxError(`expected '${symbol}' but found '${token.text || 'end of input'}'`, token);
    }
  }

  private identifier(what: string): string {
    const token = this.peek();
    if (token.kind === 'word' || token.kind === 'quoted') {
      this.pos++;
      return token.text;
    }
    throw new SqlSyntaxError(`expected ${what} but found '${token.text || 'end of input'}'`, token);
  }

  private location(token: Token): SourceLocation {
    return { source: this.source.name, line: token.line, column: token.column };
  }

  private report(kind: DiagnosticKind, message: string, token: Token): void {
    this.diagnostics.push(createDiagnostic(kind, message, { location: this.location(token) }));
  }

  private warnUnsupported(token: Token, what: string): void {
    this.report(DIAGNOSTIC_KINDS.UNSUPPORTED_STATEMENT, `skipped unsupported statement: ${what}`, token);
  }
}

function findColumn(table: TableDefinition, name: string): ColumnDefinition | undefined {
  const lower = name.toLowerCase();
  return table.columns.find((c) => c.name.toLowerCase() === lower);
}

function expandForeignKey(
  table: QualifiedName,
  constraint: Extract<TableConstraint, { kind: 'foreignKey' }>
): ForeignKeyReference[] {
  return constraint.columns.map((column, i) => ({
    name: constraint.name,
    table,
    column,
    referencedTable: constraint.referencedTable,
    referencedColumn: constraint.referencedColumns[i] ?? '',
    position: i,
    location: constraint.location,
  }));
}
