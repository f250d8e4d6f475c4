/**
 * SQL Tokenizer Tests
 */
import { describe, it, expect } from 'vitest';
import { tokenize } from './sql-tokenizer.js';

describe('tokenize', () => {
  it('should classify words, identifiers, strings, numbers and symbols', () => {
    const { tokens, issues } = tokenize("SELECT [Order Id], \"x\", N'it''s', 12.5, 0x1F <> 3");

    expect(issues).toEqual([]);
    expect(tokens.map((t) => [t.kind, t.text])).toEqual([
      ['word', 'SELECT'],
      ['quoted', 'Order Id'],
      ['symbol', ','],
      ['quoted', 'x'],
      ['symbol', ','],
      ['string', "it's"],
      ['symbol', ','],
      ['number', '12.5'],
      ['symbol', ','],
      ['number', '0x1F'],
      ['symbol', '<>'],
      ['number', '3'],
      ['eof', ''],
    ]);
  });

  it('should skip line and nested block comments', () => {
    const { tokens } = tokenize('a -- note\n/* outer /* inner */ still */ b');
    expect(tokens.map((t) => t.text)).toEqual(['a', 'b', '']);
  });

  it('should track lines, columns and the first token on each line', () => {
    const { tokens } = tokenize('CREATE TABLE t\n  GO x');
    const go = tokens[3];
    const x = tokens[4];

    expect(go?.text).toBe('GO');
    expect(go?.line).toBe(2);
    expect(go?.column).toBe(3);
    expect(go?.firstOnLine).toBe(true);
    expect(x?.firstOnLine).toBe(false);
    expect(tokens[1]?.firstOnLine).toBe(false);
  });

  it('should report unterminated constructs', () => {
    expect(tokenize("'open").issues).toEqual([{ message: 'unterminated string literal', line: 1, column: 1 }]);
    expect(tokenize('x [open').issues).toEqual([{ message: 'unterminated quoted identifier', line: 1, column: 3 }]);
    expect(tokenize('/* open').issues).toEqual([{ message: 'unterminated block comment', line: 1, column: 1 }]);
  });

  it('should keep unicode letters and sigils in words', () => {
    const { tokens } = tokenize('@var #temp Größe');
    expect(tokens.slice(0, 3).map((t) => t.kind)).toEqual(['word', 'word', 'word']);
    expect(tokens[2]?.upper).toBe('GRÖSSE');
  });
});
