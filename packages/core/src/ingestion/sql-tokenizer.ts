/**
 * SQL Tokenizer
 * Splits schema text into tokens with source positions
 */

export type TokenKind =
  | 'word'
  | 'quoted'
  | 'string'
  | 'number'
  | 'symbol'
  | 'eof';

export interface Token {
  kind: TokenKind;
  /**
   * Token text. Quoted identifiers and string literals are unwrapped
   * and unescaped; everything else is verbatim.
   */
  text: string;
  /** Upper-cased text, for keyword comparison of words */
  upper: string;
  /** Offset of the first character in the source */
  start: number;
  /** Offset one past the last character */
  end: number;
  line: number;
  column: number;
  /** Nothing but whitespace or comments precedes it on its line */
  firstOnLine: boolean;
}

export interface TokenizerIssue {
  message: string;
  line: number;
  column: number;
}

export interface TokenizeResult {
  tokens: Token[];
  issues: TokenizerIssue[];
}

const WORD_START = /[\p{L}_@#]/u;
const WORD_PART = /[\p{L}\p{N}_@#$]/u;
const DIGIT = /[0-9]/;
const TWO_CHAR_SYMBOLS = new Set(['<=', '>=', '<>', '!=', '::', '||']);

export function tokenize(text: string): TokenizeResult {
  const tokens: Token[] = [];
  const issues: TokenizerIssue[] = [];

  let pos = 0;
  let line = 1;
  let lineStart = 0;
  let lastTokenLine = 0;

  const advanceLines = (from: number, to: number) => {
    for (let i = from; i < to; i++) {
      if (text[i] === '\n') {
        line++;
        lineStart = i + 1;
      }
    }
  };

  const push = (kind: TokenKind, value: string, start: number, end: number, tokenLine: number, column: number) => {
    tokens.push({
      kind,
      text: value,
      upper: value.toUpperCase(),
      start,
      end,
      line: tokenLine,
      column,
      firstOnLine: tokenLine !== lastTokenLine,
    });
    lastTokenLine = tokenLine;
  };

  while (pos < text.length) {
    const ch = text.charAt(pos);

    // Whitespace
    if (ch === '\n') {
      line++;
      pos++;
      lineStart = pos;
      continue;
    }
    if (/\s/.test(ch)) {
      pos++;
      continue;
    }

    const start = pos;
    const tokenLine = line;
    const column = pos - lineStart + 1;

    // Line comment
    if (ch === '-' && text[pos + 1] === '-') {
      const newline = text.indexOf('\n', pos);
      pos = newline === -1 ? text.length : newline;
      continue;
    }

    // Block comment (nesting allowed)
    if (ch === '/' && text[pos + 1] === '*') {
      let depth = 1;
      let i = pos + 2;
      while (i < text.length && depth > 0) {
        if (text[i] === '/' && text[i + 1] === '*') {
          depth++;
          i += 2;
        } else if (text[i] === '*' && text[i + 1] === '/') {
          depth--;
          i += 2;
        } else {
          i++;
        }
      }
      if (depth > 0) {
        issues.push({ message: 'unterminated block comment', line: tokenLine, column });
      }
      advanceLines(pos, i);
      pos = i;
      continue;
    }

    // String literal, optionally N-prefixed
    if (ch === "'" || ((ch === 'N' || ch === 'n') && text[pos + 1] === "'")) {
      let i = ch === "'" ? pos + 1 : pos + 2;
      let value = '';
      let closed = false;
      while (i < text.length) {
        if (text[i] === "'") {
          if (text[i + 1] === "'") {
            value += "'";
            i += 2;
            continue;
          }
          closed = true;
          i++;
          break;
        }
        value += text[i];
        i++;
      }
      if (!closed) {
        issues.push({ message: 'unterminated string literal', line: tokenLine, column });
      }
      push('string', value, start, i, tokenLine, column);
      advanceLines(pos, i);
      pos = i;
      continue;
    }

    // Bracketed or double-quoted identifier
    if (ch === '[' || ch === '"') {
      const close = ch === '[' ? ']' : '"';
      let i = pos + 1;
      let value = '';
      let closed = false;
      while (i < text.length) {
        if (text[i] === close) {
          if (text[i + 1] === close) {
            value += close;
            i += 2;
            continue;
          }
          closed = true;
          i++;
          break;
        }
        value += text[i];
        i++;
      }
      if (!closed) {
        issues.push({ message: 'unterminated quoted identifier', line: tokenLine, column });
      }
      push('quoted', value, start, i, tokenLine, column);
      advanceLines(pos, i);
      pos = i;
      continue;
    }

    // Number (decimal, exponent or 0x binary literal)
    if (DIGIT.test(ch) || (ch === '.' && DIGIT.test(text.charAt(pos + 1)))) {
      let i = pos;
      if (ch === '0' && (text[pos + 1] === 'x' || text[pos + 1] === 'X')) {
        i += 2;
        while (i < text.length && /[0-9a-fA-F]/.test(text.charAt(i))) i++;
      } else {
        while (i < text.length && DIGIT.test(text.charAt(i))) i++;
        if (text[i] === '.') {
          i++;
          while (i < text.length && DIGIT.test(text.charAt(i))) i++;
        }
        if ((text[i] === 'e' || text[i] === 'E') && /[0-9+-]/.test(text.charAt(i + 1))) {
          i += 2;
          while (i < text.length && DIGIT.test(text.charAt(i))) i++;
        }
      }
      push('number', text.slice(pos, i), start, i, tokenLine, column);
      pos = i;
      continue;
    }

    // Word (keyword or bare identifier)
    if (WORD_START.test(ch)) {
      let i = pos + 1;
      while (i < text.length && WORD_PART.test(text.charAt(i))) i++;
      push('word', text.slice(pos, i), start, i, tokenLine, column);
      pos = i;
      continue;
    }

    const pair = text.slice(pos, pos + 2);
    if (TWO_CHAR_SYMBOLS.has(pair)) {
      push('symbol', pair, start, pos + 2, tokenLine, column);
      pos += 2;
      continue;
    }

    push('symbol', ch, start, pos + 1, tokenLine, column);
    pos++;
  }

  tokens.push({
    kind: 'eof',
    text: '',
    upper: '',
    start: text.length,
    end: text.length,
    line,
    column: text.length - lineStart + 1,
    firstOnLine: true,
  });

  return { tokens, issues };
}
