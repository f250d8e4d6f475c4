/**
 * Identifier naming for generated code
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';

const reservedWordsSchema = z.object({
  keywords: z.array(z.string()),
  globalTypes: z.array(z.string()),
});

const reservedWords = reservedWordsSchema.parse(
  JSON.parse(readFileSync(new URL('./reserved-words.json', import.meta.url), 'utf-8'))
);

const KEYWORDS: ReadonlySet<string> = new Set(reservedWords.keywords);
const GLOBAL_TYPES: ReadonlySet<string> = new Set(reservedWords.globalTypes);

// Upper-case runs (acronyms), capitalized words, lower-case runs, digit runs
const WORD_PATTERN = /\p{Lu}+(?!\p{Ll})|\p{Lu}?\p{Ll}+|\p{N}+|[\p{Lo}\p{Lt}\p{Lm}]+/gu;

export function splitWords(text: string): string[] {
  return text.match(WORD_PATTERN) ?? [];
}

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
}

/**
 * `order_lines` → `OrderLines`, `HTTPStatus` → `HttpStatus`
 */
export function toPascalCase(text: string): string {
  return splitWords(text).map(capitalize).join('');
}

/**
 * `Order_Id` → `orderId`, `URL` → `url`
 */
export function toCamelCase(text: string): string {
  const [first, ...rest] = splitWords(text);
  if (first === undefined) return '';
  return first.toLowerCase() + rest.map(capitalize).join('');
}

/**
 * Make a name usable as an identifier: empty names become `_`, a leading
 * digit gets a `_` prefix and reserved words get a `_` suffix
 */
export function sanitizeIdentifier(name: string, reserved: ReadonlySet<string> = new Set()): string {
  let identifier = name.replace(/[^\p{L}\p{N}_$]/gu, '');
  if (identifier.length === 0) return '_';
  if (/^\p{N}/u.test(identifier)) identifier = `_${identifier}`;
  if (KEYWORDS.has(identifier) || reserved.has(identifier)) identifier = `${identifier}_`;
  return identifier;
}

export function typeNameFor(text: string): string {
  const name = sanitizeIdentifier(toPascalCase(text));
  return GLOBAL_TYPES.has(name) ? `${name}_` : name;
}

export function propertyNameFor(text: string, reserved: ReadonlySet<string> = new Set()): string {
  return sanitizeIdentifier(toCamelCase(text), reserved);
}

/**
 * Hands out unique names, suffixing repeats with `_2`, `_3`, ...
 */
export class UniqueNamer {
  private readonly used = new Set<string>();

  claim(name: string): string {
    let candidate = name;
    for (let n = 2; this.used.has(candidate.toLowerCase()); n++) {
      candidate = `${name}_${n}`;
    }
    this.used.add(candidate.toLowerCase());
    return candidate;
  }
}
