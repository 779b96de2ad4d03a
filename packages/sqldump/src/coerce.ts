/**
 * Value Coercer
 *
 * Converts the text of one tuple into typed values. Coercion is total:
 * every token maps to exactly one {@link Value}, and anything that is not a
 * quoted string, `NULL` or a plain number is kept verbatim as text
 * (hex literals, `NOW()`, `_binary '...'`, bare words).
 *
 * @packageDocumentation
 */

import type { Value } from './types.js';
import { floatValue, integerValue, isInt64, nullValue, textValue } from './values.js';
import { isWhitespace, isWordCharAt } from './scanner.js';

const INTEGER_PATTERN = /^-?\d+$/;
const DECIMAL_PATTERN = /^-?\d+\.\d*$/;

// =============================================================================
// TOKENIZING
// =============================================================================

/**
 * Remove one layer of surrounding parentheses
 */
export function stripOuterParens(tuple: string): string {
  let inner = tuple.trim();
  if (inner.startsWith('(')) inner = inner.slice(1);
  if (inner.endsWith(')')) inner = inner.slice(0, -1);
  return inner;
}

/**
 * Scan a quoted string starting at `start`
 * @returns Offset just past the closing quote, or -1 if unterminated
 */
function scanQuoted(text: string, start: number): number {
  for (let i = start + 1; i < text.length; i++) {
    const char = text[i];
    if (char === '\\') {
      i++;
    } else if (char === "'") {
      return i + 1;
    }
  }
  return -1;
}

/**
 * Scan a bare run up to the next comma outside parens and quotes
 * @returns Offset of that comma, or the end of text
 */
function scanBare(text: string, start: number): number {
  let depth = 0;
  for (let i = start; i < text.length; i++) {
    const char = text[i];
    if (char === "'") {
      const end = scanQuoted(text, i);
      if (end === -1) return text.length;
      i = end - 1;
    } else if (char === '(') {
      depth++;
    } else if (char === ')') {
      depth = Math.max(0, depth - 1);
    } else if (char === ',' && depth === 0) {
      return i;
    }
  }
  return text.length;
}

function isNullKeyword(text: string, start: number): boolean {
  return text.slice(start, start + 4).toUpperCase() === 'NULL' && !isWordCharAt(text, start + 4);
}

/**
 * Split the interior of a tuple into raw tokens.
 *
 * Tokens are matched in priority order: a quoted string, the `NULL`
 * keyword, then any run of text up to the next top-level comma.
 */
export function tokenizeTuple(inner: string): string[] {
  const tokens: string[] = [];
  let i = 0;

  while (i < inner.length) {
    const char = inner[i];
    if (isWhitespace(char) || char === ',') {
      i++;
      continue;
    }

    if (char === "'") {
      const end = scanQuoted(inner, i);
      if (end !== -1) {
        tokens.push(inner.slice(i, end));
        i = end;
        continue;
      }
    }

    if (isNullKeyword(inner, i)) {
      tokens.push(inner.slice(i, i + 4));
      i += 4;
      continue;
    }

    const end = scanBare(inner, i);
    const token = inner.slice(i, end).trim();
    if (token) {
      tokens.push(token);
    }
    i = end;
  }

  return tokens;
}

// =============================================================================
// DECODING
// =============================================================================

/**
 * Undo backslash escaping of quotes and backslashes in a string body.
 * Other escape sequences are kept as written.
 */
export function unescapeString(body: string): string {
  let result = '';
  for (let i = 0; i < body.length; i++) {
    const char = body[i];
    const next = body[i + 1];
    if (char === '\\' && (next === "'" || next === '\\')) {
      result += next;
      i++;
    } else {
      result += char;
    }
  }
  return result;
}

/**
 * Coerce one raw token into a value.
 */
export function coerceToken(raw: string): Value {
  const token = raw.trim();

  if (token.toUpperCase() === 'NULL') {
    return nullValue();
  }

  if (token.length >= 2 && token.startsWith("'") && token.endsWith("'")) {
    return textValue(unescapeString(token.slice(1, -1)));
  }

  if (INTEGER_PATTERN.test(token)) {
    const parsed = BigInt(token);
    return isInt64(parsed) ? integerValue(parsed) : textValue(token);
  }

  if (DECIMAL_PATTERN.test(token)) {
    const parsed = Number(token);
    return Number.isFinite(parsed) ? floatValue(parsed) : textValue(token);
  }

  return textValue(token);
}

/**
 * Coerce a tuple such as `(1,'a',NULL)` into its values.
 */
export function coerceTuple(tuple: string): Value[] {
  return tokenizeTuple(stripOuterParens(tuple)).map(coerceToken);
}
