/**
 * Column Definition Parser
 *
 * Turns the body of a `CREATE TABLE` statement into its ordered column
 * names. Index and constraint clauses are dropped, as is everything after
 * the column name (type, modifiers, defaults).
 *
 * @packageDocumentation
 */

import type { ColumnName } from './types.js';

/**
 * Clause keywords that start an index or constraint definition rather than
 * a column. Matched case-insensitively as whole words.
 */
export const NON_COLUMN_PREFIXES: readonly string[] = [
  'PRIMARY KEY',
  'UNIQUE KEY',
  'UNIQUE INDEX',
  'FOREIGN KEY',
  'FULLTEXT KEY',
  'FULLTEXT INDEX',
  'SPATIAL KEY',
  'SPATIAL INDEX',
  'KEY',
  'INDEX',
  'UNIQUE',
  'CONSTRAINT',
  'CHECK',
];

const NON_COLUMN_PATTERN = new RegExp(
  `^(?:${NON_COLUMN_PREFIXES.map(p => p.replace(/ /g, '\\s+')).join('|')})(?![\\p{L}\\p{M}\\p{N}_])`,
  'iu'
);

/** Optional backtick, word characters of any script, optional backtick, then whitespace */
const COLUMN_NAME_PATTERN = /^`?([\p{L}\p{M}\p{N}_]+)`?\s/u;

/**
 * Split text on commas at parenthesis depth 0.
 *
 * Commas inside a parenthesized sub-expression, such as an `ENUM` value list
 * or a `DECIMAL(10,2)` precision, do not split, and neither do commas or
 * parens inside a quoted `DEFAULT` or `COMMENT` string. Fragments are
 * trimmed and empty fragments dropped.
 */
export function splitTopLevel(text: string): string[] {
  const fragments: string[] = [];
  let depth = 0;
  let start = 0;
  let inString = false;
  let escapePending = false;

  for (let i = 0; i < text.length; i++) {
    const char = text[i];
    if (inString) {
      if (escapePending) {
        escapePending = false;
      } else if (char === '\\') {
        escapePending = true;
      } else if (char === "'") {
        inString = false;
      }
      continue;
    }
    if (char === "'") {
      inString = true;
    } else if (char === '(') {
      depth++;
    } else if (char === ')') {
      depth = Math.max(0, depth - 1);
    } else if (char === ',' && depth === 0) {
      fragments.push(text.slice(start, i));
      start = i + 1;
    }
  }
  fragments.push(text.slice(start));

  return fragments.map(f => f.trim()).filter(f => f.length > 0);
}

/**
 * Check whether a trimmed fragment defines an index or constraint
 */
export function isConstraintFragment(fragment: string): boolean {
  return NON_COLUMN_PATTERN.test(fragment);
}

/**
 * Extract the column name from one trimmed column-definition fragment
 * @returns The name, or undefined when the fragment has no leading identifier
 */
export function extractColumnName(fragment: string): ColumnName | undefined {
  return COLUMN_NAME_PATTERN.exec(fragment)?.[1];
}

/**
 * Parse a schema body into column names in defining order.
 */
export function parseColumnDefinitions(body: string): ColumnName[] {
  const columns: ColumnName[] = [];

  for (const fragment of splitTopLevel(body)) {
    if (isConstraintFragment(fragment)) continue;
    const name = extractColumnName(fragment);
    if (name !== undefined) {
      columns.push(name);
    }
  }

  return columns;
}
