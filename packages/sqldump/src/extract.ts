/**
 * Statement Extractor
 *
 * Locates `CREATE TABLE` and `INSERT INTO` blocks in free-form dump text.
 * Anything between statements (comments, `SET` lines, `LOCK TABLES`, ...)
 * is skipped.
 *
 * A schema statement is only recognized when its closing paren is followed
 * by the storage-engine marker (`ENGINE=` by default). Dumps written without
 * it yield no schemas.
 *
 * @packageDocumentation
 */

import type { ColumnName, InsertStatement, SchemaStatement } from './types.js';
import {
  createScanState,
  escapeRegExp,
  findNext,
  findUnquoted,
  matchExact,
  matchIdentifier,
  matchKeyword,
  peek,
  phrasePattern,
  requireWhitespace,
  skipWhitespace,
  type ScanState,
} from './scanner.js';

/**
 * Default storage-engine marker that terminates a schema statement
 */
export const DEFAULT_ENGINE_MARKER = 'ENGINE=';

const CREATE_TABLE = 'CREATE TABLE';
const INSERT_INTO = 'INSERT INTO';

// =============================================================================
// SCHEMA STATEMENTS
// =============================================================================

/**
 * Lazily extract schema statements in source order.
 *
 * @param text - Full dump text
 * @param engineMarker - Marker that must follow the closing paren of the body
 */
export function* extractSchemaStatements(
  text: string,
  engineMarker: string = DEFAULT_ENGINE_MARKER
): Generator<SchemaStatement> {
  const keyword = phrasePattern(CREATE_TABLE);
  const terminator = new RegExp(`\\)\\s*${escapeRegExp(engineMarker)}`, 'gi');
  let state = createScanState(text);

  for (;;) {
    const found = findNext(state, keyword);
    if (!found) return;

    const header = scanSchemaHeader(createScanState(text, found.end));
    if (!header) {
      state = createScanState(text, found.start + 1);
      continue;
    }

    const close = findNext(header.state, terminator);
    if (!close) return;

    yield {
      name: header.name,
      body: text.slice(header.state.position, close.start),
      offset: found.start,
    };
    state = createScanState(text, close.end);
  }
}

/**
 * Match `<ws> name <ws>? (` after the CREATE TABLE keywords.
 * The returned state sits just inside the opening paren.
 */
function scanSchemaHeader(state: ScanState): { name: string; state: ScanState } | null {
  const afterSpace = requireWhitespace(state);
  if (!afterSpace) return null;

  const ident = matchIdentifier(afterSpace);
  if (!ident) return null;

  const open = matchExact(skipWhitespace(ident.state), '(');
  if (!open) return null;

  return { name: ident.name, state: open };
}

// =============================================================================
// INSERT STATEMENTS
// =============================================================================

/**
 * Lazily extract insert statements in source order.
 *
 * The values body runs up to the first `;` that is not inside a quoted
 * string, so a statement may span any number of lines.
 */
export function* extractInsertStatements(text: string): Generator<InsertStatement> {
  const keyword = phrasePattern(INSERT_INTO);
  let state = createScanState(text);

  for (;;) {
    const found = findNext(state, keyword);
    if (!found) return;

    const header = scanInsertHeader(createScanState(text, found.end));
    if (!header) {
      state = createScanState(text, found.start + 1);
      continue;
    }

    // The body holds at least one character, so a `;` right at its start
    // is part of it.
    const end = findUnquoted(createScanState(text, header.state.position + 1), ';');
    if (end === -1) {
      state = createScanState(text, found.start + 1);
      continue;
    }

    const statement: InsertStatement = {
      name: header.name,
      values: text.slice(header.state.position, end),
      offset: found.start,
    };
    if (header.columns) {
      statement.columns = header.columns;
    }
    yield statement;
    state = createScanState(text, end + 1);
  }
}

/**
 * Match `<ws> name <ws>? (cols)? <ws> VALUES <ws>` after INSERT INTO.
 * The returned state sits at the start of the values body.
 */
function scanInsertHeader(
  state: ScanState
): { name: string; columns?: ColumnName[]; state: ScanState } | null {
  const afterSpace = requireWhitespace(state);
  if (!afterSpace) return null;

  const ident = matchIdentifier(afterSpace);
  if (!ident) return null;

  let next = skipWhitespace(ident.state);
  let columns: ColumnName[] | undefined;

  if (peek(next) === '(') {
    const close = next.input.indexOf(')', next.position + 1);
    // An explicit list holds at least one character and no nested parens
    if (close === -1 || close === next.position + 1) return null;
    columns = parseExplicitColumns(next.input.slice(next.position + 1, close));
    next = createScanState(next.input, close + 1);
  }

  // VALUES must be preceded by whitespace
  const beforeValues = next.position > ident.state.position && !columns
    ? next
    : requireWhitespace(next);
  if (!beforeValues) return null;

  const afterValues = matchKeyword(beforeValues, 'VALUES');
  if (!afterValues) return null;

  const body = requireWhitespace(afterValues);
  if (!body) return null;

  return columns ? { name: ident.name, columns, state: body } : { name: ident.name, state: body };
}

/**
 * Split an explicit column list, dropping whitespace and backticks around
 * each name.
 */
export function parseExplicitColumns(list: string): ColumnName[] {
  return list.split(',').map(column => column.replace(/^[\s`]+|[\s`]+$/g, ''));
}
