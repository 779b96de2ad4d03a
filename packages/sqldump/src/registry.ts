/**
 * Table Registry
 *
 * Owns every table schema and row reconstructed from a dump, in the order
 * the schemas were defined. Rows are only ever appended.
 *
 * @packageDocumentation
 */

import type { ColumnName, Row, TableData, TableSchema, Value } from './types.js';
import { nullValue } from './values.js';

// =============================================================================
// TYPES
// =============================================================================

/**
 * Result of applying one insert statement
 */
export type InsertOutcome =
  | { status: 'inserted'; table: string; rows: number }
  | { status: 'unknown-table'; table: string }
  | { status: 'column-count-mismatch'; table: string; expected: number; actual: number };

/**
 * Read-only view handed to consumers once parsing completes
 */
export interface ReadonlyTableRegistry extends Iterable<TableData> {
  /** Number of tables */
  readonly size: number;
  has(name: string): boolean;
  get(name: string): TableData | undefined;
  /** Table names in definition order */
  names(): string[];
  /** Sum of row counts over all tables */
  totalRows(): number;
}

interface TableEntry {
  schema: TableSchema;
  rows: Row[];
}

// =============================================================================
// REGISTRY
// =============================================================================

export class TableRegistry implements ReadonlyTableRegistry {
  private readonly tables = new Map<string, TableEntry>();

  get size(): number {
    return this.tables.size;
  }

  has(name: string): boolean {
    return this.tables.has(name);
  }

  get(name: string): TableData | undefined {
    return this.tables.get(name);
  }

  names(): string[] {
    return Array.from(this.tables.keys());
  }

  totalRows(): number {
    let total = 0;
    for (const table of this.tables.values()) {
      total += table.rows.length;
    }
    return total;
  }

  *[Symbol.iterator](): Iterator<TableData> {
    yield* this.tables.values();
  }

  /**
   * Register a table schema.
   *
   * A schema is created once; a later definition for the same name is
   * ignored.
   *
   * @returns false if the table was already defined
   */
  define(name: string, columns: readonly ColumnName[]): boolean {
    if (this.tables.has(name)) {
      return false;
    }
    const schema: TableSchema = Object.freeze({ name, columns: Object.freeze([...columns]) });
    this.tables.set(name, { schema, rows: [] });
    return true;
  }

  /**
   * Append the tuples of one insert statement.
   *
   * With an explicit column list, each tuple is re-projected into the
   * schema's column order and columns missing from the list become NULL.
   * The list must name as many columns as the schema has, otherwise the
   * whole statement is rejected.
   *
   * Without a list, tuples are stored positionally as they are; their arity
   * is not checked against the schema.
   *
   * Empty tuples are skipped.
   */
  insert(
    name: string,
    explicitColumns: readonly ColumnName[] | undefined,
    tuples: readonly (readonly Value[])[]
  ): InsertOutcome {
    const table = this.tables.get(name);
    if (!table) {
      return { status: 'unknown-table', table: name };
    }

    const { columns } = table.schema;
    if (explicitColumns && explicitColumns.length !== columns.length) {
      return {
        status: 'column-count-mismatch',
        table: name,
        expected: columns.length,
        actual: explicitColumns.length,
      };
    }

    let inserted = 0;
    for (const tuple of tuples) {
      if (tuple.length === 0) continue;
      const row = explicitColumns ? projectRow(columns, explicitColumns, tuple) : [...tuple];
      table.rows.push(Object.freeze(row));
      inserted++;
    }

    return { status: 'inserted', table: name, rows: inserted };
  }
}

/**
 * Reorder values given for `explicitColumns` into `schemaColumns` order.
 *
 * Pairs are formed position by position up to the shorter of the two
 * lists; a name repeated in the list keeps its last value.
 */
export function projectRow(
  schemaColumns: readonly ColumnName[],
  explicitColumns: readonly ColumnName[],
  tuple: readonly Value[]
): Value[] {
  const byName = new Map<ColumnName, Value>();
  const pairs = Math.min(explicitColumns.length, tuple.length);
  for (let i = 0; i < pairs; i++) {
    byName.set(explicitColumns[i], tuple[i]);
  }
  return schemaColumns.map(column => byName.get(column) ?? nullValue());
}
