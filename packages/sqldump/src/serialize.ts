/**
 * JSON export of a parsed registry.
 */

import type { ReadonlyTableRegistry } from './registry.js';
import type { TableData } from './types.js';
import { valueToJSON } from './values.js';

export type JSONScalar = null | number | string;

export interface TableJSON {
  name: string;
  columns: string[];
  rowCount: number;
  rows: JSONScalar[][];
}

export interface SerializeOptions {
  /** Maximum rows emitted per table; all rows when omitted */
  limit?: number;
}

/**
 * Convert one table to plain JSON data
 */
export function tableToJSON(table: TableData, options: SerializeOptions = {}): TableJSON {
  const rows = options.limit === undefined ? table.rows : table.rows.slice(0, options.limit);
  return {
    name: table.schema.name,
    columns: [...table.schema.columns],
    rowCount: table.rows.length,
    rows: rows.map(row => row.map(valueToJSON)),
  };
}

/**
 * Convert every table, in definition order
 */
export function registryToJSON(
  registry: ReadonlyTableRegistry,
  options: SerializeOptions = {}
): TableJSON[] {
  return Array.from(registry, table => tableToJSON(table, options));
}
