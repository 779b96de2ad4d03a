/**
 * Shared Types
 *
 * Data model for a parsed SQL dump: typed values, rows, table schemas and
 * the raw statement shapes produced by the extractor.
 *
 * @packageDocumentation
 */

// =============================================================================
// VALUES
// =============================================================================

/**
 * SQL NULL
 */
export interface NullValue {
  readonly kind: 'null';
}

/**
 * 64-bit signed integer
 */
export interface IntegerValue {
  readonly kind: 'integer';
  readonly value: bigint;
}

/**
 * 64-bit float
 */
export interface FloatValue {
  readonly kind: 'float';
  readonly value: number;
}

/**
 * Text, including any literal form the coercer does not recognize
 */
export interface TextValue {
  readonly kind: 'text';
  readonly value: string;
}

/**
 * A single typed cell value
 */
export type Value = NullValue | IntegerValue | FloatValue | TextValue;

/**
 * Discriminant of {@link Value}
 */
export type ValueKind = Value['kind'];

/**
 * One row, one value per column
 */
export type Row = readonly Value[];

/**
 * Column identifier, case preserved as written
 */
export type ColumnName = string;

// =============================================================================
// TABLES
// =============================================================================

/**
 * Table name plus its columns in defining order
 */
export interface TableSchema {
  readonly name: string;
  readonly columns: readonly ColumnName[];
}

/**
 * A schema with the rows accumulated for it
 */
export interface TableData {
  readonly schema: TableSchema;
  readonly rows: readonly Row[];
}

// =============================================================================
// STATEMENTS
// =============================================================================

/**
 * A `CREATE TABLE` block located in the dump
 */
export interface SchemaStatement {
  /** Table name without quoting */
  name: string;
  /** Text between the opening paren and the closing paren before the engine marker */
  body: string;
  /** 0-based offset of the statement in the source text */
  offset: number;
}

/**
 * An `INSERT INTO ... VALUES ...;` block located in the dump
 */
export interface InsertStatement {
  /** Table name without quoting */
  name: string;
  /** Explicit column list, if the statement gives one */
  columns?: ColumnName[];
  /** Tuple list text, without the terminating semicolon */
  values: string;
  /** 0-based offset of the statement in the source text */
  offset: number;
}
