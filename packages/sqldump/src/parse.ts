/**
 * Dump Parser
 *
 * Runs the whole pipeline over one dump text: schema statements first, in
 * source order, then insert statements, in source order. Malformed or
 * unrecognized statements are logged and skipped; parsing always completes
 * and returns whatever model it could reconstruct.
 *
 * @packageDocumentation
 */

import { parseColumnDefinitions } from './columns.js';
import { coerceTuple } from './coerce.js';
import { resolveParserConfig, type ParserConfig } from './config.js';
import { extractInsertStatements, extractSchemaStatements } from './extract.js';
import { TableRegistry, type ReadonlyTableRegistry } from './registry.js';
import { splitTuples } from './tuples.js';

/**
 * Counters collected during one parse
 */
export interface ParseStats {
  /** Tables registered */
  tables: number;
  /** Rows appended over all tables */
  rows: number;
  /** Insert statements dropped (unknown table or column-count mismatch) */
  skippedStatements: number;
}

export interface ParseResult {
  registry: ReadonlyTableRegistry;
  stats: ParseStats;
}

/**
 * Parse dump text into a table registry.
 *
 * @example
 * ```typescript
 * const { registry } = parseDump(sql, { logger: createLogger({ level: 'info' }) });
 * for (const table of registry) {
 *   console.log(table.schema.name, table.rows.length);
 * }
 * ```
 */
export function parseDump(text: string, config: ParserConfig = {}): ParseResult {
  const { engineMarker, logger } = resolveParserConfig(config);
  const registry = new TableRegistry();
  const stats: ParseStats = { tables: 0, rows: 0, skippedStatements: 0 };

  for (const statement of extractSchemaStatements(text, engineMarker)) {
    const columns = parseColumnDefinitions(statement.body);
    if (!registry.define(statement.name, columns)) {
      logger.warn(`Table '${statement.name}' is defined more than once. Keeping the first definition.`);
      continue;
    }
    stats.tables++;
    if (columns.length === 0) {
      logger.warn(`No columns found for table '${statement.name}'.`);
    } else {
      logger.info(`Found table: ${statement.name} with columns: ${columns.join(', ')}`);
    }
  }

  for (const statement of extractInsertStatements(text)) {
    const tuples = splitTuples(statement.values).map(coerceTuple);
    const outcome = registry.insert(statement.name, statement.columns, tuples);

    switch (outcome.status) {
      case 'inserted':
        stats.rows += outcome.rows;
        logger.info(`Inserted ${outcome.rows} rows into table '${outcome.table}'.`);
        break;
      case 'column-count-mismatch':
        stats.skippedStatements++;
        logger.warn(
          `Column count mismatch in INSERT INTO '${outcome.table}'. ` +
          `Expected ${outcome.expected}, got ${outcome.actual}. Skipping these inserts.`
        );
        break;
      case 'unknown-table':
        stats.skippedStatements++;
        logger.warn(`INSERT statement for unknown table '${outcome.table}'. Skipping.`);
        break;
    }
  }

  logger.info(`Parsing completed. Total tables parsed: ${registry.size}.`);
  return { registry, stats };
}
