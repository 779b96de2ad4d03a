import {
  UnknownTableError,
  loadDump,
  registryToJSON,
  type Logger,
  type ParseStats,
  type TableJSON,
} from 'sqldump';

export interface InspectOptions {
  /** Absolute path of the dump file */
  path: string;
  /** Restrict the result to one table */
  table?: string;
  /** Rows per table included in `data` */
  limit?: number;
  /** Storage-engine marker that ends a CREATE TABLE statement */
  engineMarker?: string;
  /** Diagnostic channel passed to the parser */
  logger?: Logger;
}

export interface TableSummary {
  name: string;
  columns: string[];
  rowCount: number;
}

export interface InspectResult {
  /** False when the dump defines no tables at all */
  hasTables: boolean;
  tables: TableSummary[];
  stats: ParseStats;
  data: TableJSON[];
}

/**
 * Load a dump and summarize the tables it defines.
 *
 * @throws SqlDumpError when the file cannot be read or the requested table
 * does not exist
 */
export async function inspectDump(options: InspectOptions): Promise<InspectResult> {
  const { registry, stats } = await loadDump(options.path, {
    engineMarker: options.engineMarker,
    logger: options.logger,
  });

  let data = registryToJSON(registry, { limit: options.limit });

  if (options.table !== undefined && registry.size > 0) {
    const { table } = options;
    if (!registry.has(table)) {
      throw new UnknownTableError(table, registry.names());
    }
    data = data.filter(t => t.name === table);
  }

  return {
    hasTables: registry.size > 0,
    tables: data.map(({ name, columns, rowCount }) => ({ name, columns, rowCount })),
    stats,
    data,
  };
}
