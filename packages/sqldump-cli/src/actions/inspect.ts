/**
 * CLI action handler for the inspect command.
 */

import { resolve } from 'node:path';
import {
  SqlDumpError,
  createLogger,
  getLogLevelFromEnv,
  toError,
  type LogLevel,
} from 'sqldump';
import { inspectDump, type InspectResult } from '../commands/inspect.js';

/**
 * Options for the inspect action.
 */
export interface InspectActionOptions {
  verbose?: boolean;
  json?: boolean;
  table?: string;
  limit?: number;
  engineMarker?: string;
}

/**
 * Output sinks and environment, injectable for tests.
 */
export interface ActionIO {
  stdout?: (...args: unknown[]) => void;
  stderr?: (...args: unknown[]) => void;
  env?: Record<string, string | undefined>;
}

/**
 * Level of the parser's diagnostic logger.
 *
 * Diagnostics are off unless `--verbose` is given or a level is set in the
 * environment; `--verbose` alone means info.
 */
export function resolveDiagnosticLevel(
  verbose: boolean | undefined,
  env: Record<string, string | undefined>
): LogLevel {
  return getLogLevelFromEnv(env) ?? (verbose ? 'info' : 'silent');
}

/**
 * Handles the inspect CLI command.
 *
 * @returns Process exit code
 */
export async function handleInspectAction(
  file: string,
  options: InspectActionOptions,
  io: ActionIO = {}
): Promise<number> {
  const output = createLogger({ level: 'info', stdout: io.stdout, stderr: io.stderr });
  const diagnostics = createLogger({
    level: resolveDiagnosticLevel(options.verbose, io.env ?? process.env),
    // JSON output owns stdout
    stdout: options.json ? io.stderr ?? console.error : io.stdout,
    stderr: io.stderr,
  });

  let result: InspectResult;
  try {
    result = await inspectDump({
      path: resolve(file),
      table: options.table,
      limit: options.limit,
      engineMarker: options.engineMarker,
      logger: diagnostics,
    });
  } catch (error) {
    const err = toError(error);
    output.error(err instanceof SqlDumpError ? err.toUserMessage() : err.message);
    return 1;
  }

  if (!result.hasTables) {
    output.info('No tables found in the SQL dump.');
    return 0;
  }

  if (options.json) {
    output.info(JSON.stringify(result.data, null, 2));
    return 0;
  }

  for (const table of result.tables) {
    output.info(`${table.name} (${table.columns.length} columns, ${table.rowCount} rows)`);
    output.list(table.columns);
  }
  return 0;
}
