#!/usr/bin/env node

/**
 * sqldump CLI - inspect the tables and rows of a SQL dump file.
 *
 * Prints each reconstructed table with its columns and row count, or the
 * full data as JSON with `--json`.
 *
 * @module sqldump-cli
 */

import { Command, InvalidArgumentError } from 'commander';
import { handleInspectAction } from './actions/index.js';
import { InspectCommandOptionsSchema, LimitSchema, formatIssues } from './utils/options.js';

/**
 * Parses the `--limit` option value.
 */
export function parseLimit(value: string): number {
  const result = LimitSchema.safeParse(value);
  if (!result.success) {
    throw new InvalidArgumentError(formatIssues(result.error));
  }
  return result.data;
}

/**
 * Creates and configures the sqldump CLI program.
 *
 * @example
 * ```typescript
 * const program = createCLI();
 * await program.parseAsync(['node', 'sqldump', './backup.sql', '--json']);
 * ```
 */
export function createCLI(): Command {
  const program: Command = new Command();

  // Keep in sync with package.json
  program
    .name('sqldump')
    .version('0.1.0')
    .description('sqldump CLI - reconstruct tables and rows from a SQL dump file')
    .argument('<file>', 'Path to the SQL dump file')
    .option('-v, --verbose', 'Log parsing diagnostics', false)
    .option('--json', 'Print tables and rows as JSON', false)
    .option('-t, --table <name>', 'Only show the named table')
    .option('-l, --limit <n>', 'Rows per table in JSON output', parseLimit)
    .option('--engine-marker <marker>', 'Marker that ends a CREATE TABLE statement')
    .action(async (file: string, raw: unknown) => {
      const options = InspectCommandOptionsSchema.safeParse(raw);
      if (!options.success) {
        program.error(`Invalid options: ${formatIssues(options.error)}`);
      }
      process.exitCode = await handleInspectAction(file, options.data);
    });

  return program;
}

// Export commands for programmatic use
export {
  inspectDump,
  type InspectOptions,
  type InspectResult,
  type TableSummary,
} from './commands/inspect.js';

// Run CLI if invoked directly
const isMainModule = import.meta.url === `file://${process.argv[1]}`;
if (isMainModule) {
  await createCLI().parseAsync();
}
