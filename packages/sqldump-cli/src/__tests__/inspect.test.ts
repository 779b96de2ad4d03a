import { describe, it, expect } from 'vitest';
import { DumpNotFoundError, UnknownTableError, createLogger } from 'sqldump';
import { useTempDir } from 'sqldump/testing';
import { inspectDump } from '../commands/inspect.js';

const DUMP = [
  'CREATE TABLE `users` (',
  '  `id` int NOT NULL,',
  '  `name` varchar(50),',
  '  PRIMARY KEY (`id`)',
  ') ENGINE=InnoDB;',
  'CREATE TABLE `tags` (',
  '  `label` varchar(20)',
  ') ENGINE=InnoDB;',
  "INSERT INTO `users` VALUES (1,'Ann'),(2,'Bob');",
  "INSERT INTO `ghosts` VALUES (1);",
  '',
].join('\n');

describe('inspectDump', () => {
  const ctx = useTempDir();

  it('should summarize every table in definition order', async () => {
    const path = await ctx.writeFile('dump.sql', DUMP);
    const result = await inspectDump({ path });

    expect(result.hasTables).toBe(true);
    expect(result.tables).toEqual([
      { name: 'users', columns: ['id', 'name'], rowCount: 2 },
      { name: 'tags', columns: ['label'], rowCount: 0 },
    ]);
    expect(result.stats).toEqual({ tables: 2, rows: 2, skippedStatements: 1 });
  });

  it('should include row data as JSON values', async () => {
    const path = await ctx.writeFile('dump.sql', DUMP);
    const result = await inspectDump({ path });

    expect(result.data[0]).toEqual({
      name: 'users',
      columns: ['id', 'name'],
      rowCount: 2,
      rows: [[1, 'Ann'], [2, 'Bob']],
    });
  });

  it('should cap rows per table with limit', async () => {
    const path = await ctx.writeFile('dump.sql', DUMP);
    const result = await inspectDump({ path, limit: 1 });

    expect(result.data[0].rows).toEqual([[1, 'Ann']]);
    expect(result.data[0].rowCount).toBe(2);
  });

  it('should restrict the result to one table', async () => {
    const path = await ctx.writeFile('dump.sql', DUMP);
    const result = await inspectDump({ path, table: 'tags' });

    expect(result.tables).toEqual([{ name: 'tags', columns: ['label'], rowCount: 0 }]);
    expect(result.data).toHaveLength(1);
  });

  it('should throw UnknownTableError for a missing table', async () => {
    const path = await ctx.writeFile('dump.sql', DUMP);

    const error = await inspectDump({ path, table: 'ghosts' }).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(UnknownTableError);
    expect(error).toMatchObject({
      code: 'TABLE_NOT_FOUND',
      context: { table: 'ghosts', metadata: { available: ['users', 'tags'] } },
    });
  });

  it('should not throw for a table filter on an empty dump', async () => {
    const path = await ctx.writeFile('empty.sql', '-- nothing here\n');
    const result = await inspectDump({ path, table: 'users' });

    expect(result.hasTables).toBe(false);
    expect(result.tables).toEqual([]);
  });

  it('should honor a custom engine marker', async () => {
    const path = await ctx.writeFile(
      'dump.sql',
      'CREATE TABLE `t` (\n  `a` int\n) TYPE=MyISAM;\n'
    );

    expect((await inspectDump({ path })).hasTables).toBe(false);
    expect((await inspectDump({ path, engineMarker: 'TYPE=' })).tables).toEqual([
      { name: 't', columns: ['a'], rowCount: 0 },
    ]);
  });

  it('should pass diagnostics to the given logger', async () => {
    const path = await ctx.writeFile('dump.sql', DUMP);
    const lines: unknown[] = [];
    const logger = createLogger({
      level: 'warn',
      stdout: line => lines.push(line),
      stderr: line => lines.push(line),
    });

    await inspectDump({ path, logger });

    expect(lines).toEqual(["Warning: INSERT statement for unknown table 'ghosts'. Skipping."]);
  });

  it('should propagate load errors', async () => {
    await expect(inspectDump({ path: ctx.getPath('missing.sql') })).rejects.toBeInstanceOf(
      DumpNotFoundError
    );
  });
});
