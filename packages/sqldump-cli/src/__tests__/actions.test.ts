import { describe, it, expect, vi } from 'vitest';
import { useTempDir } from 'sqldump/testing';
import { handleInspectAction, resolveDiagnosticLevel } from '../actions/index.js';

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

function createIO(env: Record<string, string | undefined> = {}) {
  return { stdout: vi.fn(), stderr: vi.fn(), env };
}

function lines(mock: ReturnType<typeof vi.fn>): unknown[] {
  return mock.mock.calls.map(call => call[0]);
}

describe('resolveDiagnosticLevel', () => {
  it('should be silent by default', () => {
    expect(resolveDiagnosticLevel(false, {})).toBe('silent');
    expect(resolveDiagnosticLevel(undefined, {})).toBe('silent');
  });

  it('should be info when verbose', () => {
    expect(resolveDiagnosticLevel(true, {})).toBe('info');
  });

  it('should prefer the environment', () => {
    expect(resolveDiagnosticLevel(true, { SQLDUMP_LOG_LEVEL: 'warn' })).toBe('warn');
    expect(resolveDiagnosticLevel(false, { SQLDUMP_LOG_LEVEL: 'debug' })).toBe('debug');
  });

  it('should stay silent when only LOG_LEVEL is set', () => {
    expect(resolveDiagnosticLevel(false, { LOG_LEVEL: 'info' })).toBe('silent');
    expect(resolveDiagnosticLevel(true, { LOG_LEVEL: 'debug' })).toBe('info');
  });
});

describe('handleInspectAction', () => {
  const ctx = useTempDir();

  it('should print each table with its columns', async () => {
    const path = await ctx.writeFile('dump.sql', DUMP);
    const io = createIO();

    const code = await handleInspectAction(path, {}, io);

    expect(code).toBe(0);
    expect(lines(io.stdout)).toEqual([
      'users (2 columns, 2 rows)',
      '  - id',
      '  - name',
      'tags (1 columns, 0 rows)',
      '  - label',
    ]);
    expect(io.stderr).not.toHaveBeenCalled();
  });

  it('should print diagnostics before the summary when verbose', async () => {
    const path = await ctx.writeFile('dump.sql', DUMP);
    const io = createIO();

    await handleInspectAction(path, { verbose: true, table: 'tags' }, io);

    expect(lines(io.stdout)).toEqual([
      'Found table: users with columns: id, name',
      'Found table: tags with columns: label',
      "Inserted 2 rows into table 'users'.",
      'Parsing completed. Total tables parsed: 2.',
      'tags (1 columns, 0 rows)',
      '  - label',
    ]);
    expect(lines(io.stderr)).toEqual([
      "Warning: INSERT statement for unknown table 'ghosts'. Skipping.",
    ]);
  });

  it('should print JSON', async () => {
    const path = await ctx.writeFile('dump.sql', DUMP);
    const io = createIO();

    const code = await handleInspectAction(path, { json: true, limit: 1 }, io);

    expect(code).toBe(0);
    expect(io.stdout).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(io.stdout.mock.calls[0][0]))).toEqual([
      { name: 'users', columns: ['id', 'name'], rowCount: 2, rows: [[1, 'Ann']] },
      { name: 'tags', columns: ['label'], rowCount: 0, rows: [] },
    ]);
  });

  it('should keep stdout parseable as JSON when verbose', async () => {
    const path = await ctx.writeFile('dump.sql', DUMP);
    const io = createIO();

    const code = await handleInspectAction(path, { json: true, verbose: true }, io);

    expect(code).toBe(0);
    expect(io.stdout).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(io.stdout.mock.calls[0][0]))).toHaveLength(2);
    expect(lines(io.stderr)).toEqual([
      'Found table: users with columns: id, name',
      'Found table: tags with columns: label',
      "Inserted 2 rows into table 'users'.",
      "Warning: INSERT statement for unknown table 'ghosts'. Skipping.",
      'Parsing completed. Total tables parsed: 2.',
    ]);
  });

  it('should report a dump without tables', async () => {
    const path = await ctx.writeFile('empty.sql', "INSERT INTO `t` VALUES (1);\n");
    const io = createIO();

    const code = await handleInspectAction(path, { json: true }, io);

    expect(code).toBe(0);
    expect(lines(io.stdout)).toEqual(['No tables found in the SQL dump.']);
  });

  it('should fail for a missing file', async () => {
    const path = ctx.getPath('missing.sql');
    const io = createIO();

    const code = await handleInspectAction(path, {}, io);

    expect(code).toBe(1);
    expect(lines(io.stderr)).toEqual([`Error: File '${path}' not found.`]);
    expect(io.stdout).not.toHaveBeenCalled();
  });

  it('should list available tables for an unknown table', async () => {
    const path = await ctx.writeFile('dump.sql', DUMP);
    const io = createIO();

    const code = await handleInspectAction(path, { table: 'orders' }, io);

    expect(code).toBe(1);
    expect(lines(io.stderr)).toEqual([
      "Error: Table 'orders' not found in the SQL dump. Available tables: users, tags",
    ]);
  });

  it('should suggest re-exporting an undecodable dump', async () => {
    const path = await ctx.writeFile('latin1.sql', new Uint8Array([0x2d, 0x2d, 0x20, 0xe9, 0x0a]));
    const io = createIO();

    const code = await handleInspectAction(path, {}, io);

    expect(code).toBe(1);
    expect(lines(io.stderr)).toEqual([
      `Error: File '${path}' is not valid UTF-8 text. Re-export the dump with a UTF-8 character set.`,
    ]);
  });
});
