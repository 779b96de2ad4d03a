import { afterEach, describe, it, expect, vi } from 'vitest';
import { CommanderError } from 'commander';
import { useTempDir } from 'sqldump/testing';
import { createCLI, parseLimit } from '../index.js';

describe('sqldump CLI', () => {
  it('should create CLI program', () => {
    const program = createCLI();
    expect(program.name()).toBe('sqldump');
  });

  it('should have proper version', () => {
    const program = createCLI();
    expect(program.version()).toBe('0.1.0');
  });

  it('should have proper description', () => {
    const program = createCLI();
    expect(program.description()).toContain('SQL dump');
  });

  it('should register every option', () => {
    const program = createCLI();
    const flags = program.options.map(option => option.long);
    expect(flags).toEqual(
      expect.arrayContaining(['--verbose', '--json', '--table', '--limit', '--engine-marker'])
    );
  });
});

describe('parseLimit', () => {
  it('should accept non-negative integers', () => {
    expect(parseLimit('0')).toBe(0);
    expect(parseLimit('25')).toBe(25);
  });

  it('should reject anything else', () => {
    expect(() => parseLimit('-1')).toThrow('Limit must be a non-negative integer.');
    expect(() => parseLimit('2.5')).toThrow('Limit must be a non-negative integer.');
    expect(() => parseLimit('ten')).toThrow('Limit must be a non-negative integer.');
  });

  it('should surface as a commander error', async () => {
    const program = createCLI()
      .exitOverride()
      .configureOutput({ writeErr: () => {} });

    await expect(
      program.parseAsync(['node', 'sqldump', 'dump.sql', '--limit', 'many'])
    ).rejects.toBeInstanceOf(CommanderError);
  });
});

describe('option validation', () => {
  it('should reject an empty engine marker', async () => {
    const program = createCLI()
      .exitOverride()
      .configureOutput({ writeErr: () => {} });

    await expect(
      program.parseAsync(['node', 'sqldump', 'dump.sql', '--engine-marker='])
    ).rejects.toMatchObject({
      code: 'commander.error',
      exitCode: 1,
      message: 'Invalid options: engineMarker: Engine marker must not be empty.',
    });
  });
});

describe('sqldump CLI run', () => {
  const ctx = useTempDir();

  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
    process.exitCode = undefined;
  });

  it('should print table summaries', async () => {
    vi.stubEnv('SQLDUMP_LOG_LEVEL', 'silent');
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const path = await ctx.writeFile(
      'dump.sql',
      'CREATE TABLE `notes` (\n  `id` int,\n  `body` text\n) ENGINE=InnoDB;\n' +
        "INSERT INTO `notes` VALUES (1,'hello');\n"
    );

    await createCLI().parseAsync(['node', 'sqldump', path]);

    expect(log.mock.calls).toEqual([
      ['notes (2 columns, 1 rows)'],
      ['  - id'],
      ['  - body'],
    ]);
    expect(process.exitCode).toBe(0);
  });
});
