/**
 * Dump Loader
 *
 * Reads a dump file into memory and parses it. Failing to open or decode
 * the file is the only fatal outcome.
 */

import { promises as fs } from 'node:fs';
import type { ParserConfig } from './config.js';
import {
  DumpDecodeError,
  DumpNotFoundError,
  DumpReadError,
  hasErrorCode,
  toError,
} from './errors.js';
import { parseDump, type ParseResult } from './parse.js';

/**
 * Read a dump file as UTF-8 text.
 *
 * A leading byte order mark is dropped. Bytes that are not valid UTF-8 are
 * rejected rather than replaced.
 *
 * @throws DumpNotFoundError if nothing exists at `path`
 * @throws DumpReadError if the file cannot be read
 * @throws DumpDecodeError if the content is not valid UTF-8
 */
export async function readDumpText(path: string): Promise<string> {
  let bytes: Uint8Array;
  try {
    bytes = await fs.readFile(path);
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) {
      throw new DumpNotFoundError(path, { cause: toError(error) });
    }
    throw new DumpReadError(path, { cause: toError(error) });
  }

  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
  } catch (error) {
    throw new DumpDecodeError(path, { cause: toError(error) });
  }
}

/**
 * Read and parse a dump file.
 *
 * @example
 * ```typescript
 * const { registry } = await loadDump('./backup.sql');
 * if (registry.size === 0) {
 *   console.log('No tables found in the SQL dump.');
 * }
 * ```
 */
export async function loadDump(path: string, config: ParserConfig = {}): Promise<ParseResult> {
  const text = await readDumpText(path);
  return parseDump(text, config);
}
