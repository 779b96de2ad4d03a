/**
 * SQL Dump Error Hierarchy
 *
 * Fatal errors raised while loading a dump. Statement-level problems inside
 * a dump are never errors: the parser logs them and skips the statement.
 *
 * All errors extend SqlDumpError which provides:
 * - Required error codes
 * - Timestamps
 * - Context preservation
 * - Serialization for JSON output
 *
 * @packageDocumentation
 */

// =============================================================================
// Error Context
// =============================================================================

/**
 * Context that can be attached to any error
 */
export interface ErrorContext {
  /** Path of the dump file involved */
  path?: string;
  /** Table name involved */
  table?: string;
  /** Additional metadata */
  metadata?: Record<string, unknown>;
}

/**
 * Serialized error format for JSON output
 */
export interface SerializedError {
  name: string;
  code: string;
  category: ErrorCategory;
  message: string;
  timestamp: number;
  context?: ErrorContext;
  cause?: { name: string; message: string };
}

// =============================================================================
// Error Categories
// =============================================================================

/**
 * High-level error categories
 */
export enum ErrorCategory {
  /** Missing files */
  RESOURCE = 'RESOURCE',
  /** Input that cannot be read as a dump */
  VALIDATION = 'VALIDATION',
  /** Unexpected I/O failures */
  IO = 'IO',
}

// =============================================================================
// Base Error
// =============================================================================

/**
 * Base error class for all SQL dump errors
 *
 * @example
 * ```typescript
 * try {
 *   await loadDump('./backup.sql');
 * } catch (error) {
 *   if (error instanceof SqlDumpError) {
 *     console.error(error.code);            // 'DUMP_NOT_FOUND'
 *     console.error(error.toUserMessage());
 *   }
 * }
 * ```
 */
export abstract class SqlDumpError extends Error {
  /** Machine-readable error code */
  abstract readonly code: string;

  /** Error category for consistent handling */
  abstract readonly category: ErrorCategory;

  /** Timestamp when error occurred */
  readonly timestamp: number;

  /** Error context */
  context?: ErrorContext;

  constructor(message: string, options?: { cause?: Error; context?: ErrorContext }) {
    super(message, { cause: options?.cause });
    this.timestamp = Date.now();
    this.context = options?.context;

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Get a user-friendly error message
   */
  toUserMessage(): string {
    return this.message;
  }

  /**
   * Serialize error for JSON output
   */
  toJSON(): SerializedError {
    const result: SerializedError = {
      name: this.name,
      code: this.code,
      category: this.category,
      message: this.message,
      timestamp: this.timestamp,
    };

    if (this.context) {
      result.context = this.context;
    }

    if (this.cause instanceof Error) {
      result.cause = { name: this.cause.name, message: this.cause.message };
    }

    return result;
  }
}

// =============================================================================
// Load Errors
// =============================================================================

/**
 * The dump file does not exist
 */
export class DumpNotFoundError extends SqlDumpError {
  readonly code = 'DUMP_NOT_FOUND';
  readonly category = ErrorCategory.RESOURCE;

  constructor(path: string, options?: { cause?: Error }) {
    super(`File '${path}' not found.`, { cause: options?.cause, context: { path } });
    this.name = 'DumpNotFoundError';
  }
}

/**
 * The dump file exists but could not be read
 */
export class DumpReadError extends SqlDumpError {
  readonly code = 'DUMP_READ_FAILED';
  readonly category = ErrorCategory.IO;

  constructor(path: string, options?: { cause?: Error }) {
    const reason = options?.cause ? `: ${options.cause.message}` : '';
    super(`Error reading file '${path}'${reason}`, { cause: options?.cause, context: { path } });
    this.name = 'DumpReadError';
  }
}

/**
 * The dump file is not valid UTF-8
 */
export class DumpDecodeError extends SqlDumpError {
  readonly code = 'DUMP_DECODE_FAILED';
  readonly category = ErrorCategory.VALIDATION;

  constructor(path: string, options?: { cause?: Error }) {
    super(`File '${path}' is not valid UTF-8 text.`, { cause: options?.cause, context: { path } });
    this.name = 'DumpDecodeError';
  }

  toUserMessage(): string {
    return `${this.message} Re-export the dump with a UTF-8 character set.`;
  }
}

/**
 * A table was requested by name but the dump does not define it
 */
export class UnknownTableError extends SqlDumpError {
  readonly code = 'TABLE_NOT_FOUND';
  readonly category = ErrorCategory.RESOURCE;

  constructor(table: string, available: readonly string[] = []) {
    super(`Table '${table}' not found in the SQL dump.`, {
      context: { table, metadata: { available: [...available] } },
    });
    this.name = 'UnknownTableError';
  }

  toUserMessage(): string {
    const available = this.context?.metadata?.available;
    if (Array.isArray(available) && available.length > 0) {
      return `${this.message} Available tables: ${available.join(', ')}`;
    }
    return this.message;
  }
}

// =============================================================================
// Coercion Helpers
// =============================================================================

/**
 * Coerces an unknown value to an Error instance.
 * If the value is already an Error, returns it as-is.
 * Otherwise, converts it to a string and wraps it in a new Error.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Extracts the error message from an unknown error value.
 */
export function getErrorMessage(error: unknown): string {
  return toError(error).message;
}

/**
 * Check for a Node.js system error with the given code (ENOENT, EISDIR, ...)
 */
export function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}
