/**
 * sqldump - reconstruct tables and rows from a MySQL-style SQL dump without
 * a database engine.
 *
 * @example
 * ```typescript
 * import { loadDump, formatValue } from 'sqldump';
 *
 * const { registry } = await loadDump('./backup.sql');
 * const users = registry.get('users');
 * users?.rows.forEach(row => console.log(row.map(formatValue).join(' | ')));
 * ```
 *
 * @packageDocumentation
 */

// Types
export type {
  ColumnName,
  FloatValue,
  InsertStatement,
  IntegerValue,
  NullValue,
  Row,
  SchemaStatement,
  TableData,
  TableSchema,
  TextValue,
  Value,
  ValueKind,
} from './types.js';

// Values
export {
  INT64_MAX,
  INT64_MIN,
  floatValue,
  formatValue,
  integerValue,
  isInt64,
  nullValue,
  textValue,
  valueToJSON,
} from './values.js';

// Pipeline stages
export {
  DEFAULT_ENGINE_MARKER,
  extractInsertStatements,
  extractSchemaStatements,
  parseExplicitColumns,
} from './extract.js';
export {
  NON_COLUMN_PREFIXES,
  extractColumnName,
  isConstraintFragment,
  parseColumnDefinitions,
  splitTopLevel,
} from './columns.js';
export { splitTuples } from './tuples.js';
export { coerceToken, coerceTuple, stripOuterParens, tokenizeTuple, unescapeString } from './coerce.js';
export {
  TableRegistry,
  projectRow,
  type InsertOutcome,
  type ReadonlyTableRegistry,
} from './registry.js';

// Entry points
export { parseDump, type ParseResult, type ParseStats } from './parse.js';
export { loadDump, readDumpText } from './load.js';
export {
  registryToJSON,
  tableToJSON,
  type JSONScalar,
  type SerializeOptions,
  type TableJSON,
} from './serialize.js';

// Ambient
export {
  LOG_LEVEL_ENV_VARS,
  getLogLevelFromEnv,
  resolveParserConfig,
  type ParserConfig,
} from './config.js';
export {
  LOG_LEVELS,
  Logger,
  createLogger,
  isLogLevel,
  silentLogger,
  type LogLevel,
  type LoggerOptions,
} from './logger.js';
export {
  DumpDecodeError,
  DumpNotFoundError,
  DumpReadError,
  ErrorCategory,
  SqlDumpError,
  UnknownTableError,
  getErrorMessage,
  hasErrorCode,
  toError,
  type ErrorContext,
  type SerializedError,
} from './errors.js';
