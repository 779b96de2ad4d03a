/**
 * Parser configuration and environment lookups.
 *
 * @module config
 */

import { DEFAULT_ENGINE_MARKER } from './extract.js';
import { isLogLevel, silentLogger, type LogLevel, type Logger } from './logger.js';

// =============================================================================
// Parser Configuration
// =============================================================================

/**
 * Options accepted by parseDump and loadDump
 */
export interface ParserConfig {
  /**
   * Marker that must follow the closing paren of a CREATE TABLE body.
   * @default 'ENGINE='
   */
  engineMarker?: string;

  /**
   * Diagnostic channel for found tables, inserted rows and skipped statements.
   * @default a silent logger
   */
  logger?: Logger;
}

/**
 * Fill in defaults for every option
 */
export function resolveParserConfig(config: ParserConfig = {}): Required<ParserConfig> {
  return {
    engineMarker: config.engineMarker || DEFAULT_ENGINE_MARKER,
    logger: config.logger ?? silentLogger,
  };
}

// =============================================================================
// Environment
// =============================================================================

/**
 * Environment variables consulted for the log level, highest priority first.
 * The generic `LOG_LEVEL` is not read.
 */
export const LOG_LEVEL_ENV_VARS = ['SQLDUMP_LOG_LEVEL'] as const;

/**
 * Get log level from environment variables
 * @returns The first valid level found, or undefined
 */
export function getLogLevelFromEnv(
  env: Record<string, string | undefined> = process.env
): LogLevel | undefined {
  for (const name of LOG_LEVEL_ENV_VARS) {
    const value = env[name]?.trim().toLowerCase();
    if (value && isLogLevel(value)) {
      return value;
    }
  }
  return undefined;
}
