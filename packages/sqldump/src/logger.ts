/**
 * Leveled logging for parser diagnostics and CLI output.
 *
 * `parseDump` reports found tables, inserted rows and skipped statements
 * through the logger in its config and falls back to `silentLogger`. The CLI
 * builds two instances: one for its own output, one at the diagnostic level
 * handed to the parser.
 */

/**
 * Log levels for filtering output.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/**
 * Logger configuration options.
 */
export interface LoggerOptions {
  /**
   * Minimum log level to output.
   * @default 'info'
   */
  level?: LogLevel;

  /**
   * Output function for info/debug messages.
   * @default console.log
   */
  stdout?: (...args: unknown[]) => void;

  /**
   * Output function for error/warning messages.
   * @default console.error
   */
  stderr?: (...args: unknown[]) => void;
}

export const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

/**
 * Check whether a string names a log level
 */
export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

export class Logger {
  private level: LogLevel;
  private stdout: (...args: unknown[]) => void;
  private stderr: (...args: unknown[]) => void;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.stdout = options.stdout ?? console.log;
    this.stderr = options.stderr ?? console.error;
  }

  /**
   * Checks if a log level should be output.
   */
  isEnabled(level: LogLevel): boolean {
    return level !== 'silent' && LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  debug(message: string): void {
    if (this.isEnabled('debug')) {
      this.stdout(`[DEBUG] ${message}`);
    }
  }

  info(message: string): void {
    if (this.isEnabled('info')) {
      this.stdout(message);
    }
  }

  warn(message: string): void {
    if (this.isEnabled('warn')) {
      this.stderr(`Warning: ${message}`);
    }
  }

  error(message: string): void {
    if (this.isEnabled('error')) {
      this.stderr(`Error: ${message}`);
    }
  }

  /**
   * Logs a list of items with bullet points.
   */
  list(items: readonly string[], indent = 2): void {
    if (this.isEnabled('info')) {
      const prefix = ' '.repeat(indent) + '- ';
      items.forEach(item => this.stdout(`${prefix}${item}`));
    }
  }
}

/**
 * Creates a new logger instance with custom options.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  return new Logger(options);
}

/**
 * Logger that discards everything. Default for the parser.
 */
export const silentLogger = new Logger({ level: 'silent' });
