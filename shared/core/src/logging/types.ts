/**
 * Logger Type Definitions
 *
 * Defines the ILogger interface that decouples estimators from pino.
 * Estimators accept an ILogger through their options so tests can inject
 * a RecordingLogger and assert on what was logged.
 */

/**
 * Log level union type for type-safe level checking.
 */
export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

/**
 * Metadata object that can be attached to log entries.
 */
export type LogMeta = Record<string, unknown>;

/**
 * Core logger interface.
 *
 * All logging implementations (Pino, RecordingLogger)
 * must implement this interface.
 *
 * @example
 * ```typescript
 * const rolling = new Rolling(new Mean(), 10, { logger: createPinoLogger('latency-mean') });
 *
 * // Test
 * const logger = new RecordingLogger();
 * const rolling = new Rolling(new Mean(), 10, { logger });
 * ```
 */
export interface ILogger {
  fatal(msg: string, meta?: LogMeta): void;
  error(msg: string, meta?: LogMeta): void;
  warn(msg: string, meta?: LogMeta): void;
  info(msg: string, meta?: LogMeta): void;
  debug(msg: string, meta?: LogMeta): void;
  trace?(msg: string, meta?: LogMeta): void;

  /**
   * Create a child logger with additional context.
   * The context is merged into every log entry from the child.
   */
  child(bindings: LogMeta): ILogger;

  /**
   * Check if a given log level is enabled.
   */
  isLevelEnabled?(level: LogLevel): boolean;
}

/**
 * Configuration for logger creation.
 */
export interface LoggerConfig {
  /**
   * Module name for log identification.
   */
  name: string;

  /**
   * Minimum log level to output.
   * @default process.env.LOG_LEVEL ?? 'info'
   */
  level?: LogLevel;

  /**
   * Enable pretty printing (development mode).
   * @default process.env.NODE_ENV === 'development'
   */
  pretty?: boolean;

  /**
   * Additional context to include in every log entry.
   */
  bindings?: LogMeta;
}
