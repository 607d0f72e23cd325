/**
 * Recording Logger
 *
 * In-memory ILogger for asserting what an estimator logged.
 *
 * @example
 * ```typescript
 * const logger = new RecordingLogger();
 * const rolling = new Rolling(new Mean(), 3, { logger });
 * expect(logger.getLogs('fatal')).toHaveLength(0);
 * ```
 */

import type { ILogger, LogLevel, LogMeta } from './types';

export interface LogEntry {
  level: LogLevel;
  msg: string;
  meta?: LogMeta;
  /** Bindings of the child logger that wrote the entry */
  bindings?: LogMeta;
}

/**
 * Children write into their parent's entry list.
 */
export class RecordingLogger implements ILogger {
  private readonly entries: LogEntry[];
  private readonly bindings?: LogMeta;

  constructor(bindings?: LogMeta, entries: LogEntry[] = []) {
    this.bindings = bindings;
    this.entries = entries;
  }

  fatal(msg: string, meta?: LogMeta): void {
    this.record('fatal', msg, meta);
  }

  error(msg: string, meta?: LogMeta): void {
    this.record('error', msg, meta);
  }

  warn(msg: string, meta?: LogMeta): void {
    this.record('warn', msg, meta);
  }

  info(msg: string, meta?: LogMeta): void {
    this.record('info', msg, meta);
  }

  debug(msg: string, meta?: LogMeta): void {
    this.record('debug', msg, meta);
  }

  child(bindings: LogMeta): ILogger {
    return new RecordingLogger({ ...this.bindings, ...bindings }, this.entries);
  }

  getLogs(level: LogLevel): ReadonlyArray<LogEntry> {
    return this.entries.filter((entry) => entry.level === level);
  }

  getWarnings(): ReadonlyArray<LogEntry> {
    return this.getLogs('warn');
  }

  hasLogMatching(level: LogLevel, pattern: string | RegExp): boolean {
    return this.getLogs(level).some((entry) =>
      typeof pattern === 'string' ? entry.msg.includes(pattern) : pattern.test(entry.msg)
    );
  }

  /**
   * True if some entry at `level` carries every given meta key with an equal value.
   */
  hasLogWithMeta(level: LogLevel, meta: LogMeta): boolean {
    return this.getLogs(level).some(({ meta: recorded }) =>
      recorded !== undefined && Object.entries(meta).every(([key, value]) => recorded[key] === value)
    );
  }

  private record(level: LogLevel, msg: string, meta?: LogMeta): void {
    this.entries.push({
      level,
      msg,
      meta: meta ? { ...meta } : undefined,
      bindings: this.bindings ? { ...this.bindings } : undefined,
    });
  }
}
