/**
 * Logging Module
 *
 * Production code uses createPinoLogger() / getLogger().
 * Tests use RecordingLogger, which captures entries for assertions.
 */

export type {
  ILogger,
  LoggerConfig,
  LogLevel,
  LogMeta,
} from './types';

export {
  createPinoLogger,
  getLogger,
  resetLoggerCache,
  resolveLogLevel,
} from './pino-logger';

export { RecordingLogger } from './testing-logger';
export type { LogEntry } from './testing-logger';
