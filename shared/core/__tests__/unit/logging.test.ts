/**
 * Logging Module Tests
 *
 * Verifies:
 * - ILogger interface compliance
 * - Singleton caching behavior
 * - LOG_LEVEL resolution
 * - RecordingLogger for test assertions
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';

import {
  createPinoLogger,
  getLogger,
  resetLoggerCache,
  resolveLogLevel,
  RecordingLogger,
} from '../../src/logging';
import type { ILogger } from '../../src/logging';

describe('Logging Module', () => {
  beforeEach(() => {
    resetLoggerCache();
  });

  afterEach(() => {
    resetLoggerCache();
  });

  describe('createPinoLogger', () => {
    it('should create a logger with string config', () => {
      const logger = createPinoLogger('test-module');
      expect(typeof logger.info).toBe('function');
      expect(typeof logger.fatal).toBe('function');
    });

    it('should return cached instance for same name', () => {
      const logger1 = createPinoLogger({ name: 'cached', pretty: false });
      const logger2 = createPinoLogger('cached');
      expect(logger1).toBe(logger2);
    });

    it('should create different instances for different names', () => {
      expect(createPinoLogger('module-a')).not.toBe(createPinoLogger('module-b'));
    });

    it('should honour an explicit level', () => {
      const logger = createPinoLogger({ name: 'quiet', level: 'error', pretty: false });
      expect(logger.isLevelEnabled?.('error')).toBe(true);
      expect(logger.isLevelEnabled?.('warn')).toBe(false);
    });

    it('should return an uncached child when bindings are given', () => {
      const base = createPinoLogger({ name: 'with-bindings', pretty: false });
      const child = createPinoLogger({ name: 'with-bindings', bindings: { estimator: 'mean' } });
      expect(child).not.toBe(base);
    });
  });

  describe('getLogger', () => {
    it('should alias createPinoLogger', () => {
      expect(getLogger('alias')).toBe(createPinoLogger('alias'));
    });
  });

  describe('resolveLogLevel', () => {
    it('should prefer an explicit level', () => {
      expect(resolveLogLevel('debug', { LOG_LEVEL: 'error' })).toBe('debug');
    });

    it('should read LOG_LEVEL', () => {
      expect(resolveLogLevel(undefined, { LOG_LEVEL: 'warn' })).toBe('warn');
    });

    it('should fall back to info on unknown values', () => {
      expect(resolveLogLevel(undefined, { LOG_LEVEL: 'loud' })).toBe('info');
      expect(resolveLogLevel(undefined, {})).toBe('info');
    });
  });

  describe('RecordingLogger', () => {
    let logger: RecordingLogger;

    beforeEach(() => {
      logger = new RecordingLogger();
    });

    it('should record entries with level, message and meta', () => {
      logger.fatal('revert failed', { evicted: 3 });

      expect(logger.getLogs('fatal')).toEqual([
        { level: 'fatal', msg: 'revert failed', meta: { evicted: 3 }, bindings: undefined },
      ]);
    });

    it('should filter by level', () => {
      logger.info('one');
      logger.warn('two');
      logger.error('three');

      expect(logger.getWarnings().map((e) => e.msg)).toEqual(['two']);
      expect(logger.getLogs('error').map((e) => e.msg)).toEqual(['three']);
      expect(logger.getLogs('debug')).toEqual([]);
    });

    it('should match messages and metadata', () => {
      logger.debug('Estimator created', { kind: 'mean' });

      expect(logger.hasLogMatching('debug', 'created')).toBe(true);
      expect(logger.hasLogMatching('debug', /^Estimator/)).toBe(true);
      expect(logger.hasLogMatching('info', 'created')).toBe(false);
      expect(logger.hasLogWithMeta('debug', { kind: 'mean' })).toBe(true);
      expect(logger.hasLogWithMeta('debug', { kind: 'sum' })).toBe(false);
    });

    it('should share entries with children and keep their bindings', () => {
      const child: ILogger = logger.child({ component: 'rolling' });
      child.warn('from child');

      expect(logger.getWarnings()).toEqual([
        { level: 'warn', msg: 'from child', meta: undefined, bindings: { component: 'rolling' } },
      ]);
    });

    it('should merge bindings of nested children', () => {
      logger.child({ component: 'rolling' }).child({ windowSize: 3 }).fatal('x');

      expect(logger.getLogs('fatal')[0].bindings).toEqual({ component: 'rolling', windowSize: 3 });
    });
  });
});
