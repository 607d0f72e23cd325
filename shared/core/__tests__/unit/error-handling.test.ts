/**
 * Error Handling Unit Tests
 *
 * Tests for the error taxonomy and Result helpers.
 */

import { describe, it, expect } from '@jest/globals';

import {
  StatsError,
  ValidationError,
  InvariantError,
  ErrorCode,
  ErrorSeverity,
  success,
  failure,
  tryCatchSync,
  formatErrorForLog,
} from '../../src/error-handling';

// =============================================================================
// Custom Error Classes Tests
// =============================================================================

describe('StatsError', () => {
  it('should create error with default values', () => {
    const error = new StatsError('Test error');

    expect(error.message).toBe('Test error');
    expect(error.name).toBe('StatsError');
    expect(error.code).toBe(ErrorCode.UNKNOWN_ERROR);
    expect(error.severity).toBe(ErrorSeverity.ERROR);
    expect(error.timestamp).toBeGreaterThan(0);
  });

  it('should create error with options', () => {
    const cause = new Error('Original');
    const error = new StatsError('Test error', ErrorCode.INVALID_STATE, {
      severity: ErrorSeverity.WARNING,
      context: { structure: 'test' },
      cause,
    });

    expect(error.code).toBe(ErrorCode.INVALID_STATE);
    expect(error.severity).toBe(ErrorSeverity.WARNING);
    expect(error.context).toEqual({ structure: 'test' });
    expect(error.cause).toBe(cause);
  });

  it('should serialize to JSON', () => {
    const error = new StatsError('Test error', ErrorCode.INVALID_ARGUMENT, {
      cause: new Error('root cause'),
    });
    const json = error.toJSON();

    expect(json.name).toBe('StatsError');
    expect(json.message).toBe('Test error');
    expect(json.code).toBe(ErrorCode.INVALID_ARGUMENT);
    expect(json.severity).toBe(ErrorSeverity.ERROR);
    expect(json.cause).toBe('root cause');
  });

  it('should be an instance of Error', () => {
    expect(new StatsError('x')).toBeInstanceOf(Error);
  });
});

describe('ValidationError', () => {
  it('should default to VALIDATION_FAILED with WARNING severity', () => {
    const error = new ValidationError('Bad input');

    expect(error.name).toBe('ValidationError');
    expect(error.code).toBe(ErrorCode.VALIDATION_FAILED);
    expect(error.severity).toBe(ErrorSeverity.WARNING);
    expect(error.issues).toEqual([]);
  });

  it('should carry field, received value and issues', () => {
    const error = new ValidationError('Invalid q', {
      code: ErrorCode.INVALID_ARGUMENT,
      field: 'q',
      receivedValue: 1.5,
      issues: ['Quantile cannot exceed 1'],
    });

    expect(error.code).toBe(ErrorCode.INVALID_ARGUMENT);
    expect(error.field).toBe('q');
    expect(error.receivedValue).toBe(1.5);
    expect(error.issues).toEqual(['Quantile cannot exceed 1']);
    expect(error.context).toEqual({
      field: 'q',
      receivedValue: 1.5,
      issues: ['Quantile cannot exceed 1'],
    });
    expect(error).toBeInstanceOf(StatsError);
  });
});

describe('InvariantError', () => {
  it('should be critical and name its structure', () => {
    const error = new InvariantError('Window is empty', 'SortedWindow', {
      code: ErrorCode.EMPTY_WINDOW,
    });

    expect(error.name).toBe('InvariantError');
    expect(error.structure).toBe('SortedWindow');
    expect(error.code).toBe(ErrorCode.EMPTY_WINDOW);
    expect(error.severity).toBe(ErrorSeverity.CRITICAL);
    expect(error.context).toEqual({ structure: 'SortedWindow' });
  });

  it('should default to INVALID_STATE', () => {
    expect(new InvariantError('broken', 'Rolling').code).toBe(ErrorCode.INVALID_STATE);
  });
});

// =============================================================================
// Result Type Tests
// =============================================================================

describe('Result helpers', () => {
  it('should create success result', () => {
    expect(success(42)).toEqual({ success: true, data: 42 });
  });

  it('should create failure result', () => {
    const error = new StatsError('Failed');
    expect(failure(error)).toEqual({ success: false, error });
  });

  describe('tryCatchSync', () => {
    it('should return success for a returning function', () => {
      expect(tryCatchSync(() => 'ok')).toEqual({ success: true, data: 'ok' });
    });

    it('should keep StatsError instances as they are', () => {
      const thrown = new ValidationError('nope');
      const result = tryCatchSync(() => {
        throw thrown;
      });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toBe(thrown);
      }
    });

    it('should wrap plain errors with the given code', () => {
      const result = tryCatchSync(() => {
        throw new Error('boom');
      }, ErrorCode.INVALID_CONFIG);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toBeInstanceOf(StatsError);
        expect(result.error.message).toBe('boom');
        expect(result.error.code).toBe(ErrorCode.INVALID_CONFIG);
        expect(result.error.cause?.message).toBe('boom');
      }
    });

    it('should wrap thrown non-errors', () => {
      const result = tryCatchSync(() => {
        throw 'plain string';
      });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.message).toBe('plain string');
        expect(result.error.code).toBe(ErrorCode.UNKNOWN_ERROR);
      }
    });
  });
});

// =============================================================================
// Formatting Tests
// =============================================================================

describe('formatErrorForLog', () => {
  it('should format errors for logging', () => {
    const plain = new Error('plain');
    expect(formatErrorForLog(plain)).toEqual({
      name: 'Error',
      message: 'plain',
      stack: plain.stack,
    });

    const stats = new InvariantError('bad', 'Rolling', { code: ErrorCode.REVERT_FAILED });
    const formatted = formatErrorForLog(stats);
    expect(formatted.code).toBe(ErrorCode.REVERT_FAILED);
    expect(formatted.severity).toBe(ErrorSeverity.CRITICAL);
  });
});
