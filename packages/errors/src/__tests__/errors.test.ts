/**
 * Tests for toolkit errors and error helpers
 */

import { describe, it, expect } from 'vitest';

import {
  ConfigurationError,
  ErrorCategory,
  HandlerContractError,
  ReboundError,
  describeError,
  extractErrorInfo,
  matchesErrorType,
} from '../index.js';

class TransientError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TransientError';
  }
}

class ThrottledError extends TransientError {}

describe('Error Types', () => {
  describe('ConfigurationError', () => {
    it('should carry code, category and issues', () => {
      const error = new ConfigurationError('Invalid expo schedule', {
        issues: ['maxMs: Number must be greater than 0'],
      });

      expect(error.message).toBe('Invalid expo schedule');
      expect(error.code).toBe('CONFIGURATION_ERROR');
      expect(error.name).toBe('ConfigurationError');
      expect(error.metadata.category).toBe(ErrorCategory.CONFIGURATION);
      expect(error.getFormattedIssues()).toEqual(['maxMs: Number must be greater than 0']);
      expect(error.metadata.data).toEqual({ issues: ['maxMs: Number must be greater than 0'] });
    });

    it('should have proper prototype chain for instanceof checks', () => {
      const error = new ConfigurationError('bad');

      expect(error instanceof Error).toBe(true);
      expect(error instanceof ReboundError).toBe(true);
      expect(error instanceof ConfigurationError).toBe(true);
    });

    it('should format error for logging', () => {
      const cause = new Error('file missing');
      const error = new ConfigurationError('Policy file unreadable', { cause });

      expect(error.toLogFormat()).toEqual({
        name: 'ConfigurationError',
        message: 'Policy file unreadable',
        code: 'CONFIGURATION_ERROR',
        category: ErrorCategory.CONFIGURATION,
        cause: 'file missing',
      });
    });
  });

  describe('HandlerContractError', () => {
    it('should record the event and target', () => {
      const error = new HandlerContractError('async handler', {
        event: 'backoff',
        target: 'fetchUser',
      });

      expect(error.code).toBe('HANDLER_CONTRACT_ERROR');
      expect(error.metadata.category).toBe(ErrorCategory.HANDLER);
      expect(error.metadata.data).toEqual({ event: 'backoff', target: 'fetchUser' });
    });
  });
});

describe('Error Utils', () => {
  describe('matchesErrorType', () => {
    it('should match a single class and its subclasses', () => {
      expect(matchesErrorType(new TransientError('x'), TransientError)).toBe(true);
      expect(matchesErrorType(new ThrottledError('x'), TransientError)).toBe(true);
      expect(matchesErrorType(new TypeError('x'), TransientError)).toBe(false);
    });

    it('should match any class of a list', () => {
      expect(matchesErrorType(new RangeError('x'), [TypeError, RangeError])).toBe(true);
      expect(matchesErrorType(new Error('x'), [TypeError, RangeError])).toBe(false);
    });

    it('should never match thrown non-errors', () => {
      expect(matchesErrorType('boom', Error)).toBe(false);
      expect(matchesErrorType(undefined, [Error])).toBe(false);
    });
  });

  describe('describeError', () => {
    it('should describe errors by name and message', () => {
      expect(describeError(new TransientError('socket hang up'))).toBe(
        'TransientError: socket hang up'
      );
      expect(describeError(new TypeError(''))).toBe('TypeError');
      expect(describeError(42)).toBe('42');
    });
  });

  describe('extractErrorInfo', () => {
    it('should use the log format of toolkit errors', () => {
      const info = extractErrorInfo(new HandlerContractError('nope'));
      expect(info).toMatchObject({ code: 'HANDLER_CONTRACT_ERROR', category: 'handler' });
    });

    it('should handle plain errors and other values', () => {
      expect(extractErrorInfo(new Error('plain'))).toMatchObject({
        name: 'Error',
        message: 'plain',
      });
      expect(extractErrorInfo('text')).toEqual({ error: 'text' });
    });
  });
});
