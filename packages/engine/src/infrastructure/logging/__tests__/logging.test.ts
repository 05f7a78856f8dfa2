/**
 * @fileoverview Tests for logger construction, logging context and error categorization
 */

import { describe, it, expect } from 'vitest';
import {
  categorizeError,
  createLogger,
  getLoggingContext,
  HookLogger,
  isLogLevel,
  LogErrorCategory,
  LogErrorCodes,
  withLoggingContext,
} from '../index.js';

describe('logger', () => {
  it('should accept only pino level names from LOG_LEVEL', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('fatal')).toBe(true);
    expect(isLogLevel('DEBUG')).toBe(false);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel(undefined)).toBe(false);
  });

  it('should create component loggers', () => {
    expect(createLogger('hooks:test')).toBeInstanceOf(HookLogger);
  });
});

describe('logging context', () => {
  it('should be empty outside a context', () => {
    expect(getLoggingContext()).toEqual({});
  });

  it('should merge nested contexts', async () => {
    await withLoggingContext({ sessionId: 'sess-1', dispatchId: 'd-1' }, async () => {
      await withLoggingContext({ ruleId: 'rule-a' }, async () => {
        expect(getLoggingContext()).toEqual({ sessionId: 'sess-1', dispatchId: 'd-1', ruleId: 'rule-a' });
      });
      expect(getLoggingContext()).toEqual({ sessionId: 'sess-1', dispatchId: 'd-1' });
    });
  });

  it('should keep concurrent contexts apart', async () => {
    const seen: string[] = [];
    await Promise.all(
      ['a', 'b'].map(id =>
        withLoggingContext({ dispatchId: id }, async () => {
          await new Promise(resolve => setTimeout(resolve, id === 'a' ? 20 : 5));
          seen.push(`${id}:${getLoggingContext().dispatchId}`);
        })
      )
    );
    expect(seen.sort()).toEqual(['a:a', 'b:b']);
  });
});

describe('categorizeError', () => {
  function withProperty(message: string, key: string, value: unknown): Error {
    return Object.assign(new Error(message), { [key]: value });
  }

  it('should classify HTTP status codes', () => {
    const structured = categorizeError(withProperty('Too many', 'status', 429), { model: 'm' });
    expect(structured.category).toBe(LogErrorCategory.PROMPT_BACKEND);
    expect(structured.code).toBe(LogErrorCodes.PRMT_RATE_LIMIT);
    expect(structured.retryable).toBe(true);
    expect(structured.context).toEqual({ model: 'm', status: 429 });
  });

  it('should classify Node error codes', () => {
    const structured = categorizeError(withProperty('spawn nope ENOENT', 'code', 'ENOENT'));
    expect(structured.code).toBe(LogErrorCodes.FS_NOT_FOUND);
    expect(structured.context).toEqual({ nodeCode: 'ENOENT' });
  });

  it('should classify by message', () => {
    expect(categorizeError(new Error('operation timed out')).code).toBe(LogErrorCodes.HOOK_TIMEOUT);
    expect(categorizeError(new Error('The operation was aborted')).code).toBe(LogErrorCodes.HOOK_CANCELLED);
    expect(categorizeError(new SyntaxError('Unexpected token')).code).toBe(LogErrorCodes.HOUT_MALFORMED);
    expect(categorizeError(new Error('API is overloaded')).code).toBe(LogErrorCodes.PRMT_UNAVAILABLE);
  });

  it('should wrap non-errors', () => {
    const structured = categorizeError('plain string');
    expect(structured.category).toBe(LogErrorCategory.UNKNOWN);
    expect(structured.message).toBe('plain string');
    expect(structured.cause).toBeInstanceOf(Error);
  });
});
