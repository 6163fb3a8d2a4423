/**
 * Unit tests for error classes
 */

import { describe, it, expect } from 'vitest';

import {
  HeraldError,
  ErrorCode,
  ValidationError,
  WorkerError,
  isHeraldError,
  isValidationError,
  toError,
  validResult,
  invalidResult,
} from '../../src/errors/index.js';

describe('HeraldError', () => {
  it('defaults to the UNKNOWN code', () => {
    const error = new HeraldError('something broke');
    expect(error.code).toBe(ErrorCode.UNKNOWN);
    expect(error.name).toBe('HeraldError');
    expect(error.meta).toEqual({});
  });

  it('serializes to a JSON error envelope', () => {
    const error = new HeraldError('cache sync', ErrorCode.CACHE_SYNC_TIMEOUT, { resourceType: 'secrets' });
    const json = error.toJSON();
    expect(json).toEqual({
      error: {
        name: 'HeraldError',
        code: ErrorCode.CACHE_SYNC_TIMEOUT,
        message: 'cache sync',
        meta: { resourceType: 'secrets' },
        timestamp: error.timestamp.toISOString(),
      },
    });
  });

  it('includes the cause message in log output', () => {
    const cause = new Error('socket hang up');
    const error = new HeraldError('list failed', ErrorCode.INTERNAL, {}, cause);
    expect(error.toLog().cause).toBe('socket hang up');
  });

  it('classifies fatal codes', () => {
    expect(new HeraldError('x', ErrorCode.VALIDATION_FAILED).isFatal()).toBe(true);
    expect(new HeraldError('x', ErrorCode.CACHE_SYNC_TIMEOUT).isFatal()).toBe(true);
    expect(new HeraldError('x', ErrorCode.WORKER_INIT_FAILED).isFatal()).toBe(true);
    expect(new HeraldError('x', ErrorCode.STALE_SNAPSHOT).isFatal()).toBe(false);
    expect(new HeraldError('x', ErrorCode.CANCELLED).isFatal()).toBe(false);
  });
});

describe('toError', () => {
  it('keeps Error instances', () => {
    const error = new TypeError('bad');
    expect(toError(error)).toBe(error);
  });

  it('converts other values', () => {
    expect(toError(42).message).toBe('42');
  });
});

describe('ValidationError', () => {
  it('builds a required-field error', () => {
    const error = ValidationError.required('namespace');
    expect(error.message).toBe('Missing required field: namespace');
    expect(error.code).toBe(ErrorCode.MISSING_REQUIRED_FIELD);
    expect(error.hasFieldError('namespace')).toBe(true);
    expect(error.isFatal()).toBe(true);
  });

  it('builds an invalid-format error', () => {
    const error = ValidationError.invalidFormat('loglevel', 'one of: debug|info');
    expect(error.message).toBe('Invalid format for field: loglevel');
    expect(error.getFieldErrors('loglevel')).toEqual([
      { field: 'loglevel', message: 'Expected one of: debug|info', code: 'INVALID_FORMAT' },
    ]);
  });

  it('builds an unresolved-reference error', () => {
    const error = ValidationError.unresolvedReference('trigger.on-sync', 'template', 'missing');
    expect(error.message).toBe("trigger.on-sync references undefined template 'missing'");
    expect(error.code).toBe(ErrorCode.UNRESOLVED_REFERENCE);
  });

  it('uses the single detail as the message', () => {
    const error = ValidationError.multiple([{ field: 'context', message: 'Must be a map', code: 'INVALID_TYPE' }]);
    expect(error.message).toBe('context: Must be a map');
    expect(error.meta.field).toBe('context');
  });

  it('lists unique fields for several details', () => {
    const error = ValidationError.multiple([
      { field: 'a', message: 'one', code: 'X' },
      { field: 'b', message: 'two', code: 'X' },
      { field: 'a', message: 'three', code: 'X' },
    ]);
    expect(error.message).toBe('Validation failed for fields: a, b');
    expect(error.details).toHaveLength(3);
    expect(error.code).toBe(ErrorCode.VALIDATION_FAILED);
  });

  it('includes details in JSON output', () => {
    const error = ValidationError.required('name');
    const json = error.toJSON();
    expect(json.error).toMatchObject({
      name: 'ValidationError',
      details: [{ field: 'name', message: 'This field is required', code: 'REQUIRED' }],
    });
  });

  it('is recognized by the type guards', () => {
    const error = ValidationError.required('x');
    expect(isValidationError(error)).toBe(true);
    expect(isHeraldError(error)).toBe(true);
    expect(error).not.toBeInstanceOf(WorkerError);
  });
});

describe('ValidationResult helpers', () => {
  it('wraps valid and invalid results', () => {
    expect(validResult(3)).toEqual({ valid: true, value: 3 });
    const error = ValidationError.required('x');
    expect(invalidResult(error)).toEqual({ valid: false, error });
  });
});

describe('WorkerError', () => {
  it('describes construction failures', () => {
    const error = WorkerError.constructionFailed(4, new Error('no templates'));
    expect(error.message).toBe('Failed to construct worker for generation 4: no templates');
    expect(error.code).toBe(ErrorCode.WORKER_CONSTRUCTION_FAILED);
    expect(error.generation).toBe(4);
    expect(error.meta).toEqual({ resourceType: 'worker', generation: 4 });
    expect(error.isFatal()).toBe(true);
  });

  it('describes initialization failures', () => {
    const error = WorkerError.initFailed(2, new Error('informer down'));
    expect(error.message).toBe('Failed to initialize worker for generation 2: informer down');
    expect(error.code).toBe(ErrorCode.WORKER_INIT_FAILED);
    expect(error.cause?.message).toBe('informer down');
  });

  it('describes stale snapshots as non-fatal', () => {
    const error = WorkerError.staleSnapshot(3, 5);
    expect(error.message).toBe('Snapshot generation 3 is not newer than running generation 5');
    expect(error.meta.current).toBe(5);
    expect(error.isFatal()).toBe(false);
    expect(isHeraldError(error)).toBe(true);
  });
});
