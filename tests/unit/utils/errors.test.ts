import { describe, it, expect } from 'vitest';
import {
  BurstgenError,
  CancelledError,
  ConfigError,
  ContractViolationError,
  ErrorCode,
  FileIOError,
  SchemaError,
  isCancelled,
} from '../../../src/utils/errors.js';

describe('Errors', () => {
  it('should create BurstgenError with correct properties', () => {
    const error = new BurstgenError(ErrorCode.GENERAL_ERROR, 'test message', { detail: 'extra' });
    expect(error.message).toBe('test message');
    expect(error.code).toBe(ErrorCode.GENERAL_ERROR);
    expect(error.details).toEqual({ detail: 'extra' });
    expect(error.name).toBe('BurstgenError');
  });

  it('should create ConfigError with correct properties', () => {
    const error = new ConfigError('config error');
    expect(error.message).toBe('config error');
    expect(error.code).toBe(ErrorCode.CONFIG_ERROR);
    expect(error.name).toBe('ConfigError');
  });

  it('should create FileIOError with correct properties', () => {
    const error = new FileIOError('io error');
    expect(error.code).toBe(ErrorCode.FILE_IO_ERROR);
    expect(error.name).toBe('FileIOError');
  });

  it('should create SchemaError with correct properties', () => {
    const error = new SchemaError('schema error');
    expect(error.code).toBe(ErrorCode.SCHEMA_ERROR);
    expect(error.name).toBe('SchemaError');
  });

  it('should create ContractViolationError with details', () => {
    const error = new ContractViolationError('bad type', { field: 'price' });
    expect(error.code).toBe(ErrorCode.CONTRACT_VIOLATION);
    expect(error.details).toEqual({ field: 'price' });
    expect(error).toBeInstanceOf(BurstgenError);
  });

  it('should default the CancelledError message', () => {
    const error = new CancelledError();
    expect(error.message).toBe('operation cancelled');
    expect(error.code).toBe(ErrorCode.CANCELLED);
    expect(isCancelled(error)).toBe(true);
    expect(isCancelled(new Error('operation cancelled'))).toBe(false);
  });

  it('should convert to response format', () => {
    const error = new ConfigError('config error', { errors: ['a'] });
    expect(error.toResponse('validation')).toEqual({
      status: 'error',
      phase: 'validation',
      error: {
        code: ErrorCode.CONFIG_ERROR,
        message: 'config error',
        details: { errors: ['a'] },
      },
    });
  });

  it('should include the cause in the response', () => {
    const error = new FileIOError('failed', undefined, { cause: new Error('ENOENT') });
    expect(error.toResponse('generation')).toEqual({
      status: 'error',
      phase: 'generation',
      error: {
        code: ErrorCode.FILE_IO_ERROR,
        message: 'failed',
        cause: 'Error: ENOENT',
      },
    });
  });
});
