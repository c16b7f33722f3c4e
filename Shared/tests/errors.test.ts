import { describe, it, expect } from 'vitest';
import {
  BaseError,
  ConfigurationError,
  ValidationError,
  toErrorMessage,
} from '../Types/errors.js';

describe('BaseError', () => {
  it('should set message, code, and details', () => {
    const err = new BaseError('test message', 'TEST_CODE', { key: 'val' });
    expect(err.message).toBe('test message');
    expect(err.code).toBe('TEST_CODE');
    expect(err.details).toEqual({ key: 'val' });
  });

  it('should be instanceof Error', () => {
    const err = new BaseError('msg', 'CODE');
    expect(err).toBeInstanceOf(Error);
    expect(err).toBeInstanceOf(BaseError);
    expect(err.name).toBe('BaseError');
  });
});

describe('Error subclasses', () => {
  const subclasses = [
    { Class: ConfigurationError, name: 'ConfigurationError', code: 'CONFIGURATION_ERROR' },
    { Class: ValidationError, name: 'ValidationError', code: 'VALIDATION_ERROR' },
  ] as const;

  for (const { Class, name, code } of subclasses) {
    describe(name, () => {
      it(`should have code "${code}" and name "${name}"`, () => {
        const err = new Class('test');
        expect(err.code).toBe(code);
        expect(err.name).toBe(name);
      });

      it('should be instanceof BaseError and Error', () => {
        const err = new Class('test');
        expect(err).toBeInstanceOf(BaseError);
        expect(err).toBeInstanceOf(Error);
      });

      it('should preserve details when provided', () => {
        const err = new Class('test', { field: 'timeout_ms' });
        expect(err.details).toEqual({ field: 'timeout_ms' });
      });
    });
  }
});

describe('toErrorMessage', () => {
  it('should return the message of an Error', () => {
    expect(toErrorMessage(new Error('boom'))).toBe('boom');
  });

  it('should return strings unchanged', () => {
    expect(toErrorMessage('plain')).toBe('plain');
  });

  it('should stringify anything else', () => {
    expect(toErrorMessage(42)).toBe('42');
  });
});
