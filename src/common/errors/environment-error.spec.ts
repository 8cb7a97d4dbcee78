import { describe, it, expect } from 'vitest';
import {
  EnvironmentError,
  ENVIRONMENT_ERROR_CODES,
} from './environment-error';
import { ConfigValidationError } from './config-validation-error';
import { SystemError } from './system-error';

describe('EnvironmentError', () => {
  it('should default to error severity', () => {
    const error = new EnvironmentError(
      ENVIRONMENT_ERROR_CODES.NOT_INITIALIZED,
      'Environment has not been initialized',
    );
    expect(error).toBeInstanceOf(SystemError);
    expect(error.code).toBe(4001);
    expect(error.severity).toBe('error');
    expect(error.name).toBe('EnvironmentError');
  });
});

describe('ConfigValidationError', () => {
  it('should carry validation errors in metadata', () => {
    const error = new ConfigValidationError('bad config', ['a', 'b']);
    expect(error.code).toBe(4010);
    expect(error.severity).toBe('critical');
    expect(error.metadata).toEqual({ validationErrors: ['a', 'b'] });
  });
});
