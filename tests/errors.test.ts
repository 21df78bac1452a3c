import { describe, it, expect } from 'vitest';
import { ErrorCodes } from '../src/types';
import { InvalidConfigError, InvalidInputError } from '../src/utils/errors';

describe('Errors', () => {
  it('defines a code for every error the engine raises', () => {
    expect(Object.keys(ErrorCodes)).toEqual(['INVALID_INPUT', 'INVALID_CONFIG']);
  });

  it('renders an error body', () => {
    const err = new InvalidInputError('Validation failed', { issues: [] });

    expect(err.toResponse()).toEqual({
      error: { code: 'INVALID_INPUT', message: 'Validation failed', details: { issues: [] } },
    });
  });

  it('tags configuration errors', () => {
    const err = new InvalidConfigError('Engine configuration is invalid');

    expect(err.code).toBe('INVALID_CONFIG');
    expect(err.name).toBe('InvalidConfigError');
  });
});
