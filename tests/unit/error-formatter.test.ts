import { describe, it, expect } from 'vitest';
import { Err } from '../../src/errors/factories.js';
import { formatAppError } from '../../src/errors/formatter.js';
import { createConfigValidationError } from '../../src/errors/config-validation-error.js';

describe('formatAppError', () => {
  it('lists every config issue', () => {
    const error = Err.configInvalid([{ path: 'CONFIGKIT_URL_TIMEOUT_MS', message: 'must be positive' }]);
    expect(formatAppError(error)).toBe(
      'Invalid configkit environment settings\n\n  - CONFIGKIT_URL_TIMEOUT_MS: must be positive'
    );
  });

  it('renders every startup validation error', () => {
    const error = Err.startupValidationFailed(
      ['App', 'Database'],
      [
        createConfigValidationError('App:name', 'name must not be empty', '', []),
        createConfigValidationError('Database:maxPoolSize', 'too big', 2000, ['Valid range: 1-1000']),
      ]
    );

    expect(error.message).toBe('Configuration validation failed with 2 error(s)');
    expect(formatAppError(error)).toBe(
      'Configuration validation failed with 2 error(s):\n\n' +
        '  ✗ App:name: name must not be empty\n' +
        '    Current value: \n' +
        '  ✗ Database:maxPoolSize: too big\n' +
        '    Current value: 2000\n' +
        '    → Valid range: 1-1000\n'
    );
  });

  it('falls back to a placeholder without issues', () => {
    expect(formatAppError(Err.configInvalid([]))).toBe('Invalid configkit environment settings\n\n  - (no details)');
  });

  it('includes the cause of an unexpected error', () => {
    expect(formatAppError(Err.unexpected('Startup validation could not complete', new Error('disk gone')))).toBe(
      'Startup validation could not complete\nCause: Error: disk gone'
    );
  });
});
