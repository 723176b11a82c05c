import { describe, it, expect } from 'vitest';
import { createPropertyAccessor, isBlank, readText } from '../../src/validation/property-accessor.js';
import { InvalidSelectorError } from '../../src/errors/argument-errors.js';

interface DatabaseConfig {
  connectionString: string;
  maxPoolSize: number;
}

const config: DatabaseConfig = { connectionString: 'Server=db;Database=app', maxPoolSize: 100 };

describe('createPropertyAccessor', () => {
  it('reads the named property and reports its name', () => {
    const accessor = createPropertyAccessor<DatabaseConfig, 'maxPoolSize'>('maxPoolSize');
    expect(accessor.name).toBe('maxPoolSize');
    expect(accessor.get(config)).toBe(100);
  });

  it('does not mutate the options object', () => {
    const frozen = Object.freeze({ ...config });
    const accessor = createPropertyAccessor<DatabaseConfig, 'connectionString'>('connectionString');
    expect(accessor.get(frozen)).toBe('Server=db;Database=app');
  });

  it('rejects an empty selector', () => {
    expect(() => createPropertyAccessor<Record<string, string>, string>('')).toThrow(InvalidSelectorError);
  });

  it.each(['database.port', 'items[0]', 'getValue()', '1abc', 'has space'])(
    'rejects %s as a selector',
    (selector) => {
      expect(() => createPropertyAccessor<Record<string, string>, string>(selector)).toThrow(
        'selector must name a single top-level property'
      );
    }
  );

  it('carries the offending selector on the error', () => {
    try {
      createPropertyAccessor<Record<string, string>, string>('a.b');
      expect.unreachable('selector should have been rejected');
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidSelectorError);
      if (error instanceof InvalidSelectorError) {
        expect(error._tag).toBe('InvalidSelector');
        expect(error.selector).toBe('a.b');
        expect(error.message).toBe(
          'selector: "a.b" is not a valid property selector (selector must name a single top-level property)'
        );
      }
    }
  });

  it('accepts identifiers with $ and _', () => {
    expect(createPropertyAccessor<Record<string, string>, string>('$_private1').name).toBe('$_private1');
  });
});

describe('readText', () => {
  it('keeps absent values as null', () => {
    expect(readText(undefined)).toBeNull();
    expect(readText(null)).toBeNull();
  });

  it('stringifies non-string values', () => {
    expect(readText(42)).toBe('42');
    expect(readText('abc')).toBe('abc');
  });
});

describe('isBlank', () => {
  it('treats empty and whitespace-only strings as blank', () => {
    expect(isBlank('')).toBe(true);
    expect(isBlank(' \t\n')).toBe(true);
    expect(isBlank(' x ')).toBe(false);
  });
});
