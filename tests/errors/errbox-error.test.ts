import { describe, expect, test } from '@jest/globals';
import { ConfigError } from '../../src/errors/config-error';
import { ErrboxError } from '../../src/errors/errbox-error';
import { InvariantError } from '../../src/errors/invariant-error';
import { SerializationError } from '../../src/errors/serialization-error';

const baseOptions = {
  message: 'Something went wrong',
  code: 'CONFIG_INVALID' as const,
  category: 'config' as const,
};

describe('ErrboxError', () => {
  test('serializes cause variants', () => {
    const fromError = new ErrboxError({ ...baseOptions, cause: new Error('Root cause') });
    expect(fromError.toJSON().cause).toBe('Error: Root cause');

    const nested = new ErrboxError({ ...baseOptions, message: 'Nested' });
    const nestedJson = new ErrboxError({ ...baseOptions, cause: nested }).toJSON();
    expect(typeof nestedJson.cause === 'object' ? nestedJson.cause.message : undefined).toBe(
      'Nested'
    );

    expect(new ErrboxError({ ...baseOptions, cause: 'string-cause' }).toJSON().cause).toBe(
      'string-cause'
    );
    expect(new ErrboxError({ ...baseOptions, cause: { foo: 'bar' } }).toJSON().cause).toBe(
      '{"foo":"bar"}'
    );

    const circular: Record<string, unknown> = {};
    circular.self = circular;
    expect(new ErrboxError({ ...baseOptions, cause: circular }).toJSON().cause).toMatch(
      /Unserializable cause/
    );
  });

  test('defaults severity and names instances after their class', () => {
    const error = new ConfigError('bad limit');
    expect(error.name).toBe('ConfigError');
    expect(error.severity).toBe('error');
    expect(error.category).toBe('config');
    expect(error.code).toBe('CONFIG_INVALID');
  });

  test('invariant violations are fatal', () => {
    const error = new InvariantError('broken', { code: 'INVARIANT_BACKTRACE_MISSING' });
    expect(error.severity).toBe('fatal');
    expect(error.category).toBe('invariant');
  });

  test('serialization failures keep their cause', () => {
    const cause = new Error('bad shape');
    const error = new SerializationError('Invalid serialized error box', { cause });
    expect(error.cause).toBe(cause);
    expect(error.code).toBe('SERIALIZATION_INVALID');
  });

  test('isErrboxError type guard', () => {
    expect(ErrboxError.isErrboxError(new ConfigError('x'))).toBe(true);
    expect(ErrboxError.isErrboxError(new Error('nope'))).toBe(false);
  });
});
