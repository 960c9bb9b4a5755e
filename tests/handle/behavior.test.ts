import { describe, expect, test } from '@jest/globals';
import {
  debugOf,
  displayOf,
  isErrorValue,
  renderValue,
  sourceOf,
  typeNameFor,
} from '../../src/handle/behavior';

describe('behavior helpers', () => {
  test('isErrorValue accepts errors and displayable objects', () => {
    expect(isErrorValue(new Error('x'))).toBe(true);
    expect(isErrorValue({ display: () => 'x' })).toBe(true);
    expect(isErrorValue({ display: 'x' })).toBe(false);
    expect(isErrorValue('x')).toBe(false);
    expect(isErrorValue(null)).toBe(false);
  });

  test('displayOf prefers the display hook over the message', () => {
    const error = Object.assign(new Error('raw'), { display: () => 'rendered' });
    expect(displayOf(error)).toBe('rendered');
    expect(displayOf(new Error('raw'))).toBe('raw');
    expect(displayOf(42)).toBe('42');
  });

  test('renderValue inspects values that have no primitive form', () => {
    expect(renderValue(Object.create(null))).toBe('[Object: null prototype] {}');
    expect(renderValue(['a', 1])).toBe('a,1');
    expect(displayOf(Object.create(null))).toBe('[Object: null prototype] {}');
  });

  test('debugOf describes errors and inspects other values', () => {
    expect(debugOf(new TypeError('bad input'))).toBe('TypeError: bad input');
    expect(debugOf(new Error(''))).toBe('Error');
    expect(debugOf('text')).toBe("'text'");
    expect(debugOf({ debug: () => 'Custom { id: 1 }', display: () => 'custom' })).toBe(
      'Custom { id: 1 }'
    );
  });

  test('sourceOf reads cause unless a source hook exists', () => {
    const cause = new Error('inner');
    expect(sourceOf(new Error('outer', { cause }))).toBe(cause);
    expect(sourceOf(new Error('outer'))).toBeUndefined();
    expect(sourceOf({ display: () => 'x', source: () => null })).toBeUndefined();
    expect(sourceOf('text')).toBeUndefined();
  });

  test('typeNameFor uses error names and constructor names', () => {
    expect(typeNameFor(new RangeError('x'))).toBe('RangeError');
    expect(typeNameFor('x')).toBe('String');
    expect(typeNameFor({})).toBe('Object');
  });
});
