import { describe, it, expect } from 'vitest';
import { stringifyValue } from './stringify';

describe('stringifyValue', () => {
  it('renders absent and null values as empty strings', () => {
    expect(stringifyValue(undefined)).toBe('');
    expect(stringifyValue(null)).toBe('');
  });

  it('renders scalars with String()', () => {
    expect(stringifyValue(0)).toBe('0');
    expect(stringifyValue(2.5)).toBe('2.5');
    expect(stringifyValue(false)).toBe('false');
    expect(stringifyValue('text')).toBe('text');
  });

  it('renders collections as JSON', () => {
    expect(stringifyValue([1, 'a'])).toBe('[1,"a"]');
    expect(stringifyValue({ a: true })).toBe('{"a":true}');
  });
});
