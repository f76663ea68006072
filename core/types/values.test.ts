import { describe, it, expect } from 'vitest';
import { isMapping, isSequence, isTruthy, toStructuredValue, type StructuredValue } from './values';
import { LineIndex } from './location';

describe('isTruthy', () => {
  const cases: Array<[StructuredValue | undefined, boolean]> = [
    [undefined, false],
    [null, false],
    [false, false],
    ['', false],
    [[], false],
    [{}, false],
    [0, true],
    [' ', true],
    [true, true],
    [[0], true],
    [{ a: null }, true]
  ];

  it.each(cases)('%j is %s', (value, expected) => {
    expect(isTruthy(value)).toBe(expected);
  });
});

describe('collection guards', () => {
  it('tells sequences from mappings', () => {
    expect(isSequence([1])).toBe(true);
    expect(isMapping([1])).toBe(false);
    expect(isMapping({ a: 1 })).toBe(true);
    expect(isMapping(null)).toBe(false);
  });
});

describe('toStructuredValue', () => {
  it('accepts parsed JSON', () => {
    const input: unknown = JSON.parse('{"a":[1,"two",null,{"b":true}]}');
    expect(toStructuredValue(input)).toEqual({ a: [1, 'two', null, { b: true }] });
  });

  it('keeps a "__proto__" key as an own property', () => {
    const value = toStructuredValue(JSON.parse('{"__proto__": {"x": 1}, "a": 2}'));
    expect(isMapping(value)).toBe(true);
    if (isMapping(value)) {
      expect(Object.keys(value)).toEqual(['__proto__', 'a']);
      expect(Object.hasOwn(value, '__proto__')).toBe(true);
      expect(Object.getPrototypeOf(value)).toBe(Object.prototype);
    }
  });

  it('rejects values JSON cannot hold', () => {
    expect(toStructuredValue(undefined)).toBeUndefined();
    expect(toStructuredValue(Number.NaN)).toBeUndefined();
    expect(toStructuredValue({ a: [() => 1] })).toBeUndefined();
  });
});

describe('LineIndex', () => {
  it('maps offsets to 1-based lines and columns', () => {
    const index = new LineIndex('ab\ncd\n\nef');
    expect(index.locate(0)).toEqual({ offset: 0, line: 1, column: 1 });
    expect(index.locate(4)).toEqual({ offset: 4, line: 2, column: 2 });
    expect(index.locate(6)).toEqual({ offset: 6, line: 3, column: 1 });
    expect(index.locate(8)).toEqual({ offset: 8, line: 4, column: 2 });
  });

  it('attaches the file path', () => {
    expect(new LineIndex('x', 'a.html').locate(0)).toEqual({ offset: 0, line: 1, column: 1, filePath: 'a.html' });
  });
});
