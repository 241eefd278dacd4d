import { describe, it, expect } from 'vitest';

import { IncompatibleReturnError } from '../errors.js';
import { t } from '../types/typeTags.js';
import { convertReturn, convertToType } from './convertReturn.js';
import { ReturnTuple } from './returnTuple.js';

describe('convertReturn', () => {
  it('returns the empty vector itself', () => {
    const empty: unknown[] = [];
    expect(convertReturn(empty, [t.void], t.void)).toBe(empty);
  });

  it('unwraps a single value', () => {
    expect(convertReturn(['hello'], [t.string], t.string)).toBe('hello');
  });

  it('fills a plain array in order', () => {
    expect(convertReturn(['a', 'b'], [t.string, t.string], t.arrayOf(t.string))).toEqual(['a', 'b']);
  });

  it('keeps null positions as null', () => {
    expect(convertReturn(['a', undefined, 'c'], [t.string, t.string, t.string], t.arrayOf(t.string))).toEqual([
      'a',
      null,
      'c',
    ]);
  });

  it('builds a typed array for typed-array shapes', () => {
    const out = convertReturn([1.5, Float64Array.of(2.5)], [t.double, t.double], t.typedArray('Float64Array'));
    expect(out).toBeInstanceOf(Float64Array);
    expect(out).toEqual(Float64Array.of(1.5, 2.5));
  });

  it('wraps tuples', () => {
    const out = convertReturn(['name', 42], [t.string, t.number], t.tuple(2));
    expect(out).toBeInstanceOf(ReturnTuple);
    if (!(out instanceof ReturnTuple)) return;
    expect(out.toArray()).toEqual(['name', 42]);
  });

  it('checks each position against its own type', () => {
    expect(() => convertReturn(['name', 'not a number'], [t.string, t.number], t.list)).toThrow(
      IncompatibleReturnError,
    );
  });

  it('rejects a result count that differs from the declared types', () => {
    expect(() => convertReturn([1, 2, 3], [t.double, t.double], t.typedArray('Float64Array'))).toThrow(
      'Engine returned 3 values but 2 were declared',
    );
  });
});

describe('convertToType', () => {
  it('passes null through', () => {
    expect(convertToType(null, t.double)).toBe(null);
    expect(convertToType(undefined, t.string)).toBe(null);
  });

  it('accepts the scalar and the one-element array form of a primitive', () => {
    expect(convertToType(2.5, t.double)).toBe(2.5);
    expect(convertToType(Float64Array.of(2.5), t.double)).toBe(2.5);
    expect(convertToType(Int32Array.of(-7), t.int32)).toBe(-7);
    expect(convertToType([true], t.logical)).toBe(true);
  });

  it('rejects an array form that does not hold exactly one value', () => {
    expect(() => convertToType(Float64Array.of(1, 2), t.double)).toThrow(
      new IncompatibleReturnError('Array of double does not have exactly 1 value (it has 2)'),
    );
  });

  it('never widens or converts between primitives', () => {
    expect(() => convertToType(Int32Array.of(1), t.double)).toThrow(
      new IncompatibleReturnError(
        'Required return type is incompatible with the type actually returned\n' +
          'Required type: double\n' +
          'Returned type: Int32Array',
      ),
    );
    expect(() => convertToType(1.5, t.int32)).toThrow(IncompatibleReturnError);
  });

  it('requires a compatible runtime type for other tags', () => {
    expect(convertToType(['x'], t.list)).toEqual(['x']);
    expect(() => convertToType('x', t.list)).toThrow('Required type: any[]');
  });
});

describe('ReturnTuple', () => {
  it('exposes its values by position', () => {
    const tuple = new ReturnTuple(['a', 1, null] as const);
    expect(tuple.size).toBe(3);
    expect(tuple.get(1)).toBe(1);
    expect([...tuple]).toEqual(['a', 1, null]);
    const past: number = tuple.size;
    const negative: number = -1;
    expect(() => tuple.get(past)).toThrow(RangeError);
    expect(() => tuple.get(negative)).toThrow('ReturnTuple index -1 out of range [0, 3)');
  });
});
