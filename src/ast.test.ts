import { describe, expect, it } from 'vitest';
import {
  asArray,
  asBigInt,
  asBool,
  asDate,
  asF64,
  asI64,
  asObject,
  asString,
  describeValue,
  isPrimitive,
  isSpecial,
  normalizeTables,
  numberAsF64,
  numberAsI64,
  toonArray,
  toonBigInt,
  toonBool,
  toonDate,
  toonFloat,
  toonInteger,
  toonNull,
  toonNumber,
  toonNumberOf,
  toonObject,
  toonString,
  toonTable,
  valueEquals,
  valueToDisplayString,
} from './ast.js';

describe('constructors', () => {
  it('picks the number variant from a JS number', () => {
    expect(toonNumber(3).value).toEqual({ kind: 'integer', value: 3 });
    expect(toonNumber(3.5).value).toEqual({ kind: 'float', value: 3.5 });
    expect(toonNumber(2 ** 60).value).toEqual({ kind: 'float', value: 2 ** 60 });
    expect(toonNumber(Infinity).value).toEqual({ kind: 'infinity' });
    expect(toonNumber(-Infinity).value).toEqual({ kind: 'negative-infinity' });
    expect(toonNumber(NaN).value).toEqual({ kind: 'nan' });
  });

  it('rejects unsafe integers', () => {
    expect(() => toonInteger(2 ** 53)).toThrow(RangeError);
    expect(() => toonInteger(1.5)).toThrow(RangeError);
  });

  it('validates explicit number variants', () => {
    expect(() => toonNumberOf({ kind: 'integer', value: 1e21 })).toThrow(RangeError);
    expect(() => toonNumberOf({ kind: 'integer', value: 1.5 })).toThrow(RangeError);
    expect(() => toonNumberOf({ kind: 'float', value: Infinity })).toThrow('Float must be finite: Infinity');
    expect(toonNumberOf({ kind: 'float', value: 2.5 }).value).toEqual({ kind: 'float', value: 2.5 });
    expect(toonNumberOf({ kind: 'nan' }).value).toEqual({ kind: 'nan' });
    expect(Object.isFrozen(toonNumberOf({ kind: 'integer', value: 3 }).value)).toBe(true);
  });

  it('normalizes negative zero', () => {
    expect(Object.is(numberAsF64(toonInteger(-0).value), 0)).toBe(true);
  });

  it('keeps the first position for repeated keys', () => {
    const obj = toonObject([
      ['a', toonInteger(1)],
      ['b', toonInteger(2)],
      ['a', toonInteger(3)],
    ]);
    expect([...obj.entries.keys()]).toEqual(['a', 'b']);
    expect(asI64(obj.entries.get('a') ?? toonNull())).toBe(3);
  });

  it('validates table row widths', () => {
    expect(() => toonTable(['a', 'b'], [[toonInteger(1)]])).toThrow('Table row has 1 cells, expected 2');
  });

  it('rejects invalid dates and copies valid ones', () => {
    expect(() => toonDate(new Date('nope'))).toThrow(RangeError);
    const source = new Date(0);
    const value = toonDate(source);
    source.setTime(1000);
    expect(value.value.getTime()).toBe(0);
  });

  it('freezes values', () => {
    expect(Object.isFrozen(toonString('x'))).toBe(true);
    expect(Object.isFrozen(toonArray([toonNull()]).items)).toBe(true);
  });
});

describe('accessors', () => {
  it('return undefined on a variant mismatch', () => {
    const s = toonString('x');
    expect(asString(s)).toBe('x');
    expect(asBool(s)).toBeUndefined();
    expect(asI64(s)).toBeUndefined();
    expect(asArray(s)).toBeUndefined();
    expect(asObject(s)).toBeUndefined();
    expect(asDate(s)).toBeUndefined();
    expect(asBigInt(s)).toBeUndefined();
  });

  it('converts numbers', () => {
    expect(numberAsI64(toonFloat(4).value)).toBe(4);
    expect(numberAsI64(toonFloat(4.5).value)).toBeUndefined();
    expect(numberAsI64(toonFloat(Infinity).value)).toBeUndefined();
    expect(asF64(toonFloat(-Infinity))).toBe(-Infinity);
    expect(asF64(toonFloat(NaN))).toBeNaN();
    expect(isSpecial(toonFloat(NaN).value)).toBe(true);
    expect(isSpecial(toonInteger(1).value)).toBe(false);
  });

  it('classifies primitives', () => {
    expect(isPrimitive(toonBigInt(1n))).toBe(true);
    expect(isPrimitive(toonDate(new Date(0)))).toBe(true);
    expect(isPrimitive(toonObject())).toBe(false);
    expect(isPrimitive(toonTable([], []))).toBe(false);
  });
});

describe('normalizeTables', () => {
  it('turns tables into arrays of objects, recursively', () => {
    const table = toonTable(['id', 'name'], [[toonInteger(1), toonString('Alice')]]);
    const normalized = normalizeTables(toonObject([['users', table]]));
    expect(normalized).toEqual(
      toonObject([
        [
          'users',
          toonArray([
            toonObject([
              ['id', toonInteger(1)],
              ['name', toonString('Alice')],
            ]),
          ]),
        ],
      ])
    );
  });
});

describe('valueEquals', () => {
  it('compares numbers by value', () => {
    expect(valueEquals(toonInteger(1), toonFloat(1))).toBe(true);
    expect(valueEquals(toonFloat(NaN), toonFloat(NaN))).toBe(true);
    expect(valueEquals(toonInteger(1), toonString('1'))).toBe(false);
  });

  it('ignores object key order', () => {
    const a = toonObject([
      ['x', toonInteger(1)],
      ['y', toonBool(true)],
    ]);
    const b = toonObject([
      ['y', toonBool(true)],
      ['x', toonInteger(1)],
    ]);
    expect(valueEquals(a, b)).toBe(true);
    expect(valueEquals(a, toonObject([['x', toonInteger(1)]]))).toBe(false);
  });

  it('compares tables in normalized form', () => {
    const table = toonTable(['a'], [[toonInteger(1)]]);
    const array = toonArray([toonObject([['a', toonInteger(1)]])]);
    expect(valueEquals(table, array)).toBe(true);
  });

  it('compares arrays element-wise', () => {
    expect(valueEquals(toonArray([toonNull()]), toonArray([toonNull()]))).toBe(true);
    expect(valueEquals(toonArray([toonNull()]), toonArray([]))).toBe(false);
  });
});

describe('display', () => {
  it('names variants', () => {
    expect(describeValue(toonBool(false))).toBe('boolean');
    expect(describeValue(toonTable([], []))).toBe('table');
  });

  it('renders a short form', () => {
    expect(valueToDisplayString(toonArray([toonInteger(1), toonString('a')]))).toBe('[1, "a"]');
    expect(valueToDisplayString(toonFloat(-Infinity))).toBe('-Infinity');
    expect(valueToDisplayString(toonBigInt(12n))).toBe('12n');
    expect(valueToDisplayString(toonDate(new Date(0)))).toBe('1970-01-01T00:00:00.000Z');
    expect(valueToDisplayString(toonObject())).toBe('{object}');
  });
});
