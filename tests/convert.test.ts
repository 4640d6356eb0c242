/**
 * maskframe — typed conversion tests
 *
 * Policy under test: an empty cell is the zero value of its target type; a
 * non-empty cell that does not parse throws ConversionError.
 */

import { describe, it, expect } from 'vitest';
import {
  CELL_TYPES,
  compareValues,
  ConversionError,
  convertCell,
  convertCells,
  inferCellType,
  matchesCellType,
} from '../src/index';

describe('convertCell — empty cells', () => {
  it('converts an empty cell to the zero value of every type', () => {
    expect(convertCell('', 'int')).toBe(0);
    expect(convertCell('', 'float')).toBe(0);
    expect(convertCell('', 'bool')).toBe(false);
    expect(convertCell('', 'string')).toBe('');
    expect(convertCell('', 'bigint')).toBe(0n);
  });

  it('has a zero value for every listed type', () => {
    expect(CELL_TYPES.map((type) => convertCell('', type))).toEqual([0, 0, false, '', 0n]);
  });

  it('treats a blank cell as empty', () => {
    expect(convertCell('   ', 'int')).toBe(0);
  });
});

describe('convertCell — numbers', () => {
  it('parses signed integers', () => {
    expect(convertCell('42', 'int')).toBe(42);
    expect(convertCell('-7', 'int')).toBe(-7);
    expect(convertCell('+3', 'int')).toBe(3);
    expect(convertCell(' 12 ', 'int')).toBe(12);
  });

  it('reads negative zero as integer zero', () => {
    expect(Object.is(convertCell('-0', 'int'), 0)).toBe(true);
    expect(convertCells(['-0', '+0'], 'int')).toEqual([0, 0]);
  });

  it('rejects fractions, hex and trailing garbage as int', () => {
    for (const cell of ['3.5', '0x10', '12abc', 'one']) {
      expect(() => convertCell(cell, 'int')).toThrow(ConversionError);
    }
  });

  it('rejects integers beyond the safe range', () => {
    expect(() => convertCell('9007199254740993', 'int')).toThrow(ConversionError);
  });

  it('parses decimal and exponent notation as float', () => {
    expect(convertCell('2.5', 'float')).toBe(2.5);
    expect(convertCell('-.5', 'float')).toBe(-0.5);
    expect(convertCell('1e3', 'float')).toBe(1000);
    expect(convertCell('7.', 'float')).toBe(7);
  });

  it('rejects Infinity, NaN and hex as float', () => {
    for (const cell of ['Infinity', 'NaN', '0x1f', '1e', '.']) {
      expect(() => convertCell(cell, 'float')).toThrow(ConversionError);
    }
  });

  it('parses big integers exactly', () => {
    expect(convertCell('9007199254740993', 'bigint')).toBe(9007199254740993n);
    expect(() => convertCell('1.0', 'bigint')).toThrow(ConversionError);
  });
});

describe('convertCell — bool and string', () => {
  it('accepts 1/0/true/false in any case', () => {
    expect(convertCell('1', 'bool')).toBe(true);
    expect(convertCell('TRUE', 'bool')).toBe(true);
    expect(convertCell('0', 'bool')).toBe(false);
    expect(convertCell('False', 'bool')).toBe(false);
    expect(() => convertCell('yes', 'bool')).toThrow(ConversionError);
  });

  it('returns string cells unchanged', () => {
    expect(convertCell('hello world', 'string')).toBe('hello world');
  });
});

describe('ConversionError', () => {
  it('records the cell text and the target type', () => {
    const error = (() => {
      try {
        convertCell('abc', 'float');
      } catch (e) {
        return e;
      }
      return undefined;
    })();

    expect(error).toBeInstanceOf(ConversionError);
    expect(error).toMatchObject({
      name:    'ConversionError',
      cell:    'abc',
      type:    'float',
      message: "Cannot convert 'abc' to float.",
    });
  });
});

describe('convertCells', () => {
  it('converts element-wise and preserves order', () => {
    expect(convertCells(['3', '', '-1'], 'int')).toEqual([3, 0, -1]);
  });
});

describe('inferCellType / matchesCellType', () => {
  it('maps reference values to target types', () => {
    expect(inferCellType(25)).toBe('float');
    expect(inferCellType('x')).toBe('string');
    expect(inferCellType(true)).toBe('bool');
    expect(inferCellType(5n)).toBe('bigint');
  });

  it('requires integral numbers for int', () => {
    expect(matchesCellType(2, 'int')).toBe(true);
    expect(matchesCellType(2.5, 'int')).toBe(false);
    expect(matchesCellType(2.5, 'float')).toBe(true);
    expect(matchesCellType('2', 'float')).toBe(false);
    expect(matchesCellType(NaN, 'float')).toBe(false);
    expect(matchesCellType(NaN, 'int')).toBe(false);
  });
});

describe('compareValues', () => {
  it('orders each value type', () => {
    expect(compareValues(1, 2)).toBe(-1);
    expect(compareValues('b', 'a')).toBe(1);
    expect(compareValues(3n, 3n)).toBe(0);
    expect(compareValues(false, true)).toBe(-1);
  });

  it('refuses to order values of different types', () => {
    expect(() => compareValues(1, '1')).toThrow(TypeError);
  });
});
