/**
 * maskframe — typed conversion
 *
 * convertCell() is the only place a string cell becomes a typed value. The
 * predicate engine, the extractors and the matrix export all go through it.
 *
 * Conversion rules:
 *   - Surrounding whitespace is ignored when parsing; 'string' returns the
 *     cell as stored.
 *   - An empty (or blank) cell converts to the zero value of the target type:
 *       int → 0, float → 0, bool → false, string → '', bigint → 0n.
 *   - A non-empty cell that does not parse throws ConversionError.
 *     There is no silent fallback to zero.
 */

import { ConversionError } from './errors';
import type { CellType, CellValue, CellValueOf } from './types';

// Plain decimal notation only. Number() alone would also accept '0x1f',
// '0b11' and 'Infinity'.
const INT_PATTERN   = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

const ZERO_VALUES: { readonly [T in CellType]: CellValueOf<T> } = {
  int:    0,
  float:  0,
  bool:   false,
  string: '',
  bigint: 0n,
};

// ─── Cell conversion ──────────────────────────────────────────────────────────

export function convertCell<T extends CellType>(cell: string, type: T): CellValueOf<T>;
export function convertCell(cell: string, type: CellType): CellValue {
  const text = cell.trim();
  if (text === '') return ZERO_VALUES[type];

  switch (type) {
    case 'int': {
      if (!INT_PATTERN.test(text)) throw new ConversionError(cell, type);
      const n = Number(text);
      if (!Number.isSafeInteger(n)) throw new ConversionError(cell, type);
      // '-0' reads as integer zero.
      return n + 0;
    }

    case 'float': {
      if (!FLOAT_PATTERN.test(text)) throw new ConversionError(cell, type);
      const n = Number(text);
      if (!Number.isFinite(n)) throw new ConversionError(cell, type);
      return n;
    }

    case 'bool': {
      const lower = text.toLowerCase();
      if (lower === '1' || lower === 'true')  return true;
      if (lower === '0' || lower === 'false') return false;
      throw new ConversionError(cell, type);
    }

    case 'string':
      return cell;

    case 'bigint': {
      if (!INT_PATTERN.test(text)) throw new ConversionError(cell, type);
      return BigInt(text);
    }
  }
}

/** Element-wise convertCell(); order is preserved. */
export function convertCells<T extends CellType>(cells: Iterable<string>, type: T): CellValueOf<T>[] {
  const out: CellValueOf<T>[] = [];
  for (const cell of cells) out.push(convertCell(cell, type));
  return out;
}

// ─── Reference values ─────────────────────────────────────────────────────────

/**
 * Target type implied by a reference value's JS type.
 *
 * Numbers map to 'float': integer references compare the same way under
 * either numeric type, and 'float' also accepts cells such as '2.5'. Pass an
 * explicit 'int' when cells must be integers.
 */
export function inferCellType(value: CellValue): CellType {
  if (typeof value === 'number')  return 'float';
  if (typeof value === 'string')  return 'string';
  if (typeof value === 'boolean') return 'bool';
  return 'bigint';
}

/**
 * True when `value` is a valid converted value of `type`. NaN is never one:
 * convertCell() cannot produce it and it has no place in an ordering.
 */
export function matchesCellType(value: CellValue, type: CellType): boolean {
  switch (type) {
    case 'int':    return typeof value === 'number' && Number.isInteger(value);
    case 'float':  return typeof value === 'number' && !Number.isNaN(value);
    case 'bool':   return typeof value === 'boolean';
    case 'string': return typeof value === 'string';
    case 'bigint': return typeof value === 'bigint';
  }
}

// ─── Ordering ─────────────────────────────────────────────────────────────────

/**
 * Three-way comparison of two converted values of the same type.
 * Strings compare by UTF-16 code unit, booleans as false < true.
 */
export function compareValues(a: CellValue, b: CellValue): number {
  if (typeof a === 'number' && typeof b === 'number') return a < b ? -1 : a > b ? 1 : 0;
  if (typeof a === 'string' && typeof b === 'string') return a < b ? -1 : a > b ? 1 : 0;
  if (typeof a === 'bigint' && typeof b === 'bigint') return a < b ? -1 : a > b ? 1 : 0;
  if (typeof a === 'boolean' && typeof b === 'boolean') return Number(a) - Number(b);

  // Unreachable through TableView: reference values are validated against
  // their target type before any cell is converted.
  throw new TypeError(`compareValues: cannot order ${typeof a} against ${typeof b}.`);
}
