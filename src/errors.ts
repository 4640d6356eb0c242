/**
 * maskframe — error types
 *
 * Every failure surfaces synchronously to the caller of the operation that
 * detected it. Nothing is retried and no operation returns a partial result.
 */

import type { CellType } from './types';

// ─── Loading ──────────────────────────────────────────────────────────────────

/** The source could not be opened or read. The underlying error is `cause`. */
export class TableIOError extends Error {
  readonly source: string;

  constructor(source: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name   = 'TableIOError';
    this.source = source;
  }
}

/** The header row names the same column more than once. */
export class SchemaError extends Error {
  readonly duplicates: readonly string[];

  constructor(duplicates: readonly string[]) {
    super(
      `Header contains duplicate column names: ${duplicates.map((d) => `'${d}'`).join(', ')}. ` +
      `Every column name must be unique.`,
    );
    this.name       = 'SchemaError';
    this.duplicates = duplicates;
  }
}

/** Table.cell() was asked for a position outside the loaded extents. */
export class OutOfRangeError extends RangeError {
  constructor(message: string) {
    super(message);
    this.name = 'OutOfRangeError';
  }
}

// ─── Views ────────────────────────────────────────────────────────────────────

/**
 * A mask does not cover its container one-to-one.
 *
 * Views build their masks from the table they share, so this indicates a
 * broken internal invariant rather than bad input.
 */
export class SizeMismatchError extends Error {
  readonly expected: number;
  readonly actual:   number;

  constructor(context: string, expected: number, actual: number) {
    super(`${context}: mask covers ${actual} positions but the container has ${expected}.`);
    this.name     = 'SizeMismatchError';
    this.expected = expected;
    this.actual   = actual;
  }
}

/** The active column count does not match a requested or declared arity. */
export class ArityMismatchError extends Error {
  readonly expected: number;
  readonly actual:   number;

  constructor(context: string, expected: number, actual: number) {
    super(`${context}: expected ${expected} column(s), got ${actual}.`);
    this.name     = 'ArityMismatchError';
    this.expected = expected;
    this.actual   = actual;
  }
}

export class UnknownColumnError extends Error {
  readonly column: string;

  constructor(column: string, available: readonly string[]) {
    super(
      `Unknown column '${column}'. ` +
      `Available columns: ${available.join(', ')}.`,
    );
    this.name   = 'UnknownColumnError';
    this.column = column;
  }
}

/** Two views backed by different tables were combined or cross-selected. */
export class CrossTableError extends Error {
  constructor(operation: string) {
    super(`${operation}: views belong to different tables.`);
    this.name = 'CrossTableError';
  }
}

// ─── Conversion & export ──────────────────────────────────────────────────────

export class ConversionError extends Error {
  readonly cell: string;
  readonly type: CellType;

  constructor(cell: string, type: CellType) {
    super(`Cannot convert '${cell}' to ${type}.`);
    this.name = 'ConversionError';
    this.cell = cell;
    this.type = type;
  }
}

/** A fixed matrix extent disagrees with the view's shape. */
export class ShapeMismatchError extends Error {
  readonly dimension: 'rows' | 'cols';
  readonly expected:  number;
  readonly actual:    number;

  constructor(dimension: 'rows' | 'cols', expected: number, actual: number) {
    super(`Matrix export: expected ${expected} ${dimension}, view has ${actual}.`);
    this.name      = 'ShapeMismatchError';
    this.dimension = dimension;
    this.expected  = expected;
    this.actual    = actual;
  }
}
