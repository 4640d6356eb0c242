/**
 * maskframe — matrix export
 *
 * A view hands its cells to a numeric matrix through the MatrixSink
 * interface: one resize() with the final shape, then one set() per cell,
 * rows in view order and columns in view order within each row. Any
 * linear-algebra container can be filled by adapting it to that interface.
 *
 * DenseMatrix is the bundled sink: a row-major Float64Array.
 */

import { convertCell } from './convert';
import { ShapeMismatchError } from './errors';
import type { MatrixExportOptions } from './types';
import type { TableView } from './view';

// ─── Sink interface ───────────────────────────────────────────────────────────

export interface MatrixSink<T> {
  resize(rows: number, cols: number): void;
  set(row: number, col: number, value: T): void;
}

// ─── Export ───────────────────────────────────────────────────────────────────

/**
 * Convert every included cell of `view` and write it into `sink`.
 *
 * `options.rows` / `options.cols` pin the expected shape; a view of any other
 * shape throws ShapeMismatchError before the sink is touched. Booleans are
 * written as 0 / 1.
 */
export function exportMatrix(
  view:    TableView,
  sink:    MatrixSink<number>,
  options: MatrixExportOptions = {},
): void {
  const type = options.type ?? 'float';
  const rows = view.rows();
  const cols = view.cols();

  if (options.rows !== undefined && options.rows !== rows) {
    throw new ShapeMismatchError('rows', options.rows, rows);
  }
  if (options.cols !== undefined && options.cols !== cols) {
    throw new ShapeMismatchError('cols', options.cols, cols);
  }

  sink.resize(rows, cols);

  let r = 0;
  for (const row of view.rowIterable()) {
    let c = 0;
    for (const cell of view.colIterable(row)) {
      sink.set(r, c, Number(convertCell(cell, type)));
      c++;
    }
    r++;
  }
}

// ─── DenseMatrix ──────────────────────────────────────────────────────────────

/** Row-major Float64 matrix. Element (r, c) lives at data[r * cols + c]. */
export class DenseMatrix implements MatrixSink<number> {
  private _rows = 0;
  private _cols = 0;
  private _data = new Float64Array(0);

  constructor(rows = 0, cols = 0) {
    this.resize(rows, cols);
  }

  get rows(): number {
    return this._rows;
  }

  get cols(): number {
    return this._cols;
  }

  /** Backing storage, row-major. */
  get data(): Float64Array {
    return this._data;
  }

  /** Reallocate to `rows` × `cols`, zero-filled. Previous contents are dropped. */
  resize(rows: number, cols: number): void {
    if (!Number.isInteger(rows) || rows < 0 || !Number.isInteger(cols) || cols < 0) {
      throw new RangeError(`DenseMatrix: invalid shape ${rows}x${cols}.`);
    }
    this._rows = rows;
    this._cols = cols;
    this._data = new Float64Array(rows * cols);
  }

  set(row: number, col: number, value: number): void {
    this._data[this.offset(row, col)] = value;
  }

  get(row: number, col: number): number {
    return this._data[this.offset(row, col)]!;
  }

  /** Row `row` as a view into the backing storage (no copy). */
  row(row: number): Float64Array {
    if (!Number.isInteger(row) || row < 0 || row >= this._rows) {
      throw new RangeError(`DenseMatrix: row ${row} is outside ${this._rows} rows.`);
    }
    const start = row * this._cols;
    return this._data.subarray(start, start + this._cols);
  }

  /** Nested-array copy, one inner array per row. */
  toArray(): number[][] {
    return Array.from({ length: this._rows }, (_, r) => Array.from(this.row(r)));
  }

  private offset(row: number, col: number): number {
    if (!Number.isInteger(row) || row < 0 || row >= this._rows ||
        !Number.isInteger(col) || col < 0 || col >= this._cols) {
      throw new RangeError(
        `DenseMatrix: (${row}, ${col}) is outside ${this._rows}x${this._cols}.`,
      );
    }
    return row * this._cols + col;
  }
}
