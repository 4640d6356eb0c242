/**
 * maskframe — TableView
 *
 * A TableView is a lens over a shared Table: the table itself, one bitset
 * selecting rows, one bitset selecting columns, and an optional arity.
 *
 * Views are immutable. Every operation below returns a new view that shares
 * the same Table instance and carries freshly built masks; no cell is ever
 * copied or written. Two views are comparable (may be combined or
 * cross-selected) only when they share the identical Table.
 *
 * Arity is the number of active columns a view promises to have. Projection
 * and comparison set it; the private constructor re-checks it on every view
 * it builds, so a mismatch is reported by the operation that caused it rather
 * than by a later typed extraction.
 *
 * Typical use:
 *
 *   const df    = readCsv('prices.csv');
 *   const cheap = df.select('price').lt([10]);
 *   const rare  = df.select('stock').le([3]);
 *   const rows  = df.selectRows(cheap.or(rare));
 *   const [names, prices] = rows.select('name', 'price').colsToArrays('string', 'float');
 */

import {
  andMask,
  countMask,
  createBitset,
  createMask,
  forEachSet,
  maskFromIndices,
  maskToBooleans,
  orMask,
  setBit,
  type Mask,
} from './bitset';
import { compareValues, convertCell, inferCellType, matchesCellType } from './convert';
import {
  ArityMismatchError,
  CrossTableError,
  SizeMismatchError,
  UnknownColumnError,
} from './errors';
import { masked } from './masked';
import { DenseMatrix, exportMatrix, type MatrixSink } from './matrix';
import { formatView, writeView } from './render';
import { Table } from './table';
import type {
  CellType,
  CellValue,
  CellValueOf,
  ColumnArrays,
  Comparison,
  LogicalOp,
  MatrixExportOptions,
  RenderOptions,
  RowTuple,
  TableOptions,
  TextSink,
} from './types';

// ─── Predicates ───────────────────────────────────────────────────────────────

type Predicate = (order: number) => boolean;

// Each operator tests the three-way comparison of (converted cell, reference).
// 'ne' is not listed: it is the negation of the whole-row 'eq' result.
const PREDICATES: Readonly<Record<Exclude<Comparison, 'ne'>, Predicate>> = {
  eq: (o) => o === 0,
  lt: (o) => o < 0,
  le: (o) => o <= 0,
  gt: (o) => o > 0,
  ge: (o) => o >= 0,
};

// ─── TableView ────────────────────────────────────────────────────────────────

export class TableView {
  readonly table: Table;
  /** Declared active-column count, or undefined when unconstrained. */
  readonly arity: number | undefined;

  private readonly _rowMask: Mask;
  private readonly _colMask: Mask;
  private readonly _rows:    number;
  private readonly _cols:    number;

  private constructor(table: Table, rowMask: Mask, colMask: Mask, arity?: number) {
    if (rowMask.size !== table.rowCount) {
      throw new SizeMismatchError('TableView row mask', table.rowCount, rowMask.size);
    }
    if (colMask.size !== table.columnCount) {
      throw new SizeMismatchError('TableView column mask', table.columnCount, colMask.size);
    }

    this.table    = table;
    this._rowMask = rowMask;
    this._colMask = colMask;
    this._rows    = countMask(rowMask);
    this._cols    = countMask(colMask);
    this.arity    = arity;

    if (arity !== undefined && this._cols !== arity) {
      throw new ArityMismatchError('TableView', arity, this._cols);
    }
  }

  // ── Factories ──────────────────────────────────────────────────────────────

  /** A view over every row and column of `table`. */
  static fromTable(table: Table): TableView {
    return new TableView(
      table,
      createMask(table.rowCount, true),
      createMask(table.columnCount, true),
    );
  }

  /** Load a file into a new Table and view all of it. */
  static load(path: string, options?: TableOptions): TableView {
    return TableView.fromTable(Table.load(path, options));
  }

  /** Parse in-memory text into a new Table and view all of it. */
  static fromText(text: string, options?: TableOptions): TableView {
    return TableView.fromTable(Table.fromText(text, options));
  }

  // ── Shape ──────────────────────────────────────────────────────────────────

  /** Full header of the underlying table, including inactive columns. */
  header(): readonly string[] {
    return this.table.header;
  }

  /** Number of included rows. */
  rows(): number {
    return this._rows;
  }

  /** Number of active columns. */
  cols(): number {
    return this._cols;
  }

  /** Names of the active columns, in table order. */
  columns(): string[] {
    return [...masked(this.table.header, this._colMask)];
  }

  /** Row mask as one boolean per table row. A copy; the view is unaffected. */
  rowMask(): boolean[] {
    return maskToBooleans(this._rowMask);
  }

  /** Column mask as one boolean per header entry. */
  colMask(): boolean[] {
    return maskToBooleans(this._colMask);
  }

  /** True when `other` is backed by the same Table instance. */
  sharesTable(other: TableView): boolean {
    return this.table === other.table;
  }

  // ── Iteration ──────────────────────────────────────────────────────────────

  /** Included rows of the table, whole (inactive columns included). */
  rowIterable(): Iterable<readonly string[]> {
    return masked(this.table.rows, this._rowMask);
  }

  /** Active cells of `row`, in column order. `row` must span the full header. */
  colIterable(row: readonly string[]): Iterable<string> {
    return masked(row, this._colMask);
  }

  // ── Projection ─────────────────────────────────────────────────────────────

  /**
   * Keep only the named columns. Rows are unchanged.
   *
   * Names may be given in any order; the view still presents columns in
   * table order. Repeated names select the column once. The result's arity is
   * the number of distinct names.
   */
  select(...names: string[]): TableView {
    const indices = names.map((name) => {
      const index = this.table.headerIndex.get(name);
      if (index === undefined) throw new UnknownColumnError(name, this.table.header);
      return index;
    });

    const colMask = maskFromIndices(this.table.columnCount, indices);
    return new TableView(this.table, this._rowMask, colMask, new Set(indices).size);
  }

  // ── Comparison ─────────────────────────────────────────────────────────────

  /**
   * Row-wise comparison against one reference value per active column.
   *
   * For every included row the active cells are converted to the reference
   * types and tested column by column; the row survives only if every test
   * passes. 'ne' instead keeps the included rows for which the 'eq' test
   * fails, i.e. rows where at least one column differs.
   *
   * @param values  One reference value per active column, in column order.
   * @param types   Target type per column. Defaults to the type implied by
   *                each value (numbers → 'float'; see inferCellType).
   * @returns       A view with the same columns, fewer rows and arity N.
   */
  compare(op: Comparison, values: readonly CellValue[], types?: readonly CellType[]): TableView {
    const targets = this.referenceTypes(op, values, types);
    const n = values.length;

    const test = PREDICATES[op === 'ne' ? 'eq' : op];
    const keepOnMatch = op !== 'ne';

    const bits = createBitset(this.table.rowCount);
    forEachSet(this._rowMask.bits, this._rowMask.size, (r) => {
      let c = 0;
      let all = true;
      for (const cell of this.colIterable(this.table.rows[r]!)) {
        const order = compareValues(convertCell(cell, targets[c]!), values[c]!);
        c++;
        if (!test(order)) {
          all = false;
          break;
        }
      }
      if (all === keepOnMatch) setBit(bits, r);
    });

    return new TableView(this.table, { bits, size: this.table.rowCount }, this._colMask, n);
  }

  eq(values: readonly CellValue[], types?: readonly CellType[]): TableView {
    return this.compare('eq', values, types);
  }

  ne(values: readonly CellValue[], types?: readonly CellType[]): TableView {
    return this.compare('ne', values, types);
  }

  lt(values: readonly CellValue[], types?: readonly CellType[]): TableView {
    return this.compare('lt', values, types);
  }

  le(values: readonly CellValue[], types?: readonly CellType[]): TableView {
    return this.compare('le', values, types);
  }

  gt(values: readonly CellValue[], types?: readonly CellType[]): TableView {
    return this.compare('gt', values, types);
  }

  ge(values: readonly CellValue[], types?: readonly CellType[]): TableView {
    return this.compare('ge', values, types);
  }

  /**
   * Keep rows whose single active cell, converted to `type`, is in `values`.
   *
   * Requires exactly one active column. `type` defaults to the type implied
   * by the first value, or 'string' when `values` is empty.
   */
  isIn(values: Iterable<CellValue>, type?: CellType): TableView {
    const set = new Set<CellValue>(values);
    this.requireArity('isIn', 1);

    const first = set.values().next();
    const target = type ?? (first.done ? 'string' : inferCellType(first.value));
    for (const value of set) {
      if (!matchesCellType(value, target)) {
        throw new TypeError(`isIn: value ${String(value)} is not a valid ${target}.`);
      }
    }

    const bits = createBitset(this.table.rowCount);
    forEachSet(this._rowMask.bits, this._rowMask.size, (r) => {
      for (const cell of this.colIterable(this.table.rows[r]!)) {
        if (set.has(convertCell(cell, target))) setBit(bits, r);
      }
    });

    return new TableView(this.table, { bits, size: this.table.rowCount }, this._colMask, 1);
  }

  // ── Logical combination ────────────────────────────────────────────────────

  /** Rows included in both views. Keeps this view's columns and arity. */
  and(other: TableView): TableView {
    return this.combine(other, 'and');
  }

  /** Rows included in either view. Keeps this view's columns and arity. */
  or(other: TableView): TableView {
    return this.combine(other, 'or');
  }

  /**
   * Combine row masks element-wise. `other`'s column mask plays no part.
   *
   * Throws CrossTableError for views of different tables, and
   * ArityMismatchError when either view declares an arity the other does
   * not share.
   */
  combine(other: TableView, op: LogicalOp): TableView {
    this.requireSameTable(other, op);
    if ((this.arity !== undefined || other.arity !== undefined) && this.arity !== other.arity) {
      throw new ArityMismatchError(op, this.arity ?? this._cols, other.arity ?? other._cols);
    }

    const rowMask = op === 'and'
      ? andMask(this._rowMask, other._rowMask)
      : orMask(this._rowMask, other._rowMask);
    return new TableView(this.table, rowMask, this._colMask, this.arity);
  }

  // ── Cross-view selection ───────────────────────────────────────────────────

  /**
   * Take `other`'s rows and keep this view's columns.
   *
   * The usual way to apply a filter computed on some columns to a view that
   * shows other columns:
   *
   *   df.selectRows(df.select('age').ge([18]))
   */
  selectRows(other: TableView): TableView {
    this.requireSameTable(other, 'selectRows');
    return new TableView(this.table, other._rowMask, this._colMask, this.arity);
  }

  /** Take `other`'s columns and keep this view's rows. */
  selectCols(other: TableView): TableView {
    this.requireSameTable(other, 'selectCols');
    return new TableView(this.table, this._rowMask, other._colMask, this.arity);
  }

  // ── Extraction ─────────────────────────────────────────────────────────────

  /**
   * One array per active column, converted to the matching type.
   *
   *   const [ids, scores] = view.select('id', 'score').colsToArrays('int', 'float');
   *
   * The number of types must equal cols() (and the arity, when declared).
   */
  colsToArrays<Ts extends readonly CellType[]>(...types: Ts): ColumnArrays<Ts> {
    this.requireArity('colsToArrays', types.length);

    const columns: CellValue[][] = types.map(() => []);
    for (const cells of this.activeRows()) {
      cells.forEach((cell, c) => {
        columns[c]!.push(convertCell(cell, types[c]!));
      });
    }
    // Element c of `columns` was filled with convertCell(…, types[c]).
    return columns as ColumnArrays<Ts>;
  }

  /** The single active column as one typed array. */
  colToArray<T extends CellType>(type: T): CellValueOf<T>[] {
    this.requireArity('colToArray', 1);

    const out: CellValueOf<T>[] = [];
    for (const [cell = ''] of this.activeRows()) out.push(convertCell(cell, type));
    return out;
  }

  /** Every included row as an array of its active cells converted to `type`. */
  rowsToArrays<T extends CellType>(type: T): CellValueOf<T>[][] {
    const out: CellValueOf<T>[][] = [];
    for (const cells of this.activeRows()) {
      out.push(cells.map((cell) => convertCell(cell, type)));
    }
    return out;
  }

  /** Every included row as a typed tuple. Same arity rule as colsToArrays(). */
  rowsToTuples<Ts extends readonly CellType[]>(...types: Ts): RowTuple<Ts>[] {
    this.requireArity('rowsToTuples', types.length);

    const out: RowTuple<Ts>[] = [];
    for (const cells of this.activeRows()) {
      const tuple: CellValue[] = cells.map((cell, c) => convertCell(cell, types[c]!));
      // Position c of `tuple` was converted with types[c].
      out.push(tuple as RowTuple<Ts>);
    }
    return out;
  }

  // ── Export ─────────────────────────────────────────────────────────────────

  /** Write every included cell into `sink`, rows then columns. */
  exportTo<S extends MatrixSink<number>>(sink: S, options?: MatrixExportOptions): S {
    exportMatrix(this, sink, options);
    return sink;
  }

  /** Convert the view into a row-major Float64 matrix. */
  toMatrix(options?: MatrixExportOptions): DenseMatrix {
    return this.exportTo(new DenseMatrix(), options);
  }

  /** Header line of active columns, then one line per included row. */
  format(options?: RenderOptions): string {
    return formatView(this, options);
  }

  /** Write format() output to a text sink such as process.stdout. */
  print(sink: TextSink, options?: RenderOptions): void {
    writeView(this, sink, options);
  }

  toString(): string {
    return formatView(this);
  }

  // ── Internal helpers ───────────────────────────────────────────────────────

  /** Active cells of each included row, materialized one row at a time. */
  private *activeRows(): Generator<string[]> {
    for (const row of this.rowIterable()) {
      yield [...this.colIterable(row)];
    }
  }

  private requireSameTable(other: TableView, operation: string): void {
    if (other.table !== this.table) throw new CrossTableError(operation);
  }

  /** Active columns and declared arity must both equal `n`. */
  private requireArity(operation: string, n: number): void {
    if (this._cols !== n) throw new ArityMismatchError(operation, n, this._cols);
    if (this.arity !== undefined && this.arity !== n) {
      throw new ArityMismatchError(operation, n, this.arity);
    }
  }

  /** Validate comparison reference values and resolve one target type per column. */
  private referenceTypes(
    operation: string,
    values:    readonly CellValue[],
    types:     readonly CellType[] | undefined,
  ): CellType[] {
    this.requireArity(operation, values.length);
    if (types !== undefined && types.length !== values.length) {
      throw new ArityMismatchError(`${operation} types`, values.length, types.length);
    }

    const targets = types === undefined ? values.map(inferCellType) : [...types];
    targets.forEach((type, i) => {
      const value = values[i]!;
      if (!matchesCellType(value, type)) {
        throw new TypeError(
          `${operation}: reference value ${String(value)} at position ${i} is not a valid ${type}.`,
        );
      }
    });
    return targets;
  }
}

// ─── Entry point ──────────────────────────────────────────────────────────────

/** Load a delimited text file and view all of it. */
export function readCsv(path: string, options?: TableOptions): TableView {
  return TableView.load(path, options);
}
