/**
 * maskframe — type definitions
 *
 * Cells are stored as strings. Every typed operation names the type a cell
 * is converted to; these types describe that vocabulary and the shapes the
 * typed extractors return.
 */

// ─── Cell Types ───────────────────────────────────────────────────────────────

/**
 * Target types a cell can be converted to.
 *
 * int:     Safe integer in plain decimal notation (`-12`, `+7`, `0`).
 * float:   Decimal number with optional fraction and exponent (`1.5e3`).
 * bool:    `1` / `0` / `true` / `false`, case-insensitive.
 * string:  The cell text, unchanged.
 * bigint:  Arbitrary-precision integer in plain decimal notation.
 *
 * An empty cell converts to the zero value of its target type.
 */
export type CellType = 'int' | 'float' | 'bool' | 'string' | 'bigint';

/** Cell types that fit in a Float64 matrix slot. */
export type NumericCellType = 'int' | 'float' | 'bool';

/** JS representation of each CellType after conversion. */
export interface CellTypeMap {
  int:    number;
  float:  number;
  bool:   boolean;
  string: string;
  bigint: bigint;
}

export type CellValueOf<T extends CellType> = CellTypeMap[T];

/** Any converted cell value. Also the domain of comparison reference values. */
export type CellValue = CellTypeMap[CellType];

/** Maps a tuple of cell types to the tuple of arrays colsToArrays() returns. */
export type ColumnArrays<Ts extends readonly CellType[]> = {
  -readonly [K in keyof Ts]: Ts[K] extends CellType ? CellValueOf<Ts[K]>[] : never;
};

/** Maps a tuple of cell types to one converted row. */
export type RowTuple<Ts extends readonly CellType[]> = {
  -readonly [K in keyof Ts]: Ts[K] extends CellType ? CellValueOf<Ts[K]> : never;
};

// ─── Predicates ───────────────────────────────────────────────────────────────

/**
 * Row-wise comparison operators.
 *
 * All but `ne` keep a row when every active column satisfies the operator
 * against its reference value. `ne` keeps a row when the `eq` test fails for
 * the row as a whole, i.e. when at least one column differs.
 */
export type Comparison = 'eq' | 'ne' | 'lt' | 'le' | 'gt' | 'ge';

export type LogicalOp = 'and' | 'or';

// ─── Options ──────────────────────────────────────────────────────────────────

export interface TableOptions {
  /** Field delimiter. Default ','. */
  readonly delimiter?: string;
  /** Text encoding used by Table.load(). Default 'utf8'. */
  readonly encoding?: BufferEncoding;
}

export interface RenderOptions {
  /** String placed between cells. Default '\t'. */
  readonly separator?: string;
  /** Render at most this many rows; the rest are summarized on one line. */
  readonly maxRows?: number;
}

export interface MatrixExportOptions {
  /** Conversion applied to every cell. Default 'float'. */
  readonly type?: NumericCellType;
  /** Required row count. Omit for a dynamic extent. */
  readonly rows?: number;
  /** Required column count. Omit for a dynamic extent. */
  readonly cols?: number;
}

/** Anything with a write(string) method: process.stdout, a Writable, a test buffer. */
export interface TextSink {
  write(chunk: string): unknown;
}
