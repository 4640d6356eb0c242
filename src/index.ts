// ─── Types ────────────────────────────────────────────────────────────────────
export type {
  CellType,
  NumericCellType,
  CellTypeMap,
  CellValue,
  CellValueOf,
  ColumnArrays,
  RowTuple,
  Comparison,
  LogicalOp,
  TableOptions,
  RenderOptions,
  MatrixExportOptions,
  TextSink,
} from './types';

// ─── Constants ────────────────────────────────────────────────────────────────
export {
  DEFAULT_DELIMITER,
  DEFAULT_ENCODING,
  DEFAULT_SEPARATOR,
  CELL_TYPES,
} from './constants';

// ─── Errors ───────────────────────────────────────────────────────────────────
export {
  TableIOError,
  SchemaError,
  OutOfRangeError,
  SizeMismatchError,
  ArityMismatchError,
  UnknownColumnError,
  CrossTableError,
  ConversionError,
  ShapeMismatchError,
} from './errors';

// ─── Masks ────────────────────────────────────────────────────────────────────
export {
  createMask,
  maskFromIndices,
  maskFromBooleans,
  maskToBooleans,
  andMask,
  orMask,
  countMask,
  popcount,
  forEachSet,
} from './bitset';
export type { Mask } from './bitset';
export { masked, maskedIndices } from './masked';

// ─── Conversion ───────────────────────────────────────────────────────────────
export {
  convertCell,
  convertCells,
  inferCellType,
  matchesCellType,
  compareValues,
} from './convert';

// ─── Table ────────────────────────────────────────────────────────────────────
export { Table, parseRecords } from './table';

// ─── View ─────────────────────────────────────────────────────────────────────
export { TableView, readCsv } from './view';

// ─── Output ───────────────────────────────────────────────────────────────────
export { formatView, writeView } from './render';
export { DenseMatrix, exportMatrix } from './matrix';
export type { MatrixSink } from './matrix';
