/**
 * maskframe — Table
 *
 * The immutable dataset every view shares. A Table is built once, from a
 * file, a string, a stream or pre-split records, and is never written to
 * afterwards: the header, each row and the row list are frozen.
 *
 * Shape invariant: every row has exactly `header.length` cells. Short rows
 * are padded with '' and long rows truncated when the table is built.
 *
 * Parsing rules:
 *   - The first line is the header; every later line is a row.
 *   - Lines are split on the delimiter (default ','). Quotes carry no
 *     meaning: '"a,b"' is two cells, '"a' and 'b"'.
 *   - Every cell is trimmed of surrounding whitespace.
 *   - An empty line in the body is a row of empty cells; a trailing newline
 *     at the end of the file does not add a row.
 */

import { readFileSync } from 'node:fs';
import { parse } from 'csv-parse/sync';

import { DEFAULT_DELIMITER, DEFAULT_ENCODING } from './constants';
import { OutOfRangeError, SchemaError, TableIOError } from './errors';
import type { TableOptions } from './types';

// ─── Parsing ──────────────────────────────────────────────────────────────────

/** Split delimited text into trimmed records. Record 0 is the header. */
export function parseRecords(text: string, options: TableOptions = {}): string[][] {
  const records: string[][] = parse(text, {
    delimiter:          options.delimiter ?? DEFAULT_DELIMITER,
    quote:              false,
    bom:                true,
    relax_column_count: true,
    skip_empty_lines:   false,
  });
  return records.map((record) => record.map((cell) => cell.trim()));
}

/** Pad with '' or truncate `cells` to exactly `width` entries. */
function fitRow(cells: readonly string[], width: number): string[] {
  const row = cells.slice(0, width);
  while (row.length < width) row.push('');
  return row;
}

/** Names that appear more than once, in order of first repetition. */
function findDuplicates(header: readonly string[]): string[] {
  const seen       = new Set<string>();
  const duplicates = new Set<string>();
  for (const name of header) {
    if (seen.has(name)) duplicates.add(name);
    seen.add(name);
  }
  return [...duplicates];
}

// ─── Table ────────────────────────────────────────────────────────────────────

export class Table {
  readonly header:      readonly string[];
  readonly headerIndex: ReadonlyMap<string, number>;
  readonly rows:        readonly (readonly string[])[];

  /**
   * Build a table from a header and already-split records.
   *
   * Records are copied and fitted to the header width; the caller's arrays
   * are not retained. Throws SchemaError when the header repeats a name.
   */
  constructor(header: readonly string[], records: readonly (readonly string[])[]) {
    const duplicates = findDuplicates(header);
    if (duplicates.length > 0) throw new SchemaError(duplicates);

    this.header = Object.freeze([...header]);
    this.headerIndex = new Map(header.map((name, i) => [name, i]));
    this.rows = Object.freeze(
      records.map((record) => Object.freeze(fitRow(record, header.length))),
    );
  }

  // ── Factories ──────────────────────────────────────────────────────────────

  /** Parse delimited text held in memory. */
  static fromText(text: string, options: TableOptions = {}): Table {
    const [header = [], ...body] = parseRecords(text, options);
    return new Table(header, body);
  }

  /**
   * Read and parse a file synchronously.
   *
   * Throws TableIOError when the file does not exist or cannot be read; the
   * underlying fs error is attached as `cause`.
   */
  static load(path: string, options: TableOptions = {}): Table {
    let text: string;
    try {
      text = readFileSync(path, { encoding: options.encoding ?? DEFAULT_ENCODING });
    } catch (cause) {
      const reason = cause instanceof Error ? cause.message : String(cause);
      throw new TableIOError(path, `Cannot read table source '${path}': ${reason}`, { cause });
    }
    return Table.fromText(text, options);
  }

  /**
   * Collect a stream (a Node Readable, or any async iterable of text or
   * bytes) and parse it once it ends. Byte chunks are decoded as UTF-8.
   */
  static async fromStream(
    stream:  AsyncIterable<string | Uint8Array>,
    options: TableOptions = {},
    source:  string = '<stream>',
  ): Promise<Table> {
    const decoder = new TextDecoder();
    let text = '';
    try {
      for await (const chunk of stream) {
        // Flush pending bytes before a string chunk so text stays in order.
        text += typeof chunk === 'string'
          ? decoder.decode() + chunk
          : decoder.decode(chunk, { stream: true });
      }
      text += decoder.decode();
    } catch (cause) {
      const reason = cause instanceof Error ? cause.message : String(cause);
      throw new TableIOError(source, `Cannot read table source '${source}': ${reason}`, { cause });
    }
    return Table.fromText(text, options);
  }

  // ── Shape ──────────────────────────────────────────────────────────────────

  get rowCount(): number {
    return this.rows.length;
  }

  get columnCount(): number {
    return this.header.length;
  }

  // ── Cell access ────────────────────────────────────────────────────────────

  /** Bounds-checked cell read. Throws OutOfRangeError outside the extents. */
  cell(row: number, col: number): string {
    if (!Number.isInteger(row) || row < 0 || row >= this.rows.length) {
      throw new OutOfRangeError(
        `Table has ${this.rows.length} rows, but row ${row} was requested.`,
      );
    }
    if (!Number.isInteger(col) || col < 0 || col >= this.header.length) {
      throw new OutOfRangeError(
        `Table has ${this.header.length} columns, but column ${col} was requested.`,
      );
    }
    return this.rows[row]![col]!;
  }

  /** Index of a column by name, or undefined. */
  columnIndex(name: string): number | undefined {
    return this.headerIndex.get(name);
  }
}
