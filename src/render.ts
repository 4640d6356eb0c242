/**
 * maskframe — text rendering
 *
 * Layout:
 *
 *   a<TAB>c
 *   1<TAB>x
 *   2<TAB>y
 *
 * The first line holds the active column names; each further line holds the
 * active cells of one included row. Every line, the last included, ends
 * with '\n'.
 */

import { DEFAULT_SEPARATOR } from './constants';
import type { RenderOptions, TextSink } from './types';
import type { TableView } from './view';

/** Render lines one at a time so writeView() never builds the whole string. */
function* renderLines(view: TableView, options: RenderOptions): Generator<string> {
  const separator = options.separator ?? DEFAULT_SEPARATOR;
  const maxRows   = options.maxRows ?? Infinity;

  yield [...view.colIterable(view.header())].join(separator);

  let shown = 0;
  for (const row of view.rowIterable()) {
    if (shown >= maxRows) break;
    yield [...view.colIterable(row)].join(separator);
    shown++;
  }

  const hidden = view.rows() - shown;
  if (hidden > 0) yield `... (${hidden} more rows)`;
}

export function formatView(view: TableView, options: RenderOptions = {}): string {
  let out = '';
  for (const line of renderLines(view, options)) out += `${line}\n`;
  return out;
}

export function writeView(view: TableView, sink: TextSink, options: RenderOptions = {}): void {
  for (const line of renderLines(view, options)) sink.write(`${line}\n`);
}
