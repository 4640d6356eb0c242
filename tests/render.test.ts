/**
 * maskframe — text rendering tests
 */

import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'node:url';
import { formatView, readCsv, TableView, writeView } from '../src/index';

const PEOPLE =
  'name,age,city\n' +
  'ann,34,oslo\n' +
  'bob,19,rome\n' +
  'dee,19,lima\n';

function teens(): TableView {
  const df = TableView.fromText(PEOPLE);
  return df.selectRows(df.select('age').lt([20])).select('name', 'age');
}

describe('format', () => {
  it('prints a header line and one line per included row', () => {
    expect(teens().format()).toBe('name\tage\nbob\t19\ndee\t19\n');
  });

  it('honours a custom separator', () => {
    expect(teens().format({ separator: ',' })).toBe('name,age\nbob,19\ndee,19\n');
  });

  it('summarises rows beyond maxRows', () => {
    expect(teens().format({ maxRows: 1 })).toBe('name\tage\nbob\t19\n... (1 more rows)\n');
    expect(teens().format({ maxRows: 0 })).toBe('name\tage\n... (2 more rows)\n');
  });

  it('prints only the header for a view without rows', () => {
    const df = TableView.fromText(PEOPLE);
    expect(df.select('age').gt([100]).format()).toBe('age\n');
  });

  it('prints empty cells as empty fields', () => {
    const path = fileURLToPath(new URL('./fixtures/scores.csv', import.meta.url));
    expect(readCsv(path).select('name', 'score').format()).toBe(
      'name\tscore\nann\t91.5\nbob\t78\ncy\t85\ndee\t\n',
    );
  });

  it('is what toString() and formatView() return', () => {
    const view = teens();
    expect(`${view}`).toBe(view.format());
    expect(formatView(view)).toBe(view.format());
  });
});

describe('print', () => {
  it('writes one chunk per line to the sink', () => {
    const chunks: string[] = [];
    teens().print({ write: (chunk: string) => chunks.push(chunk) });
    expect(chunks).toEqual(['name\tage\n', 'bob\t19\n', 'dee\t19\n']);
  });

  it('passes options through', () => {
    const chunks: string[] = [];
    writeView(teens(), { write: (chunk: string) => chunks.push(chunk) }, { maxRows: 1 });
    expect(chunks.join('')).toBe('name\tage\nbob\t19\n... (1 more rows)\n');
  });
});
