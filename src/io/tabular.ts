/**
 * Tabular file helpers
 *
 * Thin wrappers over csv-parse / csv-stringify that expose the tables as
 * rows of named (or positional) string cells.
 */

import * as fs from 'fs';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';

export type TabularFileState = 'missing' | 'empty' | 'present';

/**
 * A table with a header row
 */
export interface HeaderedTable {
  columns: string[];
  rows: Array<Record<string, string>>;
}

export interface ReadOptions {
  delimiter?: string;
}

/**
 * Check whether a file exists and has any content
 */
export function inspectTabularFile(filePath: string): TabularFileState {
  if (!fs.existsSync(filePath)) {
    return 'missing';
  }
  return fs.statSync(filePath).size === 0 ? 'empty' : 'present';
}

/**
 * Parse delimited text into raw rows of cells
 */
export function parseRows(content: string, options: ReadOptions = {}): string[][] {
  const rows: string[][] = parse(content, {
    delimiter: options.delimiter ?? ',',
    skip_empty_lines: true,
    relax_column_count: true,
    relax_quotes: true,
    bom: true,
  });
  return rows;
}

/**
 * Turn raw rows into a table keyed by the first row's column names
 * Missing trailing cells read as empty strings
 */
export function toHeaderedTable(rows: string[][]): HeaderedTable {
  if (rows.length === 0) {
    return { columns: [], rows: [] };
  }

  const [header, ...body] = rows;
  const columns = header.map((name) => name.trim());

  return {
    columns,
    rows: body.map((cells) => {
      const record: Record<string, string> = {};
      columns.forEach((column, index) => {
        record[column] = cells[index] ?? '';
      });
      return record;
    }),
  };
}

/**
 * Read a delimited file that starts with a header row
 */
export function readHeaderedTable(filePath: string, options: ReadOptions = {}): HeaderedTable {
  const content = fs.readFileSync(filePath, 'utf-8');
  return toHeaderedTable(parseRows(content, options));
}

/**
 * Read a header-less delimited file
 */
export function readRawTable(filePath: string, options: ReadOptions = {}): string[][] {
  const content = fs.readFileSync(filePath, 'utf-8');
  return parseRows(content, options);
}

/**
 * Serialize rows under the given columns, header first
 */
export function formatTable<C extends string>(
  columns: readonly C[],
  rows: ReadonlyArray<Record<C, string | number>>,
  options: ReadOptions = {}
): string {
  if (rows.length === 0) {
    return stringify([[...columns]], { delimiter: options.delimiter ?? ',' });
  }
  return stringify([...rows], {
    header: true,
    columns: [...columns],
    delimiter: options.delimiter ?? ',',
  });
}

/**
 * Write rows to a delimited file, header first
 */
export function writeTable<C extends string>(
  filePath: string,
  columns: readonly C[],
  rows: ReadonlyArray<Record<C, string | number>>,
  options: ReadOptions = {}
): void {
  fs.writeFileSync(filePath, formatTable(columns, rows, options), 'utf-8');
}
