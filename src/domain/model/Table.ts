import type { JsonValue } from './Record.js';

/** A table cell. `undefined` stands for a cell the row never had. */
export type CellValue = JsonValue | undefined;

export interface TableRow {
  readonly [column: string]: CellValue;
}

/**
 * Tabular view of a record sequence.
 *
 * `columns` lists the schema's field names in schema order. Rows may also carry
 * keys that are not columns; they are kept but not shown.
 */
export interface Table {
  readonly columns: readonly string[];
  readonly rows: readonly TableRow[];
}

/** Read a cell the row itself holds; inherited members such as `constructor` count as missing. */
export function readCell(row: TableRow, column: string): CellValue {
  return Object.hasOwn(row, column) ? row[column] : undefined;
}

/** Blank cells: `undefined`, `null`, `NaN`, or a string that is empty once trimmed. */
export function isBlankCell(value: CellValue): boolean {
  if (value === undefined || value === null) return true;
  if (typeof value === 'number') return Number.isNaN(value);
  if (typeof value === 'string') return value.trim() === '';
  return false;
}

/** Check whether every cell of a row is blank, including the listed columns it lacks. */
export function isBlankRow(row: TableRow, columns: readonly string[]): boolean {
  return Object.values(row).every(isBlankCell) && columns.every((column) => isBlankCell(readCell(row, column)));
}
