import Papa from 'papaparse';
import type { Schema } from '../../domain/model/Schema.js';
import type { CellValue, Table, TableRow } from '../../domain/model/Table.js';
import { readCell } from '../../domain/model/Table.js';
import { setEntry, stringifyValue } from '../../domain/model/Record.js';
import { alignColumns } from '../../domain/services/TableProjector.js';

export interface CsvTableCodecOptions {
  /** Column delimiter. Default: `','`. */
  readonly delimiter?: string;
  /** Line terminator used when writing. Default: `'\n'`. */
  readonly newline?: string;
}

/**
 * Exchanges tables as delimited text, for pasting to and from spreadsheets.
 * Every parsed cell is a string; coercion is left to `toRecords()`.
 */
export class CsvTableCodec {
  private readonly delimiter: string;
  private readonly newline: string;

  constructor(options?: CsvTableCodecOptions) {
    this.delimiter = options?.delimiter ?? ',';
    this.newline = options?.newline ?? '\n';
  }

  /** Write the table's columns (not the extra row keys) with a header line. */
  format(table: Table): string {
    const data = table.rows.map((row) => table.columns.map((column) => this.formatCell(readCell(row, column))));

    return Papa.unparse(
      { fields: [...table.columns], data },
      { delimiter: this.delimiter, newline: this.newline },
    );
  }

  /**
   * Read delimited text with a header line. With a schema, the result has the
   * schema's columns and cells for missing columns are `''`.
   */
  parse(text: string, schema?: Schema): Table {
    const result = Papa.parse<Record<string, string | undefined>>(text, {
      header: true,
      delimiter: this.delimiter,
      skipEmptyLines: 'greedy',
      dynamicTyping: false,
    });

    const columns = result.meta.fields ?? [];
    const rows = result.data.map((parsed) => {
      const row: Record<string, CellValue> = {};
      for (const column of columns) {
        setEntry(row, column, Object.hasOwn(parsed, column) ? parsed[column] ?? '' : '');
      }
      return row satisfies TableRow;
    });

    const table: Table = { columns, rows };
    return schema ? alignColumns(table, schema) : table;
  }

  private formatCell(value: CellValue): string {
    if (value === undefined || value === null) return '';
    return stringifyValue(value);
  }
}
