import type { Schema } from '../model/Schema.js';
import { fieldNames } from '../model/Schema.js';
import type { JsonRecord, JsonValue } from '../model/Record.js';
import { setEntry, stringifyValue } from '../model/Record.js';
import type { CellValue, Table, TableRow } from '../model/Table.js';
import type { ConversionOptions } from '../model/ConversionOptions.js';
import { resolveConversionOptions } from '../model/ConversionOptions.js';

/**
 * Project JSON records onto the schema's columns.
 *
 * Array values of `list` fields become one joined string; every other value
 * is left as it is, keys unknown to the schema included. Schema fields a
 * record lacks become `''`.
 */
export function toTable(
  records: readonly JsonRecord[],
  schema: Schema,
  options?: Partial<ConversionOptions>,
): Table {
  const { listJoinSeparator } = resolveConversionOptions(options);
  const listFields = new Set(schema.filter((field) => field.type === 'list').map((field) => field.name));
  const columns = fieldNames(schema);

  const rows = records.map((record) => {
    const row: Record<string, CellValue> = {};
    for (const [key, value] of Object.entries(record)) {
      setEntry(row, key, listFields.has(key) && Array.isArray(value) ? joinList(value, listJoinSeparator) : value);
    }
    return fillMissing(row, columns);
  });

  return { columns, rows };
}

/** Reset a table's columns to the schema, adding `''` cells for columns new to it. */
export function alignColumns(table: Table, schema: Schema): Table {
  const columns = fieldNames(schema);
  return {
    columns,
    rows: table.rows.map((row) => fillMissing({ ...row }, columns)),
  };
}

function joinList(items: readonly JsonValue[], separator: string): string {
  return items.map(stringifyValue).join(separator);
}

function fillMissing(row: Record<string, CellValue>, columns: readonly string[]): TableRow {
  for (const column of columns) {
    if (!Object.hasOwn(row, column)) setEntry(row, column, '');
  }
  return row;
}
