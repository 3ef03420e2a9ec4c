import type { Schema } from '../model/Schema.js';
import { fieldNames } from '../model/Schema.js';
import type { JsonRecord, JsonValue } from '../model/Record.js';
import { setEntry } from '../model/Record.js';
import type { Table } from '../model/Table.js';
import { isBlankRow, readCell } from '../model/Table.js';
import type { ConversionOptions } from '../model/ConversionOptions.js';
import { resolveConversionOptions } from '../model/ConversionOptions.js';
import { coerceCell } from './ValueCoercer.js';

/**
 * Rebuild JSON records from a table.
 *
 * Rows with nothing but blank cells are dropped. Each remaining row yields a
 * record holding exactly the schema's fields, in schema order, coerced to the
 * declared types.
 */
export function toRecords(table: Table, schema: Schema, options?: Partial<ConversionOptions>): JsonRecord[] {
  const resolved = resolveConversionOptions(options);
  const columns = fieldNames(schema);
  const records: JsonRecord[] = [];

  for (const row of table.rows) {
    if (isBlankRow(row, columns)) continue;

    const record: Record<string, JsonValue> = {};
    for (const field of schema) {
      setEntry(record, field.name, coerceCell(readCell(row, field.name), field.type, resolved));
    }
    records.push(record);
  }

  return records;
}
