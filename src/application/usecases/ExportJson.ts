import type { JsonRecord } from '../../domain/model/Record.js';
import type { Schema } from '../../domain/model/Schema.js';
import type { Table } from '../../domain/model/Table.js';
import type { ConversionOptions } from '../../domain/model/ConversionOptions.js';
import { toRecords } from '../../domain/services/TableReconstructor.js';
import type { EventBus } from '../EventBus.js';

/**
 * `array` always writes an array. `object` writes a lone record as a bare
 * object and anything else as an array; `auto` behaves the same way.
 */
export type ExportFormat = 'array' | 'object' | 'auto';

const INDENT = 2;

/** Use case: turn an edited table back into pretty-printed JSON text. */
export class ExportJson {
  constructor(
    private readonly eventBus: EventBus,
    private readonly options: ConversionOptions,
  ) {}

  exportRecords(table: Table, schema: Schema, schemaName: string, format: ExportFormat = 'auto'): string {
    const records = toRecords(table, schema, this.options);

    this.eventBus.emit({ type: 'data:exported', schemaName, recordCount: records.length, timestamp: Date.now() });

    return serializeRecords(records, format);
  }

  exportSchema(schema: Schema): string {
    return JSON.stringify(schema, null, INDENT);
  }
}

export function serializeRecords(records: readonly JsonRecord[], format: ExportFormat = 'auto'): string {
  const [only] = records;
  if (format !== 'array' && records.length === 1 && only) {
    return JSON.stringify(only, null, INDENT);
  }
  return JSON.stringify(records, null, INDENT);
}
