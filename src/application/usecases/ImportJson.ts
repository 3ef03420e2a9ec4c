import type { JsonRecord } from '../../domain/model/Record.js';
import type { Schema } from '../../domain/model/Schema.js';
import type { Table } from '../../domain/model/Table.js';
import type { ConversionOptions } from '../../domain/model/ConversionOptions.js';
import { ImportError, SchemaNotFoundError } from '../../domain/errors/EditorErrors.js';
import { inferSchema } from '../../domain/services/SchemaInferencer.js';
import { toTable } from '../../domain/services/TableProjector.js';
import type { JsonParser } from '../../infrastructure/parsers/JsonParser.js';
import type { SchemaStore } from '../SchemaStore.js';
import type { EventBus } from '../EventBus.js';

/** `schema-and-data` merges fields inferred from the first record before projecting. */
export type ImportMode = 'schema-and-data' | 'data-only';

export interface ImportJsonResult {
  readonly records: readonly JsonRecord[];
  /** The schema after any merge. */
  readonly schema: Schema;
  /** `null` when the input held nothing to import; the caller keeps its current table. */
  readonly table: Table | null;
  readonly addedFields: readonly string[];
}

/** Use case: read JSON text into a schema's table, optionally growing the schema first. */
export class ImportJson {
  constructor(
    private readonly store: SchemaStore,
    private readonly parser: JsonParser,
    private readonly eventBus: EventBus,
    private readonly options: ConversionOptions,
  ) {}

  /**
   * An empty array, or objects without keys, import nothing: the schema is not
   * touched and no event is emitted.
   *
   * @throws SchemaNotFoundError before anything is read.
   * @throws ImportError for every other failure.
   */
  execute(text: string, schemaName: string, mode: ImportMode = 'schema-and-data'): ImportJsonResult {
    if (!this.store.hasSchema(schemaName)) throw new SchemaNotFoundError(schemaName);

    try {
      const records = [...this.parser.parse(text)];
      if (records.every((record) => Object.keys(record).length === 0)) {
        return { records: [], schema: this.store.getSchema(schemaName), table: null, addedFields: [] };
      }

      const addedFields =
        mode === 'schema-and-data' ? this.store.mergeInferredFields(schemaName, inferSchema(records, this.options)) : [];
      const schema = this.store.getSchema(schemaName);
      const table = toTable(records, schema, this.options);

      this.eventBus.emit({
        type: 'data:imported',
        schemaName,
        recordCount: records.length,
        addedFields,
        timestamp: Date.now(),
      });

      return { records, schema, table, addedFields };
    } catch (error) {
      const failure = this.toImportError(error);
      this.eventBus.emit({
        type: 'import:failed',
        schemaName,
        code: failure.code,
        error: failure.message,
        timestamp: Date.now(),
      });
      throw failure;
    }
  }

  private toImportError(error: unknown): ImportError {
    const reason = error instanceof Error ? error.message : String(error);
    return new ImportError(`Failed to import JSON: ${reason}`, { cause: error });
  }
}
