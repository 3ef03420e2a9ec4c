import type { FieldType, WidgetHint } from './domain/model/FieldDefinition.js';
import type { Schema, SchemaBase } from './domain/model/Schema.js';
import type { JsonRecord } from './domain/model/Record.js';
import type { Table } from './domain/model/Table.js';
import type { ConversionOptions } from './domain/model/ConversionOptions.js';
import { resolveConversionOptions } from './domain/model/ConversionOptions.js';
import type { EventType, EventPayload } from './domain/events/DomainEvents.js';
import { inferSchema } from './domain/services/SchemaInferencer.js';
import { alignColumns, toTable } from './domain/services/TableProjector.js';
import { toRecords } from './domain/services/TableReconstructor.js';
import { EventBus } from './application/EventBus.js';
import type { HandlerErrorCallback } from './application/EventBus.js';
import { SchemaStore } from './application/SchemaStore.js';
import { ImportJson } from './application/usecases/ImportJson.js';
import type { ImportJsonResult, ImportMode } from './application/usecases/ImportJson.js';
import { ExportJson } from './application/usecases/ExportJson.js';
import type { ExportFormat } from './application/usecases/ExportJson.js';
import { JsonParser } from './infrastructure/parsers/JsonParser.js';
import { CsvTableCodec } from './infrastructure/parsers/CsvTableCodec.js';
import type { CsvTableCodecOptions } from './infrastructure/parsers/CsvTableCodec.js';

/** Configuration for a `JsonTableEditor`. */
export interface JsonTableEditorConfig {
  /**
   * Store to work on. Default: a new `SchemaStore` seeded with `Default`, wired
   * to this editor's event bus. A store passed in keeps the bus it was built with.
   */
  readonly store?: SchemaStore;
  /** Default: a new `EventBus`. */
  readonly eventBus?: EventBus;
  /** Overrides for inference, projection, and coercion defaults. */
  readonly conversion?: Partial<ConversionOptions>;
  /** Delimited-text settings for `tableToText()` / `tableFromText()`. */
  readonly text?: CsvTableCodecOptions;
  /** Receives errors thrown by event subscribers. Ignored when `eventBus` is given. */
  readonly onHandlerError?: HandlerErrorCallback;
}

/**
 * Facade over the schema store and the conversion engine, addressed by schema name.
 *
 * @example
 * ```typescript
 * const editor = new JsonTableEditor();
 * const { table } = editor.importJson('[{"name":"alpha","tags":["a","b"]}]', 'Default');
 * const json = editor.exportRecords(table, 'Default', 'array');
 * ```
 */
export class JsonTableEditor {
  readonly store: SchemaStore;
  private readonly eventBus: EventBus;
  private readonly options: ConversionOptions;
  private readonly importer: ImportJson;
  private readonly exporter: ExportJson;
  private readonly codec: CsvTableCodec;

  constructor(config: JsonTableEditorConfig = {}) {
    this.eventBus = config.eventBus ?? new EventBus(config.onHandlerError);
    this.store = config.store ?? new SchemaStore({ eventBus: this.eventBus });
    this.options = resolveConversionOptions(config.conversion);
    this.importer = new ImportJson(this.store, new JsonParser(), this.eventBus, this.options);
    this.exporter = new ExportJson(this.eventBus, this.options);
    this.codec = new CsvTableCodec(config.text);
  }

  on<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): void {
    this.eventBus.on(type, handler);
  }

  off<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): void {
    this.eventBus.off(type, handler);
  }

  schemaNames(): string[] {
    return this.store.schemaNames();
  }

  getSchema(schemaName: string): Schema {
    return this.store.getSchema(schemaName);
  }

  inferSchema(sample: unknown): Schema {
    return inferSchema(sample, this.options);
  }

  createSchema(name: string, base: SchemaBase = 'empty'): void {
    this.store.createSchema(name, base);
  }

  upsertField(
    schemaName: string,
    name: string,
    type: FieldType,
    required = false,
    widget: WidgetHint = '',
  ): 'added' | 'updated' {
    return this.store.upsertField(schemaName, name, type, required, widget);
  }

  deleteField(schemaName: string, name: string): boolean {
    return this.store.deleteField(schemaName, name);
  }

  mergeInferredFields(schemaName: string, inferred: Schema): string[] {
    return this.store.mergeInferredFields(schemaName, inferred);
  }

  toTable(records: readonly JsonRecord[], schemaName: string): Table {
    return toTable(records, this.store.getSchema(schemaName), this.options);
  }

  toRecords(table: Table, schemaName: string): JsonRecord[] {
    return toRecords(table, this.store.getSchema(schemaName), this.options);
  }

  /** Bring a table in line with the schema after fields were added or removed. */
  alignColumns(table: Table, schemaName: string): Table {
    return alignColumns(table, this.store.getSchema(schemaName));
  }

  importJson(text: string, schemaName: string, mode: ImportMode = 'schema-and-data'): ImportJsonResult {
    return this.importer.execute(text, schemaName, mode);
  }

  exportRecords(table: Table, schemaName: string, format: ExportFormat = 'auto'): string {
    return this.exporter.exportRecords(table, this.store.getSchema(schemaName), schemaName, format);
  }

  exportSchema(schemaName: string): string {
    return this.exporter.exportSchema(this.store.getSchema(schemaName));
  }

  tableToText(table: Table): string {
    return this.codec.format(table);
  }

  /** Read pasted delimited text into a table aligned to the schema's columns. */
  tableFromText(text: string, schemaName: string): Table {
    return this.codec.parse(text, this.store.getSchema(schemaName));
  }
}
