// Main entry point
export { JsonTableEditor } from './JsonTableEditor.js';
export type { JsonTableEditorConfig } from './JsonTableEditor.js';

// Domain model
export type { FieldDefinition, FieldType, WidgetHint } from './domain/model/FieldDefinition.js';
export { FIELD_TYPES, WIDGET_HINTS, createField, isFieldType, isWidgetHint } from './domain/model/FieldDefinition.js';
export type { Schema, SchemaBase } from './domain/model/Schema.js';
export { fieldNames } from './domain/model/Schema.js';
export type { JsonValue, JsonObject, JsonRecord } from './domain/model/Record.js';
export { isJsonObject, setEntry, stringifyValue } from './domain/model/Record.js';
export type { Table, TableRow, CellValue } from './domain/model/Table.js';
export { isBlankCell, isBlankRow, readCell } from './domain/model/Table.js';
export type { ConversionOptions } from './domain/model/ConversionOptions.js';
export { DEFAULT_CONVERSION_OPTIONS, resolveConversionOptions } from './domain/model/ConversionOptions.js';

// Errors
export type { EditorErrorCode } from './domain/errors/EditorErrors.js';
export {
  EditorError,
  DuplicateNameError,
  SchemaNotFoundError,
  InvalidNameError,
  ImportError,
  isEditorError,
} from './domain/errors/EditorErrors.js';

// Conversion engine
export { inferSchema, guessFieldType } from './domain/services/SchemaInferencer.js';
export { toTable, alignColumns } from './domain/services/TableProjector.js';
export { toRecords } from './domain/services/TableReconstructor.js';
export { coerceCell, emptyValue, toNumber, toBoolean, toList } from './domain/services/ValueCoercer.js';

// Schema store
export { SchemaStore, DEFAULT_SCHEMA_NAME, createSchema, upsertField, deleteField, mergeInferredFields } from './application/SchemaStore.js';
export type { SchemaStoreOptions } from './application/SchemaStore.js';

// Use cases
export { ImportJson } from './application/usecases/ImportJson.js';
export type { ImportMode, ImportJsonResult } from './application/usecases/ImportJson.js';
export { ExportJson, serializeRecords } from './application/usecases/ExportJson.js';
export type { ExportFormat } from './application/usecases/ExportJson.js';

// Domain events
export { EventBus } from './application/EventBus.js';
export type { HandlerErrorCallback } from './application/EventBus.js';
export type {
  DomainEvent,
  EventType,
  EventPayload,
  SchemaCreatedEvent,
  FieldUpsertedEvent,
  FieldDeletedEvent,
  FieldsMergedEvent,
  DataImportedEvent,
  ImportFailedEvent,
  DataExportedEvent,
} from './domain/events/DomainEvents.js';

// Infrastructure adapters (built-in)
export { JsonParser } from './infrastructure/parsers/JsonParser.js';
export { CsvTableCodec } from './infrastructure/parsers/CsvTableCodec.js';
export type { CsvTableCodecOptions } from './infrastructure/parsers/CsvTableCodec.js';
