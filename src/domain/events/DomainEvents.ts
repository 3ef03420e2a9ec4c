import type { FieldDefinition } from '../model/FieldDefinition.js';
import type { SchemaBase } from '../model/Schema.js';
import type { EditorErrorCode } from '../errors/EditorErrors.js';

/** Emitted when `createSchema()` adds a schema to the store. */
export interface SchemaCreatedEvent {
  readonly type: 'schema:created';
  readonly schemaName: string;
  readonly base: SchemaBase;
  readonly fieldCount: number;
  readonly timestamp: number;
}

/** Emitted when `upsertField()` appends a field or replaces one in place. */
export interface FieldUpsertedEvent {
  readonly type: 'field:upserted';
  readonly schemaName: string;
  readonly field: FieldDefinition;
  readonly action: 'added' | 'updated';
  readonly timestamp: number;
}

/** Emitted only when `deleteField()` actually removed a field. */
export interface FieldDeletedEvent {
  readonly type: 'field:deleted';
  readonly schemaName: string;
  readonly fieldName: string;
  readonly timestamp: number;
}

/** Emitted after `mergeInferredFields()`, even when nothing new was added. */
export interface FieldsMergedEvent {
  readonly type: 'fields:merged';
  readonly schemaName: string;
  readonly addedFields: readonly string[];
  readonly timestamp: number;
}

export interface DataImportedEvent {
  readonly type: 'data:imported';
  readonly schemaName: string;
  readonly recordCount: number;
  readonly addedFields: readonly string[];
  readonly timestamp: number;
}

/** Emitted when JSON input could not be imported. */
export interface ImportFailedEvent {
  readonly type: 'import:failed';
  readonly schemaName: string;
  readonly code: EditorErrorCode;
  readonly error: string;
  readonly timestamp: number;
}

export interface DataExportedEvent {
  readonly type: 'data:exported';
  readonly schemaName: string;
  readonly recordCount: number;
  readonly timestamp: number;
}

/** Discriminated union of all domain events. */
export type DomainEvent =
  | SchemaCreatedEvent
  | FieldUpsertedEvent
  | FieldDeletedEvent
  | FieldsMergedEvent
  | DataImportedEvent
  | ImportFailedEvent
  | DataExportedEvent;

/** String literal union of all event type names. */
export type EventType = DomainEvent['type'];

/** Extract the payload type for a specific event type. */
export type EventPayload<T extends EventType> = Extract<DomainEvent, { type: T }>;
