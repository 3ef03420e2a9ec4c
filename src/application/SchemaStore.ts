import type { FieldDefinition, FieldType, WidgetHint } from '../domain/model/FieldDefinition.js';
import { createField } from '../domain/model/FieldDefinition.js';
import type { Schema, SchemaBase } from '../domain/model/Schema.js';
import { DuplicateNameError, InvalidNameError, SchemaNotFoundError } from '../domain/errors/EditorErrors.js';
import type { EventBus } from './EventBus.js';

export interface SchemaStoreOptions {
  /** Receives `schema:*` and `field:*` events. */
  readonly eventBus?: EventBus;
  /** Name of the schema the store is seeded with. Default: `'Default'`. */
  readonly defaultSchemaName?: string;
}

export const DEFAULT_SCHEMA_NAME = 'Default';

function defaultFields(): FieldDefinition[] {
  return [createField('name', 'string', true), createField('value', 'string', false)];
}

/**
 * Owns every schema by name.
 *
 * Field definitions are frozen, so a schema handed out by `getSchema()` is a
 * fresh array that cannot be used to change the store. Schemas are never
 * removed; only their fields are.
 */
export class SchemaStore {
  private readonly schemas = new Map<string, FieldDefinition[]>();
  private readonly eventBus: EventBus | null;

  constructor(options?: SchemaStoreOptions) {
    this.eventBus = options?.eventBus ?? null;
    this.schemas.set(options?.defaultSchemaName ?? DEFAULT_SCHEMA_NAME, defaultFields());
  }

  hasSchema(name: string): boolean {
    return this.schemas.has(name);
  }

  /** Names in creation order. */
  schemaNames(): string[] {
    return [...this.schemas.keys()];
  }

  /** @throws SchemaNotFoundError */
  getSchema(name: string): Schema {
    return [...this.fieldsOf(name)];
  }

  /**
   * Add a schema, empty or as an independent copy of an existing one.
   *
   * @throws DuplicateNameError when `name` is taken; nothing changes in that case.
   * @throws SchemaNotFoundError when the copy source does not exist.
   */
  createSchema(name: string, base: SchemaBase = 'empty'): void {
    if (name.trim() === '') throw new InvalidNameError('schema');
    if (this.schemas.has(name)) throw new DuplicateNameError(name);

    const fields = base === 'empty' ? [] : [...this.fieldsOf(base.copyOf)];
    this.schemas.set(name, fields);

    this.eventBus?.emit({
      type: 'schema:created',
      schemaName: name,
      base,
      fieldCount: fields.length,
      timestamp: Date.now(),
    });
  }

  /** Replace the field called `name` where it stands, or append it. */
  upsertField(
    schemaName: string,
    name: string,
    type: FieldType,
    required = false,
    widget: WidgetHint = '',
  ): 'added' | 'updated' {
    if (name.trim() === '') throw new InvalidNameError('field');
    const fields = this.fieldsOf(schemaName);
    const field = createField(name, type, required, widget);

    const index = fields.findIndex((existing) => existing.name === name);
    const action = index === -1 ? 'added' : 'updated';
    if (index === -1) {
      fields.push(field);
    } else {
      fields[index] = field;
    }

    this.eventBus?.emit({ type: 'field:upserted', schemaName, field, action, timestamp: Date.now() });
    return action;
  }

  /** Remove the field called `name`. Returns `false` when there was none. */
  deleteField(schemaName: string, name: string): boolean {
    const fields = this.fieldsOf(schemaName);
    const index = fields.findIndex((field) => field.name === name);
    if (index === -1) return false;

    fields.splice(index, 1);
    this.eventBus?.emit({ type: 'field:deleted', schemaName, fieldName: name, timestamp: Date.now() });
    return true;
  }

  /**
   * Append the inferred fields whose names the schema does not have yet.
   * Existing definitions keep their settings and positions.
   *
   * @returns Names of the appended fields, in order.
   */
  mergeInferredFields(schemaName: string, inferred: Schema): string[] {
    const fields = this.fieldsOf(schemaName);
    const known = new Set(fields.map((field) => field.name));
    const added: string[] = [];

    for (const field of inferred) {
      if (known.has(field.name)) continue;
      fields.push(createField(field.name, field.type, field.required, field.widget));
      known.add(field.name);
      added.push(field.name);
    }

    this.eventBus?.emit({ type: 'fields:merged', schemaName, addedFields: added, timestamp: Date.now() });
    return added;
  }

  /** Plain snapshot, ready for `JSON.stringify`. */
  toJSON(): Record<string, Schema> {
    const snapshot: Record<string, Schema> = {};
    for (const [name, fields] of this.schemas) {
      snapshot[name] = [...fields];
    }
    return snapshot;
  }

  private fieldsOf(schemaName: string): FieldDefinition[] {
    const fields = this.schemas.get(schemaName);
    if (!fields) throw new SchemaNotFoundError(schemaName);
    return fields;
  }
}

export function createSchema(store: SchemaStore, name: string, base: SchemaBase = 'empty'): void {
  store.createSchema(name, base);
}

export function upsertField(
  store: SchemaStore,
  schemaName: string,
  name: string,
  type: FieldType,
  required = false,
  widget: WidgetHint = '',
): 'added' | 'updated' {
  return store.upsertField(schemaName, name, type, required, widget);
}

export function deleteField(store: SchemaStore, schemaName: string, name: string): boolean {
  return store.deleteField(schemaName, name);
}

export function mergeInferredFields(store: SchemaStore, schemaName: string, inferred: Schema): string[] {
  return store.mergeInferredFields(schemaName, inferred);
}
