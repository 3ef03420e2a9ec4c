import type { FieldDefinition } from './FieldDefinition.js';

/** Ordered field definitions. Order is column order. */
export type Schema = readonly FieldDefinition[];

/** How a new schema starts out: with no fields, or as a value copy of an existing schema. */
export type SchemaBase = 'empty' | { readonly copyOf: string };

export function fieldNames(schema: Schema): string[] {
  return schema.map((field) => field.name);
}
