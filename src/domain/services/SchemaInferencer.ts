import type { FieldDefinition, FieldType } from '../model/FieldDefinition.js';
import { createField } from '../model/FieldDefinition.js';
import type { Schema } from '../model/Schema.js';
import type { ConversionOptions } from '../model/ConversionOptions.js';
import { resolveConversionOptions } from '../model/ConversionOptions.js';
import { isJsonObject } from '../model/Record.js';

/** Guess a field type from one value. Checked in order: boolean, number, list, then string. */
export function guessFieldType(value: unknown): FieldType {
  if (typeof value === 'boolean') return 'boolean';
  if (typeof value === 'number') return 'number';
  if (Array.isArray(value)) return 'list';
  return 'string';
}

/**
 * Propose a schema from one sample record.
 *
 * An array contributes its first element. Anything that is not an object
 * (including an empty array) yields an empty schema. Inferred fields are
 * never required.
 */
export function inferSchema(sample: unknown, options?: Partial<ConversionOptions>): Schema {
  const { textareaThreshold } = resolveConversionOptions(options);
  const candidate: unknown = Array.isArray(sample) ? sample[0] : sample;

  if (!isJsonObject(candidate)) return [];

  const fields: FieldDefinition[] = [];
  for (const [name, value] of Object.entries(candidate)) {
    const type = guessFieldType(value);
    const isLongText = type === 'string' && typeof value === 'string' && [...value].length > textareaThreshold;
    fields.push(createField(name, type, false, isLongText ? 'textarea' : ''));
  }

  return fields;
}
