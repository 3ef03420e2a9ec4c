/** Supported field types. Determines how a table cell is coerced back into JSON. */
export type FieldType = 'string' | 'number' | 'boolean' | 'list';

/** Presentation hint for the editing widget. Has no effect on conversion. */
export type WidgetHint = '' | 'textarea' | 'text';

export const FIELD_TYPES: readonly FieldType[] = ['string', 'number', 'boolean', 'list'];

export const WIDGET_HINTS: readonly WidgetHint[] = ['', 'textarea', 'text'];

/** Defines a single field (table column) of a schema. */
export interface FieldDefinition {
  /** Record key and column name. Unique within a schema. */
  readonly name: string;
  readonly type: FieldType;
  /** Carried for the editor; reconstruction never enforces it. */
  readonly required: boolean;
  /** Always a literal hint, `''` when there is none. */
  readonly widget: WidgetHint;
}

/** Build a frozen field definition. */
export function createField(
  name: string,
  type: FieldType,
  required = false,
  widget: WidgetHint = '',
): FieldDefinition {
  return Object.freeze({ name, type, required, widget });
}

export function isFieldType(value: unknown): value is FieldType {
  return typeof value === 'string' && (FIELD_TYPES as readonly string[]).includes(value);
}

export function isWidgetHint(value: unknown): value is WidgetHint {
  return typeof value === 'string' && (WIDGET_HINTS as readonly string[]).includes(value);
}
