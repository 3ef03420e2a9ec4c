import type { FieldType } from '../model/FieldDefinition.js';
import type { JsonValue } from '../model/Record.js';
import { stringifyValue } from '../model/Record.js';
import type { CellValue } from '../model/Table.js';
import { isBlankCell } from '../model/Table.js';
import type { ConversionOptions } from '../model/ConversionOptions.js';

const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/** Value a blank cell takes for each field type. */
export function emptyValue(type: FieldType): JsonValue {
  switch (type) {
    case 'number':
      return 0;
    case 'boolean':
      return false;
    case 'list':
      return [];
    case 'string':
      return '';
  }
}

/**
 * Turn one table cell back into a JSON value of the field's type.
 *
 * Never throws: unparseable numbers become `0`, anything outside the truthy
 * set becomes `false`.
 */
export function coerceCell(value: CellValue, type: FieldType, options: ConversionOptions): JsonValue {
  if (value === undefined || isBlankCell(value)) return emptyValue(type);

  switch (type) {
    case 'number':
      return toNumber(value);
    case 'boolean':
      return toBoolean(value, options.truthyValues);
    case 'list':
      return toList(value, options.listSplitSeparator);
    case 'string':
      return stringifyValue(value);
  }
}

export function toNumber(value: JsonValue): number {
  let parsed: number;
  if (typeof value === 'number') {
    parsed = value;
  } else if (typeof value === 'boolean') {
    parsed = value ? 1 : 0;
  } else if (typeof value === 'string' && DECIMAL_PATTERN.test(value.trim())) {
    parsed = Number(value.trim());
  } else {
    return 0;
  }

  if (!Number.isFinite(parsed)) return 0;
  // -0 narrows to 0
  return Number.isInteger(parsed) ? Math.trunc(parsed) || 0 : parsed;
}

export function toBoolean(value: JsonValue, truthyValues: readonly string[]): boolean {
  if (typeof value === 'boolean') return value;
  return truthyValues.includes(stringifyValue(value).toLowerCase());
}

export function toList(value: JsonValue, separator: string): string[] {
  const pieces = Array.isArray(value) ? value.map(stringifyValue) : stringifyValue(value).split(separator);
  return pieces.map((piece) => piece.trim()).filter((piece) => piece !== '');
}
