export type EditorErrorCode = 'DUPLICATE_NAME' | 'SCHEMA_NOT_FOUND' | 'INVALID_NAME' | 'IMPORT_FAILED';

/** Base class for every failure the editor reports to its caller. */
export class EditorError extends Error {
  readonly code: EditorErrorCode;

  constructor(code: EditorErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'EditorError';
    this.code = code;
  }

  toJSON(): { name: string; code: EditorErrorCode; message: string } {
    return { name: this.name, code: this.code, message: this.message };
  }
}

/** A schema with this name already exists. The store is left untouched. */
export class DuplicateNameError extends EditorError {
  constructor(readonly schemaName: string) {
    super('DUPLICATE_NAME', `Schema '${schemaName}' already exists`);
    this.name = 'DuplicateNameError';
  }
}

export class SchemaNotFoundError extends EditorError {
  constructor(readonly schemaName: string) {
    super('SCHEMA_NOT_FOUND', `Schema '${schemaName}' does not exist`);
    this.name = 'SchemaNotFoundError';
  }
}

/** Schema and field names must contain something other than whitespace. */
export class InvalidNameError extends EditorError {
  constructor(kind: 'schema' | 'field') {
    super('INVALID_NAME', `A ${kind} name must not be blank`);
    this.name = 'InvalidNameError';
  }
}

/** Wraps whatever went wrong while reading JSON input into one import failure. */
export class ImportError extends EditorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('IMPORT_FAILED', message, options);
    this.name = 'ImportError';
  }
}

export function isEditorError(value: unknown): value is EditorError {
  return value instanceof EditorError;
}
