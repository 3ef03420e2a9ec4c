import { describe, it, expect, vi } from 'vitest';
import { JsonTableEditor } from '../../src/JsonTableEditor.js';
import { ImportError, SchemaNotFoundError } from '../../src/domain/errors/EditorErrors.js';

describe('JsonTableEditor session', () => {
  describe('importing JSON', () => {
    it('should grow the schema and project the records', () => {
      const editor = new JsonTableEditor();

      const result = editor.importJson('{"title": "Lamp", "price": 12.5, "tags": ["home", "light"]}', 'Default');

      expect(result.addedFields).toEqual(['title', 'price', 'tags']);
      expect(result.schema.map((f) => f.name)).toEqual(['name', 'value', 'title', 'price', 'tags']);
      expect(result.table!.columns).toEqual(['name', 'value', 'title', 'price', 'tags']);
      expect(result.table!.rows).toEqual([{ title: 'Lamp', price: 12.5, tags: 'home, light', name: '', value: '' }]);
      expect(editor.getSchema('Default')).toEqual(result.schema);
    });

    it('should leave the schema alone in data-only mode', () => {
      const editor = new JsonTableEditor();

      const result = editor.importJson('[{"name": "a", "extra": 1}]', 'Default', 'data-only');

      expect(result.addedFields).toEqual([]);
      expect(result.table!.columns).toEqual(['name', 'value']);
      expect(result.table!.rows).toEqual([{ name: 'a', extra: 1, value: '' }]);
    });

    it('should import nothing from an empty array', () => {
      const editor = new JsonTableEditor();

      const result = editor.importJson('[]', 'Default');

      expect(result.records).toEqual([]);
      expect(result.addedFields).toEqual([]);
      expect(result.table).toBeNull();
    });

    it('should leave schema and table alone for objects without keys', () => {
      const editor = new JsonTableEditor();
      editor.createSchema('Blank');
      const imported = vi.fn();
      editor.on('data:imported', imported);

      const single = editor.importJson('{}', 'Blank');
      const several = editor.importJson('[{}, {}]', 'Default');

      expect(single).toEqual({ records: [], schema: [], table: null, addedFields: [] });
      expect(several.table).toBeNull();
      expect(several.schema.map((f) => f.name)).toEqual(['name', 'value']);
      expect(imported).not.toHaveBeenCalled();
    });

    it('should keep __proto__ as an ordinary field from import to export', () => {
      const editor = new JsonTableEditor();
      editor.createSchema('Keys');

      const { table } = editor.importJson('[{"__proto__": {"name": "nested"}, "id": "1"}]', 'Keys');

      expect(table!.columns).toEqual(['__proto__', 'id']);
      expect(Object.keys(table!.rows[0]!)).toEqual(['__proto__', 'id']);
      expect(editor.exportRecords(table!, 'Keys', 'array')).toBe(
        '[\n  {\n    "__proto__": "{\\"name\\":\\"nested\\"}",\n    "id": "1"\n  }\n]',
      );
    });

    it('should wrap malformed JSON in one import failure', () => {
      const editor = new JsonTableEditor();
      const failed = vi.fn();
      editor.on('import:failed', failed);

      expect(() => editor.importJson('{"a": ', 'Default')).toThrow(ImportError);
      expect(() => editor.importJson('{"a": ', 'Default')).toThrow(/^Failed to import JSON: JsonParser: invalid JSON/);
      expect(failed).toHaveBeenCalledWith(expect.objectContaining({ schemaName: 'Default', code: 'IMPORT_FAILED' }));
      expect(editor.getSchema('Default')).toHaveLength(2);
    });

    it('should reject JSON that is not an object or an array of objects', () => {
      const editor = new JsonTableEditor();

      expect(() => editor.importJson('"text"', 'Default')).toThrow(
        'Failed to import JSON: JsonParser: expected a JSON object or an array of objects',
      );
    });

    it('should report an unknown schema as such, not as an import failure', () => {
      const editor = new JsonTableEditor();
      const failed = vi.fn();
      editor.on('import:failed', failed);

      expect(() => editor.importJson('{}', 'Nope')).toThrow(SchemaNotFoundError);
      expect(failed).not.toHaveBeenCalled();
    });

    it('should announce successful imports', () => {
      const editor = new JsonTableEditor();
      const imported = vi.fn();
      editor.on('data:imported', imported);

      editor.importJson('[{"name": "a"}, {"name": "b"}]', 'Default');

      expect(imported).toHaveBeenCalledWith(
        expect.objectContaining({ schemaName: 'Default', recordCount: 2, addedFields: [] }),
      );
    });
  });

  describe('exporting JSON', () => {
    it('should export an edited table as an array', () => {
      const editor = new JsonTableEditor();
      const { table } = editor.importJson('{"title": "Lamp", "price": 12.5, "tags": ["home", "light"]}', 'Default');

      const json = editor.exportRecords(table!, 'Default', 'array');

      expect(json).toBe(
        JSON.stringify([{ name: '', value: '', title: 'Lamp', price: 12.5, tags: ['home', 'light'] }], null, 2),
      );
    });

    it('should write a lone record as an object and several as an array', () => {
      const editor = new JsonTableEditor();
      const one = { columns: ['name', 'value'], rows: [{ name: 'a', value: '1' }] };
      const two = { columns: ['name', 'value'], rows: [{ name: 'a', value: '1' }, { name: 'b', value: '2' }] };

      expect(editor.exportRecords(one, 'Default')).toBe('{\n  "name": "a",\n  "value": "1"\n}');
      expect(editor.exportRecords(one, 'Default', 'object')).toBe('{\n  "name": "a",\n  "value": "1"\n}');
      expect(editor.exportRecords(two, 'Default', 'auto')).toBe(
        JSON.stringify(
          [
            { name: 'a', value: '1' },
            { name: 'b', value: '2' },
          ],
          null,
          2,
        ),
      );
    });

    it('should keep non-ASCII characters as they are', () => {
      const editor = new JsonTableEditor();
      const table = { columns: ['name', 'value'], rows: [{ name: 'Café ☕', value: 'ü' }] };

      expect(editor.exportRecords(table, 'Default')).toBe('{\n  "name": "Café ☕",\n  "value": "ü"\n}');
    });

    it('should announce exports with the record count', () => {
      const editor = new JsonTableEditor();
      const exported = vi.fn();
      editor.on('data:exported', exported);

      editor.exportRecords({ columns: ['name', 'value'], rows: [{ name: '', value: '' }] }, 'Default');

      expect(exported).toHaveBeenCalledWith(expect.objectContaining({ schemaName: 'Default', recordCount: 0 }));
    });

    it('should serialize the schema definition directly', () => {
      const editor = new JsonTableEditor();
      editor.upsertField('Default', 'notes', 'string', false, 'textarea');

      expect(editor.exportSchema('Default')).toBe(
        JSON.stringify(
          [
            { name: 'name', type: 'string', required: true, widget: '' },
            { name: 'value', type: 'string', required: false, widget: '' },
            { name: 'notes', type: 'string', required: false, widget: 'textarea' },
          ],
          null,
          2,
        ),
      );
    });
  });

  describe('editing in tabular form', () => {
    it('should bring a table in line after a schema edit', () => {
      const editor = new JsonTableEditor();
      const table = editor.toTable([{ name: 'a', value: 'b' }], 'Default');

      editor.upsertField('Default', 'note', 'string');
      editor.deleteField('Default', 'value');
      const aligned = editor.alignColumns(table, 'Default');

      expect(aligned.columns).toEqual(['name', 'note']);
      expect(editor.toRecords(aligned, 'Default')).toEqual([{ name: 'a', note: '' }]);
    });

    it('should exchange tables as delimited text', () => {
      const editor = new JsonTableEditor();

      const text = editor.tableToText(editor.toTable([{ name: 'a', value: 'b, c' }], 'Default'));
      const pasted = editor.tableFromText('name,value\nalpha,1\n', 'Default');

      expect(text).toBe('name,value\na,"b, c"');
      expect(editor.toRecords(pasted, 'Default')).toEqual([{ name: 'alpha', value: '1' }]);
    });

    it('should apply configured conversion options in both directions', () => {
      const editor = new JsonTableEditor({ conversion: { listJoinSeparator: ' | ', listSplitSeparator: '|' } });
      editor.upsertField('Default', 'tags', 'list');

      const table = editor.toTable([{ name: 'n', tags: ['x', 'y'] }], 'Default');

      expect(table.rows[0]!['tags']).toBe('x | y');
      expect(editor.toRecords(table, 'Default')).toEqual([{ name: 'n', value: '', tags: ['x', 'y'] }]);
    });

    it('should infer with the configured textarea threshold', () => {
      const editor = new JsonTableEditor({ conversion: { textareaThreshold: 3 } });

      expect(editor.inferSchema({ note: 'long' })[0]!.widget).toBe('textarea');
    });

    it('should manage schemas by name', () => {
      const editor = new JsonTableEditor();

      editor.createSchema('Products', { copyOf: 'Default' });
      editor.mergeInferredFields('Products', editor.inferSchema({ sku: 'A1' }));

      expect(editor.schemaNames()).toEqual(['Default', 'Products']);
      expect(editor.getSchema('Products').map((f) => f.name)).toEqual(['name', 'value', 'sku']);
    });

    it('should hand subscriber errors to the configured callback', () => {
      const onHandlerError = vi.fn();
      const editor = new JsonTableEditor({ onHandlerError });
      editor.on('schema:created', () => {
        throw new Error('subscriber broke');
      });

      editor.createSchema('Other');

      expect(editor.schemaNames()).toContain('Other');
      expect(onHandlerError).toHaveBeenCalledOnce();
    });
  });
});
