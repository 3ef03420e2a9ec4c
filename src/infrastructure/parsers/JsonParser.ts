import type { JsonRecord } from '../../domain/model/Record.js';
import { isJsonObject } from '../../domain/model/Record.js';
import { ImportError } from '../../domain/errors/EditorErrors.js';

/**
 * Reads JSON text into records. Accepts one object (a single record) or an
 * array of objects. Zero dependencies.
 */
export class JsonParser {
  *parse(data: string | Buffer): Iterable<JsonRecord> {
    const content = typeof data === 'string' ? data : data.toString('utf-8');
    const trimmed = content.trim();

    if (trimmed === '') return;

    const parsed = this.parseJson(trimmed);

    if (isJsonObject(parsed)) {
      yield parsed;
      return;
    }

    if (!Array.isArray(parsed)) {
      throw new ImportError('JsonParser: expected a JSON object or an array of objects');
    }

    for (const item of parsed) {
      if (!isJsonObject(item)) {
        throw new ImportError('JsonParser: each item in the array must be a plain object');
      }
      yield item;
    }
  }

  private parseJson(content: string): unknown {
    try {
      return JSON.parse(content);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ImportError(`JsonParser: invalid JSON (${reason})`, { cause: error });
    }
  }
}
