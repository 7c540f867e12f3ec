import type { Constraint } from '../../domain/model/Constraint.js';
import type { ProblemsView } from '../../ProblemsView.js';
import { validate } from '../../validate.js';

export interface JsonTableOptions {
  /** Parse format: 'array' for JSON array of objects, 'ndjson' for newline-delimited JSON. Default: 'auto'. */
  readonly format?: 'array' | 'ndjson' | 'auto';
  /** Header to lay the objects out against. Default: every key, in the order first seen. */
  readonly fields?: readonly string[];
}

type JsonObject = Readonly<Record<string, unknown>>;

/**
 * Table over a JSON array or NDJSON stream of objects.
 *
 * Each object becomes one row laid out against the header. Missing keys become
 * `undefined` and nested objects are kept as their JSON text.
 */
export class JsonTable implements Iterable<readonly unknown[]> {
  private readonly content: string;
  private readonly format: 'array' | 'ndjson' | 'auto';
  private readonly fields: readonly string[] | null;
  private rows: readonly (readonly unknown[])[] | null = null;

  constructor(data: string | Buffer, options?: JsonTableOptions) {
    this.content = (typeof data === 'string' ? data : data.toString('utf-8')).trim();
    this.format = options?.format ?? 'auto';
    this.fields = options?.fields ?? null;
  }

  *[Symbol.iterator](): Generator<readonly unknown[], void, undefined> {
    yield* this.parse();
  }

  validate(constraints?: readonly Constraint[] | null, header?: Iterable<unknown> | null): ProblemsView {
    return validate(this, constraints, header);
  }

  private parse(): readonly (readonly unknown[])[] {
    if (this.rows === null) {
      const objects = this.content === '' ? [] : this.parseObjects();
      const fields = this.fields ?? collectFields(objects);
      const data = objects.map((obj) => fields.map((field) => (Object.hasOwn(obj, field) ? obj[field] : undefined)));
      this.rows = [fields, ...data];
    }
    return this.rows;
  }

  private parseObjects(): JsonObject[] {
    const format = this.format === 'auto' ? (this.content.startsWith('[') ? 'array' : 'ndjson') : this.format;
    return format === 'array' ? this.parseArray() : this.parseNdjson();
  }

  private parseArray(): JsonObject[] {
    const parsed: unknown = JSON.parse(this.content);

    if (!Array.isArray(parsed)) {
      throw new Error('JsonTable: expected a JSON array of objects');
    }

    return parsed.map((item: unknown) => {
      if (!isJsonObject(item)) {
        throw new Error('JsonTable: each item in the array must be a plain object');
      }
      return flattenValues(item);
    });
  }

  private parseNdjson(): JsonObject[] {
    const objects: JsonObject[] = [];

    for (const line of this.content.split('\n')) {
      const trimmedLine = line.trim();
      if (trimmedLine === '') continue;

      const parsed: unknown = JSON.parse(trimmedLine);
      if (!isJsonObject(parsed)) {
        throw new Error('JsonTable: each NDJSON line must be a plain object');
      }
      objects.push(flattenValues(parsed));
    }

    return objects;
  }
}

function isJsonObject(value: unknown): value is JsonObject {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function flattenValues(obj: JsonObject): JsonObject {
  const flat: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    flat[key] = typeof value === 'object' && value !== null ? JSON.stringify(value) : value;
  }
  return flat;
}

function collectFields(objects: readonly JsonObject[]): string[] {
  const fields = new Set<string>();
  for (const obj of objects) {
    for (const key of Object.keys(obj)) fields.add(key);
  }
  return [...fields];
}
