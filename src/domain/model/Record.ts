import { FieldSelectionError, MissingValueError } from '../errors/RowcheckError.js';

/** A header and its name-to-position map. Built once per pass and shared by every row of it. */
export class FieldIndex {
  private readonly positions: ReadonlyMap<string, number>;

  constructor(readonly fields: readonly string[]) {
    const positions = new Map<string, number>();
    fields.forEach((field, position) => {
      if (!positions.has(field)) positions.set(field, position);
    });
    this.positions = positions;
  }

  get size(): number {
    return this.fields.length;
  }

  has(field: string): boolean {
    return this.positions.has(field);
  }

  /** Position of the first column named `field`. Throws `FieldSelectionError` when absent. */
  positionOf(field: string): number {
    const position = this.positions.get(field);
    if (position === undefined) {
      throw new FieldSelectionError(field, this.fields);
    }
    return position;
  }
}

/** A data row addressable by field name as well as by position. */
export class RecordView implements Iterable<unknown> {
  constructor(
    readonly values: readonly unknown[],
    private readonly index: FieldIndex,
  ) {}

  get length(): number {
    return this.values.length;
  }

  get fields(): readonly string[] {
    return this.index.fields;
  }

  has(key: string | number): boolean {
    const position = typeof key === 'number' ? key : this.index.has(key) ? this.index.positionOf(key) : -1;
    return Number.isInteger(position) && position >= 0 && position < this.values.length;
  }

  get(key: string | number): unknown {
    const position = typeof key === 'number' ? key : this.index.positionOf(key);
    if (!Number.isInteger(position) || position < 0 || position >= this.values.length) {
      throw new MissingValueError(position, this.values.length);
    }
    return this.values[position];
  }

  /** Field-keyed copy of the row. Fields past the end of the row are left out; extra values are dropped. */
  toObject(): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    this.index.fields.forEach((field, position) => {
      if (position < this.values.length && !Object.hasOwn(result, field)) {
        result[field] = this.values[position];
      }
    });
    return result;
  }

  [Symbol.iterator](): Iterator<unknown> {
    return this.values[Symbol.iterator]();
  }
}
