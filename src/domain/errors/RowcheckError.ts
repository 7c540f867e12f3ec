/** Base class for every error this library raises. `code` is stable and serializable. */
export abstract class RowcheckError extends Error {
  abstract readonly code: string;

  constructor(
    message: string,
    readonly context: Readonly<Record<string, unknown>> = {},
  ) {
    super(message);
    this.name = new.target.name;
    Error.captureStackTrace(this, new.target);
  }

  toJSON(): { name: string; code: string; message: string; context: Readonly<Record<string, unknown>> } {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

/** A constraint references a field that is not in the effective field list. */
export class FieldSelectionError extends RowcheckError {
  readonly code = 'FIELD_SELECTION';

  constructor(
    readonly field: string,
    readonly fields: readonly string[],
  ) {
    super(`Field '${field}' not found in header [${fields.map((f) => `'${f}'`).join(', ')}]`, { field, fields });
  }
}

/** A row has no value at the requested position. */
export class MissingValueError extends RowcheckError {
  readonly code = 'MISSING_VALUE';

  constructor(
    readonly position: number,
    readonly length: number,
  ) {
    super(`No value at position ${String(position)} in a row of length ${String(length)}`, { position, length });
  }
}

/** A value was `null`, `undefined` or the empty string where one was required. */
export class EmptyValueError extends RowcheckError {
  readonly code = 'EMPTY_VALUE';

  constructor(readonly expected: string) {
    super(`Expected ${expected} but the value is empty`, { expected });
  }
}

/** A value could not be converted to the expected type. */
export class CoercionError extends RowcheckError {
  readonly code = 'COERCION_FAILED';

  constructor(
    readonly expected: string,
    readonly value: unknown,
  ) {
    super(`Cannot convert ${JSON.stringify(String(value))} to ${expected}`, { expected, value });
  }
}

/** A single-pass table was asked for a second pass. */
export class TableConsumedError extends RowcheckError {
  readonly code = 'TABLE_CONSUMED';

  constructor() {
    super('Table can only be iterated once; wrap its rows in an ArrayTable to validate them again');
  }
}
