import type { Constraint } from '../../domain/model/Constraint.js';
import type { Table } from '../../domain/ports/Table.js';
import type { ProblemsView } from '../../ProblemsView.js';
import { validate } from '../../validate.js';

/** In-memory table, header first. Rows are copied once, so any source can be validated repeatedly. */
export class ArrayTable implements Iterable<readonly unknown[]> {
  private readonly rows: readonly (readonly unknown[])[];

  constructor(rows: Table) {
    this.rows = Array.from(rows, (row) => Array.from(row));
  }

  /** Header row as given, or an empty array for an empty table. */
  get header(): readonly unknown[] {
    return this.rows[0] ?? [];
  }

  /** Number of data rows. */
  get length(): number {
    return Math.max(this.rows.length - 1, 0);
  }

  [Symbol.iterator](): Iterator<readonly unknown[]> {
    return this.rows[Symbol.iterator]();
  }

  validate(constraints?: readonly Constraint[] | null, header?: Iterable<unknown> | null): ProblemsView {
    return validate(this, constraints, header);
  }
}
