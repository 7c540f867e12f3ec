import type { Constraint } from './domain/model/Constraint.js';
import type { Table } from './domain/ports/Table.js';
import { ProblemsView } from './ProblemsView.js';

/**
 * Validate `table` against `constraints` and/or an expected `header`.
 *
 * Nothing is read until the returned view is iterated. Each iteration is a
 * full pass yielding `['name', 'row', 'field', 'value', 'error']` followed by
 * one row per problem, in row order and, within a row, in constraint order:
 *
 * ```ts
 * const problems = validate(
 *   [
 *     ['foo', 'bar'],
 *     [1, 'a'],
 *     [-1, 'b'],
 *     [2, 'c', 'extra'],
 *   ],
 *   [{ name: 'foo_pos', field: 'foo', assertion: (v) => typeof v === 'number' && v > 0 }],
 *   ['foo', 'bar'],
 * );
 * // ['name', 'row', 'field', 'value', 'error']
 * // ['foo_pos', 2, 'foo', -1, 'AssertionFailure']
 * // ['__len__', 3, null, 3, 'RowLengthMismatch']
 * ```
 *
 * A constraint naming a field missing from the effective header, and not
 * marked `optional`, makes the pass throw `FieldSelectionError` before any data
 * row is checked. Every other failure is reported as a problem.
 */
export function validate(
  table: Table,
  constraints?: readonly Constraint[] | null,
  header?: Iterable<unknown> | null,
): ProblemsView {
  return new ProblemsView({ table, constraints, header });
}
