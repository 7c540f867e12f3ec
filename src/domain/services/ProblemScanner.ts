import type { CompiledConstraint, Constraint } from '../model/Constraint.js';
import type { Problem, ProblemKind } from '../model/Problem.js';
import type { Table } from '../ports/Table.js';
import { HEADER_CHECK, LENGTH_CHECK, causeOf } from '../model/Problem.js';
import { FieldIndex, RecordView } from '../model/Record.js';

const ASYNC_VALIDATOR = 'AsyncValidator';
import { ConstraintCompiler } from './ConstraintCompiler.js';
import { compareHeaders, normalizeHeader } from './HeaderCheck.js';

export interface ScanSummary {
  /** Data rows scanned, header excluded. */
  readonly rows: number;
  readonly problems: number;
}

export interface ScanHooks {
  /** Called once the effective field list is known and constraints compiled. */
  readonly onFieldsResolved?: (fields: readonly string[]) => void;
  /** Called when the table is exhausted. Not called when the consumer stops early. */
  readonly onCompleted?: (summary: ScanSummary) => void;
}

/**
 * One validation pass over `table`.
 *
 * Pulls rows only as problems are requested. The table iterator is released
 * when the pass ends, whether it was exhausted or abandoned by the consumer.
 * A constraint naming a missing non-optional field throws `FieldSelectionError`
 * before any data row is read.
 */
export function* scanProblems(
  table: Table,
  constraints: readonly Constraint[],
  expectedHeader: readonly unknown[] | null,
  hooks: ScanHooks = {},
): Generator<Problem, void, undefined> {
  const iterator = table[Symbol.iterator]();
  let rows = 0;
  let problems = 0;

  try {
    const first = iterator.next();
    const actualFields = first.done ? [] : normalizeHeader(first.value);
    let fields = actualFields;

    if (expectedHeader !== null) {
      const expectedFields = normalizeHeader(expectedHeader);
      const mismatch = compareHeaders(expectedFields, actualFields);
      if (mismatch !== null) {
        problems++;
        yield {
          name: HEADER_CHECK,
          row: 0,
          field: null,
          value: null,
          error: 'HeaderMismatch',
          cause: mismatch,
        };
      }
      fields = expectedFields;
    }

    const index = new FieldIndex(fields);
    const compiled = new ConstraintCompiler(index).compile(constraints);
    hooks.onFieldsResolved?.(fields);

    for (let next = iterator.next(); !next.done; next = iterator.next()) {
      rows++;
      for (const problem of checkRow(Array.from(next.value), rows, index, compiled)) {
        problems++;
        yield problem;
      }
    }

    hooks.onCompleted?.({ rows, problems });
  } finally {
    iterator.return?.();
  }
}

function* checkRow(
  values: readonly unknown[],
  row: number,
  index: FieldIndex,
  constraints: readonly CompiledConstraint[],
): Generator<Problem, void, undefined> {
  if (values.length !== index.size) {
    yield {
      name: LENGTH_CHECK,
      row,
      field: null,
      value: values.length,
      error: 'RowLengthMismatch',
      cause: values.length < index.size ? 'TooFewValues' : 'TooManyValues',
    };
  }

  if (constraints.length === 0) return;

  const record = new RecordView(values, index);
  for (const constraint of constraints) {
    yield* evaluate(constraint, record, row);
  }
}

function* evaluate(
  constraint: CompiledConstraint,
  record: RecordView,
  row: number,
): Generator<Problem, void, undefined> {
  const problem = (error: ProblemKind, value: unknown, cause: string): Problem => ({
    name: constraint.name,
    row,
    field: constraint.field,
    value,
    error,
    cause,
  });

  let target: unknown;
  try {
    target = constraint.getter === null ? record : constraint.getter(record);
  } catch (error) {
    yield problem('ExtractionFailure', null, causeOf(error));
    return;
  }

  // Whole-row constraints never report the row as a value.
  const value = constraint.field === null ? null : target;

  if (constraint.test !== null) {
    let cause: string | null = null;
    try {
      if (settleAsync(constraint.test(target))) cause = ASYNC_VALIDATOR;
    } catch (error) {
      cause = causeOf(error);
    }
    if (cause !== null) yield problem('TestFailure', value, cause);
  }

  // Runs even when the test failed.
  if (constraint.assertion !== null) {
    let cause: string | null = null;
    try {
      const result = constraint.assertion(target);
      if (settleAsync(result)) cause = ASYNC_VALIDATOR;
      else if (!result) cause = 'FalsyAssertion';
    } catch (error) {
      cause = causeOf(error);
    }
    if (cause !== null) yield problem('AssertionFailure', value, cause);
  }
}

/**
 * Checks run synchronously, so a returned promise is a failure of its own. Its
 * rejection, if any, is observed here and never surfaces as an unhandled one.
 */
function settleAsync(result: unknown): boolean {
  if (!isThenable(result)) return false;
  void result.then(undefined, () => undefined);
  return true;
}

function isThenable(value: unknown): value is PromiseLike<unknown> {
  return (
    (typeof value === 'object' || typeof value === 'function') &&
    value !== null &&
    'then' in value &&
    typeof value.then === 'function'
  );
}
