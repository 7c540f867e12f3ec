import type { Field } from './Constraint.js';

/** Column names of the problems report, always the first row a problems view yields. */
export const PROBLEM_HEADER = Object.freeze(['name', 'row', 'field', 'value', 'error'] as const);

export type ProblemHeader = typeof PROBLEM_HEADER;

/** Reserved constraint names for the structural checks. */
export const HEADER_CHECK = '__header__';
export const LENGTH_CHECK = '__len__';

export type ProblemKind =
  | 'HeaderMismatch'
  | 'RowLengthMismatch'
  | 'ExtractionFailure'
  | 'TestFailure'
  | 'AssertionFailure';

export interface Problem {
  readonly name: string;
  /** 1-based data row index; `0` is the header. */
  readonly row: number;
  readonly field: Field | null;
  readonly value: unknown;
  readonly error: ProblemKind;
  /**
   * Specific category behind `error`: the thrown error's `name`, `FalsyAssertion`,
   * `UnknownFailure` for non-Error throws, `AsyncValidator` for a check that returned a promise, or the structural check's own category.
   */
  readonly cause: string;
}

export type ProblemRow = readonly [
  name: string,
  row: number,
  field: Field | null,
  value: unknown,
  error: ProblemKind,
];

export function toProblemRow(problem: Problem): ProblemRow {
  return [problem.name, problem.row, problem.field, problem.value, problem.error];
}

/** Category of a failure raised by user code. */
export function causeOf(error: unknown): string {
  if (error instanceof Error) return error.name;
  return 'UnknownFailure';
}
