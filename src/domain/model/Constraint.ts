import type { RecordView } from './Record.js';

/** One field name, or several whose values are selected together as a tuple. */
export type Field = string | readonly string[];

export type Getter = (row: RecordView) => unknown;

/** Must complete synchronously without throwing. The return value is ignored unless it is a promise, which counts as a failure. */
export type TestFn = (value: unknown) => unknown;

/** Must synchronously return a truthy value without throwing. A promise counts as a failure. */
export type AssertionFn = (value: unknown) => unknown;

export interface Constraint {
  readonly name: string;
  /** Field(s) to inspect. Without it the whole row is the target. */
  readonly field?: Field;
  /** Skip the constraint when `field` is not in the effective header. Default: `false`. */
  readonly optional?: boolean;
  /** Custom extraction, used instead of resolving `field`. */
  readonly getter?: Getter;
  readonly test?: TestFn;
  readonly assertion?: AssertionFn;
}

/** A constraint resolved against one pass's field list. */
export interface CompiledConstraint {
  readonly name: string;
  readonly field: Field | null;
  /** `null` when the whole row is the target. */
  readonly getter: Getter | null;
  readonly test: TestFn | null;
  readonly assertion: AssertionFn | null;
}

export function fieldNames(field: Field): readonly string[] {
  return typeof field === 'string' ? [field] : field;
}
