import type { AssertionFn } from '../model/Constraint.js';
import { CoercionError, EmptyValueError } from '../errors/RowcheckError.js';
import { RecordView } from '../model/Record.js';

const NUMBER_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const INTEGER_PATTERN = /^[+-]?\d+$/;
const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;
const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const BOOLEAN_VALUES: ReadonlyMap<string, boolean> = new Map([
  ['true', true],
  ['false', false],
  ['1', true],
  ['0', false],
  ['yes', true],
  ['no', false],
]);

function isEmpty(value: unknown): value is null | undefined | '' {
  return value === undefined || value === null || value === '';
}

// --- Coercions, for use as `test` ---

/** Finite decimal numbers, optionally with an exponent. No hex, octal, binary or `Infinity`. */
export function toNumber(value: unknown): number {
  if (isEmpty(value)) throw new EmptyValueError('a number');
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) throw new CoercionError('a number', value);
    return value;
  }

  const text = String(value).trim();
  const num = Number(text);
  if (!NUMBER_PATTERN.test(text) || !Number.isFinite(num)) {
    throw new CoercionError('a number', value);
  }
  return num;
}

/** Whole decimal numbers written as digits only, with an optional sign. */
export function toInteger(value: unknown): number {
  if (isEmpty(value)) throw new EmptyValueError('an integer');
  if (typeof value === 'number') {
    if (!Number.isInteger(value)) throw new CoercionError('an integer', value);
    return value;
  }

  const text = String(value).trim();
  if (!INTEGER_PATTERN.test(text)) {
    throw new CoercionError('an integer', value);
  }
  return Number(text);
}

/** Accepts `true/false`, `1/0` and `yes/no`, case-insensitive. */
export function toBoolean(value: unknown): boolean {
  if (isEmpty(value)) throw new EmptyValueError('a boolean');
  if (typeof value === 'boolean') return value;

  const parsed = BOOLEAN_VALUES.get(String(value).trim().toLowerCase());
  if (parsed === undefined) {
    throw new CoercionError('a boolean', value);
  }
  return parsed;
}

/** Anything `Date` can parse. */
export function toDate(value: unknown): Date {
  if (isEmpty(value)) throw new EmptyValueError('a date');

  const date = value instanceof Date ? value : new Date(String(value));
  if (isNaN(date.getTime())) {
    throw new CoercionError('a date', value);
  }
  return date;
}

/** Strict `YYYY-MM-DD` that names a real calendar day. Returns midnight UTC. */
export function toIsoDate(value: unknown): Date {
  if (isEmpty(value)) throw new EmptyValueError('an ISO date');

  const match = ISO_DATE_PATTERN.exec(String(value));
  if (!match) {
    throw new CoercionError('an ISO date', value);
  }

  const [year, month, day] = match.slice(1).map(Number);
  if (year === undefined || month === undefined || day === undefined) {
    throw new CoercionError('an ISO date', value);
  }

  const date = new Date(Date.UTC(year, month - 1, day));
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    throw new CoercionError('an ISO date', value);
  }
  return date;
}

// --- Predicates, for use as `assertion` ---

export function notEmpty(value: unknown): boolean {
  return !isEmpty(value);
}

export function isEmail(value: unknown): boolean {
  return typeof value === 'string' && EMAIL_PATTERN.test(value);
}

/** Whole-row check: no value in the row is `null` or `undefined`. */
export function noneMissing(row: unknown): boolean {
  const values: readonly unknown[] = row instanceof RecordView ? row.values : Array.isArray(row) ? row : [row];
  return values.every((value) => value !== null && value !== undefined);
}

export function oneOf(allowed: readonly unknown[]): AssertionFn {
  const set = new Set(allowed);
  return (value) => set.has(value);
}

/** String values matching `pattern`. Global and sticky flags are ignored. */
export function matches(pattern: RegExp): AssertionFn {
  const regex = new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ''));
  return (value) => typeof value === 'string' && regex.test(value);
}
