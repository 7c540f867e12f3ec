import type { Field } from '../model/Constraint.js';
import { fieldNames } from '../model/Constraint.js';
import type { FieldIndex } from '../model/Record.js';

/** Resolve one or more field names to positions, in the order the names were given. */
export function selectIndices(index: FieldIndex, field: Field): number[] {
  return fieldNames(field).map((name) => index.positionOf(name));
}

/** Whether every named field is in the header. */
export function hasFields(index: FieldIndex, field: Field): boolean {
  return fieldNames(field).every((name) => index.has(name));
}
