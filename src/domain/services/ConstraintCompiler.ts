import type { CompiledConstraint, Constraint, Field, Getter } from '../model/Constraint.js';
import type { FieldIndex } from '../model/Record.js';
import { hasFields, selectIndices } from './FieldSelector.js';

/**
 * Resolves constraint field references against one header.
 *
 * Runs once per validation pass. The returned list is a working copy: the
 * caller's constraint objects are never modified. Optional constraints whose
 * fields are missing are left out of it.
 */
export class ConstraintCompiler {
  constructor(private readonly index: FieldIndex) {}

  /** Throws `FieldSelectionError` when a non-optional constraint names a missing field. */
  compile(constraints: readonly Constraint[]): CompiledConstraint[] {
    const compiled: CompiledConstraint[] = [];

    for (const constraint of constraints) {
      const result = this.compileOne(constraint);
      if (result) compiled.push(result);
    }

    return compiled;
  }

  private compileOne(constraint: Constraint): CompiledConstraint | null {
    const field = constraint.field ?? null;
    const base = {
      name: constraint.name,
      field,
      test: constraint.test ?? null,
      assertion: constraint.assertion ?? null,
    };

    if (constraint.getter) {
      return { ...base, getter: constraint.getter };
    }
    if (field === null) {
      return { ...base, getter: null };
    }
    if (constraint.optional && !hasFields(this.index, field)) {
      return null;
    }

    return { ...base, getter: this.buildGetter(field) };
  }

  private buildGetter(field: Field): Getter {
    const positions = selectIndices(this.index, field);

    const [first] = positions;

    if (positions.length === 1 && first !== undefined) {
      return (row) => row.get(first);
    }
    return (row) => positions.map((position) => row.get(position));
  }
}
