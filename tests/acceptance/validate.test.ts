import { describe, it, expect, vi } from 'vitest';
import { validate } from '../../src/validate.js';
import { PROBLEM_HEADER } from '../../src/domain/model/Problem.js';
import { FieldSelectionError } from '../../src/domain/errors/RowcheckError.js';
import { RecordView } from '../../src/domain/model/Record.js';
import type { Constraint } from '../../src/domain/model/Constraint.js';

const isPositive = (v: unknown): boolean => typeof v === 'number' && v > 0;

describe('validate', () => {
  describe('structure only', () => {
    it('should yield only the report header for a well-formed table', () => {
      const table = [
        ['a', 'b'],
        [1, 2],
        [3, 4],
      ];

      expect([...validate(table)]).toEqual([PROBLEM_HEADER]);
    });

    it('should report each row whose length differs from the header', () => {
      const table = [['a', 'b'], [1], [1, 2], [1, 2, 3], []];

      expect([...validate(table)]).toEqual([
        PROBLEM_HEADER,
        ['__len__', 1, null, 1, 'RowLengthMismatch'],
        ['__len__', 3, null, 3, 'RowLengthMismatch'],
        ['__len__', 4, null, 0, 'RowLengthMismatch'],
      ]);
    });

    it('should handle a table without a header row', () => {
      expect([...validate([])]).toEqual([PROBLEM_HEADER]);
      expect([...validate([], null, ['a'])]).toEqual([PROBLEM_HEADER, ['__header__', 0, null, null, 'HeaderMismatch']]);
    });
  });

  describe('expected header', () => {
    it('should report a single mismatch and continue with the expected header', () => {
      const table = [
        ['a', 'c'],
        [1, 2],
      ];
      const constraints: Constraint[] = [{ name: 'b_positive', field: 'b', assertion: (v) => v === 1 }];

      expect([...validate(table, constraints, ['a', 'b'])]).toEqual([
        PROBLEM_HEADER,
        ['__header__', 0, null, null, 'HeaderMismatch'],
        ['b_positive', 1, 'b', 2, 'AssertionFailure'],
      ]);
    });

    it('should resolve fields by the expected order when only the order differs', () => {
      const table = [
        ['a', 'b'],
        [1, 2],
      ];
      const constraints: Constraint[] = [
        { name: 'b_is_one', field: 'b', assertion: (v) => v === 1 },
        { name: 'a_is_one', field: 'a', assertion: (v) => v === 1 },
      ];

      expect([...validate(table, constraints, ['b', 'a'])]).toEqual([
        PROBLEM_HEADER,
        ['__header__', 0, null, null, 'HeaderMismatch'],
        ['a_is_one', 1, 'a', 2, 'AssertionFailure'],
      ]);
    });

    it('should check row lengths against the expected header', () => {
      const table = [
        ['a', 'b'],
        [1, 2],
      ];

      expect([...validate(table, null, ['a', 'b', 'c'])]).toEqual([
        PROBLEM_HEADER,
        ['__header__', 0, null, null, 'HeaderMismatch'],
        ['__len__', 1, null, 2, 'RowLengthMismatch'],
      ]);
    });

    it('should compare headers in their string form', () => {
      const table = [
        [1, 2],
        ['x', 'y'],
      ];

      expect([...validate(table, null, ['1', '2'])]).toEqual([PROBLEM_HEADER]);
    });

    it('should classify the header mismatch', () => {
      const causes = (header: string[]): string[] =>
        [...validate([['a', 'b']], null, header).problems()].map((p) => p.cause);

      expect(causes(['a'])).toEqual(['FieldCountMismatch']);
      expect(causes(['b', 'a'])).toEqual(['FieldOrderMismatch']);
      expect(causes(['a', 'z'])).toEqual(['FieldNameMismatch']);
    });
  });

  describe('constraints', () => {
    it('should report value assertions per row', () => {
      const table = [['foo', 'bar'], [1, 'a'], [-1, 'b'], [2, 'c', 'extra']];
      const constraints: Constraint[] = [{ name: 'foo_pos', field: 'foo', assertion: isPositive }];

      expect([...validate(table, constraints, ['foo', 'bar'])]).toEqual([
        PROBLEM_HEADER,
        ['foo_pos', 2, 'foo', -1, 'AssertionFailure'],
        ['__len__', 3, null, 3, 'RowLengthMismatch'],
      ]);
    });

    it('should never report an optional constraint on a missing field', () => {
      const assertion = vi.fn(() => false);
      const table = [['a'], [1], [2, 3], []];

      const problems = [...validate(table, [{ name: 'x_check', field: 'x', optional: true, assertion }])];

      expect(problems.filter((p) => p[0] === 'x_check')).toEqual([]);
      expect(assertion).not.toHaveBeenCalled();
    });

    it('should throw before scanning rows when a required field is missing', () => {
      const getRow = vi.fn();
      const table = {
        *[Symbol.iterator]() {
          yield ['a', 'b'];
          getRow();
          yield [1, 2];
        },
      };

      const view = validate(table, [{ name: 'x_check', field: 'x' }]);

      expect(() => [...view]).toThrow(FieldSelectionError);
      expect(getRow).not.toHaveBeenCalled();
    });

    it('should report both a failed test and a failed assertion with the same value', () => {
      const table = [['n'], ['abc']];
      const constraints: Constraint[] = [
        {
          name: 'n_number',
          field: 'n',
          test: (v) => {
            if (Number.isNaN(Number(v))) throw new TypeError('not numeric');
          },
          assertion: (v) => typeof v === 'number',
        },
      ];

      expect([...validate(table, constraints)]).toEqual([
        PROBLEM_HEADER,
        ['n_number', 1, 'n', 'abc', 'TestFailure'],
        ['n_number', 1, 'n', 'abc', 'AssertionFailure'],
      ]);
    });

    it('should report an assertion that throws', () => {
      const table = [['n'], [null]];
      const constraints: Constraint[] = [
        {
          name: 'n_upper',
          field: 'n',
          assertion: (v) => {
            if (typeof v !== 'string') throw new TypeError('expected a string');
            return v === v.toUpperCase();
          },
        },
      ];

      const [problem] = [...validate(table, constraints).problems()];

      expect(problem).toEqual({
        name: 'n_upper',
        row: 1,
        field: 'n',
        value: null,
        error: 'AssertionFailure',
        cause: 'TypeError',
      });
    });

    it('should skip test and assertion when extraction fails', () => {
      const test = vi.fn();
      const assertion = vi.fn(() => true);
      const table = [['a', 'b'], [1]];

      expect([...validate(table, [{ name: 'b_check', field: 'b', test, assertion }])]).toEqual([
        PROBLEM_HEADER,
        ['__len__', 1, null, 1, 'RowLengthMismatch'],
        ['b_check', 1, 'b', null, 'ExtractionFailure'],
      ]);
      expect(test).not.toHaveBeenCalled();
      expect(assertion).not.toHaveBeenCalled();
    });

    it('should never report a value for whole-row constraints', () => {
      const table = [
        ['a', 'b'],
        [1, null],
      ];
      const constraints: Constraint[] = [
        { name: 'no_nulls', assertion: (row) => row instanceof RecordView && !row.values.includes(null) },
      ];

      expect([...validate(table, constraints)]).toEqual([PROBLEM_HEADER, ['no_nulls', 1, null, null, 'AssertionFailure']]);
    });

    it('should select several fields as a tuple', () => {
      const table = [
        ['start', 'end'],
        [1, 5],
        [7, 3],
      ];
      const constraints: Constraint[] = [
        {
          name: 'ordered',
          field: ['start', 'end'],
          assertion: (pair) => Array.isArray(pair) && pair[0] <= pair[1],
        },
      ];

      expect([...validate(table, constraints)]).toEqual([
        PROBLEM_HEADER,
        ['ordered', 2, ['start', 'end'], [7, 3], 'AssertionFailure'],
      ]);
    });

    it('should use a supplied getter and report its value when a field is named', () => {
      const table = [
        ['first', 'last'],
        ['Ada', ''],
      ];
      const constraints: Constraint[] = [
        {
          name: 'full_name',
          field: 'last',
          getter: (row) => `${String(row.get('first'))} ${String(row.get('last'))}`.trim(),
          assertion: (v) => typeof v === 'string' && v.includes(' '),
        },
        {
          name: 'initials',
          getter: (row) => String(row.get(0)).charAt(0),
          assertion: (v) => v === 'B',
        },
      ];

      expect([...validate(table, constraints)]).toEqual([
        PROBLEM_HEADER,
        ['full_name', 1, 'last', 'Ada', 'AssertionFailure'],
        ['initials', 1, null, null, 'AssertionFailure'],
      ]);
    });

    it('should keep evaluating other constraints and rows after a failure', () => {
      const table = [['a'], ['x'], ['y']];
      const constraints: Constraint[] = [
        {
          name: 'explodes',
          field: 'a',
          test: () => {
            throw new Error('boom');
          },
        },
        { name: 'is_y', field: 'a', assertion: (v) => v === 'y' },
      ];

      expect([...validate(table, constraints)]).toEqual([
        PROBLEM_HEADER,
        ['explodes', 1, 'a', 'x', 'TestFailure'],
        ['is_y', 1, 'a', 'x', 'AssertionFailure'],
        ['explodes', 2, 'a', 'y', 'TestFailure'],
      ]);
    });

    it('should accept rows given as any iterable', () => {
      const table = [new Set(['a', 'b']), new Map([[1, 2]]).keys()];

      expect([...validate(table)]).toEqual([PROBLEM_HEADER, ['__len__', 1, null, 1, 'RowLengthMismatch']]);
    });
  });

  describe('re-iteration', () => {
    it('should yield identical results on every pass', () => {
      const table = [['a', 'b'], [1, 2], [-1], [3, 4, 5]];
      const view = validate(table, [{ name: 'a_pos', field: 'a', assertion: isPositive }], ['a', 'b']);

      const first = [...view];
      const second = [...view];

      expect(second).toEqual(first);
      expect(first).toHaveLength(4);
    });

    it('should recompile constraints against the header of each pass', () => {
      const table: unknown[][] = [
        ['a', 'b'],
        [1, 2],
      ];
      const view = validate(table, [{ name: 'a_is_one', field: 'a', assertion: (v) => v === 1 }]);

      expect([...view]).toEqual([PROBLEM_HEADER]);

      table[0] = ['b', 'a'];

      expect([...view]).toEqual([PROBLEM_HEADER, ['a_is_one', 1, 'a', 2, 'AssertionFailure']]);
    });
  });
});
