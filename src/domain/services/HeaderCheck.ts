import type { TableRow } from '../ports/Table.js';

export type HeaderMismatch = 'FieldCountMismatch' | 'FieldOrderMismatch' | 'FieldNameMismatch';

/** Canonical string form of a header, used for comparison and field lookup. */
export function normalizeHeader(header: TableRow): string[] {
  return Array.from(header, (field) => String(field));
}

/** Compare two normalized headers. Returns `null` when they are identical. */
export function compareHeaders(expected: readonly string[], actual: readonly string[]): HeaderMismatch | null {
  if (expected.length !== actual.length) return 'FieldCountMismatch';
  if (expected.every((field, i) => field === actual[i])) return null;

  const sortedActual = [...actual].sort();
  const sameNames = [...expected].sort().every((field, i) => field === sortedActual[i]);
  return sameNames ? 'FieldOrderMismatch' : 'FieldNameMismatch';
}
