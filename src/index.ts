// Main entry point
export { validate } from './validate.js';
export { ProblemsView } from './ProblemsView.js';
export type { ProblemsViewConfig } from './ProblemsView.js';

// Domain model
export type { Constraint, CompiledConstraint, Field, Getter, TestFn, AssertionFn } from './domain/model/Constraint.js';
export type { Problem, ProblemKind, ProblemRow, ProblemHeader } from './domain/model/Problem.js';
export { PROBLEM_HEADER, HEADER_CHECK, LENGTH_CHECK, toProblemRow, causeOf } from './domain/model/Problem.js';
export { FieldIndex, RecordView } from './domain/model/Record.js';

// Errors
export {
  RowcheckError,
  FieldSelectionError,
  MissingValueError,
  EmptyValueError,
  CoercionError,
  TableConsumedError,
} from './domain/errors/RowcheckError.js';

// Domain services (for building custom validation passes)
export { ConstraintCompiler } from './domain/services/ConstraintCompiler.js';
export { scanProblems } from './domain/services/ProblemScanner.js';
export type { ScanHooks, ScanSummary } from './domain/services/ProblemScanner.js';
export { selectIndices, hasFields } from './domain/services/FieldSelector.js';
export { normalizeHeader, compareHeaders } from './domain/services/HeaderCheck.js';
export type { HeaderMismatch } from './domain/services/HeaderCheck.js';

// Built-in checks
export {
  toNumber,
  toInteger,
  toBoolean,
  toDate,
  toIsoDate,
  notEmpty,
  isEmail,
  noneMissing,
  oneOf,
  matches,
} from './domain/services/checks.js';

// Ports (for custom implementations)
export type { Table, TableRow } from './domain/ports/Table.js';

// Domain events
export type {
  DomainEvent,
  EventType,
  EventPayload,
  ValidationStartedEvent,
  ProblemFoundEvent,
  ValidationCompletedEvent,
  ValidationFailedEvent,
} from './domain/events/DomainEvents.js';
export { EventBus } from './application/EventBus.js';

// Infrastructure adapters (built-in)
export { ArrayTable } from './infrastructure/tables/ArrayTable.js';
export { CsvTable } from './infrastructure/tables/CsvTable.js';
export type { CsvTableOptions } from './infrastructure/tables/CsvTable.js';
export { JsonTable } from './infrastructure/tables/JsonTable.js';
export type { JsonTableOptions } from './infrastructure/tables/JsonTable.js';
