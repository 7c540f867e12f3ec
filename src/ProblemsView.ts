import type { Constraint } from './domain/model/Constraint.js';
import type { Problem, ProblemHeader, ProblemRow } from './domain/model/Problem.js';
import type { Table } from './domain/ports/Table.js';
import type { DomainEvent, EventType, EventPayload } from './domain/events/DomainEvents.js';
import { PROBLEM_HEADER, toProblemRow } from './domain/model/Problem.js';
import { TableConsumedError } from './domain/errors/RowcheckError.js';
import { scanProblems } from './domain/services/ProblemScanner.js';
import { EventBus } from './application/EventBus.js';

export interface ProblemsViewConfig {
  readonly table: Table;
  readonly constraints?: readonly Constraint[] | null;
  /** Expected header. Without it the table's own header is used and never reported. */
  readonly header?: Iterable<unknown> | null;
}

/**
 * Lazy report of every problem found in a table.
 *
 * Itself a table: iteration yields `PROBLEM_HEADER` and then one row per
 * problem. Every iteration is a new pass over the source table that re-reads
 * its header and recompiles the constraints. A source that is its own
 * iterator (a generator object, for instance) supports one pass only.
 */
export class ProblemsView implements Iterable<ProblemHeader | ProblemRow> {
  private readonly table: Table;
  private readonly constraints: readonly Constraint[];
  private readonly header: readonly unknown[] | null;
  private readonly eventBus = new EventBus();
  private readonly singlePass: boolean;
  private passes = 0;

  constructor(config: ProblemsViewConfig) {
    this.table = config.table;
    this.constraints = [...(config.constraints ?? [])];
    this.header = config.header ? Array.from(config.header) : null;
    this.singlePass = isOwnIterator(config.table);
  }

  on<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.eventBus.on(type, handler);
    return this;
  }

  /** Subscribe to every event of every pass, e.g. to log them. */
  onAny(handler: (event: DomainEvent) => void): this {
    this.eventBus.onAny(handler);
    return this;
  }

  *[Symbol.iterator](): Generator<ProblemHeader | ProblemRow, void, undefined> {
    yield PROBLEM_HEADER;
    for (const problem of this.problems()) {
      yield toProblemRow(problem);
    }
  }

  /** Problems as records, including their `cause`. No report header. */
  *problems(): Generator<Problem, void, undefined> {
    if (this.singlePass && this.passes > 0) {
      throw new TableConsumedError();
    }
    this.passes++;

    const pass = scanProblems(this.table, this.constraints, this.header, {
      onFieldsResolved: (fields) => {
        this.eventBus.emit({ type: 'validation:started', fields, timestamp: Date.now() });
      },
      onCompleted: (summary) => {
        this.eventBus.emit({
          type: 'validation:completed',
          rowCount: summary.rows,
          problemCount: summary.problems,
          timestamp: Date.now(),
        });
      },
    });

    try {
      for (const problem of pass) {
        this.eventBus.emit({ type: 'validation:problem', problem, timestamp: Date.now() });
        yield problem;
      }
    } catch (error) {
      this.eventBus.emit({
        type: 'validation:failed',
        error: error instanceof Error ? error.message : String(error),
        timestamp: Date.now(),
      });
      throw error;
    }
  }

  /** Validate this report as a table in its own right. */
  validate(constraints?: readonly Constraint[] | null, header?: Iterable<unknown> | null): ProblemsView {
    return new ProblemsView({ table: this, constraints, header });
  }
}

function isOwnIterator(table: Table): boolean {
  return typeof table === 'object' && table !== null && 'next' in table && typeof table.next === 'function';
}
