import type { Problem } from '../model/Problem.js';

/** Emitted once per pass, after the header is read and constraints are compiled. */
export interface ValidationStartedEvent {
  readonly type: 'validation:started';
  /** Effective field list: the expected header when one was given, else the table's own. */
  readonly fields: readonly string[];
  readonly timestamp: number;
}

/** Emitted for each problem, just before it is handed to the consumer. */
export interface ProblemFoundEvent {
  readonly type: 'validation:problem';
  readonly problem: Problem;
  readonly timestamp: number;
}

/** Emitted when the table is exhausted. A consumer that stops early never sees it. */
export interface ValidationCompletedEvent {
  readonly type: 'validation:completed';
  readonly rowCount: number;
  readonly problemCount: number;
  readonly timestamp: number;
}

/** Emitted when the pass throws: a configuration error, or a failure from the table itself. */
export interface ValidationFailedEvent {
  readonly type: 'validation:failed';
  readonly error: string;
  readonly timestamp: number;
}

/** Discriminated union of all domain events. */
export type DomainEvent =
  | ValidationStartedEvent
  | ProblemFoundEvent
  | ValidationCompletedEvent
  | ValidationFailedEvent;

/** String literal union of all event type names. */
export type EventType = DomainEvent['type'];

/** Extract the payload type for a specific event type. */
export type EventPayload<T extends EventType> = Extract<DomainEvent, { type: T }>;
