// noteref types, re-exported for the CLI layer and library callers

export type {
  AmbiguityOutcome,
  Candidate,
  DayQuery,
  NoteEntry,
  QueryKind,
  QueryShape,
  ResolutionContext,
  RuleName,
} from "./domain/entities/reference.js";
export { NOTE_EXTENSIONS } from "./domain/entities/reference.js";

export type {
  BodyNode,
  LedgerLayout,
  LedgerMeta,
  ReferenceNode,
  TaskComment,
  TaskDefinition,
  TaskEntry,
  TaskLedger,
  TaskStatus,
  TaskView,
} from "./domain/entities/ledger.js";
export {
  DEFAULT_TASK_PREFIX,
  definitions,
  isValidTaskStatus,
  nextTaskId,
  TASK_STATUSES,
  taskView,
} from "./domain/entities/ledger.js";

export { NoteError, type NoteErrorCode } from "./domain/entities/errors.js";
export type { DateTimeParts } from "./domain/ports/clock.js";
