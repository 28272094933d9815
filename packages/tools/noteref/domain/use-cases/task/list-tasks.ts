// ListTasksUseCase - Read-side queries over a parsed ledger (list, show, find)

import {
  definitions,
  type TaskLedger,
  type TaskStatus,
  type TaskView,
  taskView,
} from "../../entities/ledger.js";
import { NoteError } from "../../entities/errors.js";

/** Owner filter value selecting tasks nobody holds. */
export const NO_OWNER = "(none)";

export interface ListTasksInput {
  readonly ledger: TaskLedger;
  readonly status?: TaskStatus;
  readonly owner?: string;
}

export function allTasks(ledger: TaskLedger): TaskView[] {
  const views: TaskView[] = [];
  for (const { id } of definitions(ledger)) {
    const view = taskView(ledger, id);
    if (view) views.push(view);
  }
  return views;
}

export class ListTasksUseCase {
  execute(input: ListTasksInput): TaskView[] {
    const owner = input.owner?.replace(/^@/, "");
    return allTasks(input.ledger).filter((task) => {
      if (input.status && task.status !== input.status) return false;
      if (owner === undefined) return true;
      return owner === NO_OWNER ? task.owner === null : task.owner === owner;
    });
  }

  /** One task by id; `not_found` when the id has no reference definition. */
  show(ledger: TaskLedger, id: string): TaskView {
    const view = taskView(ledger, id);
    if (!view) {
      throw new NoteError("not_found", `Task '${id}' not found`);
    }
    return view;
  }

  /** Tasks whose node_ref contains `text`. */
  find(ledger: TaskLedger, text: string): TaskView[] {
    const needle = text.trim();
    if (needle === "") {
      throw new NoteError("invalid_args", "Search text must not be empty");
    }
    return allTasks(ledger).filter((task) => task.nodeRef.includes(needle));
  }
}
