// ReleaseTaskUseCase - Drop ownership of one or more tasks, optionally marking them done
// Every id is validated before any entry changes.

import {
  type BodyNode,
  findEntry,
  type TaskLedger,
  type TaskView,
  taskView,
} from "../../entities/ledger.js";
import { NoteError } from "../../entities/errors.js";

export interface ReleaseTaskInput {
  readonly ledger: TaskLedger;
  readonly ids: readonly string[];
  readonly done?: boolean;
  readonly force?: boolean;
}

export interface ReleaseTaskOutput {
  readonly ledger: TaskLedger;
  readonly tasks: readonly TaskView[];
}

export class ReleaseTaskUseCase {
  execute(input: ReleaseTaskInput): ReleaseTaskOutput {
    const { ledger, done = false, force = false } = input;
    if (input.ids.length === 0) {
      throw new NoteError("invalid_args", "At least one task id is required");
    }
    if (force && input.ids.length > 1) {
      throw new NoteError(
        "invalid_args",
        "--force can only be used with a single task id",
      );
    }

    const ids = [...new Set(input.ids)];
    const targets = ids.map((id) => {
      const found = findEntry(ledger, id);
      if (!found) {
        throw new NoteError("not_found", `Task '${id}' is not in progress`);
      }
      if (found.entry.owner === null && !force && !done) {
        throw new NoteError(
          "not_owned",
          `Task '${id}' has no owner (use --force to release it anyway)`,
        );
      }
      return found;
    });

    const body: BodyNode[] = [...ledger.body];
    for (const { entry, index } of targets) {
      body[index] = {
        kind: "entry",
        entry: { ...entry, owner: null, done: entry.done || done },
      };
    }

    const updated = { ...ledger, body };
    const tasks: TaskView[] = [];
    for (const id of ids) {
      const view = taskView(updated, id);
      if (view) tasks.push(view);
    }
    return { ledger: updated, tasks };
  }
}
