// TakeTaskUseCase - Claim a task: promote it to the body (or reopen it) and set the owner

import {
  type BodyNode,
  findDefinition,
  findEntry,
  isBlankNode,
  type TaskEntry,
  type TaskLedger,
  type TaskView,
  taskView,
} from "../../entities/ledger.js";
import { NoteError } from "../../entities/errors.js";
import type { Clock } from "../../ports/clock.js";

export interface TakeTaskInput {
  readonly ledger: TaskLedger;
  readonly id: string;
  readonly title?: string;
  readonly header?: string;
  readonly agent?: string | null;
}

export interface TakeTaskOutput {
  readonly ledger: TaskLedger;
  readonly task: TaskView;
  readonly created: boolean;
}

function normalizeHeader(header: string): string {
  return header.trim().replace(/^#+\s*/, "").trim();
}

/**
 * Index after the last entry of the section opened by the heading at
 * `headingIndex`. An empty section gets the entry after the heading and one
 * blank line.
 */
function sectionInsertIndex(
  body: readonly BodyNode[],
  headingIndex: number,
): number {
  let end = body.length;
  let lastEntry = -1;
  for (let i = headingIndex + 1; i < body.length; i++) {
    const node = body[i];
    if (node.kind === "heading") {
      end = i;
      break;
    }
    if (node.kind === "entry") lastEntry = i;
  }
  if (lastEntry >= 0) return lastEntry + 1;
  const afterHeading = headingIndex + 1;
  if (afterHeading < end && isBlankNode(body[afterHeading])) {
    return afterHeading + 1;
  }
  return afterHeading;
}

export class TakeTaskUseCase {
  constructor(private readonly clock: Clock) {}

  execute(input: TakeTaskInput): TakeTaskOutput {
    const { ledger, id } = input;
    const title = input.title?.trim() || undefined;
    if (title !== undefined && /[[\]\n]/.test(title)) {
      throw new NoteError(
        "invalid_args",
        "Task title must not contain brackets or line breaks",
      );
    }

    const found = findEntry(ledger, id);
    if (!found && !findDefinition(ledger, id)) {
      throw new NoteError("not_found", `Task '${id}' not found`);
    }
    if (found?.entry.owner) {
      throw new NoteError(
        "already_owned",
        `Task '${id}' is already owned by @${found.entry.owner}`,
      );
    }

    const headingIndex = input.header !== undefined
      ? this.findHeading(ledger.body, input.header)
      : -1;

    const entry = this.claim(found?.entry ?? null, id, title, input.agent);
    const body = [...ledger.body];

    if (found) {
      if (headingIndex >= 0) {
        body.splice(found.index, 1);
        const adjusted = found.index < headingIndex
          ? headingIndex - 1
          : headingIndex;
        body.splice(sectionInsertIndex(body, adjusted), 0, {
          kind: "entry",
          entry,
        });
      } else {
        body[found.index] = { kind: "entry", entry };
      }
    } else if (headingIndex >= 0) {
      body.splice(sectionInsertIndex(body, headingIndex), 0, {
        kind: "entry",
        entry,
      });
    } else {
      this.insertDefault(body, entry);
    }

    const updated = { ...ledger, body };
    const task = taskView(updated, id);
    if (!task) {
      throw new NoteError("not_found", `Task '${id}' not found`);
    }
    return { ledger: updated, task, created: found === null };
  }

  private claim(
    previous: TaskEntry | null,
    id: string,
    title: string | undefined,
    agent: string | null | undefined,
  ): TaskEntry {
    const owner = agent || null;
    if (!previous) {
      return { id, title: title ?? null, done: false, owner, comments: [] };
    }

    let comments = previous.comments;
    let nextTitle = previous.title;
    if (title !== undefined) {
      if (previous.title === null) {
        nextTitle = title;
      } else if (previous.title !== title) {
        comments = [
          ...comments,
          {
            indent: "  ",
            bullet: true,
            timestamp: this.clock.now().stamp,
            text: title,
            hash: null,
          },
        ];
      }
    }
    return { ...previous, title: nextTitle, done: false, owner, comments };
  }

  private findHeading(body: readonly BodyNode[], header: string): number {
    const wanted = normalizeHeader(header);
    const index = body.findIndex((n) =>
      n.kind === "heading" && n.title.trim() === wanted
    );
    if (index < 0) {
      throw new NoteError("header_not_found", `Header '${header}' not found`);
    }
    return index;
  }

  /**
   * New entries go right before the first heading (followed by a blank
   * line), or after the last non-blank line when the body has no heading.
   */
  private insertDefault(body: BodyNode[], entry: TaskEntry): void {
    const node: BodyNode = { kind: "entry", entry };
    const firstHeading = body.findIndex((n) => n.kind === "heading");
    if (firstHeading >= 0) {
      body.splice(firstHeading, 0, node, { kind: "text", line: "" });
      return;
    }

    let lastContent = -1;
    body.forEach((n, i) => {
      if (!isBlankNode(n)) lastContent = i;
    });
    if (lastContent >= 0) {
      body.splice(lastContent + 1, 0, node);
      return;
    }
    // Blank body: keep one blank line on each side of the entry.
    if (body.length === 0) body.push({ kind: "text", line: "" });
    body.splice(1, 0, node);
    if (body.length === 2) body.push({ kind: "text", line: "" });
  }
}
