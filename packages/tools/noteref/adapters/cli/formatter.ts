/**
 * CLI output formatters for noteref commands.
 *
 * Pure functions turning command results into human-readable text.
 */

import type {
  NoteError,
  TaskComment,
  TaskStatus,
  TaskView,
} from "../../types.js";
import { formatComment } from "../../domain/use-cases/ledger/parse-ledger.js";

const STATUS_MARKS: Record<TaskStatus, string> = {
  backlog: " ",
  doing: "/",
  done: "x",
};

export function formatCandidates(paths: readonly string[]): string {
  return paths.map((p, i) => `  ${i + 1}. ${p}`).join("\n");
}

export function formatTaskOneline(task: TaskView): string {
  const owner = task.owner ? ` @${task.owner}` : "";
  const title = task.title ? ` ${task.title}` : "";
  return `[${STATUS_MARKS[task.status]}] ${task.id}${title} (${task.nodeRef})${owner}`;
}

export function formatTaskList(tasks: readonly TaskView[]): string {
  if (tasks.length === 0) {
    return "No tasks";
  }

  const groups: string[] = [];
  for (const status of ["doing", "backlog", "done"] as const) {
    const inGroup = tasks.filter((t) => t.status === status);
    if (inGroup.length === 0) continue;
    groups.push(
      [`${status}:`, ...inGroup.map((t) => `  ${formatTaskOneline(t)}`)].join(
        "\n",
      ),
    );
  }
  return groups.join("\n\n");
}

export function formatTaskShow(task: TaskView): string {
  const lines = [
    `id:     ${task.id}`,
    `status: ${task.status}`,
    `title:  ${task.title ?? "(none)"}`,
    `owner:  ${task.owner ? `@${task.owner}` : "(none)"}`,
    `note:   ${task.nodeRef}`,
  ];
  if (task.comments.length > 0) {
    lines.push("", formatTaskLog(task));
  }
  return lines.join("\n");
}

export function formatTaskLog(task: TaskView): string {
  if (task.comments.length === 0) {
    return "No comments";
  }
  return task.comments.map((c: TaskComment) =>
    formatComment({ ...c, indent: "", bullet: true })
  ).join("\n");
}

export function formatError(error: NoteError): string {
  const lines = [`error: ${error.message}`];
  if (error.candidates.length > 0) {
    lines.push(formatCandidates(error.candidates));
  }
  return lines.join("\n");
}
