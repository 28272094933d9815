// Ledger entity - the task ledger document (TASK.md) and its entries

export type TaskStatus = "backlog" | "doing" | "done";

export const TASK_STATUSES = ["backlog", "doing", "done"] as const;

export function isValidTaskStatus(value: string): value is TaskStatus {
  return TASK_STATUSES.some((s) => s === value);
}

export const DEFAULT_TASK_PREFIX = "task-";

/**
 * One indented line under a body entry.
 * `timestamp` uses the `YYYY-MM-DD HH:MM` form; `hash` is a short commit hash.
 */
export type TaskComment = {
  readonly indent: string;
  readonly bullet: boolean;
  readonly timestamp: string | null;
  readonly text: string;
  readonly hash: string | null;
};

export type TaskEntry = {
  readonly id: string;
  readonly title: string | null;
  readonly done: boolean;
  readonly owner: string | null; // agent name, without the leading @
  readonly comments: readonly TaskComment[];
};

/**
 * Body content in document order. Anything that is not an entry is kept as
 * its raw line so serialization reproduces it unchanged.
 */
export type BodyNode =
  | {
    readonly kind: "heading";
    readonly level: number;
    readonly title: string;
    readonly line: string;
  }
  | { readonly kind: "text"; readonly line: string }
  | { readonly kind: "entry"; readonly entry: TaskEntry };

export type ReferenceNode =
  | { readonly kind: "definition"; readonly id: string; readonly target: string }
  | { readonly kind: "text"; readonly line: string };

/**
 * Horizontal rules found in the source, kept verbatim (`---` or `***`).
 * A null rule means the block had no delimiter of its own.
 */
export type LedgerLayout = {
  readonly metaRules: { readonly open: string; readonly close: string } | null;
  readonly descriptionRule: string | null;
  readonly referenceRule: string | null;
  readonly trailingNewline: boolean;
};

export type LedgerMeta = {
  readonly lines: readonly string[];
  readonly prefix: string;
};

export type TaskLedger = {
  readonly meta: LedgerMeta;
  readonly description: readonly string[];
  readonly body: readonly BodyNode[];
  readonly references: readonly ReferenceNode[];
  readonly layout: LedgerLayout;
};

export type TaskDefinition = {
  readonly id: string;
  readonly target: string;
};

/**
 * Read-side view of a task, joining the reference block with the body.
 */
export type TaskView = {
  readonly id: string;
  readonly nodeRef: string;
  readonly status: TaskStatus;
  readonly title: string | null;
  readonly owner: string | null;
  readonly comments: readonly TaskComment[];
};

export function definitions(ledger: TaskLedger): TaskDefinition[] {
  const result: TaskDefinition[] = [];
  for (const node of ledger.references) {
    if (node.kind === "definition") {
      result.push({ id: node.id, target: node.target });
    }
  }
  return result;
}

export function findDefinition(
  ledger: TaskLedger,
  id: string,
): TaskDefinition | null {
  return definitions(ledger).find((d) => d.id === id) ?? null;
}

/**
 * Locate a body entry by task id. `index` is the position in `ledger.body`.
 */
export function findEntry(
  ledger: TaskLedger,
  id: string,
): { readonly entry: TaskEntry; readonly index: number } | null {
  for (let i = 0; i < ledger.body.length; i++) {
    const node = ledger.body[i];
    if (node.kind === "entry" && node.entry.id === id) {
      return { entry: node.entry, index: i };
    }
  }
  return null;
}

export function statusOf(entry: TaskEntry | null): TaskStatus {
  if (!entry) return "backlog";
  return entry.done ? "done" : "doing";
}

/**
 * Build the view of a task, or null when the id has no reference definition.
 */
export function taskView(ledger: TaskLedger, id: string): TaskView | null {
  const definition = findDefinition(ledger, id);
  if (!definition) return null;
  const found = findEntry(ledger, id);
  const entry = found?.entry ?? null;
  return {
    id,
    nodeRef: definition.target,
    status: statusOf(entry),
    title: entry?.title ?? null,
    owner: entry?.owner ?? null,
    comments: entry?.comments ?? [],
  };
}

/**
 * Next id for the ledger prefix: one past the largest integer suffix.
 * Suffixes are compared as bigints, so arbitrarily long ids stay exact.
 */
export function nextTaskId(ledger: TaskLedger): string {
  const prefix = ledger.meta.prefix;
  let max = 0n;
  for (const { id } of definitions(ledger)) {
    if (!id.startsWith(prefix)) continue;
    const suffix = id.slice(prefix.length);
    if (/^\d+$/.test(suffix)) {
      const value = BigInt(suffix);
      if (value > max) max = value;
    }
  }
  return `${prefix}${max + 1n}`;
}

export function isBlankNode(node: BodyNode): boolean {
  return node.kind === "text" && node.line.trim() === "";
}

/**
 * Default document used when the ledger file does not exist yet.
 */
export const DEFAULT_LEDGER_TEXT = `---
PREFIX: ${DEFAULT_TASK_PREFIX}
---

---

`;
