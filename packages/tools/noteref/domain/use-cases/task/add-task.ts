// AddTaskUseCase - Register a note reference in the ledger's reference block
// Idempotent: a node_ref already mapped returns its existing id untouched

import type { ResolutionContext } from "../../entities/reference.js";
import {
  definitions,
  findDefinition,
  nextTaskId,
  type ReferenceNode,
  type TaskLedger,
} from "../../entities/ledger.js";
import { NoteError } from "../../entities/errors.js";
import {
  type ResolveReferenceUseCase,
  selectPaths,
} from "../reference/resolve-reference.js";

export interface AddTaskInput {
  readonly ledger: TaskLedger;
  readonly nodeRef: string;
  readonly context: ResolutionContext;
}

export interface AddTaskOutput {
  readonly ledger: TaskLedger;
  readonly id: string;
  readonly created: boolean;
  readonly path: string;
}

/**
 * Insert a definition after the last existing one, or after the leading
 * blank lines of the reference block when it has none.
 */
export function appendDefinition(
  ledger: TaskLedger,
  id: string,
  target: string,
): TaskLedger {
  if (findDefinition(ledger, id)) {
    throw new NoteError(
      "duplicate_id",
      `Task id '${id}' is already defined in the reference block`,
    );
  }
  const refs = [...ledger.references];
  const node: ReferenceNode = { kind: "definition", id, target };

  let at = -1;
  refs.forEach((r, i) => {
    if (r.kind === "definition") at = i;
  });
  if (at >= 0) {
    at++;
  } else {
    at = 0;
    while (at < refs.length && isBlankReference(refs[at])) at++;
  }
  refs.splice(at, 0, node);

  const layout = ledger.layout.referenceRule === null &&
      definitions(ledger).length === 0
    ? { ...ledger.layout, referenceRule: "---" }
    : ledger.layout;

  return { ...ledger, references: refs, layout };
}

function isBlankReference(node: ReferenceNode): boolean {
  return node.kind === "text" && node.line.trim() === "";
}

export class AddTaskUseCase {
  constructor(private readonly resolver: ResolveReferenceUseCase) {}

  async execute(input: AddTaskInput): Promise<AddTaskOutput> {
    const nodeRef = input.nodeRef.trim();
    if (nodeRef === "") {
      throw new NoteError("invalid_args", "node_ref must not be empty");
    }

    // The reference must point at exactly one existing note.
    const { outcome } = await this.resolver.execute({
      raw: nodeRef,
      context: input.context,
    });
    const [path] = selectPaths(outcome, nodeRef);

    const existing = definitions(input.ledger).find((d) =>
      d.target === nodeRef
    );
    if (existing) {
      return { ledger: input.ledger, id: existing.id, created: false, path };
    }

    const id = nextTaskId(input.ledger);
    return {
      ledger: appendDefinition(input.ledger, id, nodeRef),
      id,
      created: true,
      path,
    };
  }
}
