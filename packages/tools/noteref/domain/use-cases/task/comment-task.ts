// CommentTaskUseCase - Append a timestamped comment line under a body entry

import {
  findEntry,
  type TaskComment,
  type TaskLedger,
} from "../../entities/ledger.js";
import { NoteError } from "../../entities/errors.js";
import { formatComment, parseComment } from "../ledger/parse-ledger.js";
import type { Clock } from "../../ports/clock.js";

export interface CommentTaskInput {
  readonly ledger: TaskLedger;
  readonly id: string;
  readonly text: string;
  readonly gitHash?: string;
}

export interface CommentTaskOutput {
  readonly ledger: TaskLedger;
  readonly comment: TaskComment;
}

const GIT_HASH_RE = /^[0-9a-fA-F]{4,40}$/;

export class CommentTaskUseCase {
  constructor(private readonly clock: Clock) {}

  execute(input: CommentTaskInput): CommentTaskOutput {
    const text = input.text.trim();
    if (text === "" || text.includes("\n")) {
      throw new NoteError(
        "invalid_args",
        "Comment text must be a single non-empty line",
      );
    }
    const hash = input.gitHash?.trim() || null;
    if (hash !== null && !GIT_HASH_RE.test(hash)) {
      throw new NoteError(
        "invalid_args",
        `Invalid git hash '${hash}': expected 4-40 hex characters`,
      );
    }

    const found = findEntry(input.ledger, input.id);
    if (!found) {
      throw new NoteError(
        "not_found",
        `Task '${input.id}' is not in progress (take it before commenting)`,
      );
    }

    const draft: TaskComment = {
      indent: "  ",
      bullet: true,
      timestamp: this.clock.now().stamp,
      text,
      hash,
    };
    // Stored as the line reads back: a trailing `[hex]` in the text is a hash.
    const comment = parseComment(formatComment(draft)) ?? draft;
    const body = [...input.ledger.body];
    body[found.index] = {
      kind: "entry",
      entry: {
        ...found.entry,
        comments: [...found.entry.comments, comment],
      },
    };
    return { ledger: { ...input.ledger, body }, comment };
  }
}
