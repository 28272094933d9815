/**
 * Use Case: ResolveReference
 *
 * Raw reference -> query shape -> candidate set -> ambiguity outcome.
 * Zero matches is a normal outcome (`not_found`), never an exception; only
 * malformed references throw.
 *
 * Dependencies: ParseReferenceUseCase, ResolutionRuleChain, NoteTree (port).
 */

import { join } from "node:path";
import {
  DAILY_DIR,
  NOTE_DIR,
} from "../../entities/collection.js";
import { NoteError } from "../../entities/errors.js";
import type {
  AmbiguityOutcome,
  Candidate,
  QueryShape,
  ResolutionContext,
} from "../../entities/reference.js";
import type { NoteTree } from "../../ports/note-tree.js";
import type { ParseReferenceUseCase } from "./parse-reference.js";
import type { ResolutionRuleChain } from "./resolution-rules.js";

export interface ResolveReferenceInput {
  readonly raw: string;
  readonly context: ResolutionContext;
}

export interface ResolveReferenceResult {
  readonly shape: QueryShape;
  readonly candidates: readonly Candidate[];
  readonly outcome: AmbiguityOutcome;
}

export function resolveUnique(
  candidates: readonly Candidate[],
): AmbiguityOutcome {
  if (candidates.length === 0) return { kind: "not_found" };
  if (candidates.length === 1) {
    return { kind: "unique", path: candidates[0].path };
  }
  return { kind: "ambiguous", candidates };
}

/**
 * Turn an outcome into the paths an operation should act on.
 * `force` lets an ambiguous outcome through as a batch; only operations
 * that are safe to repeat per path should pass it.
 */
export function selectPaths(
  outcome: AmbiguityOutcome,
  reference: string,
  options: { readonly force?: boolean } = {},
): string[] {
  switch (outcome.kind) {
    case "unique":
      return [outcome.path];
    case "not_found":
      throw new NoteError("not_found", `Note '${reference}' not found`);
    case "ambiguous": {
      const paths = outcome.candidates.map((c) => c.path);
      if (options.force) return paths;
      throw new NoteError(
        "ambiguous",
        `Ambiguous note reference '${reference}': ${paths.length} candidates found`,
        paths,
      );
    }
  }
}

export class ResolveReferenceUseCase {
  constructor(
    private readonly parser: ParseReferenceUseCase,
    private readonly chain: ResolutionRuleChain,
    private readonly tree: NoteTree,
  ) {}

  async execute(input: ResolveReferenceInput): Promise<ResolveReferenceResult> {
    this.parser.validate(input.raw);
    const shape = this.parser.execute({ raw: input.raw });
    return await this.resolveShape(shape, input.context);
  }

  /**
   * Look up permanent notes filed under a source string. The string is
   * opaque: it is hashed, never parsed as a reference.
   */
  async executeSource(
    source: string,
    context: ResolutionContext,
  ): Promise<ResolveReferenceResult> {
    const text = source.trim();
    if (text === "") {
      throw new NoteError("invalid_args", "Source string must not be empty");
    }
    return await this.resolveShape({ kind: "literal", text }, context);
  }

  /** Build the search context for a collection rooted at `root`. */
  async contextFor(root: string, todayDate: string): Promise<ResolutionContext> {
    return {
      dailyRoot: join(root, DAILY_DIR),
      todayDate,
      permanentRoot: join(root, NOTE_DIR),
      indexFiles: await this.tree.listIndexFiles(root),
    };
  }

  private async resolveShape(
    shape: QueryShape,
    context: ResolutionContext,
  ): Promise<ResolveReferenceResult> {
    const candidates = await this.chain.resolve(shape, context);
    return { shape, candidates, outcome: resolveUnique(candidates) };
  }
}
